/**
 * 스테이킹 엔진 에러 체계
 *
 * 닫힌(closed) 분류:
 * - 모든 에러는 동기적으로 발생하고, 입력을 바꾸지 않는 재시도는 의미 없음
 * - 배치 처리 중 발생한 행(row) 에러는 실패한 행의 index를 포함
 *   → 릴레이어는 해당 행만 제거하고 다시 제출하면 됨
 * - 에러가 발생하면 해당 호출에서 일어난 모든 변경(커스터디 이동 포함)은 롤백됨
 */

export type StakingErrorCode =
  | 'AmountZero'
  | 'DurationZero'
  | 'AlreadyStaked'
  | 'StakeZero'
  | 'NotUnlocked'
  | 'DelegateAddressInUse'
  | 'LengthMismatch'
  | 'NonceUsed'
  | 'InvalidSignature'
  | 'VotingPowerZero'
  | 'TopicExpired'
  | 'StakeExpiresBeforeVote'
  | 'AlreadyVoted'
  | 'Forbidden'
  | 'WrongAsset'
  | 'ReentrantCall';

export abstract class StakingError extends Error {
  abstract readonly code: StakingErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * API 응답용 직렬화
   */
  toJSON(): Record<string, string | number> {
    return { error: this.code, message: this.message };
  }
}

/**
 * 배치의 특정 행에서 발생한 에러
 */
export abstract class RowError extends StakingError {
  constructor(
    readonly index: number,
    message: string,
  ) {
    super(`${message} (row ${index})`);
  }

  toJSON(): Record<string, string | number> {
    return { ...super.toJSON(), index: this.index };
  }
}

export class AmountZero extends StakingError {
  readonly code = 'AmountZero';

  constructor() {
    super('Amount and collateral are both empty');
  }
}

export class DurationZero extends StakingError {
  readonly code = 'DurationZero';

  constructor() {
    super('Duration must be positive');
  }
}

export class AlreadyStaked extends StakingError {
  readonly code = 'AlreadyStaked';

  constructor() {
    super('Caller already has an active stake');
  }
}

export class StakeZero extends StakingError {
  readonly code = 'StakeZero';

  constructor() {
    super('Caller has no active stake');
  }
}

export class NotUnlocked extends StakingError {
  readonly code = 'NotUnlocked';

  constructor(readonly unlockTime: number) {
    super(`Stake is locked until ${unlockTime}`);
  }
}

export class DelegateAddressInUse extends StakingError {
  readonly code = 'DelegateAddressInUse';

  constructor(readonly address: string) {
    super(`Address ${address} is already linked to another staker`);
  }
}

export class LengthMismatch extends StakingError {
  readonly code = 'LengthMismatch';

  constructor(left: number, right: number) {
    super(`Array lengths differ: ${left} != ${right}`);
  }
}

export class NonceUsed extends RowError {
  readonly code = 'NonceUsed';

  constructor(
    index: number,
    readonly nonce: bigint,
  ) {
    super(index, `Nonce ${nonce} already consumed`);
  }

  toJSON(): Record<string, string | number> {
    return { ...super.toJSON(), nonce: this.nonce.toString() };
  }
}

export class InvalidSignature extends RowError {
  readonly code = 'InvalidSignature';

  constructor(index: number) {
    super(index, 'Signature does not match the declared signer');
  }
}

export class VotingPowerZero extends RowError {
  readonly code = 'VotingPowerZero';

  constructor(index: number) {
    super(index, 'Voter has no voting power');
  }
}

export class TopicExpired extends RowError {
  readonly code = 'TopicExpired';

  constructor(index: number) {
    super(index, 'Topic voting window has closed');
  }
}

export class StakeExpiresBeforeVote extends RowError {
  readonly code = 'StakeExpiresBeforeVote';

  constructor(index: number) {
    super(index, 'Voter stake unlocks before the topic expires');
  }
}

export class AlreadyVoted extends RowError {
  readonly code = 'AlreadyVoted';

  constructor(index: number) {
    super(index, 'Voter already voted on this topic');
  }
}

export class Forbidden extends StakingError {
  readonly code = 'Forbidden';

  constructor(reason = 'Forbidden') {
    super(reason);
  }
}

export class WrongAsset extends StakingError {
  readonly code = 'WrongAsset';

  constructor(reason = 'Unsolicited custody inbound') {
    super(reason);
  }
}

export class ReentrantCall extends StakingError {
  readonly code = 'ReentrantCall';

  constructor() {
    super('Re-entrant call into the staking engine');
  }
}
