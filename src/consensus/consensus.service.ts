import { Inject, Injectable, Logger } from '@nestjs/common';
import { Clock } from '../common/clock/clock';
import { Signature } from '../common/crypto/crypto.types';
import {
  AlreadyVoted,
  Forbidden,
  InvalidSignature,
  LengthMismatch,
  StakeExpiresBeforeVote,
  TopicExpired,
  VotingPowerZero,
} from '../common/errors/staking.errors';
import {
  Address,
  Amount,
  Hash,
  UnixTime,
} from '../common/types/common.types';
import { STAKING_CONFIG, StakingConfig } from '../config/staking.config';
import { NonReentrantGate } from '../guard/non-reentrant.gate';
import { SignatureService } from '../signature/signature.service';
import { StakeService } from '../stake/stake.service';
import { StakingStateStore } from '../state/staking-state.store';
import { AssetTransferEffect } from './effects/asset-transfer.effect';
import { ParameterChangeEffect } from './effects/parameter-change.effect';
import { PriceUpdateEffect } from './effects/price-update.effect';
import { TopicEffect } from './effects/topic-effect.interface';
import { GlobalParameters } from './entities/global-parameters.entity';
import { TopicRecord } from './entities/topic.entity';
import {
  SetNftPricesKey,
  SetNftPricesMessage,
  SetParamsKey,
  SetParamsMessage,
  TopicKeys,
  TopicKind,
  TopicMessages,
  TransferKey,
  TransferMessage,
} from './types/topic-payloads';

/**
 * 배치 한 행의 처리 결과
 */
export interface VoteOutcome {
  index: number;
  topic: Hash;
  voter: Address;
  /**
   * false: 이미 투표한 투표자의 중복 행 (ignore 정책)
   */
  counted: boolean;
  votedPower: Amount;
  accepted: boolean;
  /**
   * 이 행에서 임계치에 도달해 효과가 실행됐는지
   */
  executed: boolean;
}

/**
 * 토픽 조회 결과
 */
export interface TopicStatus {
  key: Hash;
  record: TopicRecord | null;
  expiresAt: UnixTime | null;
}

/**
 * Consensus Service (ConsensusEngine)
 *
 * 지분 가중 오프체인 서명 합의
 *
 * 흐름:
 * - 릴레이어가 여러 스테이커의 서명된 메시지를 배치로 제출
 * - 같은 내용(토픽 키)에 대한 투표의 투표력을 누적
 * - 누적 투표력 >= floor(전체 투표력 × threshold / 100) → 효과를 정확히 한 번 실행
 *
 * 배치:
 * - 순서대로 처리, 한 행이라도 실패하면 배치 전체 롤백
 * - 에러에는 실패한 행의 index 포함
 */
@Injectable()
export class ConsensusService {
  private readonly logger = new Logger(ConsensusService.name);

  constructor(
    private readonly state: StakingStateStore,
    private readonly stakeService: StakeService,
    private readonly signatures: SignatureService,
    private readonly gate: NonReentrantGate,
    private readonly clock: Clock,
    private readonly transferEffect: AssetTransferEffect,
    private readonly paramsEffect: ParameterChangeEffect,
    private readonly pricesEffect: PriceUpdateEffect,
    @Inject(STAKING_CONFIG) private readonly config: StakingConfig,
  ) {}

  // ========================================
  // 투표 진입점
  // ========================================

  transfer(
    messages: readonly TransferMessage[],
    signatures: readonly Signature[],
  ): VoteOutcome[] {
    return this.submit(this.transferEffect, messages, signatures);
  }

  setParams(
    messages: readonly SetParamsMessage[],
    signatures: readonly Signature[],
  ): VoteOutcome[] {
    return this.submit(this.paramsEffect, messages, signatures);
  }

  setNftPrices(
    messages: readonly SetNftPricesMessage[],
    signatures: readonly Signature[],
  ): VoteOutcome[] {
    return this.submit(this.pricesEffect, messages, signatures);
  }

  // ========================================
  // 조회
  // ========================================

  getParams(): GlobalParameters {
    return this.state.params.get();
  }

  getChainId(): number {
    return this.config.domain.chainId;
  }

  /**
   * 승인 임계치 (전체 투표력 대비 %)
   */
  getConsensusThreshold(): number {
    return this.state.params.get().threshold;
  }

  /**
   * 현재 승인에 필요한 투표력
   */
  getRequiredPower(): Amount {
    return this.requiredPower(this.state.params.get());
  }

  getTransferStatus(key: TransferKey): TopicStatus {
    return this.status('transfer', key);
  }

  getSetParamsStatus(key: SetParamsKey): TopicStatus {
    return this.status('params', key);
  }

  getSetNftPricesStatus(key: SetNftPricesKey): TopicStatus {
    return this.status('prices', key);
  }

  /**
   * 토픽 키로 기록 조회
   */
  getTopic(key: Hash): TopicRecord | null {
    return this.state.topics.get(key.toLowerCase()) ?? null;
  }

  hasVoted(key: Hash, voter: Address): boolean {
    return this.getTopic(key)?.hasVoted(voter.toLowerCase()) ?? false;
  }

  topicKeyOf<K extends TopicKind>(kind: K, key: TopicKeys[K]): Hash {
    return this.signatures.topicKey(kind, key);
  }

  // ========================================
  // 투표 누적
  // ========================================

  private submit<K extends TopicKind>(
    effect: TopicEffect<K>,
    messages: readonly TopicMessages[K][],
    signatures: readonly Signature[],
  ): VoteOutcome[] {
    return this.gate.run(`vote:${effect.kind}`, () => {
      if (messages.length !== signatures.length) {
        throw new LengthMismatch(messages.length, signatures.length);
      }
      const now = this.clock.now();
      if (now < this.config.activationTime) {
        throw new Forbidden(`Voting opens at ${this.config.activationTime}`);
      }

      return messages.map((message, index) =>
        this.vote(effect, index, message, signatures[index], now),
      );
    });
  }

  /**
   * 투표 한 행 처리
   *
   * 1. 토픽 키 계산, 첫 투표면 firstSeen = now, expiresAt = now + expiration
   * 2. now > expiresAt → TopicExpired
   * 3. 승인 전이면 종류별 사전 검증
   * 4. 서명 → 투표자 (불일치 → InvalidSignature)
   * 5. 중복 투표 → 정책에 따라 무시 또는 AlreadyVoted
   * 6. 투표력 0 → VotingPowerZero, 잠금 해제가 마감 이전 → StakeExpiresBeforeVote
   * 7. 투표 기록, 투표력 누적
   * 8. 이미 승인됨 → 종료
   * 9. 임계치 도달 → 승인 + 효과 실행
   */
  private vote<K extends TopicKind>(
    effect: TopicEffect<K>,
    index: number,
    message: TopicMessages[K],
    signature: Signature,
    now: UnixTime,
  ): VoteOutcome {
    // 행마다 스냅샷: 앞 행에서 승인된 ParameterChange가 반영됨
    const params = this.state.params.get();
    const key = effect.keyOf(message);
    const topicKey = this.signatures.topicKey(effect.kind, key);

    let topic = this.state.topics.get(topicKey);
    if (!topic) {
      topic = TopicRecord.open(
        topicKey,
        effect.payloadOf(key),
        now,
        params.expiration,
      );
      this.state.topics.set(topicKey, topic);
    }

    if (!topic.isOpenAt(now)) {
      throw new TopicExpired(index);
    }

    if (!topic.accepted) {
      effect.precheck(index, key, params);
    }

    const voter = this.signatures.resolveVoter(
      effect.kind,
      message,
      signature,
      effect.voterOf(message),
    );
    if (voter === null) {
      throw new InvalidSignature(index);
    }

    if (topic.hasVoted(voter)) {
      if (this.config.duplicateVotePolicy === 'reject') {
        throw new AlreadyVoted(index);
      }
      return this.outcome(index, topic, voter, false, false);
    }

    const stake = this.stakeService.getStake(voter);
    const power = this.stakeService.votingPowerOf(stake);
    if (power === 0n) {
      throw new VotingPowerZero(index);
    }
    if (stake.unlockTime <= topic.expiresAt) {
      throw new StakeExpiresBeforeVote(index);
    }

    topic = topic.withVote(voter, power);
    this.state.topics.set(topicKey, topic);
    this.logger.debug(
      `${effect.kind} ${topicKey}: ${voter} +${power} → ${topic.votedPower}`,
    );

    if (topic.accepted) {
      return this.outcome(index, topic, voter, true, false);
    }

    if (topic.votedPower < this.requiredPower(params)) {
      return this.outcome(index, topic, voter, true, false);
    }

    topic = topic.withAccepted();
    this.state.topics.set(topicKey, topic);
    effect.apply(key, params);
    this.logger.log(`${effect.kind} topic ${topicKey} accepted at ${topic.votedPower}`);

    return this.outcome(index, topic, voter, true, true);
  }

  private requiredPower(params: GlobalParameters): Amount {
    return (this.state.totalVotingPower.get() * BigInt(params.threshold)) / 100n;
  }

  private status<K extends TopicKind>(kind: K, key: TopicKeys[K]): TopicStatus {
    const topicKey = this.signatures.topicKey(kind, key);
    const record = this.getTopic(topicKey);
    return {
      key: topicKey,
      record,
      expiresAt: record ? record.expiresAt : null,
    };
  }

  private outcome(
    index: number,
    topic: TopicRecord,
    voter: Address,
    counted: boolean,
    executed: boolean,
  ): VoteOutcome {
    return {
      index,
      topic: topic.key,
      voter,
      counted,
      votedPower: topic.votedPower,
      accepted: topic.accepted,
      executed,
    };
  }
}
