import { Injectable } from '@nestjs/common';
import { NonceUsed } from '../common/errors/staking.errors';
import { Address } from '../common/types/common.types';
import { StakingStateStore } from '../state/staking-state.store';

/**
 * nonce 네임스페이스
 *
 * - transfer: 자산 이동 토픽의 수신자 nonce
 * - caller: 서명된 호출자 동작 (스테이크 변경, BLS 등록)
 */
export type NonceScope = 'transfer' | 'caller';

/**
 * ReplayGuardService
 *
 * 소비된 (scope, identity, nonce) 쌍의 원장
 *
 * - 한 번 소비된 nonce는 다른 토픽에서도 다시 쓸 수 없음
 * - 원장은 줄어들지 않음 (롤백된 호출 안에서의 소비는 예외)
 */
@Injectable()
export class ReplayGuardService {
  constructor(private readonly state: StakingStateStore) {}

  isUsed(scope: NonceScope, identity: Address, nonce: bigint): boolean {
    return this.state.usedNonces.has(this.key(scope, identity, nonce));
  }

  /**
   * @throws {NonceUsed} 이미 소비된 nonce가 하나라도 있으면 (첫 번째 것을 보고)
   */
  assertUnused(
    index: number,
    scope: NonceScope,
    identity: Address,
    nonces: readonly bigint[],
  ): void {
    for (const nonce of nonces) {
      if (this.isUsed(scope, identity, nonce)) {
        throw new NonceUsed(index, nonce);
      }
    }
  }

  consume(scope: NonceScope, identity: Address, nonces: readonly bigint[]): void {
    for (const nonce of nonces) {
      this.state.usedNonces.add(this.key(scope, identity, nonce));
    }
  }

  private key(scope: NonceScope, identity: Address, nonce: bigint): string {
    return `${scope}:${identity.toLowerCase()}:${nonce}`;
  }
}
