import { Amount, NftId, UnixTime } from '../../common/types/common.types';

/**
 * Stake Entity
 *
 * 스테이커 한 명의 담보 기록
 * - amount: 대체 가능 담보 수량
 * - unlockTime: 이 시각 이후에만 언스테이킹 가능
 * - collateralIds: 담보로 맡긴 NFT
 *
 * 불변 레코드:
 * - 모든 변경 메서드는 새 Stake를 반환 (저널 테이블에 교체 저장)
 *
 * 활성 조건:
 * - amount > 0 또는 collateralIds 비어있지 않음
 */
export class Stake {
  readonly amount: Amount;
  readonly unlockTime: UnixTime;
  readonly collateralIds: ReadonlySet<NftId>;

  constructor(amount: Amount, unlockTime: UnixTime, collateralIds: Iterable<NftId> = []) {
    if (amount < 0n) {
      throw new Error('Stake amount must not be negative');
    }
    this.amount = amount;
    this.unlockTime = unlockTime;
    this.collateralIds = new Set(collateralIds);
  }

  static empty(): Stake {
    return new Stake(0n, 0);
  }

  get isActive(): boolean {
    return this.amount > 0n || this.collateralIds.size > 0;
  }

  hasCollateral(id: NftId): boolean {
    return this.collateralIds.has(id);
  }

  /**
   * 담보 추가 (unlockTime 유지)
   */
  withAdded(amount: Amount, nftIds: readonly NftId[]): Stake {
    return new Stake(this.amount + amount, this.unlockTime, [
      ...this.collateralIds,
      ...nftIds,
    ]);
  }

  withExtended(duration: number): Stake {
    return new Stake(this.amount, this.unlockTime + duration, this.collateralIds);
  }

  /**
   * 대체 가능 담보 차감
   *
   * @throws {Error} 잔여 담보보다 많이 차감하려는 경우
   */
  withoutAmount(amount: Amount): Stake {
    if (amount > this.amount) {
      throw new Error(`Insufficient stake. Current: ${this.amount}, Required: ${amount}`);
    }
    return this.settle(new Stake(this.amount - amount, this.unlockTime, this.collateralIds));
  }

  withoutCollateral(id: NftId): Stake {
    const remaining = [...this.collateralIds].filter((item) => item !== id);
    return this.settle(new Stake(this.amount, this.unlockTime, remaining));
  }

  toJSON() {
    return {
      amount: this.amount.toString(),
      unlockTime: this.unlockTime,
      nftIds: [...this.collateralIds].map((id) => id.toString()),
    };
  }

  // 비활성이 된 기록은 unlockTime도 비워서 새로 스테이킹할 수 있게 함
  private settle(next: Stake): Stake {
    return next.isActive ? next : Stake.empty();
  }
}
