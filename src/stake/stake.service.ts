import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { Clock } from '../common/clock/clock';
import {
  AlreadyStaked,
  AmountZero,
  DurationZero,
  Forbidden,
  NotUnlocked,
  StakeZero,
  WrongAsset,
} from '../common/errors/staking.errors';
import {
  Address,
  Amount,
  NftId,
  normalizeAddress,
} from '../common/types/common.types';
import { STAKING_CONFIG, StakingConfig } from '../config/staking.config';
import { GlobalParameters } from '../consensus/entities/global-parameters.entity';
import { ICustodyRegistry } from '../custody/interfaces/custody-registry.interface';
import { INftReceiver } from '../custody/interfaces/nft-custodian.interface';
import { NonReentrantGate } from '../guard/non-reentrant.gate';
import { StakingStateStore } from '../state/staking-state.store';
import { Stake } from './entities/stake.entity';

interface ExpectedNft {
  collection: Address;
  id: NftId;
}

/**
 * Stake Service (StakeLedger)
 *
 * 역할:
 * - 스테이크 생명주기: stake → increaseStake / extend → unstake
 * - 투표력 계산: amount + Σ 캐시된 NFT 가격
 * - 전체 투표력 풀 관리
 *
 * 불변식:
 * - Σ(활성 스테이커의 투표력) == totalVotingPower (모든 변경 연산 이후)
 * - Σ(활성 스테이커의 amount) == totalStakedAmount
 *
 * 커스터디:
 * - 담보는 엔진 주소가 보유
 * - NFT는 엔진 자신이 끌어오는 동안에만 받아들임 (onNftReceived)
 */
@Injectable()
export class StakeService implements INftReceiver, OnModuleInit {
  private readonly logger = new Logger(StakeService.name);

  /**
   * 현재 끌어오는 중인 NFT
   *
   * null이면 들어오는 NFT는 모두 거부
   */
  private expecting: ExpectedNft | null = null;

  constructor(
    private readonly state: StakingStateStore,
    private readonly custody: ICustodyRegistry,
    private readonly gate: NonReentrantGate,
    private readonly clock: Clock,
    @Inject(STAKING_CONFIG) private readonly config: StakingConfig,
  ) {}

  onModuleInit(): void {
    this.listenTo(this.state.params.get().nft);
  }

  /**
   * NFT 레지스트리에 엔진 주소의 수신 훅 등록
   *
   * 파라미터 변경으로 새 레지스트리를 가리키게 되면 다시 호출됨
   */
  listenTo(nft: Address): void {
    this.custody.nft(nft).registerReceiver(this.config.engineAddress, this);
  }

  // ========================================
  // 조회
  // ========================================

  /**
   * 스테이크 조회 (없으면 빈 Stake)
   */
  getStake(address: Address): Stake {
    return this.state.stakes.get(address.toLowerCase()) ?? Stake.empty();
  }

  /**
   * BLS 주소로 스테이크 조회
   *
   * 등록되지 않은 주소면 빈 Stake
   */
  getStakeByBlsAddress(bls: Address): Stake {
    const staker = this.state.blsToStaker.get(bls.toLowerCase());
    return staker ? this.getStake(staker) : Stake.empty();
  }

  /**
   * 투표력 = amount + Σ 캐시된 NFT 가격
   *
   * 가격은 항상 엔진 캐시에서 읽음 (오라클 직접 조회 없음)
   * → 풀 합계와 개별 투표력이 같은 기준을 사용
   */
  getVotingPower(address: Address): Amount {
    return this.votingPowerOf(this.getStake(address));
  }

  votingPowerOf(stake: Stake): Amount {
    let power = stake.amount;
    for (const id of stake.collateralIds) {
      power += this.state.prices.get(id) ?? 0n;
    }
    return power;
  }

  getTotalVotingPower(): Amount {
    return this.state.totalVotingPower.get();
  }

  getTotalStakedAmount(): Amount {
    return this.state.totalStakedAmount.get();
  }

  /**
   * NFT를 담보로 맡긴 스테이커 (없으면 null)
   */
  stakerOfNft(id: NftId): Address | null {
    return this.state.nftStakers.get(id) ?? null;
  }

  // ========================================
  // 스테이크 생명주기 (관문 통과)
  // ========================================

  /**
   * 스테이킹
   *
   * 검증 순서:
   * 1. amount == 0 이고 NFT 없음 → AmountZero
   * 2. duration == 0 → DurationZero
   * 3. 이미 활성 스테이크 → AlreadyStaked
   *
   * 커스터디 이동과 기록은 원자적 (하나라도 실패하면 전부 롤백)
   */
  stake(
    caller: Address,
    duration: number,
    amount: Amount,
    nftIds: readonly NftId[],
  ): Stake {
    return this.gate.run('stake', () => {
      const staker = normalizeAddress(caller);
      this.assertCollateral(amount, nftIds);
      this.assertDuration(duration);

      if (this.getStake(staker).isActive) {
        throw new AlreadyStaked();
      }

      const params = this.state.params.get();
      this.pullCollateral(staker, amount, nftIds, params);

      const stake = new Stake(amount, this.clock.now() + duration, nftIds);
      this.state.stakes.set(staker, stake);

      this.logger.log(
        `Staked ${amount} + ${nftIds.length} NFT(s) for ${staker}, unlock at ${stake.unlockTime}`,
      );
      return stake;
    });
  }

  /**
   * 스테이크 증가
   *
   * unlockTime은 바꾸지 않음 (기간 변경은 extend()만)
   */
  increaseStake(caller: Address, amount: Amount, nftIds: readonly NftId[]): Stake {
    return this.gate.run('increaseStake', () => {
      const staker = normalizeAddress(caller);
      const current = this.getStake(staker);
      if (!current.isActive) {
        throw new StakeZero();
      }
      this.assertCollateral(amount, nftIds);

      const params = this.state.params.get();
      this.pullCollateral(staker, amount, nftIds, params);

      const stake = current.withAdded(amount, nftIds);
      this.state.stakes.set(staker, stake);

      this.logger.log(
        `Increased stake of ${staker} by ${amount} + ${nftIds.length} NFT(s)`,
      );
      return stake;
    });
  }

  /**
   * 잠금 기간 연장: unlockTime += duration
   */
  extend(caller: Address, duration: number): Stake {
    return this.gate.run('extend', () => {
      const staker = normalizeAddress(caller);
      this.assertDuration(duration);

      const current = this.getStake(staker);
      if (!current.isActive) {
        throw new StakeZero();
      }

      const stake = current.withExtended(duration);
      this.state.stakes.set(staker, stake);

      this.logger.log(`Extended stake of ${staker} until ${stake.unlockTime}`);
      return stake;
    });
  }

  /**
   * 언스테이킹
   *
   * - now < unlockTime → NotUnlocked
   * - 기록 삭제, 풀에서 투표력 제거, 담보 반환
   *
   * @returns 반환된 스테이크 (삭제 직전 기록)
   */
  unstake(caller: Address): Stake {
    return this.gate.run('unstake', () => {
      const staker = normalizeAddress(caller);
      const stake = this.getStake(staker);
      if (!stake.isActive) {
        throw new StakeZero();
      }
      if (this.clock.now() < stake.unlockTime) {
        throw new NotUnlocked(stake.unlockTime);
      }

      const params = this.state.params.get();
      const power = this.votingPowerOf(stake);

      this.state.stakes.delete(staker);
      this.adjustTotals(-power, -stake.amount);

      if (stake.amount > 0n) {
        this.custody.fungible(params.token).transfer(staker, stake.amount);
      }
      for (const id of stake.collateralIds) {
        this.state.nftStakers.delete(id);
        this.custody.nft(params.nft).transferNft(this.config.engineAddress, staker, id);
      }

      this.logger.log(
        `Unstaked ${stake.amount} + ${stake.collateralIds.size} NFT(s) for ${staker}`,
      );
      return stake;
    });
  }

  /**
   * 잘못 입금된 대체 가능 자산 회수 (owner 전용)
   *
   * 스테이킹 토큰은 회수 불가 → Forbidden
   */
  recoverFungible(
    caller: Address,
    token: Address,
    recipient: Address,
    amount: Amount,
  ): void {
    this.gate.run('recoverFungible', () => {
      const params = this.state.params.get();
      if (normalizeAddress(caller) !== this.config.ownerAddress) {
        throw new Forbidden('Only the owner may recover tokens');
      }
      if (normalizeAddress(token) === params.token) {
        throw new Forbidden('The staking token cannot be recovered');
      }
      this.custody.fungible(token).transfer(normalizeAddress(recipient), amount);
      this.logger.log(`Recovered ${amount} of ${token} to ${recipient}`);
    });
  }

  // ========================================
  // 효과 적용용 내부 연산 (관문 안에서만 호출)
  // ========================================

  /**
   * 스테이커의 대체 가능 담보를 recipient에게 내보냄
   *
   * @throws {Forbidden} 활성 스테이크가 없거나 amount가 부족한 경우
   */
  releaseAmount(
    staker: Address,
    recipient: Address,
    amount: Amount,
    params: GlobalParameters,
  ): void {
    if (amount === 0n) {
      return;
    }
    const current = this.getStake(staker);
    if (!current.isActive || current.amount < amount) {
      throw new Forbidden(`Stake of ${staker} cannot cover ${amount}`);
    }

    this.storeStake(staker, current.withoutAmount(amount));
    this.adjustTotals(-amount, -amount);
    this.custody.fungible(params.token).transfer(recipient, amount);
  }

  /**
   * 스테이커의 NFT 담보를 recipient에게 내보냄
   *
   * @throws {Forbidden} 해당 NFT가 그 스테이커의 담보가 아닌 경우
   */
  releaseNft(
    staker: Address,
    recipient: Address,
    id: NftId,
    params: GlobalParameters,
  ): void {
    const current = this.getStake(staker);
    if (!current.hasCollateral(id)) {
      throw new Forbidden(`NFT ${id} is not staked by ${staker}`);
    }

    const price = this.state.prices.get(id) ?? 0n;
    this.storeStake(staker, current.withoutCollateral(id));
    this.state.nftStakers.delete(id);
    this.adjustTotals(-price, 0n);
    this.custody.nft(params.nft).transferNft(this.config.engineAddress, recipient, id);
  }

  /**
   * 풀 자체 커스터디(스테이크가 아닌 잔고)에서 내보냄
   *
   * 여유분 = 엔진 토큰 잔고 - Σ 스테이크 amount
   *
   * @throws {Forbidden} 여유분 초과
   */
  releasePoolAmount(recipient: Address, amount: Amount, params: GlobalParameters): void {
    if (amount === 0n) {
      return;
    }
    const token = this.custody.fungible(params.token);
    const free = token.balanceOf(this.config.engineAddress) - this.getTotalStakedAmount();
    if (amount > free) {
      throw new Forbidden(`Pool custody holds ${free}, cannot release ${amount}`);
    }
    token.transfer(recipient, amount);
  }

  /**
   * NFT 가격 캐시 갱신
   *
   * 담보로 잡혀 있는 NFT면 풀 합계를 차이만큼 조정 (전체 재계산 없음)
   *
   * @returns 풀에 반영된 차이
   */
  repriceCollateral(id: NftId, price: Amount): Amount {
    const previous = this.state.prices.get(id) ?? 0n;
    this.state.prices.set(id, price);

    if (!this.state.nftStakers.has(id)) {
      return 0n;
    }
    const delta = price - previous;
    this.adjustTotals(delta, 0n);
    return delta;
  }

  // ========================================
  // NFT 수신 훅
  // ========================================

  /**
   * 커스터디가 엔진으로 NFT를 옮길 때 동기적으로 호출
   *
   * 관문을 통과하지 않음: 엔진 자신의 NFT 이동 도중에만 호출되어야 함
   *
   * @throws {WrongAsset} 다른 컬렉션이거나 엔진이 요청하지 않은 NFT
   */
  onNftReceived(collection: Address, from: Address, id: NftId): void {
    const expected = this.expecting;
    if (!expected || !this.gate.isEntered) {
      throw new WrongAsset(`Unsolicited NFT ${id} from ${from}`);
    }
    if (collection.toLowerCase() !== expected.collection || id !== expected.id) {
      throw new WrongAsset(`Unexpected NFT ${collection}#${id}`);
    }
  }

  // ========================================
  // 내부 헬퍼
  // ========================================

  private assertCollateral(amount: Amount, nftIds: readonly NftId[]): void {
    if (amount < 0n) {
      throw new Forbidden('Amount must not be negative');
    }
    if (amount === 0n && nftIds.length === 0) {
      throw new AmountZero();
    }
    if (new Set(nftIds).size !== nftIds.length) {
      throw new Forbidden('Duplicate NFT ids');
    }
  }

  private assertDuration(duration: number): void {
    if (!Number.isSafeInteger(duration) || duration <= 0) {
      throw new DurationZero();
    }
  }

  /**
   * 담보 끌어오기 + 가격 캐시 동기화 + 풀 증가
   */
  private pullCollateral(
    staker: Address,
    amount: Amount,
    nftIds: readonly NftId[],
    params: GlobalParameters,
  ): void {
    if (amount > 0n) {
      this.custody
        .fungible(params.token)
        .transferFrom(staker, this.config.engineAddress, amount);
    }

    let power = amount;
    for (const id of nftIds) {
      this.pullNft(staker, id, params);
      const price = this.custody.oracle.getPrice(id);
      this.state.prices.set(id, price);
      this.state.nftStakers.set(id, staker);
      power += price;
    }

    this.adjustTotals(power, amount);
  }

  private pullNft(staker: Address, id: NftId, params: GlobalParameters): void {
    const registry = this.custody.nft(params.nft);
    this.expecting = { collection: registry.address, id };
    try {
      registry.transferNft(staker, this.config.engineAddress, id);
    } finally {
      this.expecting = null;
    }
  }

  private storeStake(staker: Address, stake: Stake): void {
    if (stake.isActive) {
      this.state.stakes.set(staker, stake);
    } else {
      this.state.stakes.delete(staker);
    }
  }

  private adjustTotals(powerDelta: Amount, amountDelta: Amount): void {
    this.state.totalVotingPower.set(this.state.totalVotingPower.get() + powerDelta);
    this.state.totalStakedAmount.set(this.state.totalStakedAmount.get() + amountDelta);
  }
}
