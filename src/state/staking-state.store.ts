import { Inject, Injectable } from '@nestjs/common';
import {
  Address,
  Amount,
  Hash,
  NftId,
} from '../common/types/common.types';
import { GlobalParameters } from '../consensus/entities/global-parameters.entity';
import { TopicRecord } from '../consensus/entities/topic.entity';
import { STAKING_CONFIG, StakingConfig } from '../config/staking.config';
import { Stake } from '../stake/entities/stake.entity';
import {
  Journal,
  Journaled,
  JournaledMap,
  JournaledSet,
  JournaledValue,
} from './journal';

/**
 * StakingStateStore
 *
 * 엔진의 모든 가변 상태를 한 곳에 모은 저장소
 *
 * 테이블:
 * - stakes: 스테이커 → Stake
 * - nftStakers: NFT → 그 NFT를 담보로 맡긴 스테이커
 * - prices: NFT 가격 캐시 (투표력 계산의 유일한 기준)
 * - totalVotingPower / totalStakedAmount: 풀 합계
 * - params: GlobalParameters (버전 있는 단일 값)
 * - topics: TopicKey → TopicRecord
 * - usedNonces: "scope:identity:nonce"
 * - bls/signer: 신원 매핑 (양방향)
 *
 * 모든 테이블이 하나의 Journal을 공유하므로
 * checkpoint / commit / revert 가 엔진 상태 전체에 한 번에 적용됨
 */
@Injectable()
export class StakingStateStore implements Journaled {
  private readonly journal = new Journal();

  readonly stakes = new JournaledMap<Address, Stake>(this.journal);
  readonly nftStakers = new JournaledMap<NftId, Address>(this.journal);
  readonly prices = new JournaledMap<NftId, Amount>(this.journal);
  readonly totalVotingPower = new JournaledValue<Amount>(this.journal, 0n);
  readonly totalStakedAmount = new JournaledValue<Amount>(this.journal, 0n);
  readonly params: JournaledValue<GlobalParameters>;
  readonly topics = new JournaledMap<Hash, TopicRecord>(this.journal);
  readonly usedNonces = new JournaledSet<string>(this.journal);
  readonly blsToStaker = new JournaledMap<Address, Address>(this.journal);
  readonly stakerToBls = new JournaledMap<Address, Address>(this.journal);
  readonly signerToStaker = new JournaledMap<Address, Address>(this.journal);
  readonly stakerToSigner = new JournaledMap<Address, Address>(this.journal);

  constructor(@Inject(STAKING_CONFIG) config: StakingConfig) {
    this.params = new JournaledValue<GlobalParameters>(
      this.journal,
      Object.freeze({ version: 1, ...config.initialParams }),
    );
  }

  get depth(): number {
    return this.journal.depth;
  }

  checkpoint(): void {
    this.journal.checkpoint();
  }

  commitCheckpoint(): void {
    this.journal.commitCheckpoint();
  }

  revertCheckpoint(): void {
    this.journal.revertCheckpoint();
  }
}
