import { Inject, Injectable, Logger } from '@nestjs/common';
import { Forbidden } from '../../common/errors/staking.errors';
import { Address, normalizeAddress } from '../../common/types/common.types';
import { STAKING_CONFIG, StakingConfig } from '../../config/staking.config';
import { ReplayGuardService } from '../../guard/replay-guard.service';
import { StakeService } from '../../stake/stake.service';
import { GlobalParameters } from '../entities/global-parameters.entity';
import {
  TopicPayload,
  TransferKey,
  TransferMessage,
} from '../types/topic-payloads';
import { TopicEffect } from './topic-effect.interface';

/**
 * AssetTransfer 효과
 *
 * from → to 로 amount + nftIds 이동
 * - from == 엔진 주소: 풀 자체 커스터디에서 이동 (NFT 불가)
 * - 그 외: from의 스테이크에서 차감
 *
 * 슬래싱 = to 가 collector 인 전송
 *
 * nonce는 승인 시점에 to 기준으로 한 번만 소비됨
 */
@Injectable()
export class AssetTransferEffect implements TopicEffect<'transfer'> {
  readonly kind = 'transfer';

  private readonly logger = new Logger(AssetTransferEffect.name);

  constructor(
    private readonly stakeService: StakeService,
    private readonly replayGuard: ReplayGuardService,
    @Inject(STAKING_CONFIG) private readonly config: StakingConfig,
  ) {}

  keyOf(message: TransferMessage): TransferKey {
    return {
      from: normalizeAddress(message.from),
      to: normalizeAddress(message.to),
      amount: message.amount,
      nftIds: [...message.nftIds],
      nonces: [...message.nonces],
    };
  }

  voterOf(message: TransferMessage): Address {
    return message.signer;
  }

  payloadOf(key: TransferKey): TopicPayload {
    return { kind: 'transfer', data: key };
  }

  /**
   * @throws {NonceUsed} (to, nonce) 가 이미 소비됨
   */
  precheck(index: number, key: TransferKey): void {
    this.replayGuard.assertUnused(index, 'transfer', key.to, key.nonces);
  }

  apply(key: TransferKey, params: GlobalParameters): void {
    if (key.from === this.config.engineAddress) {
      if (key.nftIds.length > 0) {
        throw new Forbidden('Pool-sourced transfers cannot move NFTs');
      }
      this.stakeService.releasePoolAmount(key.to, key.amount, params);
    } else {
      if (!this.stakeService.getStake(key.from).isActive) {
        throw new Forbidden(`${key.from} has no active stake`);
      }
      this.stakeService.releaseAmount(key.from, key.to, key.amount, params);
      for (const id of key.nftIds) {
        this.stakeService.releaseNft(key.from, key.to, id, params);
      }
    }

    this.replayGuard.consume('transfer', key.to, key.nonces);

    const kind = key.to === params.collector ? 'Slashed' : 'Transferred';
    this.logger.log(
      `${kind} ${key.amount} + ${key.nftIds.length} NFT(s) from ${key.from} to ${key.to}`,
    );
  }
}
