import { Injectable, Logger } from '@nestjs/common';
import { MAX_THRESHOLD } from '../../common/constants/staking.constants';
import { Forbidden } from '../../common/errors/staking.errors';
import { Address, normalizeAddress } from '../../common/types/common.types';
import { ICustodyRegistry } from '../../custody/interfaces/custody-registry.interface';
import { StakeService } from '../../stake/stake.service';
import { StakingStateStore } from '../../state/staking-state.store';
import { GlobalParameters } from '../entities/global-parameters.entity';
import {
  SetParamsKey,
  SetParamsMessage,
  TopicPayload,
} from '../types/topic-payloads';
import { TopicEffect } from './topic-effect.interface';

/**
 * ParameterChange 효과
 *
 * GlobalParameters 전체를 한 번에 교체 (version + 1)
 */
@Injectable()
export class ParameterChangeEffect implements TopicEffect<'params'> {
  readonly kind = 'params';

  private readonly logger = new Logger(ParameterChangeEffect.name);

  constructor(
    private readonly state: StakingStateStore,
    private readonly custody: ICustodyRegistry,
    private readonly stakeService: StakeService,
  ) {}

  keyOf(message: SetParamsMessage): SetParamsKey {
    return {
      token: normalizeAddress(message.token),
      nft: normalizeAddress(message.nft),
      threshold: message.threshold,
      expiration: message.expiration,
      collector: normalizeAddress(message.collector),
      nonce: message.nonce,
    };
  }

  voterOf(message: SetParamsMessage): Address {
    return message.requester;
  }

  payloadOf(key: SetParamsKey): TopicPayload {
    return { kind: 'params', data: key };
  }

  /**
   * @throws {Forbidden} threshold ∉ (0, 100], expiration <= 0, 모르는 커스터디 주소
   */
  precheck(_index: number, key: SetParamsKey): void {
    if (
      !Number.isInteger(key.threshold) ||
      key.threshold <= 0 ||
      key.threshold > MAX_THRESHOLD
    ) {
      throw new Forbidden(`Threshold out of range: ${key.threshold}`);
    }
    if (!Number.isSafeInteger(key.expiration) || key.expiration <= 0) {
      throw new Forbidden(`Expiration must be positive: ${key.expiration}`);
    }
    if (!this.custody.hasFungible(key.token)) {
      throw new Forbidden(`Unknown fungible custodian ${key.token}`);
    }
    if (!this.custody.hasNft(key.nft)) {
      throw new Forbidden(`Unknown NFT custodian ${key.nft}`);
    }
  }

  apply(key: SetParamsKey, params: GlobalParameters): void {
    const next: GlobalParameters = Object.freeze({
      version: params.version + 1,
      token: key.token,
      nft: key.nft,
      collector: key.collector,
      threshold: key.threshold,
      expiration: key.expiration,
    });
    this.state.params.set(next);

    if (next.nft !== params.nft) {
      this.stakeService.listenTo(next.nft);
    }

    this.logger.log(
      `Parameters v${next.version}: threshold=${next.threshold}% expiration=${next.expiration}s collector=${next.collector}`,
    );
  }
}
