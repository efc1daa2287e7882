import { Injectable, Logger } from '@nestjs/common';
import { LengthMismatch } from '../../common/errors/staking.errors';
import { Address } from '../../common/types/common.types';
import { IPriceOracle } from '../../custody/interfaces/price-oracle.interface';
import { StakeService } from '../../stake/stake.service';
import {
  SetNftPricesKey,
  SetNftPricesMessage,
  TopicPayload,
} from '../types/topic-payloads';
import { TopicEffect } from './topic-effect.interface';

/**
 * PriceUpdate 효과
 *
 * - 엔진 가격 캐시 갱신 + 오라클에 기록
 * - 담보로 잡힌 NFT는 가격 차이만큼 풀 조정
 */
@Injectable()
export class PriceUpdateEffect implements TopicEffect<'prices'> {
  readonly kind = 'prices';

  private readonly logger = new Logger(PriceUpdateEffect.name);

  constructor(
    private readonly stakeService: StakeService,
    private readonly oracle: IPriceOracle,
  ) {}

  keyOf(message: SetNftPricesMessage): SetNftPricesKey {
    return {
      nftIds: [...message.nftIds],
      prices: [...message.prices],
      nonce: message.nonce,
    };
  }

  voterOf(message: SetNftPricesMessage): Address {
    return message.requester;
  }

  payloadOf(key: SetNftPricesKey): TopicPayload {
    return { kind: 'prices', data: key };
  }

  precheck(_index: number, key: SetNftPricesKey): void {
    if (key.nftIds.length !== key.prices.length) {
      throw new LengthMismatch(key.nftIds.length, key.prices.length);
    }
  }

  apply(key: SetNftPricesKey): void {
    let delta = 0n;
    key.nftIds.forEach((id, i) => {
      const price = key.prices[i];
      delta += this.stakeService.repriceCollateral(id, price);
      this.oracle.setPrice(id, price);
    });

    this.logger.log(
      `Repriced ${key.nftIds.length} NFT(s), pool adjusted by ${delta}`,
    );
  }
}
