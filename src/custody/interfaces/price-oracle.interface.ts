import { Amount, NftId } from '../../common/types/common.types';
import { Journaled } from '../../state/journal';

/**
 * NFT Price Oracle Interface
 *
 * - getPrice: 가격이 없으면 0
 * - setPrice: 승인된 PriceUpdate 토픽에서만 호출
 */
export abstract class IPriceOracle implements Journaled {
  abstract getPrice(id: NftId): Amount;

  abstract setPrice(id: NftId, price: Amount): void;

  abstract checkpoint(): void;

  abstract commitCheckpoint(): void;

  abstract revertCheckpoint(): void;
}
