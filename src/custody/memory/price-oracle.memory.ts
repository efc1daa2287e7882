import { Amount, NftId } from '../../common/types/common.types';
import { Journal, JournaledMap } from '../../state/journal';
import { IPriceOracle } from '../interfaces/price-oracle.interface';

/**
 * In-Memory NFT Price Oracle
 */
export class PriceOracleMemory extends IPriceOracle {
  private readonly journal = new Journal();
  private readonly prices = new JournaledMap<NftId, Amount>(this.journal);

  getPrice(id: NftId): Amount {
    return this.prices.get(id) ?? 0n;
  }

  setPrice(id: NftId, price: Amount): void {
    this.prices.set(id, price);
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
