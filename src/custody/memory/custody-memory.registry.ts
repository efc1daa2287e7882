import { Address } from '../../common/types/common.types';
import { Forbidden } from '../../common/errors/staking.errors';
import { Journaled } from '../../state/journal';
import { ICustodyRegistry } from '../interfaces/custody-registry.interface';
import { IFungibleCustodian } from '../interfaces/fungible-custodian.interface';
import { INftCustodian } from '../interfaces/nft-custodian.interface';
import { IPriceOracle } from '../interfaces/price-oracle.interface';

/**
 * In-Memory Custody Registry
 *
 * 부팅 시 알려진 커스터디들을 주소로 등록
 * ParameterChange 는 등록된 주소로만 전환 가능
 */
export class CustodyMemoryRegistry extends ICustodyRegistry {
  private readonly fungibles = new Map<Address, IFungibleCustodian>();
  private readonly nfts = new Map<Address, INftCustodian>();

  constructor(
    readonly oracle: IPriceOracle,
    fungibles: IFungibleCustodian[] = [],
    nfts: INftCustodian[] = [],
  ) {
    super();
    fungibles.forEach((custodian) => this.addFungible(custodian));
    nfts.forEach((custodian) => this.addNft(custodian));
  }

  addFungible(custodian: IFungibleCustodian): void {
    this.fungibles.set(custodian.address.toLowerCase(), custodian);
  }

  addNft(custodian: INftCustodian): void {
    this.nfts.set(custodian.address.toLowerCase(), custodian);
  }

  hasFungible(address: Address): boolean {
    return this.fungibles.has(address.toLowerCase());
  }

  hasNft(address: Address): boolean {
    return this.nfts.has(address.toLowerCase());
  }

  fungible(address: Address): IFungibleCustodian {
    const custodian = this.fungibles.get(address.toLowerCase());
    if (!custodian) {
      throw new Forbidden(`Unknown fungible custodian ${address}`);
    }
    return custodian;
  }

  nft(address: Address): INftCustodian {
    const custodian = this.nfts.get(address.toLowerCase());
    if (!custodian) {
      throw new Forbidden(`Unknown NFT custodian ${address}`);
    }
    return custodian;
  }

  participants(): Journaled[] {
    return [this.oracle, ...this.fungibles.values(), ...this.nfts.values()];
  }
}
