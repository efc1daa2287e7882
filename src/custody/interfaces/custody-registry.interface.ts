import { Address } from '../../common/types/common.types';
import { Journaled } from '../../state/journal';
import { IFungibleCustodian } from './fungible-custodian.interface';
import { INftCustodian } from './nft-custodian.interface';
import { IPriceOracle } from './price-oracle.interface';

/**
 * Custody Registry Interface
 *
 * 주소 → 커스터디 인스턴스 조회
 *
 * 역할:
 * - GlobalParameters의 token/nft 주소로 현재 커스터디를 찾음
 *   (ParameterChange 승인 후에는 다른 인스턴스를 가리킬 수 있음)
 * - 원자적 실행을 위해 모든 참여자(journaled)를 노출
 */
export abstract class ICustodyRegistry {
  abstract readonly oracle: IPriceOracle;

  abstract hasFungible(address: Address): boolean;

  abstract hasNft(address: Address): boolean;

  /**
   * @throws {Forbidden} 등록되지 않은 주소
   */
  abstract fungible(address: Address): IFungibleCustodian;

  /**
   * @throws {Forbidden} 등록되지 않은 주소
   */
  abstract nft(address: Address): INftCustodian;

  abstract participants(): Journaled[];
}
