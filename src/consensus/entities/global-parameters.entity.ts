import { Address } from '../../common/types/common.types';

/**
 * GlobalParameters
 *
 * 승인된 ParameterChange 토픽으로만 교체되는 버전 있는 설정 값
 *
 * - 한 번의 연산 안에서는 진입 시점의 스냅샷만 읽음
 * - 교체는 통째로 (version + 1)
 */
export interface GlobalParameters {
  readonly version: number;
  readonly token: Address;
  readonly nft: Address;
  readonly collector: Address;
  readonly threshold: number;
  readonly expiration: number;
}
