import { Address, Amount, NftId } from '../../common/types/common.types';

/**
 * 토픽 종류 (닫힌 tagged union의 태그)
 *
 * - transfer: 자산 이동 (슬래싱 포함)
 * - params: GlobalParameters 교체
 * - prices: NFT 가격 갱신
 */
export type TopicKind = 'transfer' | 'params' | 'prices';

/**
 * 토픽 키 필드
 *
 * 투표자마다 달라지는 signer/requester 필드를 제외한 내용
 * → 서로 다른 투표자가 같은 내용을 서명하면 같은 토픽으로 모임
 */
export type TransferKey = {
  from: Address;
  to: Address;
  amount: Amount;
  nftIds: readonly NftId[];
  nonces: readonly bigint[];
};

export type TransferMessage = TransferKey & {
  signer: Address;
};

export type SetParamsKey = {
  token: Address;
  nft: Address;
  threshold: number;
  expiration: number;
  collector: Address;
  nonce: bigint;
};

export type SetParamsMessage = SetParamsKey & {
  requester: Address;
};

export type SetNftPricesKey = {
  nftIds: readonly NftId[];
  prices: readonly Amount[];
  nonce: bigint;
};

export type SetNftPricesMessage = SetNftPricesKey & {
  requester: Address;
};

/**
 * 대리 서명자 등록 메시지 (staker, signer 양쪽이 서명)
 */
export type SetSignerMessage = {
  staker: Address;
  signer: Address;
};

/**
 * 종류별 메시지/키 매핑
 */
export interface TopicMessages {
  transfer: TransferMessage;
  params: SetParamsMessage;
  prices: SetNftPricesMessage;
}

export interface TopicKeys {
  transfer: TransferKey;
  params: SetParamsKey;
  prices: SetNftPricesKey;
}

export type TopicPayload =
  | { kind: 'transfer'; data: TransferKey }
  | { kind: 'params'; data: SetParamsKey }
  | { kind: 'prices'; data: SetNftPricesKey };
