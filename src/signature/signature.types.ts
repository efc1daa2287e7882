import { TypedDataTypes, TypedField } from '../common/crypto/crypto.types';
import { TopicKind } from '../consensus/types/topic-payloads';

const TRANSFER_KEY_FIELDS: readonly TypedField[] = [
  { name: 'from', type: 'address' },
  { name: 'to', type: 'address' },
  { name: 'amount', type: 'uint256' },
  { name: 'nftIds', type: 'uint256[]' },
  { name: 'nonces', type: 'uint256[]' },
];

const SET_PARAMS_KEY_FIELDS: readonly TypedField[] = [
  { name: 'token', type: 'address' },
  { name: 'nft', type: 'address' },
  { name: 'threshold', type: 'uint256' },
  { name: 'expiration', type: 'uint256' },
  { name: 'collector', type: 'address' },
  { name: 'nonce', type: 'uint256' },
];

const SET_NFT_PRICES_KEY_FIELDS: readonly TypedField[] = [
  { name: 'nftIds', type: 'uint256[]' },
  { name: 'prices', type: 'uint256[]' },
  { name: 'nonce', type: 'uint256' },
];

/**
 * 서명 대상 구조체 정의
 *
 * 메시지 타입 = 투표자 필드(signer / requester) + 키 필드
 * 키 타입 = 키 필드만 (토픽 식별용)
 */
export const STAKING_TYPES: TypedDataTypes = {
  Transfer: [{ name: 'signer', type: 'address' }, ...TRANSFER_KEY_FIELDS],
  TransferKey: TRANSFER_KEY_FIELDS,
  SetParams: [{ name: 'requester', type: 'address' }, ...SET_PARAMS_KEY_FIELDS],
  SetParamsKey: SET_PARAMS_KEY_FIELDS,
  SetNftPrices: [
    { name: 'requester', type: 'address' },
    ...SET_NFT_PRICES_KEY_FIELDS,
  ],
  SetNftPricesKey: SET_NFT_PRICES_KEY_FIELDS,
  SetSigner: [
    { name: 'staker', type: 'address' },
    { name: 'signer', type: 'address' },
  ],
  CallerAction: [
    { name: 'caller', type: 'address' },
    { name: 'action', type: 'string' },
    { name: 'amount', type: 'uint256' },
    { name: 'duration', type: 'uint256' },
    { name: 'nftIds', type: 'uint256[]' },
    { name: 'target', type: 'address' },
    { name: 'recipient', type: 'address' },
    { name: 'nonce', type: 'uint256' },
  ],
};

/**
 * 토픽 종류 → [메시지 타입, 키 타입]
 */
export const TOPIC_TYPE_NAMES: Record<TopicKind, { message: string; key: string }> = {
  transfer: { message: 'Transfer', key: 'TransferKey' },
  params: { message: 'SetParams', key: 'SetParamsKey' },
  prices: { message: 'SetNftPrices', key: 'SetNftPricesKey' },
};
