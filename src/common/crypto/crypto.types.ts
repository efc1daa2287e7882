/**
 * 암호화 관련 타입 정의
 */

/**
 * Signature: 복구 가능한 ECDSA 서명 (secp256k1)
 *
 * 구성:
 * - r: 서명의 첫 번째 부분 (32 bytes = 64 hex chars)
 * - s: 서명의 두 번째 부분 (32 bytes, low-s만 허용)
 * - v: 복구 식별자 (27/28, 또는 0/1)
 *
 * 서명과 다이제스트만으로 서명자 주소를 복구할 수 있으므로
 * 투표 메시지에 공개키를 따로 실을 필요가 없음
 */
export interface Signature {
  v: number;
  r: string;
  s: string;
}

/**
 * EIP-712 타입 필드
 *
 * 지원 타입: address, uint256, string, bytes32, bool, 그리고 각 타입의 배열(T[])
 */
export interface TypedField {
  name: string;
  type: string;
}

export type TypedDataTypes = Record<string, readonly TypedField[]>;

export type TypedScalar = string | number | bigint | boolean;

export type TypedValue = TypedScalar | readonly TypedScalar[];

export type TypedMessage = Readonly<Record<string, TypedValue>>;

/**
 * EIP-712 도메인
 *
 * 이더리움에서의 동작:
 * - 서명이 어느 앱/버전/체인/컨트랙트를 위한 것인지 고정
 * - 같은 메시지라도 도메인이 다르면 다른 다이제스트
 */
export interface TypedDataDomain {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: string;
}
