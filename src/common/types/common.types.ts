/**
 * 엔진 전체에서 사용되는 공통 타입 정의
 * 서명/해시 형식은 이더리움과 동일한 형식을 따름
 */

/**
 * Address: 신원(identity) 식별자
 *
 * 형식:
 * - secp256k1 공개키를 Keccak-256으로 해싱한 후 마지막 20바이트
 * - "0x" 접두사 + 40 hex chars, 엔진 내부에서는 항상 소문자
 *
 * 사용처:
 * - 스테이커, 대리 서명자(delegate), 대체 서명 주소(BLS)
 * - 커스터디 주소 (토큰 원장, NFT 레지스트리, 엔진 자신)
 */
export type Address = string;

/**
 * Hash: Keccak-256 해시 (32바이트 = 64 hex chars)
 *
 * 사용처:
 * - 토픽 키 (TopicKey)
 * - EIP-712 도메인 구분자, 다이제스트
 */
export type Hash = string;

/**
 * PrivateKey: secp256k1 개인키 ("0x" + 64 hex chars)
 */
export type PrivateKey = string;

/**
 * PublicKey: 비압축 공개키 (0x04 접두사 제외, 128 hex chars)
 */
export type PublicKey = string;

/**
 * Amount: 대체 가능 자산 수량 (uint256)
 *
 * - 모든 금액은 bigint로 처리 (Number.MAX_SAFE_INTEGER 초과)
 * - 음수 불가
 */
export type Amount = bigint;

/**
 * NftId: 비대체 자산 식별자 (uint256)
 */
export type NftId = bigint;

/**
 * UnixTime: 초 단위 유닉스 타임스탬프
 */
export type UnixTime = number;

/**
 * HEX 문자열에서 "0x" 접두사 제거
 */
export function stripHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex.slice(2) : hex;
}

/**
 * HEX 문자열에 "0x" 접두사 추가
 */
export function addHexPrefix(hex: string): string {
  return hex.startsWith('0x') ? hex : '0x' + hex;
}

/**
 * HEX 문자열 형식 검증
 *
 * @param value - 검증할 문자열
 * @param byteLength - 예상되는 바이트 길이 (선택, 예: 32 = 64 hex chars)
 */
export function isHexString(value: string, byteLength?: number): boolean {
  if (!value || typeof value !== 'string') {
    return false;
  }

  if (!/^0x[0-9a-fA-F]*$/.test(value)) {
    return false;
  }

  const hex = stripHexPrefix(value);

  // 홀수 길이 hex는 무효
  if (hex.length % 2 !== 0) {
    return false;
  }

  if (byteLength !== undefined && hex.length !== byteLength * 2) {
    return false;
  }

  return true;
}

/**
 * 주소 검증: 정확히 20바이트, 0x 접두사 필수
 */
export function isValidAddress(address: string): boolean {
  return isHexString(address, 20);
}

/**
 * 해시 검증: 정확히 32바이트, 0x 접두사 필수
 */
export function isValidHash(hash: string): boolean {
  return isHexString(hash, 32);
}

/**
 * 개인키 검증
 *
 * - 정확히 32바이트
 * - 0이 아니어야 함
 * - secp256k1 order 범위는 elliptic 라이브러리가 검증
 */
export function isValidPrivateKey(privateKey: string): boolean {
  if (!isHexString(privateKey, 32)) {
    return false;
  }

  return stripHexPrefix(privateKey) !== '0'.repeat(64);
}

/**
 * 주소 정규화 (소문자)
 *
 * 엔진의 모든 테이블은 소문자 주소를 키로 사용하므로
 * 외부 입력은 진입점에서 반드시 정규화해야 함
 *
 * @throws {Error} 20바이트 hex 주소가 아닌 경우
 */
export function normalizeAddress(address: string): Address {
  if (!isValidAddress(address)) {
    throw new Error(`Invalid address: ${address}`);
  }
  return address.toLowerCase();
}

/**
 * 0 주소
 *
 * 매핑이 없음을 나타내는 값으로 사용
 */
export const ZERO_ADDRESS: Address = '0x' + '0'.repeat(40);
