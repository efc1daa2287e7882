/**
 * 스테이킹 합의 엔진 전역 상수 정의
 *
 * 모든 값은 부팅 시 환경변수로 덮어쓸 수 있는 기본값
 * (config/staking.config.ts 참고)
 */

/**
 * DEFAULT_THRESHOLD: 토픽 승인에 필요한 투표력 비율 (%)
 *
 * 동작:
 * - votedPower >= totalVotingPower * threshold / 100 (정수 나눗셈, 내림)
 * - 51% = 단순 과반
 */
export const DEFAULT_THRESHOLD = 51;

/**
 * DEFAULT_EXPIRATION: 토픽 만료 기간 (초)
 *
 * 동작:
 * - 토픽의 첫 투표 시각(firstSeen) + expiration 이 지나면 더 이상 투표 불가
 * - 만료된 토픽은 다시 살릴 수 없음
 *
 * 기본값: 1일
 */
export const DEFAULT_EXPIRATION = 60 * 60 * 24;

/**
 * CHAIN_ID: EIP-712 도메인의 체인 식별자
 *
 * - 다른 배포본에서 만든 서명의 재사용 방지
 */
export const CHAIN_ID = 999;

/**
 * EIP-712 도메인 기본 이름/버전
 */
export const DEFAULT_DOMAIN_NAME = 'Staking';
export const DEFAULT_DOMAIN_VERSION = '1';

/**
 * 기본 주소들
 *
 * 메모리 커스터디로 단독 실행할 때 사용하는 고정 주소
 * - ENGINE: 엔진 자신 (verifyingContract, 풀 커스터디 보유자)
 * - TOKEN: 대체 가능 자산 원장
 * - NFT: 비대체 자산 레지스트리
 * - OWNER: 잘못 입금된 토큰 회수 권한 보유자, 기본 징수자(collector)
 */
export const DEFAULT_ENGINE_ADDRESS = '0x0000000000000000000000000000000000001000';
export const DEFAULT_TOKEN_ADDRESS = '0x0000000000000000000000000000000000001001';
export const DEFAULT_NFT_ADDRESS = '0x0000000000000000000000000000000000001002';
export const DEFAULT_OWNER_ADDRESS = '0x0000000000000000000000000000000000001003';

/**
 * MAX_THRESHOLD: threshold 상한 (%)
 */
export const MAX_THRESHOLD = 100;

/**
 * HTTP 기본 포트
 */
export const DEFAULT_PORT = 3000;
