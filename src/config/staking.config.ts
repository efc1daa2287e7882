import {
  CHAIN_ID,
  DEFAULT_DOMAIN_NAME,
  DEFAULT_DOMAIN_VERSION,
  DEFAULT_ENGINE_ADDRESS,
  DEFAULT_EXPIRATION,
  DEFAULT_NFT_ADDRESS,
  DEFAULT_OWNER_ADDRESS,
  DEFAULT_PORT,
  DEFAULT_THRESHOLD,
  DEFAULT_TOKEN_ADDRESS,
  MAX_THRESHOLD,
} from '../common/constants/staking.constants';
import { TypedDataDomain } from '../common/crypto/crypto.types';
import { Address, normalizeAddress, UnixTime } from '../common/types/common.types';

/**
 * 중복 투표 처리 정책
 *
 * - ignore: 같은 투표자의 두 번째 투표는 아무 일도 하지 않음 (릴레이어 재시도 안전)
 * - reject: AlreadyVoted(index) 에러로 배치 전체 거부
 */
export type DuplicateVotePolicy = 'ignore' | 'reject';

/**
 * 부팅 시 결정되는 초기 파라미터
 *
 * 이후에는 승인된 ParameterChange 토픽으로만 변경됨
 */
export interface InitialParameters {
  token: Address;
  nft: Address;
  collector: Address;
  threshold: number;
  expiration: number;
}

/**
 * StakingConfig
 *
 * 엔진 생성 시점 설정 (불변)
 */
export interface StakingConfig {
  /**
   * 엔진 자신의 주소
   * - EIP-712 verifyingContract
   * - 풀 커스터디 보유자
   */
  engineAddress: Address;

  /**
   * 잘못 입금된 토큰 회수 권한 보유자
   */
  ownerAddress: Address;

  domain: TypedDataDomain;

  /**
   * 이 시각 이전에는 투표 진입점 거부 (Forbidden)
   */
  activationTime: UnixTime;

  initialParams: InitialParameters;

  duplicateVotePolicy: DuplicateVotePolicy;

  port: number;
}

export const STAKING_CONFIG = Symbol('STAKING_CONFIG');

type Env = Record<string, string | undefined>;

function readInt(
  env: Env,
  key: string,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${key} must be a non-negative integer, got "${raw}"`);
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new Error(`${key} must be within [${min}, ${max}], got ${value}`);
  }
  return value;
}

function readAddress(env: Env, key: string, fallback: Address): Address {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  try {
    return normalizeAddress(raw);
  } catch {
    throw new Error(`${key} must be a 20-byte hex address, got "${raw}"`);
  }
}

function readPolicy(env: Env): DuplicateVotePolicy {
  const raw = env.STAKING_DUPLICATE_VOTE_POLICY;
  if (raw === undefined || raw === '' || raw === 'ignore') {
    return 'ignore';
  }
  if (raw === 'reject') {
    return 'reject';
  }
  throw new Error(
    `STAKING_DUPLICATE_VOTE_POLICY must be "ignore" or "reject", got "${raw}"`,
  );
}

/**
 * 환경변수로부터 설정 생성
 *
 * 환경변수:
 * - STAKING_ENGINE_ADDRESS, STAKING_OWNER_ADDRESS
 * - STAKING_TOKEN_ADDRESS, STAKING_NFT_ADDRESS, STAKING_COLLECTOR_ADDRESS
 * - STAKING_DOMAIN_NAME, STAKING_DOMAIN_VERSION, STAKING_CHAIN_ID
 * - STAKING_ACTIVATION_TIME, STAKING_THRESHOLD, STAKING_EXPIRATION
 * - STAKING_DUPLICATE_VOTE_POLICY, PORT
 *
 * @throws {Error} 잘못된 값이 있으면 부팅 실패
 */
export function loadStakingConfig(env: Env = process.env): StakingConfig {
  const engineAddress = readAddress(
    env,
    'STAKING_ENGINE_ADDRESS',
    DEFAULT_ENGINE_ADDRESS,
  );
  const ownerAddress = readAddress(
    env,
    'STAKING_OWNER_ADDRESS',
    DEFAULT_OWNER_ADDRESS,
  );

  return Object.freeze({
    engineAddress,
    ownerAddress,
    domain: Object.freeze({
      name: env.STAKING_DOMAIN_NAME || DEFAULT_DOMAIN_NAME,
      version: env.STAKING_DOMAIN_VERSION || DEFAULT_DOMAIN_VERSION,
      chainId: readInt(env, 'STAKING_CHAIN_ID', CHAIN_ID, 1),
      verifyingContract: engineAddress,
    }),
    activationTime: readInt(env, 'STAKING_ACTIVATION_TIME', 0, 0),
    initialParams: Object.freeze({
      token: readAddress(env, 'STAKING_TOKEN_ADDRESS', DEFAULT_TOKEN_ADDRESS),
      nft: readAddress(env, 'STAKING_NFT_ADDRESS', DEFAULT_NFT_ADDRESS),
      collector: readAddress(env, 'STAKING_COLLECTOR_ADDRESS', ownerAddress),
      threshold: readInt(
        env,
        'STAKING_THRESHOLD',
        DEFAULT_THRESHOLD,
        1,
        MAX_THRESHOLD,
      ),
      expiration: readInt(env, 'STAKING_EXPIRATION', DEFAULT_EXPIRATION, 1),
    }),
    duplicateVotePolicy: readPolicy(env),
    port: readInt(env, 'PORT', DEFAULT_PORT, 1, 65535),
  });
}
