import { Global, Module } from '@nestjs/common';
import { STAKING_CONFIG, StakingConfig } from '../config/staking.config';
import { ICustodyRegistry } from './interfaces/custody-registry.interface';
import { IPriceOracle } from './interfaces/price-oracle.interface';
import { CustodyMemoryRegistry } from './memory/custody-memory.registry';
import { NftMemoryCustodian } from './memory/nft-memory.custodian';
import { PriceOracleMemory } from './memory/price-oracle.memory';
import { TokenMemoryCustodian } from './memory/token-memory.custodian';

/**
 * Custody Module (Global)
 *
 * 외부 협력자(토큰 원장, NFT 레지스트리, 가격 오라클) 계층
 *
 * 현재 구현:
 * - 메모리 커스터디를 설정의 초기 token/nft 주소로 등록
 * - operator = 엔진 주소
 *
 * 교체:
 * - ICustodyRegistry 를 다른 구현으로 제공하면 엔진 코드 변경 불필요
 */
@Global()
@Module({
  providers: [
    {
      provide: TokenMemoryCustodian,
      useFactory: (config: StakingConfig) =>
        new TokenMemoryCustodian(config.initialParams.token, config.engineAddress),
      inject: [STAKING_CONFIG],
    },
    {
      provide: NftMemoryCustodian,
      useFactory: (config: StakingConfig) =>
        new NftMemoryCustodian(config.initialParams.nft, config.engineAddress),
      inject: [STAKING_CONFIG],
    },
    {
      provide: IPriceOracle,
      useClass: PriceOracleMemory,
    },
    {
      provide: ICustodyRegistry,
      useFactory: (
        oracle: IPriceOracle,
        token: TokenMemoryCustodian,
        nft: NftMemoryCustodian,
      ) => new CustodyMemoryRegistry(oracle, [token], [nft]),
      inject: [IPriceOracle, TokenMemoryCustodian, NftMemoryCustodian],
    },
  ],
  exports: [TokenMemoryCustodian, NftMemoryCustodian, IPriceOracle, ICustodyRegistry],
})
export class CustodyModule {}
