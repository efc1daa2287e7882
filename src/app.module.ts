import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { CommonModule } from './common/common.module';
import { StakingExceptionFilter } from './common/filters/staking-exception.filter';
import { ConfigModule } from './config/config.module';
import { ConsensusModule } from './consensus/consensus.module';
import { CustodyModule } from './custody/custody.module';
import { GuardModule } from './guard/guard.module';
import { IdentityModule } from './identity/identity.module';
import { StakeModule } from './stake/stake.module';
import { StateModule } from './state/state.module';

/**
 * AppModule
 *
 * 애플리케이션의 루트 모듈
 *
 * Global Modules:
 * - ConfigModule: STAKING_CONFIG, Clock
 * - CommonModule: CryptoService
 * - StateModule: StakingStateStore (엔진 상태 전체)
 * - CustodyModule: 토큰 / NFT / 가격 오라클 커스터디
 * - GuardModule: NonReentrantGate, ReplayGuardService
 *
 * Feature Modules:
 * - StakeModule: 스테이크 원장
 * - IdentityModule: BLS 주소, 대리 서명자
 * - ConsensusModule: 투표 누적과 효과
 */
@Module({
  imports: [
    // Global Modules
    ConfigModule,
    CommonModule,
    StateModule,
    CustodyModule,
    GuardModule,

    // Feature Modules
    StakeModule,
    IdentityModule,
    ConsensusModule,
  ],
  controllers: [],
  providers: [{ provide: APP_FILTER, useClass: StakingExceptionFilter }],
})
export class AppModule {}
