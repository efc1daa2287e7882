import { Global, Module } from '@nestjs/common';
import { Clock, SystemClock } from '../common/clock/clock';
import { loadStakingConfig, STAKING_CONFIG } from './staking.config';

/**
 * ConfigModule (Global)
 *
 * 제공:
 * - STAKING_CONFIG: 환경변수에서 읽은 불변 설정
 * - Clock: 시스템 시계 (테스트에서는 ManualClock으로 교체)
 */
@Global()
@Module({
  providers: [
    {
      provide: STAKING_CONFIG,
      useFactory: () => loadStakingConfig(process.env),
    },
    {
      provide: Clock,
      useClass: SystemClock,
    },
  ],
  exports: [STAKING_CONFIG, Clock],
})
export class ConfigModule {}
