import { Global, Module } from '@nestjs/common';
import { StakingStateStore } from './staking-state.store';

/**
 * StateModule (Global)
 *
 * 엔진 상태 저장소를 모든 모듈에 제공
 * - StakeModule, IdentityModule, GuardModule, ConsensusModule 이 같은 인스턴스를 공유
 */
@Global()
@Module({
  providers: [StakingStateStore],
  exports: [StakingStateStore],
})
export class StateModule {}
