import { Global, Module } from '@nestjs/common';
import { NonReentrantGate } from './non-reentrant.gate';
import { ReplayGuardService } from './replay-guard.service';

/**
 * GuardModule (Global)
 *
 * - NonReentrantGate: 모든 상태 변경 진입점이 공유하는 단일 관문
 * - ReplayGuardService: nonce 원장
 */
@Global()
@Module({
  providers: [NonReentrantGate, ReplayGuardService],
  exports: [NonReentrantGate, ReplayGuardService],
})
export class GuardModule {}
