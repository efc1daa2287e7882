import { Module } from '@nestjs/common';
import { SignatureModule } from '../signature/signature.module';
import { StakeController } from './stake.controller';
import { StakeService } from './stake.service';

/**
 * Stake Module
 *
 * 구성:
 * - StakeService: 스테이크 원장, 투표력 풀, NFT 수신 훅
 * - StakeController: 스테이크 API
 *
 * 의존 (전역): StakingStateStore, ICustodyRegistry, NonReentrantGate, Clock
 * 의존: CallerAuthService (SignatureModule)
 */
@Module({
  imports: [SignatureModule],
  controllers: [StakeController],
  providers: [StakeService],
  exports: [StakeService],
})
export class StakeModule {}
