import { Module } from '@nestjs/common';
import { CallerAuthService } from './caller-auth.service';
import { SignatureService } from './signature.service';

/**
 * SignatureModule
 *
 * 의존: CryptoService (CommonModule), StakingStateStore (StateModule),
 * ReplayGuardService / NonReentrantGate (GuardModule)
 */
@Module({
  providers: [SignatureService, CallerAuthService],
  exports: [SignatureService, CallerAuthService],
})
export class SignatureModule {}
