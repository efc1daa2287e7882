import { Module } from '@nestjs/common';
import { SignatureModule } from '../signature/signature.module';
import { IdentityController } from './identity.controller';
import { IdentityService } from './identity.service';

/**
 * Identity Module
 *
 * 스테이커 ↔ BLS 주소, 스테이커 ↔ 대리 서명자 매핑
 */
@Module({
  imports: [SignatureModule],
  controllers: [IdentityController],
  providers: [IdentityService],
  exports: [IdentityService],
})
export class IdentityModule {}
