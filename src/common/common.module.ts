import { Global, Module } from '@nestjs/common';
import { CryptoService } from './crypto/crypto.service';

/**
 * CommonModule
 *
 * 전역 모듈로 선언하여 모든 모듈에서 자동으로 사용 가능
 *
 * 포함된 서비스:
 * - CryptoService: 키, 서명, 복구, EIP-712 해싱
 *
 * 서명 검증(SignatureModule)과 테스트 서명 생성이 모두 이 서비스를 사용
 */
@Global()
@Module({
  providers: [CryptoService],
  exports: [CryptoService],
})
export class CommonModule {}
