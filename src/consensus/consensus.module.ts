import { Module } from '@nestjs/common';
import { SignatureModule } from '../signature/signature.module';
import { StakeModule } from '../stake/stake.module';
import { ConsensusController } from './consensus.controller';
import { ConsensusService } from './consensus.service';
import { AssetTransferEffect } from './effects/asset-transfer.effect';
import { ParameterChangeEffect } from './effects/parameter-change.effect';
import { PriceUpdateEffect } from './effects/price-update.effect';

/**
 * Consensus Module
 *
 * 지분 가중 투표 누적 + 토픽 종류별 효과
 *
 * 구성:
 * - ConsensusService: 배치 처리, 투표 누적, 임계치 판정
 * - AssetTransferEffect / ParameterChangeEffect / PriceUpdateEffect
 * - ConsensusController: 릴레이어 API
 */
@Module({
  imports: [StakeModule, SignatureModule],
  controllers: [ConsensusController],
  providers: [
    ConsensusService,
    AssetTransferEffect,
    ParameterChangeEffect,
    PriceUpdateEffect,
  ],
  exports: [ConsensusService],
})
export class ConsensusModule {}
