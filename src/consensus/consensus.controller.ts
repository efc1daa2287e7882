import {
  Body,
  Controller,
  Get,
  NotFoundException,
  Param,
  Post,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConsensusService, TopicStatus, VoteOutcome } from './consensus.service';
import {
  SetNftPricesBatchDto,
  SetNftPricesKeyDto,
  SetParamsBatchDto,
  SetParamsKeyDto,
  toSetNftPricesKey,
  toSetNftPricesMessage,
  toSetParamsKey,
  toSetParamsMessage,
  toTransferKey,
  toTransferMessage,
  TransferBatchDto,
  TransferKeyDto,
} from './dto/vote.dto';

/**
 * VoteOutcome → JSON (bigint는 10진수 문자열)
 */
function serializeOutcome(outcome: VoteOutcome) {
  return { ...outcome, votedPower: outcome.votedPower.toString() };
}

function serializeStatus(status: TopicStatus) {
  return {
    key: status.key,
    exists: status.record !== null,
    votedPower: status.record?.votedPower.toString() ?? '0',
    firstSeen: status.record?.firstSeen ?? null,
    accepted: status.record?.accepted ?? false,
    expiresAt: status.expiresAt,
    voters: status.record ? [...status.record.voters] : [],
  };
}

/**
 * Consensus Controller
 *
 * 릴레이어용 투표 제출 API + 토픽/파라미터 조회
 *
 * - POST /consensus/transfer | params | prices: 서명된 투표 배치 제출
 * - POST /consensus/{kind}/status: 키 필드로 토픽 상태 조회
 * - GET /consensus/params, /consensus/threshold
 */
@ApiTags('consensus')
@Controller('consensus')
export class ConsensusController {
  constructor(private readonly consensusService: ConsensusService) {}

  /**
   * 자산 이동 투표 배치
   *
   * POST /consensus/transfer
   */
  @Post('transfer')
  @ApiOperation({
    summary: '자산 이동 투표 제출',
    description:
      '서명된 Transfer 메시지 배치를 제출합니다. 한 행이라도 실패하면 배치 전체가 거부됩니다.',
  })
  @ApiResponse({ status: 201, description: '행별 처리 결과' })
  @ApiResponse({ status: 400, description: '행 에러 (index 포함)' })
  transfer(@Body() body: TransferBatchDto) {
    return this.consensusService
      .transfer(body.messages.map(toTransferMessage), body.signatures)
      .map(serializeOutcome);
  }

  @Post('params')
  @ApiOperation({
    summary: '파라미터 변경 투표 제출',
    description: '서명된 SetParams 메시지 배치를 제출합니다.',
  })
  @ApiResponse({ status: 201, description: '행별 처리 결과' })
  setParams(@Body() body: SetParamsBatchDto) {
    return this.consensusService
      .setParams(body.messages.map(toSetParamsMessage), body.signatures)
      .map(serializeOutcome);
  }

  @Post('prices')
  @ApiOperation({
    summary: 'NFT 가격 갱신 투표 제출',
    description: '서명된 SetNftPrices 메시지 배치를 제출합니다.',
  })
  @ApiResponse({ status: 201, description: '행별 처리 결과' })
  setNftPrices(@Body() body: SetNftPricesBatchDto) {
    return this.consensusService
      .setNftPrices(body.messages.map(toSetNftPricesMessage), body.signatures)
      .map(serializeOutcome);
  }

  /**
   * 전송 토픽 상태 (getRequestedTransfer)
   *
   * POST /consensus/transfer/status
   */
  @Post('transfer/status')
  @ApiOperation({
    summary: '전송 토픽 상태 조회',
    description: '키 필드(from, to, amount, nftIds, nonces)로 토픽을 찾아 누적 투표력과 승인 여부를 반환합니다.',
  })
  transferStatus(@Body() body: TransferKeyDto) {
    return serializeStatus(
      this.consensusService.getTransferStatus(toTransferKey(body)),
    );
  }

  @Post('params/status')
  @ApiOperation({ summary: '파라미터 변경 토픽 상태 조회' })
  setParamsStatus(@Body() body: SetParamsKeyDto) {
    return serializeStatus(
      this.consensusService.getSetParamsStatus(toSetParamsKey(body)),
    );
  }

  @Post('prices/status')
  @ApiOperation({ summary: 'NFT 가격 토픽 상태 조회' })
  setNftPricesStatus(@Body() body: SetNftPricesKeyDto) {
    return serializeStatus(
      this.consensusService.getSetNftPricesStatus(toSetNftPricesKey(body)),
    );
  }

  @Get('params')
  @ApiOperation({
    summary: '현재 GlobalParameters',
    description: '버전, 커스터디 주소, 임계치, 투표 기간, collector를 조회합니다.',
  })
  getParams() {
    return {
      ...this.consensusService.getParams(),
      chainId: this.consensusService.getChainId(),
    };
  }

  @Get('threshold')
  @ApiOperation({
    summary: '승인에 필요한 투표력',
    description: 'floor(전체 투표력 × threshold / 100)',
  })
  getThreshold() {
    return {
      required: this.consensusService.getRequiredPower().toString(),
      threshold: this.consensusService.getConsensusThreshold(),
    };
  }

  @Get('topics/:key')
  @ApiOperation({ summary: '토픽 키로 조회' })
  @ApiParam({ name: 'key', description: '토픽 키 (0x + 64 hex)' })
  @ApiResponse({ status: 404, description: '토픽 없음' })
  getTopic(@Param('key') key: string) {
    const topic = this.consensusService.getTopic(key);
    if (!topic) {
      throw new NotFoundException(`Topic ${key} not found`);
    }
    return topic.toJSON();
  }
}
