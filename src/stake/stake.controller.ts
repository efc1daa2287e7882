import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CallerDto } from '../common/dto/caller.dto';
import { Address } from '../common/types/common.types';
import { callerAction } from '../signature/caller-action';
import { CallerAuthService } from '../signature/caller-auth.service';
import { Stake } from './entities/stake.entity';
import {
  ExtendStakeRequestDto,
  IncreaseStakeRequestDto,
  RecoverFungibleRequestDto,
  StakeRequestDto,
} from './dto/stake.dto';
import { StakeService } from './stake.service';

/**
 * StakeController
 *
 * 스테이크 관련 HTTP API
 *
 * 제공하는 API:
 * - POST /stake, /stake/increase, /stake/extend, /stake/unstake
 * - GET /stake/:address: 스테이크 + 투표력
 * - GET /stake/bls/:bls: BLS 주소로 스테이크 조회
 * - GET /stake/power/total: 전체 투표력
 *
 * 변경 요청은 모두 CallerAction 서명으로 caller를 확인 (CallerAuthService)
 */
@ApiTags('stake')
@Controller('stake')
export class StakeController {
  constructor(
    private readonly stakeService: StakeService,
    private readonly callerAuth: CallerAuthService,
  ) {}

  @Post()
  @ApiOperation({
    summary: '스테이킹',
    description: '담보(수량 + NFT)를 맡기고 투표력을 얻습니다.',
  })
  @ApiResponse({ status: 201, description: '생성된 스테이크' })
  @ApiResponse({
    status: 400,
    description: 'InvalidSignature / NonceUsed / AmountZero / DurationZero / AlreadyStaked',
  })
  stake(@Body() body: StakeRequestDto) {
    const amount = BigInt(body.amount);
    const nftIds = body.nftIds.map((id) => BigInt(id));
    const stake = this.callerAuth.authorize(
      callerAction(body.caller, 'stake', BigInt(body.nonce), {
        amount,
        duration: body.duration,
        nftIds,
      }),
      body.signature,
      (caller) => this.stakeService.stake(caller, body.duration, amount, nftIds),
    );
    return this.view(body.caller, stake);
  }

  @Post('increase')
  @ApiOperation({ summary: '스테이크 증가', description: 'unlockTime은 바뀌지 않습니다.' })
  increase(@Body() body: IncreaseStakeRequestDto) {
    const amount = BigInt(body.amount);
    const nftIds = body.nftIds.map((id) => BigInt(id));
    const stake = this.callerAuth.authorize(
      callerAction(body.caller, 'increaseStake', BigInt(body.nonce), { amount, nftIds }),
      body.signature,
      (caller) => this.stakeService.increaseStake(caller, amount, nftIds),
    );
    return this.view(body.caller, stake);
  }

  @Post('extend')
  @ApiOperation({ summary: '잠금 기간 연장' })
  extend(@Body() body: ExtendStakeRequestDto) {
    const stake = this.callerAuth.authorize(
      callerAction(body.caller, 'extend', BigInt(body.nonce), { duration: body.duration }),
      body.signature,
      (caller) => this.stakeService.extend(caller, body.duration),
    );
    return this.view(body.caller, stake);
  }

  @Post('unstake')
  @ApiOperation({
    summary: '언스테이킹',
    description: 'unlockTime 이후에만 가능합니다. 담보 전체를 반환합니다.',
  })
  @ApiResponse({ status: 400, description: 'StakeZero / NotUnlocked' })
  unstake(@Body() body: CallerDto) {
    const returned = this.callerAuth.authorize(
      callerAction(body.caller, 'unstake', BigInt(body.nonce)),
      body.signature,
      (caller) => this.stakeService.unstake(caller),
    );
    return { returned: returned.toJSON() };
  }

  @Post('recover')
  @ApiOperation({
    summary: '잘못 입금된 토큰 회수 (owner 전용)',
    description: '스테이킹 토큰은 회수할 수 없습니다.',
  })
  @ApiResponse({ status: 400, description: 'InvalidSignature / NonceUsed / Forbidden' })
  recover(@Body() body: RecoverFungibleRequestDto) {
    const amount = BigInt(body.amount);
    this.callerAuth.authorize(
      callerAction(body.caller, 'recoverFungible', BigInt(body.nonce), {
        amount,
        target: body.token,
        recipient: body.to,
      }),
      body.signature,
      (caller) => this.stakeService.recoverFungible(caller, body.token, body.to, amount),
    );
    return { success: true };
  }

  @Get('power/total')
  @ApiOperation({ summary: '전체 투표력' })
  totalPower() {
    return {
      totalVotingPower: this.stakeService.getTotalVotingPower().toString(),
      totalStakedAmount: this.stakeService.getTotalStakedAmount().toString(),
    };
  }

  @Get('bls/:bls')
  @ApiOperation({ summary: 'BLS 주소로 스테이크 조회' })
  @ApiParam({ name: 'bls', description: '등록된 BLS 주소' })
  byBls(@Param('bls') bls: string) {
    return this.stakeService.getStakeByBlsAddress(bls).toJSON();
  }

  @Get(':address')
  @ApiOperation({ summary: '스테이크 조회', description: '스테이크 기록과 현재 투표력을 조회합니다.' })
  @ApiParam({
    name: 'address',
    description: '스테이커 주소',
    example: '0x1234567890123456789012345678901234567890',
  })
  getStake(@Param('address') address: string) {
    return this.view(address, this.stakeService.getStake(address));
  }

  private view(address: Address, stake: Stake) {
    return {
      address: address.toLowerCase(),
      ...stake.toJSON(),
      votingPower: this.stakeService.votingPowerOf(stake).toString(),
    };
  }
}
