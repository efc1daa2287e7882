import { Body, Controller, Get, Param, Post } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import { callerAction } from '../signature/caller-action';
import { CallerAuthService } from '../signature/caller-auth.service';
import { SetBlsAddressRequestDto, SetSignerRequestDto } from './dto/identity.dto';
import { IdentityService } from './identity.service';

/**
 * IdentityController
 *
 * - POST /identity/bls: BLS 주소 등록 (CallerAction 서명)
 * - POST /identity/signer: 대리 서명자 등록 (이중 서명)
 * - GET /identity/:address: 연결된 주소 조회
 */
@ApiTags('identity')
@Controller('identity')
export class IdentityController {
  constructor(
    private readonly identityService: IdentityService,
    private readonly callerAuth: CallerAuthService,
  ) {}

  @Post('bls')
  @ApiOperation({
    summary: 'BLS 주소 등록',
    description: '기존 등록은 교체됩니다. 다른 스테이커가 쓰는 주소는 등록할 수 없습니다.',
  })
  @ApiResponse({ status: 400, description: 'InvalidSignature / NonceUsed / DelegateAddressInUse' })
  setBls(@Body() body: SetBlsAddressRequestDto) {
    this.callerAuth.authorize(
      callerAction(body.caller, 'setBlsAddress', BigInt(body.nonce), { target: body.bls }),
      body.signature,
      (caller) => this.identityService.setBlsAddress(caller, body.bls),
    );
    return this.identityService.links(body.caller);
  }

  @Post('signer')
  @ApiOperation({
    summary: '대리 서명자 등록',
    description: 'SetSigner(staker, signer) 다이제스트에 대한 스테이커와 서명자 양쪽의 서명이 필요합니다.',
  })
  @ApiResponse({ status: 400, description: 'InvalidSignature / DelegateAddressInUse' })
  setSigner(@Body() body: SetSignerRequestDto) {
    this.identityService.setSigner(
      { staker: body.staker, signer: body.signer },
      body.stakerSignature,
      body.signerSignature,
    );
    return this.identityService.links(body.staker);
  }

  @Get(':address')
  @ApiOperation({ summary: '신원 연결 조회' })
  @ApiParam({
    name: 'address',
    example: '0x1234567890123456789012345678901234567890',
  })
  getLinks(@Param('address') address: string) {
    return this.identityService.links(address);
  }
}
