import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsString, Matches, ValidateNested } from 'class-validator';
import {
  ADDRESS_MESSAGE,
  ADDRESS_PATTERN,
  SignatureDto,
  UINT_MESSAGE,
  UINT_PATTERN,
} from './signature.dto';

/**
 * 호출자 서명 요청 공통 필드
 *
 * signature: CallerAction(caller, action, ..., nonce) 다이제스트에 대한 caller의 서명
 * nonce: caller별 1회용
 */
export class CallerDto {
  @ApiProperty({
    description: '호출자 주소',
    example: '0x1234567890123456789012345678901234567890',
  })
  @Matches(ADDRESS_PATTERN, { message: `caller ${ADDRESS_MESSAGE}` })
  caller!: string;

  @ApiProperty({ description: '호출자 nonce', example: '1' })
  @IsString()
  @Matches(UINT_PATTERN, { message: `nonce ${UINT_MESSAGE}` })
  nonce!: string;

  @ApiProperty({ type: SignatureDto })
  @ValidateNested()
  @Type(() => SignatureDto)
  signature!: SignatureDto;
}
