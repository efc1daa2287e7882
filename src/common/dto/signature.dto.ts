import { ApiProperty } from '@nestjs/swagger';
import { IsInt, IsString, Matches, Max, Min } from 'class-validator';
import { Signature } from '../crypto/crypto.types';

/**
 * 요청 DTO 공통 검증 패턴
 */
export const ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/;
export const UINT_PATTERN = /^(0|[1-9]\d*)$/;
export const WORD_PATTERN = /^0x[a-fA-F0-9]{64}$/;

export const ADDRESS_MESSAGE =
  'must be a valid address (0x + 40 hex characters)';
export const UINT_MESSAGE = 'must be a non-negative integer string';

/**
 * 서명 DTO (secp256k1, v = 27/28 또는 0/1)
 */
export class SignatureDto implements Signature {
  @ApiProperty({ description: '복구 식별자', example: 27 })
  @IsInt()
  @Min(0)
  @Max(28)
  v!: number;

  @ApiProperty({
    description: 'r (0x + 64 hex)',
    example: '0x' + '1'.repeat(64),
  })
  @IsString()
  @Matches(WORD_PATTERN, { message: 'r must be 32 bytes of hex' })
  r!: string;

  @ApiProperty({
    description: 's (0x + 64 hex, low-s)',
    example: '0x' + '2'.repeat(64),
  })
  @IsString()
  @Matches(WORD_PATTERN, { message: 's must be 32 bytes of hex' })
  s!: string;
}
