import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { Matches, ValidateNested } from 'class-validator';
import { CallerDto } from '../../common/dto/caller.dto';
import {
  ADDRESS_MESSAGE,
  ADDRESS_PATTERN,
  SignatureDto,
} from '../../common/dto/signature.dto';

const EXAMPLE_ADDRESS = '0x1234567890123456789012345678901234567890';

/**
 * BLS 주소 등록 요청 (caller = 스테이커, CallerAction.target = bls)
 */
export class SetBlsAddressRequestDto extends CallerDto {
  @ApiProperty({ description: 'BLS 대체 서명 주소', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `bls ${ADDRESS_MESSAGE}` })
  bls!: string;
}

/**
 * 대리 서명자 등록 요청
 *
 * SetSigner(staker, signer) 다이제스트에 대해
 * 스테이커와 서명자가 각각 서명
 */
export class SetSignerRequestDto {
  @ApiProperty({ description: '스테이커', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `staker ${ADDRESS_MESSAGE}` })
  staker!: string;

  @ApiProperty({ description: '대리 서명자', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `signer ${ADDRESS_MESSAGE}` })
  signer!: string;

  @ApiProperty({ type: SignatureDto })
  @ValidateNested()
  @Type(() => SignatureDto)
  stakerSignature!: SignatureDto;

  @ApiProperty({ type: SignatureDto })
  @ValidateNested()
  @Type(() => SignatureDto)
  signerSignature!: SignatureDto;
}
