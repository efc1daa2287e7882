import { ApiProperty } from '@nestjs/swagger';
import { IsArray, IsInt, IsString, Matches, Min } from 'class-validator';
import { CallerDto } from '../../common/dto/caller.dto';
import {
  ADDRESS_MESSAGE,
  ADDRESS_PATTERN,
  UINT_MESSAGE,
  UINT_PATTERN,
} from '../../common/dto/signature.dto';

const EXAMPLE_ADDRESS = '0x1234567890123456789012345678901234567890';

export class StakeRequestDto extends CallerDto {
  @ApiProperty({ description: '잠금 기간 (초)', example: 172800 })
  @IsInt()
  @Min(0)
  duration!: number;

  @ApiProperty({ description: '대체 가능 담보 수량', example: '500' })
  @IsString()
  @Matches(UINT_PATTERN, { message: `amount ${UINT_MESSAGE}` })
  amount!: string;

  @ApiProperty({ description: '담보 NFT id', type: [String], example: [] })
  @IsArray()
  @Matches(UINT_PATTERN, { each: true, message: `nftIds ${UINT_MESSAGE}` })
  nftIds!: string[];
}

export class IncreaseStakeRequestDto extends CallerDto {
  @ApiProperty({ description: '추가 수량', example: '100' })
  @IsString()
  @Matches(UINT_PATTERN, { message: `amount ${UINT_MESSAGE}` })
  amount!: string;

  @ApiProperty({ description: '추가 NFT id', type: [String], example: [] })
  @IsArray()
  @Matches(UINT_PATTERN, { each: true, message: `nftIds ${UINT_MESSAGE}` })
  nftIds!: string[];
}

export class ExtendStakeRequestDto extends CallerDto {
  @ApiProperty({ description: '연장할 기간 (초)', example: 86400 })
  @IsInt()
  @Min(0)
  duration!: number;
}

export class RecoverFungibleRequestDto extends CallerDto {
  @ApiProperty({ description: '회수할 토큰 커스터디', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `token ${ADDRESS_MESSAGE}` })
  token!: string;

  @ApiProperty({ description: '수신자', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `to ${ADDRESS_MESSAGE}` })
  to!: string;

  @ApiProperty({ description: '수량', example: '10' })
  @IsString()
  @Matches(UINT_PATTERN, { message: `amount ${UINT_MESSAGE}` })
  amount!: string;
}
