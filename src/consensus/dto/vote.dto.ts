import { ApiProperty } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import {
  ADDRESS_MESSAGE,
  ADDRESS_PATTERN,
  SignatureDto,
  UINT_MESSAGE,
  UINT_PATTERN,
} from '../../common/dto/signature.dto';
import { MAX_THRESHOLD } from '../../common/constants/staking.constants';
import {
  SetNftPricesKey,
  SetNftPricesMessage,
  SetParamsKey,
  SetParamsMessage,
  TransferKey,
  TransferMessage,
} from '../types/topic-payloads';

const EXAMPLE_ADDRESS = '0x1234567890123456789012345678901234567890';

/**
 * Transfer 키 DTO
 *
 * 금액, NFT id, nonce는 uint256 → 10진수 문자열
 */
export class TransferKeyDto {
  @ApiProperty({ description: '출발 스테이커 (엔진 주소면 풀 커스터디)', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `from ${ADDRESS_MESSAGE}` })
  from!: string;

  @ApiProperty({ description: '수신자', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `to ${ADDRESS_MESSAGE}` })
  to!: string;

  @ApiProperty({ description: '대체 가능 자산 수량', example: '100' })
  @IsString()
  @Matches(UINT_PATTERN, { message: `amount ${UINT_MESSAGE}` })
  amount!: string;

  @ApiProperty({ description: '이동할 NFT id', type: [String], example: [] })
  @IsArray()
  @Matches(UINT_PATTERN, { each: true, message: `nftIds ${UINT_MESSAGE}` })
  nftIds!: string[];

  @ApiProperty({ description: '수신자 기준 nonce', type: [String], example: ['1'] })
  @IsArray()
  @Matches(UINT_PATTERN, { each: true, message: `nonces ${UINT_MESSAGE}` })
  nonces!: string[];
}

export class TransferMessageDto extends TransferKeyDto {
  @ApiProperty({ description: '선언된 투표자', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `signer ${ADDRESS_MESSAGE}` })
  signer!: string;
}

export class SetParamsKeyDto {
  @ApiProperty({ description: '대체 가능 자산 커스터디', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `token ${ADDRESS_MESSAGE}` })
  token!: string;

  @ApiProperty({ description: 'NFT 커스터디', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `nft ${ADDRESS_MESSAGE}` })
  nft!: string;

  @ApiProperty({ description: '승인 임계치 (%)', example: 51 })
  @IsInt()
  @Min(1)
  @Max(MAX_THRESHOLD)
  threshold!: number;

  @ApiProperty({ description: '투표 기간 (초)', example: 86400 })
  @IsInt()
  @Min(1)
  expiration!: number;

  @ApiProperty({ description: '슬래싱 수신자', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `collector ${ADDRESS_MESSAGE}` })
  collector!: string;

  @ApiProperty({ description: 'nonce', example: '1' })
  @IsString()
  @Matches(UINT_PATTERN, { message: `nonce ${UINT_MESSAGE}` })
  nonce!: string;
}

export class SetParamsMessageDto extends SetParamsKeyDto {
  @ApiProperty({ description: '선언된 투표자', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `requester ${ADDRESS_MESSAGE}` })
  requester!: string;
}

export class SetNftPricesKeyDto {
  @ApiProperty({ description: 'NFT id', type: [String], example: ['1'] })
  @IsArray()
  @Matches(UINT_PATTERN, { each: true, message: `nftIds ${UINT_MESSAGE}` })
  nftIds!: string[];

  @ApiProperty({ description: '새 가격 (nftIds와 같은 길이)', type: [String], example: ['250'] })
  @IsArray()
  @Matches(UINT_PATTERN, { each: true, message: `prices ${UINT_MESSAGE}` })
  prices!: string[];

  @ApiProperty({ description: 'nonce', example: '1' })
  @IsString()
  @Matches(UINT_PATTERN, { message: `nonce ${UINT_MESSAGE}` })
  nonce!: string;
}

export class SetNftPricesMessageDto extends SetNftPricesKeyDto {
  @ApiProperty({ description: '선언된 투표자', example: EXAMPLE_ADDRESS })
  @Matches(ADDRESS_PATTERN, { message: `requester ${ADDRESS_MESSAGE}` })
  requester!: string;
}

/**
 * 배치 요청: messages[i] 와 signatures[i] 가 한 행
 */
export class TransferBatchDto {
  @ApiProperty({ type: [TransferMessageDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TransferMessageDto)
  messages!: TransferMessageDto[];

  @ApiProperty({ type: [SignatureDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SignatureDto)
  signatures!: SignatureDto[];
}

export class SetParamsBatchDto {
  @ApiProperty({ type: [SetParamsMessageDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SetParamsMessageDto)
  messages!: SetParamsMessageDto[];

  @ApiProperty({ type: [SignatureDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SignatureDto)
  signatures!: SignatureDto[];
}

export class SetNftPricesBatchDto {
  @ApiProperty({ type: [SetNftPricesMessageDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SetNftPricesMessageDto)
  messages!: SetNftPricesMessageDto[];

  @ApiProperty({ type: [SignatureDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SignatureDto)
  signatures!: SignatureDto[];
}

// ========================================
// DTO → 도메인 메시지
// ========================================

export function toTransferKey(dto: TransferKeyDto): TransferKey {
  return {
    from: dto.from,
    to: dto.to,
    amount: BigInt(dto.amount),
    nftIds: dto.nftIds.map((id) => BigInt(id)),
    nonces: dto.nonces.map((nonce) => BigInt(nonce)),
  };
}

export function toTransferMessage(dto: TransferMessageDto): TransferMessage {
  return { ...toTransferKey(dto), signer: dto.signer };
}

export function toSetParamsKey(dto: SetParamsKeyDto): SetParamsKey {
  return {
    token: dto.token,
    nft: dto.nft,
    threshold: dto.threshold,
    expiration: dto.expiration,
    collector: dto.collector,
    nonce: BigInt(dto.nonce),
  };
}

export function toSetParamsMessage(dto: SetParamsMessageDto): SetParamsMessage {
  return { ...toSetParamsKey(dto), requester: dto.requester };
}

export function toSetNftPricesKey(dto: SetNftPricesKeyDto): SetNftPricesKey {
  return {
    nftIds: dto.nftIds.map((id) => BigInt(id)),
    prices: dto.prices.map((price) => BigInt(price)),
    nonce: BigInt(dto.nonce),
  };
}

export function toSetNftPricesMessage(
  dto: SetNftPricesMessageDto,
): SetNftPricesMessage {
  return { ...toSetNftPricesKey(dto), requester: dto.requester };
}
