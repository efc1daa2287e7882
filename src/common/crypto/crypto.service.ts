import { Injectable } from '@nestjs/common';
import {
  bigIntToBytes,
  bytesToHex,
  concatBytes,
  setLengthLeft,
  utf8ToBytes,
} from '@ethereumjs/util';
import { curve, ec as EC } from 'elliptic';
import keccak from 'keccak';
import {
  addHexPrefix,
  Address,
  Hash,
  isHexString,
  isValidAddress,
  isValidHash,
  isValidPrivateKey,
  PrivateKey,
  PublicKey,
  stripHexPrefix,
} from '../types/common.types';
import {
  Signature,
  TypedDataDomain,
  TypedDataTypes,
  TypedMessage,
  TypedScalar,
  TypedValue,
} from './crypto.types';

/**
 * secp256k1 order / 2
 *
 * s 값이 이보다 크면 같은 서명의 변형(malleable) 버전이므로 거부
 */
const SECP256K1_HALF_ORDER = BigInt(
  '0x7fffffffffffffffffffffffffffffff5d576e7357a4501ddfe92f46681b20a0',
);

const UINT256_MAX = (1n << 256n) - 1n;

function toBytes(hex: string): Uint8Array {
  return Uint8Array.from(Buffer.from(stripHexPrefix(hex), 'hex'));
}

function isScalarList(value: TypedValue): value is readonly TypedScalar[] {
  return Array.isArray(value);
}

const EIP712_DOMAIN_TYPES: TypedDataTypes = {
  EIP712Domain: [
    { name: 'name', type: 'string' },
    { name: 'version', type: 'string' },
    { name: 'chainId', type: 'uint256' },
    { name: 'verifyingContract', type: 'address' },
  ],
};

/**
 * CryptoService
 *
 * 엔진의 모든 암호화 기능을 담당하는 핵심 서비스
 * 이더리움과 동일한 알고리즘 사용:
 * - secp256k1 타원곡선 (ECDSA, 복구 가능한 서명)
 * - Keccak-256 해싱
 * - EIP-712 구조화 데이터 해싱 (도메인 분리)
 */
@Injectable()
export class CryptoService {
  private readonly ec: EC;

  constructor() {
    this.ec = new EC('secp256k1');
  }

  /**
   * Keccak-256 해시 (바이트 입력 → 바이트 출력)
   */
  keccak(bytes: Uint8Array): Uint8Array {
    return new Uint8Array(
      keccak('keccak256').update(Buffer.from(bytes)).digest(),
    );
  }

  /**
   * Keccak-256 해시 (Buffer 입력)
   *
   * @returns "0x" + 64 hex characters (32 bytes)
   */
  hashBuffer(buffer: Buffer): Hash {
    const hash = keccak('keccak256').update(buffer).digest('hex');
    return addHexPrefix(hash);
  }

  /**
   * Keccak-256 해시 (HEX 문자열 입력)
   */
  hashHex(hex: string): Hash {
    return this.hashBuffer(Buffer.from(stripHexPrefix(hex), 'hex'));
  }

  /**
   * Keccak-256 해시 (UTF-8 텍스트 입력)
   */
  hashUtf8(text: string): Hash {
    return this.hashBuffer(Buffer.from(text, 'utf8'));
  }

  /**
   * 개인키로부터 공개키 생성
   *
   * - 개인키 * G (생성점) = 공개키
   * - 비압축 형식: x(32bytes) + y(32bytes), 0x04 접두사 제외
   */
  getPublicKeyFromPrivate(privateKey: PrivateKey): PublicKey {
    if (!isValidPrivateKey(privateKey)) {
      throw new Error('Invalid private key');
    }

    const keyPair = this.ec.keyFromPrivate(stripHexPrefix(privateKey), 'hex');
    return keyPair.getPublic().encode('hex', false).slice(2);
  }

  /**
   * 공개키로부터 주소 생성
   *
   * 1. 공개키(64바이트) → Keccak-256 해시
   * 2. 해시의 마지막 20바이트
   */
  publicKeyToAddress(publicKey: PublicKey): Address {
    const hash = this.hashHex(publicKey);
    return ('0x' + stripHexPrefix(hash).slice(-40)).toLowerCase();
  }

  privateKeyToAddress(privateKey: PrivateKey): Address {
    return this.publicKeyToAddress(this.getPublicKeyFromPrivate(privateKey));
  }

  /**
   * 다이제스트 서명 (v = 27/28)
   *
   * - canonical: true → 항상 low-s 서명 생성
   *
   * @param messageHash - 서명할 32바이트 다이제스트
   * @param privateKey - 서명에 사용할 개인키
   */
  sign(messageHash: Hash, privateKey: PrivateKey): Signature {
    if (!isValidHash(messageHash)) {
      throw new Error('Invalid message hash (must be 32 bytes)');
    }

    if (!isValidPrivateKey(privateKey)) {
      throw new Error('Invalid private key');
    }

    const keyPair = this.ec.keyFromPrivate(stripHexPrefix(privateKey), 'hex');
    const signature = keyPair.sign(stripHexPrefix(messageHash), {
      canonical: true,
    });

    const v = (signature.recoveryParam ?? 0) + 27;
    const r = addHexPrefix(signature.r.toString('hex').padStart(64, '0'));
    const s = addHexPrefix(signature.s.toString('hex').padStart(64, '0'));

    return { v, r, s };
  }

  /**
   * 서명으로부터 공개키 복구
   *
   * v 값 파싱:
   * - 27 or 28: 레거시
   * - 0 or 1: recoveryId 그대로
   *
   * @throws {Error} 형식 오류, high-s, 잘못된 recoveryId
   */
  recoverPublicKey(messageHash: Hash, signature: Signature): PublicKey {
    if (!isValidHash(messageHash)) {
      throw new Error('Invalid message hash');
    }

    if (!isHexString(signature.r, 32) || !isHexString(signature.s, 32)) {
      throw new Error('Invalid signature encoding');
    }

    if (BigInt(signature.s) > SECP256K1_HALF_ORDER) {
      throw new Error('Non-canonical signature (high s)');
    }

    const recoveryId = signature.v >= 27 ? signature.v - 27 : signature.v;
    if (recoveryId !== 0 && recoveryId !== 1) {
      throw new Error(`Invalid recovery id: ${recoveryId}`);
    }

    const publicKey: curve.base.BasePoint = this.ec.recoverPubKey(
      Buffer.from(stripHexPrefix(messageHash), 'hex'),
      { r: stripHexPrefix(signature.r), s: stripHexPrefix(signature.s) },
      recoveryId,
    );

    return publicKey.encode('hex', false).slice(2);
  }

  /**
   * 서명으로부터 주소 복구
   */
  recoverAddress(messageHash: Hash, signature: Signature): Address {
    return this.publicKeyToAddress(
      this.recoverPublicKey(messageHash, signature),
    );
  }

  /**
   * 서명자 주소 복구 (실패 시 null)
   *
   * 투표 검증에서는 "복구 불가"와 "다른 서명자"를 구분하지 않음
   */
  tryRecoverAddress(messageHash: Hash, signature: Signature): Address | null {
    try {
      return this.recoverAddress(messageHash, signature);
    } catch {
      return null;
    }
  }

  /**
   * 서명 검증
   *
   * @returns 복구된 주소가 예상 주소와 같으면 true
   */
  verify(
    messageHash: Hash,
    signature: Signature,
    expectedAddress: Address,
  ): boolean {
    const recovered = this.tryRecoverAddress(messageHash, signature);
    return (
      recovered !== null &&
      recovered.toLowerCase() === expectedAddress.toLowerCase()
    );
  }

  // ========================================
  // EIP-712 구조화 데이터 해싱
  // ========================================

  /**
   * 타입 문자열
   *
   * 예시: "SetSigner(address staker,address signer)"
   */
  encodeType(primaryType: string, types: TypedDataTypes): string {
    const fields = types[primaryType];
    if (!fields) {
      throw new Error(`Unknown typed-data type: ${primaryType}`);
    }
    return `${primaryType}(${fields.map((f) => `${f.type} ${f.name}`).join(',')})`;
  }

  /**
   * typeHash = keccak256(encodeType)
   */
  typeHash(primaryType: string, types: TypedDataTypes): Uint8Array {
    return this.keccak(utf8ToBytes(this.encodeType(primaryType, types)));
  }

  /**
   * hashStruct = keccak256(typeHash ‖ encodeData)
   *
   * 메시지의 필드 순서가 아니라 타입 정의의 필드 순서로 인코딩
   *
   * @returns "0x" + 64 hex characters
   */
  hashStruct(
    primaryType: string,
    types: TypedDataTypes,
    message: TypedMessage,
  ): Hash {
    return bytesToHex(this.hashStructBytes(primaryType, types, message));
  }

  /**
   * 도메인 구분자
   */
  domainSeparator(domain: TypedDataDomain): Hash {
    return this.hashStruct('EIP712Domain', EIP712_DOMAIN_TYPES, {
      name: domain.name,
      version: domain.version,
      chainId: domain.chainId,
      verifyingContract: domain.verifyingContract,
    });
  }

  /**
   * 서명 대상 다이제스트
   *
   * digest = keccak256(0x19 ‖ 0x01 ‖ domainSeparator ‖ hashStruct(message))
   */
  hashTypedData(
    domain: TypedDataDomain,
    types: TypedDataTypes,
    primaryType: string,
    message: TypedMessage,
  ): Hash {
    const digest = this.keccak(
      concatBytes(
        new Uint8Array([0x19, 0x01]),
        toBytes(this.domainSeparator(domain)),
        this.hashStructBytes(primaryType, types, message),
      ),
    );
    return bytesToHex(digest);
  }

  private hashStructBytes(
    primaryType: string,
    types: TypedDataTypes,
    message: TypedMessage,
  ): Uint8Array {
    const fields = types[primaryType];
    if (!fields) {
      throw new Error(`Unknown typed-data type: ${primaryType}`);
    }

    const encoded = fields.map((field) => {
      const value = message[field.name];
      if (value === undefined) {
        throw new Error(`Missing typed-data field: ${primaryType}.${field.name}`);
      }
      return this.encodeValue(field.type, value);
    });

    return this.keccak(
      concatBytes(this.typeHash(primaryType, types), ...encoded),
    );
  }

  /**
   * 필드 하나를 32바이트 워드로 인코딩
   *
   * - 배열: keccak256(원소 인코딩의 연결)
   * - string: keccak256(UTF-8)
   * - address / uint256 / bool: 왼쪽 0 패딩
   * - bytes32: 그대로
   */
  private encodeValue(type: string, value: TypedValue): Uint8Array {
    if (isScalarList(value)) {
      if (!type.endsWith('[]')) {
        throw new Error(`Unexpected array for ${type}`);
      }
      const itemType = type.slice(0, -2);
      return this.keccak(
        concatBytes(...value.map((item) => this.encodeScalar(itemType, item))),
      );
    }

    if (type.endsWith('[]')) {
      throw new Error(`Expected array for ${type}`);
    }
    return this.encodeScalar(type, value);
  }

  private encodeScalar(type: string, value: TypedScalar): Uint8Array {
    switch (type) {
      case 'string':
        return this.keccak(utf8ToBytes(String(value)));
      case 'address': {
        const address = String(value);
        if (!isValidAddress(address)) {
          throw new Error(`Invalid address value: ${address}`);
        }
        return setLengthLeft(toBytes(address), 32);
      }
      case 'bytes32': {
        const hex = String(value);
        if (!isValidHash(hex)) {
          throw new Error(`Invalid bytes32 value: ${hex}`);
        }
        return toBytes(hex);
      }
      case 'bool':
        return setLengthLeft(new Uint8Array([value ? 1 : 0]), 32);
      case 'uint256': {
        if (typeof value === 'boolean') {
          throw new Error('Expected integer for uint256');
        }
        const n = BigInt(value);
        if (n < 0n || n > UINT256_MAX) {
          throw new Error(`uint256 out of range: ${n}`);
        }
        return setLengthLeft(bigIntToBytes(n), 32);
      }
      default:
        throw new Error(`Unsupported typed-data type: ${type}`);
    }
  }
}
