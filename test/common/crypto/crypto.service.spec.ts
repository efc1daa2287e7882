import { Test, TestingModule } from '@nestjs/testing';
import { CryptoService } from '../../../src/common/crypto/crypto.service';
import { TypedDataTypes } from '../../../src/common/crypto/crypto.types';

const SECP256K1_ORDER = BigInt(
  '0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141',
);

const KEY_1 = '0x' + '0'.repeat(63) + '1';
const KEY_2 = '0x' + '0'.repeat(63) + '2';

/**
 * CryptoService 테스트
 *
 * 테스트 범위:
 * 1. Keccak-256 해싱
 * 2. 개인키 → 주소
 * 3. 서명 / 복구 (low-s, recovery id)
 * 4. EIP-712 타입 해싱과 도메인 구분자
 */
describe('CryptoService', () => {
  let service: CryptoService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [CryptoService],
    }).compile();

    service = module.get<CryptoService>(CryptoService);
  });

  describe('Hash Functions', () => {
    it('should hash utf8 text with keccak256', () => {
      expect(service.hashUtf8('hello')).toBe(
        '0x1c8aff950685c2ed4bc3174f3472287b56d9517b9c948127319a09a7a36deac8',
      );
      expect(service.hashUtf8('')).toBe(
        '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470',
      );
    });

    it('hashHex는 바이트를 해싱해야 함', () => {
      expect(service.hashHex('0x68656c6c6f')).toBe(service.hashUtf8('hello'));
    });
  });

  describe('Address Derivation', () => {
    it('개인키에서 이더리움 주소를 만들어야 함', () => {
      expect(service.privateKeyToAddress(KEY_1)).toBe(
        '0x7e5f4552091a69125d5dfcb7b8c2659029395bdf',
      );
      expect(service.privateKeyToAddress(KEY_2)).toBe(
        '0x2b5ad5c4795c026514f8317c7a215e218dccd6cf',
      );
    });

    it('잘못된 개인키는 거부해야 함', () => {
      expect(() => service.getPublicKeyFromPrivate('0x' + '0'.repeat(64))).toThrow(
        'Invalid private key',
      );
    });
  });

  describe('Sign / Recover', () => {
    const digest = '0x' + 'ab'.repeat(32);

    it('서명자 주소를 복구해야 함', () => {
      const signature = service.sign(digest, KEY_1);

      expect([27, 28]).toContain(signature.v);
      expect(service.recoverAddress(digest, signature)).toBe(
        service.privateKeyToAddress(KEY_1),
      );
      expect(service.verify(digest, signature, service.privateKeyToAddress(KEY_1))).toBe(true);
      expect(service.verify(digest, signature, service.privateKeyToAddress(KEY_2))).toBe(false);
    });

    it('v = 0/1 형식도 허용해야 함', () => {
      const signature = service.sign(digest, KEY_2);
      const recovered = service.recoverAddress(digest, {
        ...signature,
        v: signature.v - 27,
      });

      expect(recovered).toBe(service.privateKeyToAddress(KEY_2));
    });

    it('다른 다이제스트에서는 다른 주소가 복구되어야 함', () => {
      const signature = service.sign(digest, KEY_1);
      const other = service.tryRecoverAddress('0x' + 'cd'.repeat(32), signature);

      expect(other).not.toBe(service.privateKeyToAddress(KEY_1));
    });

    it('high-s 서명은 거부해야 함', () => {
      const signature = service.sign(digest, KEY_1);
      const highS = SECP256K1_ORDER - BigInt(signature.s);
      const malleable = {
        v: signature.v === 27 ? 28 : 27,
        r: signature.r,
        s: '0x' + highS.toString(16).padStart(64, '0'),
      };

      expect(() => service.recoverAddress(digest, malleable)).toThrow(
        'Non-canonical signature (high s)',
      );
      expect(service.tryRecoverAddress(digest, malleable)).toBeNull();
    });

    it('잘못된 recovery id는 거부해야 함', () => {
      const signature = service.sign(digest, KEY_1);

      expect(() => service.recoverAddress(digest, { ...signature, v: 29 })).toThrow(
        'Invalid recovery id: 2',
      );
    });

    it('형식이 잘못된 r/s는 복구 불가(null)여야 함', () => {
      expect(service.tryRecoverAddress(digest, { v: 27, r: '0x01', s: '0x02' })).toBeNull();
    });
  });

  describe('EIP-712', () => {
    const types: TypedDataTypes = {
      SetSigner: [
        { name: 'staker', type: 'address' },
        { name: 'signer', type: 'address' },
      ],
      Batch: [
        { name: 'ids', type: 'uint256[]' },
        { name: 'label', type: 'string' },
      ],
    };

    it('encodeType은 타입 정의 순서대로 문자열을 만들어야 함', () => {
      expect(service.encodeType('SetSigner', types)).toBe(
        'SetSigner(address staker,address signer)',
      );
    });

    it('EIP712Domain typeHash가 표준 값과 같아야 함', () => {
      const typeHash = service.typeHash('EIP712Domain', {
        EIP712Domain: [
          { name: 'name', type: 'string' },
          { name: 'version', type: 'string' },
          { name: 'chainId', type: 'uint256' },
          { name: 'verifyingContract', type: 'address' },
        ],
      });

      expect(Buffer.from(typeHash).toString('hex')).toBe(
        '8b73c3c69bb8fe3d512ecc4cf759cc79239f7b179b0ffacaa9a75d522b39400f',
      );
    });

    it('도메인 구분자가 EIP-712 예시 값과 같아야 함', () => {
      expect(
        service.domainSeparator({
          name: 'Ether Mail',
          version: '1',
          chainId: 1,
          verifyingContract: '0xCcCCccccCCCCcCCCCCCcCcCccCcCCCcCcccccccC',
        }),
      ).toBe('0xf2cee375fa42b42143804025fc449deafd50cc031ca257e0b194a650a912090f');
    });

    it('메시지 필드 순서와 무관하게 같은 해시여야 함', () => {
      const a = service.hashStruct('Batch', types, { ids: [1n, 2n], label: 'x' });
      const b = service.hashStruct('Batch', types, { label: 'x', ids: [1n, 2n] });

      expect(a).toBe(b);
      expect(a).not.toBe(service.hashStruct('Batch', types, { ids: [2n, 1n], label: 'x' }));
    });

    it('누락된 필드는 에러를 던져야 함', () => {
      expect(() => service.hashStruct('Batch', types, { ids: [] })).toThrow(
        'Missing typed-data field: Batch.label',
      );
    });

    it('uint256 범위를 벗어나면 에러를 던져야 함', () => {
      expect(() => service.hashStruct('Batch', types, { ids: [-1n], label: '' })).toThrow(
        'uint256 out of range: -1',
      );
    });

    it('배열 타입에 스칼라를 넣으면 에러를 던져야 함', () => {
      expect(() => service.hashStruct('Batch', types, { ids: 1n, label: '' })).toThrow(
        'Expected array for uint256[]',
      );
    });

    it('알 수 없는 타입은 에러를 던져야 함', () => {
      expect(() => service.encodeType('Missing', types)).toThrow(
        'Unknown typed-data type: Missing',
      );
    });
  });
});
