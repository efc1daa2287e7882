import {
  DelegateAddressInUse,
  Forbidden,
  InvalidSignature,
} from '../../src/common/errors/staking.errors';
import { Actor, catchError, createEngine, EngineFixture } from '../support/engine.fixture';

/**
 * IdentityService 테스트
 *
 * 테스트 범위:
 * - BLS 주소 등록 (단사 매핑, 교체)
 * - 대리 서명자 등록 (이중 서명)
 */
describe('IdentityService', () => {
  let fx: EngineFixture;
  let staker: Actor;
  let delegate: Actor;
  let other: Actor;

  beforeEach(async () => {
    fx = await createEngine();
    staker = fx.actor(1);
    delegate = fx.actor(2);
    other = fx.actor(3);
  });

  afterEach(async () => {
    await fx.close();
  });

  function signSetSigner(stakerKey: string, signerKey: string, signer = delegate.address) {
    const digest = fx.signatures.setSignerDigest({ staker: staker.address, signer });
    return {
      stakerSignature: fx.crypto.sign(digest, stakerKey),
      signerSignature: fx.crypto.sign(digest, signerKey),
    };
  }

  describe('setBlsAddress', () => {
    const bls = '0x' + 'B1'.repeat(20);
    const bls2 = '0x' + 'b2'.repeat(20);

    it('양방향 매핑을 기록해야 함 (소문자)', () => {
      fx.identity.setBlsAddress(staker.address, bls);

      expect(fx.identity.blsOf(staker.address)).toBe(bls.toLowerCase());
      expect(fx.identity.stakerOfBls(bls)).toBe(staker.address);
    });

    it('재등록하면 이전 역방향 매핑을 지워야 함', () => {
      fx.identity.setBlsAddress(staker.address, bls);
      fx.identity.setBlsAddress(staker.address, bls2);

      expect(fx.identity.stakerOfBls(bls)).toBeNull();
      expect(fx.identity.stakerOfBls(bls2)).toBe(staker.address);
    });

    it('다른 스테이커가 쓰는 주소면 DelegateAddressInUse', () => {
      fx.identity.setBlsAddress(staker.address, bls);

      expect(() => fx.identity.setBlsAddress(other.address, bls)).toThrow(
        DelegateAddressInUse,
      );
      expect(fx.identity.blsOf(other.address)).toBeNull();
    });

    it('같은 주소 재등록은 허용되어야 함', () => {
      fx.identity.setBlsAddress(staker.address, bls);
      fx.identity.setBlsAddress(staker.address, bls);

      expect(fx.identity.stakerOfBls(bls)).toBe(staker.address);
    });

    it('0 주소는 Forbidden', () => {
      expect(() => fx.identity.setBlsAddress(staker.address, '0x' + '0'.repeat(40))).toThrow(
        Forbidden,
      );
    });
  });

  describe('setSigner', () => {
    it('두 서명이 맞으면 대리 서명자를 등록해야 함', () => {
      const { stakerSignature, signerSignature } = signSetSigner(staker.key, delegate.key);

      fx.identity.setSigner(
        { staker: staker.address, signer: delegate.address },
        stakerSignature,
        signerSignature,
      );

      expect(fx.identity.signerOf(staker.address)).toBe(delegate.address);
      expect(fx.identity.stakerOfSigner(delegate.address)).toBe(staker.address);
      expect(fx.identity.links(staker.address)).toEqual({
        staker: staker.address,
        bls: null,
        signer: delegate.address,
        delegatedFor: null,
      });
    });

    it('스테이커 서명이 틀리면 InvalidSignature(0)', () => {
      const { stakerSignature, signerSignature } = signSetSigner(other.key, delegate.key);

      const error = catchError(() =>
        fx.identity.setSigner(
          { staker: staker.address, signer: delegate.address },
          stakerSignature,
          signerSignature,
        ),
      );

      expect(error).toBeInstanceOf(InvalidSignature);
      expect(error).toMatchObject({ code: 'InvalidSignature', index: 0 });
    });

    it('서명자 서명이 틀리면 InvalidSignature(1)', () => {
      const { stakerSignature, signerSignature } = signSetSigner(staker.key, other.key);

      expect(() =>
        fx.identity.setSigner(
          { staker: staker.address, signer: delegate.address },
          stakerSignature,
          signerSignature,
        ),
      ).toThrow('Signature does not match the declared signer (row 1)');
    });

    it('다른 스테이커의 서명자는 DelegateAddressInUse', () => {
      const first = signSetSigner(staker.key, delegate.key);
      fx.identity.setSigner(
        { staker: staker.address, signer: delegate.address },
        first.stakerSignature,
        first.signerSignature,
      );

      const digest = fx.signatures.setSignerDigest({
        staker: other.address,
        signer: delegate.address,
      });
      expect(() =>
        fx.identity.setSigner(
          { staker: other.address, signer: delegate.address },
          fx.crypto.sign(digest, other.key),
          fx.crypto.sign(digest, delegate.key),
        ),
      ).toThrow(DelegateAddressInUse);
    });

    it('자기 자신을 서명자로 등록할 수 없어야 함', () => {
      const { stakerSignature } = signSetSigner(staker.key, staker.key, staker.address);

      expect(() =>
        fx.identity.setSigner(
          { staker: staker.address, signer: staker.address },
          stakerSignature,
          stakerSignature,
        ),
      ).toThrow(Forbidden);
    });
  });
});
