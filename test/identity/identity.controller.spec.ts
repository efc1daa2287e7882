import { InvalidSignature, NonceUsed } from '../../src/common/errors/staking.errors';
import { ReplayGuardService } from '../../src/guard/replay-guard.service';
import { IdentityController } from '../../src/identity/identity.controller';
import { callerAction } from '../../src/signature/caller-action';
import { Actor, catchError, createEngine, EngineFixture } from '../support/engine.fixture';

const BLS = '0x' + 'b1'.repeat(20);
const OTHER_BLS = '0x' + 'b2'.repeat(20);

/**
 * IdentityController 테스트
 *
 * BLS 등록은 caller 본인의 CallerAction 서명이 있어야 함
 */
describe('IdentityController', () => {
  let fx: EngineFixture;
  let controller: IdentityController;
  let staker: Actor;
  let mallory: Actor;

  beforeEach(async () => {
    fx = await createEngine();
    controller = fx.moduleRef.get(IdentityController);
    staker = fx.actor(1);
    mallory = fx.actor(6);
  });

  afterEach(async () => {
    await fx.close();
  });

  function blsBody(bls: string, signer: Actor = staker, nonce = 1n) {
    const action = callerAction(staker.address, 'setBlsAddress', nonce, { target: bls });
    return {
      caller: staker.address,
      bls,
      nonce: nonce.toString(),
      signature: fx.signAction(action, signer.key),
    };
  }

  it('본인 서명이면 BLS 주소를 등록해야 함', () => {
    expect(controller.setBls(blsBody(BLS))).toEqual({
      staker: staker.address,
      bls: BLS,
      signer: null,
      delegatedFor: null,
    });
  });

  it('다른 사람이 서명하면 기존 BLS 주소를 덮어쓸 수 없어야 함', () => {
    controller.setBls(blsBody(BLS));

    const error = catchError(() => controller.setBls(blsBody(OTHER_BLS, mallory, 2n)));

    expect(error).toBeInstanceOf(InvalidSignature);
    expect(fx.identity.blsOf(staker.address)).toBe(BLS);
  });

  it('같은 nonce로 다시 보내면 NonceUsed', () => {
    controller.setBls(blsBody(BLS));

    expect(() => controller.setBls(blsBody(OTHER_BLS))).toThrow(new NonceUsed(0, 1n));
    expect(fx.identity.blsOf(staker.address)).toBe(BLS);
  });

  it('caller nonce는 자산 이동 nonce와 별개여야 함', () => {
    fx.moduleRef.get(ReplayGuardService).consume('transfer', staker.address, [1n]);

    expect(controller.setBls(blsBody(BLS)).bls).toBe(BLS);
  });
});
