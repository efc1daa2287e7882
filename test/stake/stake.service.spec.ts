import {
  AlreadyStaked,
  AmountZero,
  DurationZero,
  Forbidden,
  NotUnlocked,
  ReentrantCall,
  StakeZero,
  WrongAsset,
} from '../../src/common/errors/staking.errors';
import { CustodyError } from '../../src/custody/custody.errors';
import { ICustodyRegistry } from '../../src/custody/interfaces/custody-registry.interface';
import { CustodyMemoryRegistry } from '../../src/custody/memory/custody-memory.registry';
import { TokenMemoryCustodian } from '../../src/custody/memory/token-memory.custodian';
import { NonReentrantGate } from '../../src/guard/non-reentrant.gate';
import { createEngine, DAY, EngineFixture, START_TIME } from '../support/engine.fixture';

const ALICE = '0x' + 'a'.repeat(40);
const BOB = '0x' + 'b'.repeat(40);

/**
 * StakeService 테스트
 *
 * 테스트 범위:
 * - stake / increaseStake / extend / unstake 검증 순서와 에러
 * - 커스터디 이동과 원자성
 * - 투표력 풀 불변식
 * - NFT 수신 훅과 재진입 차단
 */
describe('StakeService', () => {
  let fx: EngineFixture;

  beforeEach(async () => {
    fx = await createEngine();
  });

  afterEach(async () => {
    await fx.close();
    jest.clearAllMocks();
  });

  describe('stake', () => {
    it('수량과 NFT가 모두 비면 AmountZero', () => {
      expect(() => fx.stakes.stake(ALICE, DAY, 0n, [])).toThrow(AmountZero);
    });

    it('기간이 0이면 DurationZero', () => {
      fx.fund(ALICE, 10n);
      expect(() => fx.stakes.stake(ALICE, 0, 10n, [])).toThrow(DurationZero);
    });

    it('토큰을 끌어오고 풀에 더해야 함', () => {
      fx.fund(ALICE, 500n);

      const stake = fx.stakes.stake(ALICE, 2 * DAY, 500n, []);

      expect(stake.amount).toBe(500n);
      expect(stake.unlockTime).toBe(START_TIME + 2 * DAY);
      expect(fx.token.balanceOf(ALICE)).toBe(0n);
      expect(fx.token.balanceOf(fx.engine)).toBe(500n);
      expect(fx.stakes.getTotalVotingPower()).toBe(500n);
      expect(fx.stakes.getTotalStakedAmount()).toBe(500n);
    });

    it('활성 스테이크가 있으면 AlreadyStaked', () => {
      fx.stakeTokens(ALICE, 100n);
      fx.fund(ALICE, 100n);

      expect(() => fx.stakes.stake(ALICE, DAY, 100n, [])).toThrow(AlreadyStaked);
    });

    it('NFT 담보는 오라클 가격만큼 투표력을 더해야 함', () => {
      fx.fund(ALICE, 100n);
      fx.mintNft(ALICE, 7n, 250n);

      fx.stakes.stake(ALICE, DAY, 100n, [7n]);

      expect(fx.nft.ownerOf(7n)).toBe(fx.engine);
      expect(fx.stakes.getVotingPower(ALICE)).toBe(350n);
      expect(fx.stakes.getTotalVotingPower()).toBe(350n);
      expect(fx.stakes.getTotalStakedAmount()).toBe(100n);
      expect(fx.stakes.stakerOfNft(7n)).toBe(ALICE);
    });

    it('NFT만으로도 스테이킹할 수 있어야 함', () => {
      fx.mintNft(ALICE, 1n, 40n);

      const stake = fx.stakes.stake(ALICE, DAY, 0n, [1n]);

      expect(stake.isActive).toBe(true);
      expect(fx.stakes.getVotingPower(ALICE)).toBe(40n);
    });

    it('같은 NFT id를 두 번 넣으면 Forbidden', () => {
      fx.mintNft(ALICE, 1n, 40n);
      expect(() => fx.stakes.stake(ALICE, DAY, 0n, [1n, 1n])).toThrow(Forbidden);
    });

    it('NFT 이동이 실패하면 토큰 이동도 롤백되어야 함', () => {
      fx.fund(ALICE, 100n);
      fx.nft.mint(ALICE, 9n);

      expect(() => fx.stakes.stake(ALICE, DAY, 100n, [9n])).toThrow(CustodyError);

      expect(fx.token.balanceOf(ALICE)).toBe(100n);
      expect(fx.token.balanceOf(fx.engine)).toBe(0n);
      expect(fx.token.allowance(ALICE, fx.engine)).toBe(100n);
      expect(fx.stakes.getStake(ALICE).isActive).toBe(false);
      expect(fx.stakes.getTotalVotingPower()).toBe(0n);
    });

    it('승인이 부족하면 CustodyError 후 상태가 그대로여야 함', () => {
      fx.fund(ALICE, 100n);

      expect(() => fx.stakes.stake(ALICE, DAY, 200n, [])).toThrow(CustodyError);
      expect(fx.stakes.getTotalStakedAmount()).toBe(0n);
    });
  });

  describe('increaseStake', () => {
    it('활성 스테이크가 없으면 StakeZero', () => {
      fx.fund(ALICE, 10n);
      expect(() => fx.stakes.increaseStake(ALICE, 10n, [])).toThrow(StakeZero);
    });

    it('unlockTime은 바꾸지 않아야 함', () => {
      fx.stakeTokens(ALICE, 100n, DAY);
      fx.fund(ALICE, 50n);
      fx.mintNft(ALICE, 3n, 25n);

      const stake = fx.stakes.increaseStake(ALICE, 50n, [3n]);

      expect(stake.amount).toBe(150n);
      expect(stake.unlockTime).toBe(START_TIME + DAY);
      expect([...stake.collateralIds]).toEqual([3n]);
      expect(fx.stakes.getTotalVotingPower()).toBe(175n);
    });

    it('수량과 NFT가 모두 비면 AmountZero', () => {
      fx.stakeTokens(ALICE, 100n);
      expect(() => fx.stakes.increaseStake(ALICE, 0n, [])).toThrow(AmountZero);
    });
  });

  describe('extend', () => {
    it('unlockTime에 기간을 더해야 함', () => {
      fx.stakeTokens(ALICE, 100n, DAY);

      expect(fx.stakes.extend(ALICE, DAY).unlockTime).toBe(START_TIME + 2 * DAY);
    });

    it('기간이 0이면 DurationZero, 스테이크가 없으면 StakeZero', () => {
      expect(() => fx.stakes.extend(ALICE, 0)).toThrow(DurationZero);
      expect(() => fx.stakes.extend(ALICE, DAY)).toThrow(StakeZero);
    });
  });

  describe('unstake', () => {
    it('잠금 해제 전에는 NotUnlocked, 이후에는 담보를 모두 반환해야 함', () => {
      fx.fund(ALICE, 100n);
      fx.mintNft(ALICE, 5n, 60n);
      fx.stakes.stake(ALICE, DAY, 100n, [5n]);

      fx.clock.set(START_TIME + DAY - 1);
      expect(() => fx.stakes.unstake(ALICE)).toThrow(NotUnlocked);

      fx.clock.set(START_TIME + DAY + 1);
      const returned = fx.stakes.unstake(ALICE);

      expect(returned.amount).toBe(100n);
      expect(fx.token.balanceOf(ALICE)).toBe(100n);
      expect(fx.nft.ownerOf(5n)).toBe(ALICE);
      expect(fx.stakes.getStake(ALICE).isActive).toBe(false);
      expect(fx.stakes.stakerOfNft(5n)).toBeNull();
      expect(fx.stakes.getTotalVotingPower()).toBe(0n);
      expect(fx.stakes.getTotalStakedAmount()).toBe(0n);
    });

    it('잠금 해제 시각 정각에는 허용되어야 함', () => {
      fx.stakeTokens(ALICE, 100n, DAY);
      fx.clock.set(START_TIME + DAY);

      expect(fx.stakes.unstake(ALICE).amount).toBe(100n);
    });

    it('스테이크가 없으면 StakeZero', () => {
      expect(() => fx.stakes.unstake(ALICE)).toThrow(StakeZero);
    });

    it('언스테이크 후 다시 스테이킹할 수 있어야 함', () => {
      fx.stakeTokens(ALICE, 100n, DAY);
      fx.clock.advance(DAY);
      fx.stakes.unstake(ALICE);

      fx.stakeTokens(ALICE, 40n, DAY);
      expect(fx.stakes.getStake(ALICE).amount).toBe(40n);
    });
  });

  describe('NFT 수신 훅', () => {
    it('요청하지 않은 NFT는 WrongAsset으로 거부해야 함', () => {
      fx.nft.mint(ALICE, 3n);

      expect(() => fx.nft.move(ALICE, fx.engine, 3n)).toThrow(WrongAsset);
      expect(fx.nft.ownerOf(3n)).toBe(ALICE);
    });

    it('반환 중 재진입하면 ReentrantCall로 전체 롤백되어야 함', () => {
      fx.fund(ALICE, 100n);
      fx.mintNft(ALICE, 5n, 60n);
      fx.stakes.stake(ALICE, DAY, 100n, [5n]);
      fx.clock.advance(DAY);

      fx.nft.registerReceiver(ALICE, {
        onNftReceived: () => {
          fx.stakes.extend(ALICE, DAY);
        },
      });

      expect(() => fx.stakes.unstake(ALICE)).toThrow(ReentrantCall);
      expect(fx.nft.ownerOf(5n)).toBe(fx.engine);
      expect(fx.token.balanceOf(ALICE)).toBe(0n);
      expect(fx.stakes.getStake(ALICE).amount).toBe(100n);
      expect(fx.stakes.getTotalVotingPower()).toBe(160n);
      expect(fx.moduleRef.get(NonReentrantGate).isEntered).toBe(false);
    });
  });

  describe('recoverFungible', () => {
    it('owner만 스테이킹 토큰이 아닌 토큰을 회수할 수 있어야 함', () => {
      const strayAddress = '0x' + '0'.repeat(36) + '2001';
      const stray = new TokenMemoryCustodian(strayAddress, fx.engine);
      const registry = fx.moduleRef.get(ICustodyRegistry);
      if (registry instanceof CustodyMemoryRegistry) {
        registry.addFungible(stray);
      }
      stray.mint(fx.engine, 30n);

      expect(() => fx.stakes.recoverFungible(ALICE, strayAddress, BOB, 30n)).toThrow(
        'Only the owner may recover tokens',
      );

      fx.stakes.recoverFungible(fx.config.ownerAddress, strayAddress, BOB, 30n);
      expect(stray.balanceOf(BOB)).toBe(30n);
    });

    it('스테이킹 토큰은 회수할 수 없어야 함', () => {
      fx.stakeTokens(ALICE, 100n);

      expect(() =>
        fx.stakes.recoverFungible(fx.config.ownerAddress, fx.token.address, BOB, 1n),
      ).toThrow('The staking token cannot be recovered');
    });
  });

  describe('조회', () => {
    it('풀 합계는 스테이커 투표력의 합과 같아야 함', () => {
      fx.stakeTokens(ALICE, 300n);
      fx.fund(BOB, 200n);
      fx.mintNft(BOB, 1n, 75n);
      fx.stakes.stake(BOB, DAY, 200n, [1n]);
      fx.fund(ALICE, 20n);
      fx.stakes.increaseStake(ALICE, 20n, []);

      const sum = fx.stakes.getVotingPower(ALICE) + fx.stakes.getVotingPower(BOB);
      expect(sum).toBe(595n);
      expect(fx.stakes.getTotalVotingPower()).toBe(sum);
    });

    it('BLS 주소로 스테이크를 찾아야 함', () => {
      const bls = '0x' + 'c'.repeat(40);
      fx.stakeTokens(ALICE, 100n);
      fx.identity.setBlsAddress(ALICE, bls);

      expect(fx.stakes.getStakeByBlsAddress(bls).amount).toBe(100n);
      expect(fx.stakes.getStakeByBlsAddress(BOB).isActive).toBe(false);
    });
  });
});
