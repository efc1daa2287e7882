import { NotFoundException } from '@nestjs/common';
import { ConsensusController } from '../../src/consensus/consensus.controller';
import { toTransferMessage, TransferMessageDto } from '../../src/consensus/dto/vote.dto';
import { Actor, createEngine, DAY, EngineFixture, START_TIME } from '../support/engine.fixture';

/**
 * ConsensusController 테스트
 *
 * DTO(문자열) → 도메인(bigint) 변환과 응답 직렬화 확인
 */
describe('ConsensusController', () => {
  let fx: EngineFixture;
  let controller: ConsensusController;
  let voters: Actor[];

  beforeEach(async () => {
    fx = await createEngine();
    controller = fx.moduleRef.get(ConsensusController);
    voters = [1, 2, 3, 4].map((n) => fx.actor(n));
    voters.forEach((voter) => fx.stakeTokens(voter.address, 500n));
  });

  afterEach(async () => {
    await fx.close();
  });

  function slashDto(voter: Actor): TransferMessageDto {
    const dto = new TransferMessageDto();
    dto.from = voters[3].address;
    dto.to = fx.config.initialParams.collector;
    dto.amount = '100';
    dto.nftIds = [];
    dto.nonces = ['1'];
    dto.signer = voter.address;
    return dto;
  }

  function ballot(voter: Actor) {
    const message = slashDto(voter);
    return {
      message,
      signature: fx.sign('transfer', toTransferMessage(message), voter.key),
    };
  }

  describe('transfer', () => {
    it('행별 결과를 문자열 투표력으로 반환해야 함', () => {
      const ballots = voters.slice(0, 3).map(ballot);

      const result = controller.transfer({
        messages: ballots.map((b) => b.message),
        signatures: ballots.map((b) => b.signature),
      });

      expect(result.map((row) => row.votedPower)).toEqual(['500', '1000', '1500']);
      expect(result[2]).toMatchObject({
        index: 2,
        voter: voters[2].address,
        counted: true,
        accepted: true,
        executed: true,
      });
    });
  });

  describe('transferStatus', () => {
    it('투표가 없으면 exists=false', () => {
      expect(controller.transferStatus(slashDto(voters[0]))).toEqual({
        key: fx.consensus.topicKeyOf('transfer', toTransferMessage(slashDto(voters[0]))),
        exists: false,
        votedPower: '0',
        firstSeen: null,
        accepted: false,
        expiresAt: null,
        voters: [],
      });
    });

    it('투표 후 누적 상태를 반환해야 함', () => {
      const first = ballot(voters[0]);
      controller.transfer({ messages: [first.message], signatures: [first.signature] });

      expect(controller.transferStatus(slashDto(voters[1]))).toMatchObject({
        exists: true,
        votedPower: '500',
        firstSeen: START_TIME,
        expiresAt: START_TIME + DAY,
        voters: [voters[0].address],
      });
    });
  });

  describe('getParams / getThreshold', () => {
    it('현재 파라미터와 chainId를 반환해야 함', () => {
      expect(controller.getParams()).toMatchObject({
        version: 1,
        threshold: 51,
        expiration: DAY,
        chainId: 999,
      });
    });

    it('필요 투표력을 문자열로 반환해야 함', () => {
      expect(controller.getThreshold()).toEqual({ required: '1020', threshold: 51 });
    });
  });

  describe('getTopic', () => {
    it('없는 토픽은 NotFoundException', () => {
      expect(() => controller.getTopic('0x' + '0'.repeat(64))).toThrow(NotFoundException);
    });

    it('토픽을 JSON으로 반환해야 함', () => {
      const first = ballot(voters[0]);
      const [outcome] = controller.transfer({
        messages: [first.message],
        signatures: [first.signature],
      });

      expect(controller.getTopic(outcome.topic)).toEqual({
        key: outcome.topic,
        kind: 'transfer',
        payload: {
          from: voters[3].address,
          to: fx.config.initialParams.collector,
          amount: '100',
          nftIds: [],
          nonces: ['1'],
        },
        firstSeen: START_TIME,
        expiresAt: START_TIME + DAY,
        votedPower: '500',
        accepted: false,
        voters: [voters[0].address],
      });
    });
  });
});
