import { Injectable, Logger } from '@nestjs/common';
import { ReentrantCall } from '../common/errors/staking.errors';
import { ICustodyRegistry } from '../custody/interfaces/custody-registry.interface';
import { Journaled } from '../state/journal';
import { StakingStateStore } from '../state/staking-state.store';

/**
 * NonReentrantGate
 *
 * 엔진의 모든 상태 변경 진입점을 감싸는 관문
 *
 * 동작:
 * 1. 이미 진입 중이면 ReentrantCall (NFT 수신 훅 등을 통한 중첩 호출 차단)
 * 2. 엔진 상태와 모든 커스터디에 checkpoint
 * 3. 성공하면 commit, 실패하면 전부 revert 후 에러 재전파
 *
 * 엔진 코어는 동기 코드이므로 한 프로세스 안에서 논리 연산은 하나씩만 실행됨
 * → 관문이 막아야 하는 것은 동시 실행이 아니라 같은 호출 스택 안의 재진입
 */
@Injectable()
export class NonReentrantGate {
  private readonly logger = new Logger(NonReentrantGate.name);

  private entered = false;

  constructor(
    private readonly state: StakingStateStore,
    private readonly custody: ICustodyRegistry,
  ) {}

  get isEntered(): boolean {
    return this.entered;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.entered) {
      throw new ReentrantCall();
    }

    this.entered = true;
    const participants: Journaled[] = [this.state, ...this.custody.participants()];
    participants.forEach((participant) => participant.checkpoint());

    try {
      const result = fn();
      participants.forEach((participant) => participant.commitCheckpoint());
      return result;
    } catch (error) {
      for (let i = participants.length - 1; i >= 0; i--) {
        participants[i].revertCheckpoint();
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${operation} rolled back: ${message}`);
      throw error;
    } finally {
      this.entered = false;
    }
  }
}
