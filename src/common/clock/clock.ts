import { Injectable } from '@nestjs/common';
import { UnixTime } from '../types/common.types';

/**
 * Clock
 *
 * 엔진이 읽는 "현재 시각" (초 단위 유닉스 타임스탬프)
 *
 * - 토픽 firstSeen / 만료 판정
 * - 스테이크 unlockTime 계산
 * - 활성화 시각(activationTime) 판정
 */
export abstract class Clock {
  abstract now(): UnixTime;
}

@Injectable()
export class SystemClock extends Clock {
  now(): UnixTime {
    return Math.floor(Date.now() / 1000);
  }
}

/**
 * 수동으로 움직이는 시계
 *
 * 테스트와 시뮬레이션에서 시간 경계(만료, 언락)를 정확히 맞출 때 사용
 */
export class ManualClock extends Clock {
  constructor(private current: UnixTime = 1_700_000_000) {
    super();
  }

  now(): UnixTime {
    return this.current;
  }

  set(time: UnixTime): void {
    this.current = time;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}
