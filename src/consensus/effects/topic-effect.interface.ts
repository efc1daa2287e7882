import { Address } from '../../common/types/common.types';
import { GlobalParameters } from '../entities/global-parameters.entity';
import {
  TopicKeys,
  TopicKind,
  TopicMessages,
  TopicPayload,
} from '../types/topic-payloads';

/**
 * 토픽 종류별 동작
 *
 * 투표 누적 알고리즘은 ConsensusService에 한 번만 구현되어 있고,
 * 종류마다 다른 부분만 이 인터페이스로 주입됨
 */
export interface TopicEffect<K extends TopicKind> {
  readonly kind: K;

  /**
   * 메시지 → 키 필드 (주소는 소문자로 정규화)
   */
  keyOf(message: TopicMessages[K]): TopicKeys[K];

  /**
   * 메시지에 선언된 투표자 (signer / requester)
   */
  voterOf(message: TopicMessages[K]): Address;

  payloadOf(key: TopicKeys[K]): TopicPayload;

  /**
   * 아직 승인되지 않은 토픽에 대한 투표 전에 실행
   *
   * @param index - 배치 안의 행 번호 (에러 보고용)
   */
  precheck(index: number, key: TopicKeys[K], params: GlobalParameters): void;

  /**
   * 임계치 도달 시 정확히 한 번 실행
   */
  apply(key: TopicKeys[K], params: GlobalParameters): void;
}
