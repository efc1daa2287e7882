import { Address, Amount, Hash, UnixTime } from '../../common/types/common.types';
import { TopicPayload } from '../types/topic-payloads';

type JsonScalar = string | number | boolean;

function toJsonValue(value: unknown): JsonScalar | JsonScalar[] {
  if (Array.isArray(value)) {
    return value.map((item) => String(item));
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

/**
 * Topic Entity
 *
 * 내용 해시(TopicKey)로 식별되는 제안 하나와 그에 모인 투표
 *
 * 생명주기:
 * - 첫 투표 시 생성 (firstSeen = 그 시각, expiresAt = 그 시점의 expiration 기준)
 * - expiresAt 이후에는 투표 불가 (이후 expiration이 바뀌어도 마감은 그대로)
 * - accepted 가 되면 효과가 정확히 한 번 적용됨
 * - 삭제되지 않음 (감사/멱등성)
 */
export class TopicRecord {
  constructor(
    readonly key: Hash,
    readonly payload: TopicPayload,
    readonly firstSeen: UnixTime,
    readonly expiresAt: UnixTime,
    readonly votedPower: Amount = 0n,
    readonly accepted: boolean = false,
    readonly voters: ReadonlySet<Address> = new Set(),
  ) {}

  get kind(): TopicPayload['kind'] {
    return this.payload.kind;
  }

  /**
   * 첫 투표 시각과 그때의 expiration으로 토픽 생성
   */
  static open(
    key: Hash,
    payload: TopicPayload,
    now: UnixTime,
    expiration: number,
  ): TopicRecord {
    return new TopicRecord(key, payload, now, now + expiration);
  }

  /**
   * 투표 가능 여부 (expiresAt 포함)
   */
  isOpenAt(time: UnixTime): boolean {
    return time <= this.expiresAt;
  }

  hasVoted(voter: Address): boolean {
    return this.voters.has(voter);
  }

  withVote(voter: Address, power: Amount): TopicRecord {
    return new TopicRecord(
      this.key,
      this.payload,
      this.firstSeen,
      this.expiresAt,
      this.votedPower + power,
      this.accepted,
      new Set([...this.voters, voter]),
    );
  }

  withAccepted(): TopicRecord {
    return new TopicRecord(
      this.key,
      this.payload,
      this.firstSeen,
      this.expiresAt,
      this.votedPower,
      true,
      this.voters,
    );
  }

  toJSON() {
    return {
      key: this.key,
      kind: this.kind,
      payload: Object.fromEntries(
        Object.entries(this.payload.data).map(([name, value]) => [
          name,
          toJsonValue(value),
        ]),
      ),
      firstSeen: this.firstSeen,
      expiresAt: this.expiresAt,
      votedPower: this.votedPower.toString(),
      accepted: this.accepted,
      voters: [...this.voters],
    };
  }
}
