import { Inject, Injectable } from '@nestjs/common';
import { CryptoService } from '../common/crypto/crypto.service';
import { Signature, TypedMessage } from '../common/crypto/crypto.types';
import { Address, Hash } from '../common/types/common.types';
import { STAKING_CONFIG, StakingConfig } from '../config/staking.config';
import { SetSignerMessage, TopicKind } from '../consensus/types/topic-payloads';
import { StakingStateStore } from '../state/staking-state.store';
import { CallerAction } from './caller-action';
import { STAKING_TYPES, TOPIC_TYPE_NAMES } from './signature.types';

/**
 * SignatureService (SignatureVerifier)
 *
 * 역할:
 * - 토픽 메시지의 EIP-712 다이제스트 계산
 * - 토픽 키 계산 (투표자 필드를 뺀 구조체 해시)
 * - 서명 → 투표자 결정 (직접 서명 또는 등록된 대리 서명자)
 *
 * 도메인은 설정에서 고정: 다른 엔진 인스턴스용 서명은 재사용 불가
 */
@Injectable()
export class SignatureService {
  constructor(
    private readonly crypto: CryptoService,
    private readonly state: StakingStateStore,
    @Inject(STAKING_CONFIG) private readonly config: StakingConfig,
  ) {}

  get domainSeparator(): Hash {
    return this.crypto.domainSeparator(this.config.domain);
  }

  /**
   * 투표자가 서명하는 다이제스트
   */
  digest(kind: TopicKind, message: TypedMessage): Hash {
    return this.crypto.hashTypedData(
      this.config.domain,
      STAKING_TYPES,
      TOPIC_TYPE_NAMES[kind].message,
      message,
    );
  }

  /**
   * 토픽 키
   *
   * 키 타입의 필드만 인코딩하므로 signer / requester 가 달라도 같은 값
   */
  topicKey(kind: TopicKind, key: TypedMessage): Hash {
    return this.crypto.hashStruct(TOPIC_TYPE_NAMES[kind].key, STAKING_TYPES, key);
  }

  setSignerDigest(message: SetSignerMessage): Hash {
    return this.crypto.hashTypedData(
      this.config.domain,
      STAKING_TYPES,
      'SetSigner',
      message,
    );
  }

  callerActionDigest(action: CallerAction): Hash {
    return this.crypto.hashTypedData(
      this.config.domain,
      STAKING_TYPES,
      'CallerAction',
      action,
    );
  }

  /**
   * 서명으로부터 유효 투표자 결정
   *
   * 유효 조건 (둘 중 하나):
   * - 복구된 주소 == declared
   * - 복구된 주소가 declared의 등록된 대리 서명자
   *
   * @returns declared (소문자) 또는 null (서명 불일치, 복구 불가)
   */
  resolveVoter(
    kind: TopicKind,
    message: TypedMessage,
    signature: Signature,
    declared: Address,
  ): Address | null {
    const recovered = this.crypto.tryRecoverAddress(
      this.digest(kind, message),
      signature,
    );
    if (recovered === null) {
      return null;
    }

    const voter = declared.toLowerCase();
    if (recovered === voter) {
      return voter;
    }
    return this.state.signerToStaker.get(recovered) === voter ? voter : null;
  }

  /**
   * 다이제스트 서명자 복구 (실패 시 null)
   */
  recover(digest: Hash, signature: Signature): Address | null {
    return this.crypto.tryRecoverAddress(digest, signature);
  }
}
