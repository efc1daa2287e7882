import { Injectable, Logger } from '@nestjs/common';
import { Signature } from '../common/crypto/crypto.types';
import {
  DelegateAddressInUse,
  Forbidden,
  InvalidSignature,
} from '../common/errors/staking.errors';
import { Address, normalizeAddress, ZERO_ADDRESS } from '../common/types/common.types';
import { SetSignerMessage } from '../consensus/types/topic-payloads';
import { NonReentrantGate } from '../guard/non-reentrant.gate';
import { SignatureService } from '../signature/signature.service';
import { StakingStateStore } from '../state/staking-state.store';
import { JournaledMap } from '../state/journal';

/**
 * 신원 연결 결과
 */
export interface IdentityLinks {
  staker: Address;
  bls: Address | null;
  signer: Address | null;
  delegatedFor: Address | null;
}

/**
 * IdentityService (IdentityRegistry)
 *
 * 스테이커와 보조 주소 사이의 단사(injective) 양방향 매핑
 * - BLS 주소: 검증자 집합 라이브러리가 쓰는 대체 서명 주소 (스테이커 본인이 등록)
 * - 대리 서명자: 스테이커 대신 투표 메시지에 서명 (스테이커 + 서명자 이중 서명)
 *
 * 한 주소는 동시에 두 스테이커에 연결될 수 없음 → DelegateAddressInUse
 */
@Injectable()
export class IdentityService {
  private readonly logger = new Logger(IdentityService.name);

  constructor(
    private readonly state: StakingStateStore,
    private readonly signatures: SignatureService,
    private readonly gate: NonReentrantGate,
  ) {}

  /**
   * BLS 주소 등록 (기존 등록은 교체)
   *
   * @throws {Forbidden} 0 주소
   * @throws {DelegateAddressInUse} 다른 스테이커가 이미 사용 중
   */
  setBlsAddress(caller: Address, bls: Address): void {
    this.gate.run('setBlsAddress', () => {
      const staker = normalizeAddress(caller);
      const link = normalizeAddress(bls);
      if (link === ZERO_ADDRESS) {
        throw new Forbidden('BLS address must not be zero');
      }

      this.link(this.state.stakerToBls, this.state.blsToStaker, staker, link);
      this.logger.log(`BLS address ${link} linked to ${staker}`);
    });
  }

  /**
   * 대리 서명자 등록
   *
   * 두 서명 모두 같은 SetSigner 다이제스트에 대한 것이어야 함
   * - stakerSignature: InvalidSignature(0)
   * - signerSignature: InvalidSignature(1)
   *
   * @throws {Forbidden} signer == staker 또는 0 주소
   * @throws {DelegateAddressInUse} 서명자가 다른 스테이커에 연결됨
   */
  setSigner(
    message: SetSignerMessage,
    stakerSignature: Signature,
    signerSignature: Signature,
  ): void {
    this.gate.run('setSigner', () => {
      const staker = normalizeAddress(message.staker);
      const signer = normalizeAddress(message.signer);
      if (signer === ZERO_ADDRESS || signer === staker) {
        throw new Forbidden('Signer must be a distinct non-zero address');
      }

      const digest = this.signatures.setSignerDigest({ staker, signer });
      if (this.signatures.recover(digest, stakerSignature) !== staker) {
        throw new InvalidSignature(0);
      }
      if (this.signatures.recover(digest, signerSignature) !== signer) {
        throw new InvalidSignature(1);
      }

      this.link(this.state.stakerToSigner, this.state.signerToStaker, staker, signer);
      this.logger.log(`Delegate signer ${signer} linked to ${staker}`);
    });
  }

  blsOf(staker: Address): Address | null {
    return this.state.stakerToBls.get(staker.toLowerCase()) ?? null;
  }

  stakerOfBls(bls: Address): Address | null {
    return this.state.blsToStaker.get(bls.toLowerCase()) ?? null;
  }

  signerOf(staker: Address): Address | null {
    return this.state.stakerToSigner.get(staker.toLowerCase()) ?? null;
  }

  stakerOfSigner(signer: Address): Address | null {
    return this.state.signerToStaker.get(signer.toLowerCase()) ?? null;
  }

  links(address: Address): IdentityLinks {
    const staker = normalizeAddress(address);
    return {
      staker,
      bls: this.blsOf(staker),
      signer: this.signerOf(staker),
      delegatedFor: this.stakerOfSigner(staker),
    };
  }

  private link(
    forward: JournaledMap<Address, Address>,
    reverse: JournaledMap<Address, Address>,
    staker: Address,
    target: Address,
  ): void {
    const owner = reverse.get(target);
    if (owner !== undefined && owner !== staker) {
      throw new DelegateAddressInUse(target);
    }

    const previous = forward.get(staker);
    if (previous !== undefined) {
      reverse.delete(previous);
    }
    forward.set(staker, target);
    reverse.set(target, staker);
  }
}
