import { Injectable, Logger } from '@nestjs/common';
import { Signature } from '../common/crypto/crypto.types';
import { InvalidSignature } from '../common/errors/staking.errors';
import { Address } from '../common/types/common.types';
import { NonReentrantGate } from '../guard/non-reentrant.gate';
import { ReplayGuardService } from '../guard/replay-guard.service';
import { CallerAction } from './caller-action';
import { SignatureService } from './signature.service';

/**
 * CallerAuthService
 *
 * HTTP로 들어온 스테이크 변경 / BLS 등록 요청의 호출자 확인
 *
 * 순서:
 * 1. CallerAction 다이제스트의 서명자 == caller 가 아니면 InvalidSignature(0)
 * 2. caller 네임스페이스에서 이미 쓴 nonce면 NonceUsed
 * 3. 동작 실행 (실패하면 nonce는 소비되지 않음)
 * 4. nonce 소비
 *
 * 엔진 코어가 동기 코드라 3과 4 사이에 다른 요청이 끼어들 수 없음
 */
@Injectable()
export class CallerAuthService {
  private readonly logger = new Logger(CallerAuthService.name);

  constructor(
    private readonly signatures: SignatureService,
    private readonly replayGuard: ReplayGuardService,
    private readonly gate: NonReentrantGate,
  ) {}

  authorize<T>(
    action: CallerAction,
    signature: Signature,
    run: (caller: Address) => T,
  ): T {
    const caller = action.caller.toLowerCase();
    const signer = this.signatures.recover(
      this.signatures.callerActionDigest(action),
      signature,
    );
    if (signer !== caller) {
      this.logger.warn(
        `${action.action} rejected: signer ${signer ?? 'unknown'} is not ${caller}`,
      );
      throw new InvalidSignature(0);
    }
    this.replayGuard.assertUnused(0, 'caller', caller, [action.nonce]);

    const result = run(caller);
    this.gate.run(`${action.action}:nonce`, () =>
      this.replayGuard.consume('caller', caller, [action.nonce]),
    );
    return result;
  }
}
