import { Address, Amount } from '../../common/types/common.types';
import { Journaled } from '../../state/journal';

/**
 * Fungible Custodian Interface
 *
 * 대체 가능 자산 원장 (ERC-20과 같은 모양)
 *
 * 호출 주체는 항상 엔진:
 * - transferFrom: holder가 엔진에 승인한 범위에서 끌어오기 (스테이킹)
 * - transfer: 엔진 자신의 잔고에서 내보내기 (언스테이킹, 전송 승인)
 *
 * 모든 호출은 동기적이고 실패할 수 있음 (CustodyError)
 * Journaled: 엔진 호출 하나가 실패하면 그 안에서 일어난 이동도 롤백됨
 */
export abstract class IFungibleCustodian implements Journaled {
  abstract readonly address: Address;

  abstract balanceOf(holder: Address): Amount;

  abstract transferFrom(holder: Address, recipient: Address, amount: Amount): void;

  abstract transfer(recipient: Address, amount: Amount): void;

  abstract checkpoint(): void;

  abstract commitCheckpoint(): void;

  abstract revertCheckpoint(): void;
}
