import { Address, Amount, normalizeAddress } from '../../common/types/common.types';
import { Journal, JournaledMap } from '../../state/journal';
import { CustodyError } from '../custody.errors';
import { IFungibleCustodian } from '../interfaces/fungible-custodian.interface';

/**
 * In-Memory Fungible Custodian
 *
 * 현재 구현:
 * - 잔액: Map<Address, Amount>
 * - 승인: Map<"owner:spender", Amount>
 * - operator(엔진) 한 명이 호출하는 ERC-20 모양의 원장
 *
 * 용도:
 * - 외부 원장 없이 단독 실행
 * - 테스트
 */
export class TokenMemoryCustodian extends IFungibleCustodian {
  readonly address: Address;

  private readonly journal = new Journal();
  private readonly balances = new JournaledMap<Address, Amount>(this.journal);
  private readonly allowances = new JournaledMap<string, Amount>(this.journal);

  private readonly operator: Address;

  constructor(address: Address, operator: Address) {
    super();
    this.address = normalizeAddress(address);
    this.operator = normalizeAddress(operator);
  }

  balanceOf(holder: Address): Amount {
    return this.balances.get(holder.toLowerCase()) ?? 0n;
  }

  allowance(owner: Address, spender: Address): Amount {
    return this.allowances.get(this.allowanceKey(owner, spender)) ?? 0n;
  }

  /**
   * 발행 (테스트/Genesis 용)
   */
  mint(to: Address, amount: Amount): void {
    this.credit(to.toLowerCase(), amount);
  }

  approve(owner: Address, spender: Address, amount: Amount): void {
    this.allowances.set(this.allowanceKey(owner, spender), amount);
  }

  /**
   * 소유자 간 직접 이동 (엔진 외부의 일반 송금)
   */
  move(from: Address, to: Address, amount: Amount): void {
    this.debit(from.toLowerCase(), amount);
    this.credit(to.toLowerCase(), amount);
  }

  transferFrom(holder: Address, recipient: Address, amount: Amount): void {
    const owner = holder.toLowerCase();
    if (owner !== this.operator) {
      const allowed = this.allowance(owner, this.operator);
      if (allowed < amount) {
        throw new CustodyError(
          this.address,
          `Insufficient allowance. Current: ${allowed}, Required: ${amount}`,
        );
      }
      this.allowances.set(this.allowanceKey(owner, this.operator), allowed - amount);
    }
    this.debit(owner, amount);
    this.credit(recipient.toLowerCase(), amount);
  }

  transfer(recipient: Address, amount: Amount): void {
    this.debit(this.operator, amount);
    this.credit(recipient.toLowerCase(), amount);
  }

  checkpoint(): void {
    this.journal.checkpoint();
  }

  commitCheckpoint(): void {
    this.journal.commitCheckpoint();
  }

  revertCheckpoint(): void {
    this.journal.revertCheckpoint();
  }

  private debit(holder: Address, amount: Amount): void {
    if (amount < 0n) {
      throw new CustodyError(this.address, 'Amount must not be negative');
    }
    const balance = this.balanceOf(holder);
    if (balance < amount) {
      throw new CustodyError(
        this.address,
        `Insufficient balance. Current: ${balance}, Required: ${amount}`,
      );
    }
    this.balances.set(holder, balance - amount);
  }

  private credit(holder: Address, amount: Amount): void {
    if (amount < 0n) {
      throw new CustodyError(this.address, 'Amount must not be negative');
    }
    this.balances.set(holder, this.balanceOf(holder) + amount);
  }

  private allowanceKey(owner: Address, spender: Address): string {
    return `${owner.toLowerCase()}:${spender.toLowerCase()}`;
  }
}
