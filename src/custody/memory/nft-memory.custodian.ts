import { Address, NftId, normalizeAddress } from '../../common/types/common.types';
import { Journal, JournaledMap, JournaledSet } from '../../state/journal';
import { CustodyError } from '../custody.errors';
import { INftCustodian, INftReceiver } from '../interfaces/nft-custodian.interface';

/**
 * In-Memory Non-Fungible Custodian
 *
 * 현재 구현:
 * - 소유권: Map<NftId, Address>
 * - 전체 승인(approval for all): Set<"owner:operator">
 * - 수신 훅: Map<Address, INftReceiver> (저널 대상 아님, 설정값)
 *
 * 이동 순서 (ERC-721 safeTransferFrom 과 동일):
 * 1. 소유자/승인 확인
 * 2. 소유권 변경
 * 3. 수신자에게 훅이 있으면 동기 호출 → throw 하면 호출자가 롤백
 */
export class NftMemoryCustodian extends INftCustodian {
  readonly address: Address;

  private readonly journal = new Journal();
  private readonly owners = new JournaledMap<NftId, Address>(this.journal);
  private readonly approvals = new JournaledSet<string>(this.journal);
  private readonly receivers = new Map<Address, INftReceiver>();

  private readonly operator: Address;

  constructor(address: Address, operator: Address) {
    super();
    this.address = normalizeAddress(address);
    this.operator = normalizeAddress(operator);
  }

  ownerOf(id: NftId): Address | null {
    return this.owners.get(id) ?? null;
  }

  /**
   * 발행 (테스트/Genesis 용)
   */
  mint(to: Address, id: NftId): void {
    if (this.owners.has(id)) {
      throw new CustodyError(this.address, `Token ${id} already minted`);
    }
    this.owners.set(id, to.toLowerCase());
  }

  setApprovalForAll(owner: Address, operator: Address, approved: boolean): void {
    const key = `${owner.toLowerCase()}:${operator.toLowerCase()}`;
    if (approved) {
      this.approvals.add(key);
    } else {
      this.approvals.delete(key);
    }
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this.approvals.has(`${owner.toLowerCase()}:${operator.toLowerCase()}`);
  }

  registerReceiver(address: Address, receiver: INftReceiver): void {
    this.receivers.set(address.toLowerCase(), receiver);
  }

  /**
   * 소유자 본인의 직접 이동 (엔진 외부)
   *
   * 수신 훅은 그대로 호출됨: 엔진으로 보낸 NFT는 엔진이 거부할 수 있음
   */
  move(holder: Address, recipient: Address, id: NftId): void {
    this.moveToken(holder.toLowerCase(), recipient.toLowerCase(), id);
  }

  transferNft(holder: Address, recipient: Address, id: NftId): void {
    const owner = holder.toLowerCase();
    if (owner !== this.operator && !this.isApprovedForAll(owner, this.operator)) {
      throw new CustodyError(this.address, `Operator not approved by ${owner}`);
    }
    this.moveToken(owner, recipient.toLowerCase(), id);
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

  private moveToken(holder: Address, recipient: Address, id: NftId): void {
    const current = this.owners.get(id);
    if (current === undefined) {
      throw new CustodyError(this.address, `Token ${id} does not exist`);
    }
    if (current !== holder) {
      throw new CustodyError(this.address, `Token ${id} is not owned by ${holder}`);
    }

    // 훅이 거부하면 소유권 변경도 되돌림
    this.journal.checkpoint();
    try {
      this.owners.set(id, recipient);
      this.receivers.get(recipient)?.onNftReceived(this.address, holder, id);
      this.journal.commitCheckpoint();
    } catch (error) {
      this.journal.revertCheckpoint();
      throw error;
    }
  }
}
