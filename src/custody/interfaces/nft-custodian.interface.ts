import { Address, NftId } from '../../common/types/common.types';
import { Journaled } from '../../state/journal';

/**
 * NFT 수신 훅
 *
 * 등록된 수신자에게 NFT가 이동하면 레지스트리가 동기적으로 호출
 * - 훅이 throw 하면 이동 자체가 실패
 * - 엔진은 자신이 끌어오는 중인 NFT만 받아들임
 */
export interface INftReceiver {
  onNftReceived(collection: Address, from: Address, id: NftId): void;
}

/**
 * Non-Fungible Custodian Interface
 *
 * 비대체 자산 레지스트리 (ERC-721과 같은 모양)
 *
 * 주의:
 * - transferNft는 수신자의 훅을 호출하므로 엔진으로 재진입할 수 있음
 *   → 엔진의 모든 변경 진입점은 NonReentrantGate 뒤에 있어야 함
 */
export abstract class INftCustodian implements Journaled {
  abstract readonly address: Address;

  abstract ownerOf(id: NftId): Address | null;

  abstract transferNft(holder: Address, recipient: Address, id: NftId): void;

  abstract registerReceiver(address: Address, receiver: INftReceiver): void;

  abstract checkpoint(): void;

  abstract commitCheckpoint(): void;

  abstract revertCheckpoint(): void;
}
