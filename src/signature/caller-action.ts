import { Address, Amount, NftId, ZERO_ADDRESS } from '../common/types/common.types';

/**
 * 호출자 서명이 필요한 동작
 */
export type CallerActionName =
  | 'stake'
  | 'increaseStake'
  | 'extend'
  | 'unstake'
  | 'recoverFungible'
  | 'setBlsAddress';

/**
 * CallerAction (EIP-712 구조체)
 *
 * 동작마다 쓰지 않는 필드는 0 / 빈 배열 / 0 주소
 * - target: recoverFungible의 토큰, setBlsAddress의 BLS 주소
 * - recipient: recoverFungible의 수신자
 */
export type CallerAction = {
  caller: Address;
  action: CallerActionName;
  amount: Amount;
  duration: number;
  nftIds: readonly NftId[];
  target: Address;
  recipient: Address;
  nonce: bigint;
};

export type CallerActionFields = Partial<
  Pick<CallerAction, 'amount' | 'duration' | 'nftIds' | 'target' | 'recipient'>
>;

export function callerAction(
  caller: Address,
  action: CallerActionName,
  nonce: bigint,
  fields: CallerActionFields = {},
): CallerAction {
  return {
    caller: caller.toLowerCase(),
    action,
    amount: 0n,
    duration: 0,
    nftIds: [],
    target: ZERO_ADDRESS,
    recipient: ZERO_ADDRESS,
    nonce,
    ...fields,
  };
}
