/**
 * 커스터디(외부 원장) 호출 실패
 *
 * - 잔액 부족, 승인(allowance) 부족, 소유자 불일치 등
 * - 엔진 입장에서는 재시도 불가 에러: 호출 전체가 롤백됨
 */
export class CustodyError extends Error {
  constructor(
    readonly custodian: string,
    message: string,
  ) {
    super(`[${custodian}] ${message}`);
    this.name = 'CustodyError';
  }
}
