import { HttpAdapterHost } from '@nestjs/core';
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import { ExpressAdapter } from '@nestjs/platform-express';
import { NonceUsed, StakeZero } from '../../../src/common/errors/staking.errors';
import { StakingExceptionFilter } from '../../../src/common/filters/staking-exception.filter';
import { CustodyError } from '../../../src/custody/custody.errors';

const TOKEN = '0x' + '0'.repeat(36) + '1001';

/**
 * StakingExceptionFilter 테스트
 */
describe('StakingExceptionFilter', () => {
  let filter: StakingExceptionFilter;
  let response: {
    status: jest.Mock;
    json: jest.Mock;
    send: jest.Mock;
    getHeader: jest.Mock;
  };
  let host: ExecutionContextHost;

  beforeEach(() => {
    const adapterHost = new HttpAdapterHost();
    adapterHost.httpAdapter = new ExpressAdapter();
    filter = new StakingExceptionFilter(adapterHost);

    response = {
      status: jest.fn(),
      json: jest.fn(),
      send: jest.fn(),
      getHeader: jest.fn(),
    };
    host = new ExecutionContextHost([{}, response]);
  });

  it('엔진 에러는 400과 에러 코드를 응답해야 함', () => {
    filter.catch(new StakeZero(), host);

    expect(response.status).toHaveBeenCalledWith(400);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 400,
      error: 'StakeZero',
      message: 'Caller has no active stake',
    });
  });

  it('행 에러는 index와 부가 정보를 포함해야 함', () => {
    filter.catch(new NonceUsed(2, 5n), host);

    expect(response.json).toHaveBeenCalledWith({
      statusCode: 400,
      error: 'NonceUsed',
      message: 'Nonce 5 already consumed (row 2)',
      index: 2,
      nonce: '5',
    });
  });

  it('커스터디 에러는 422로 응답해야 함', () => {
    filter.catch(new CustodyError(TOKEN, 'Insufficient balance'), host);

    expect(response.status).toHaveBeenCalledWith(422);
    expect(response.json).toHaveBeenCalledWith({
      statusCode: 422,
      error: 'CustodyError',
      message: `[${TOKEN}] Insufficient balance`,
    });
  });
});
