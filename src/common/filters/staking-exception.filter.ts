import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { CustodyError } from '../../custody/custody.errors';
import { StakingError } from '../errors/staking.errors';

/**
 * 엔진 에러 → HTTP 응답
 *
 * - StakingError: 400 { statusCode, error: code, message, index?, nonce? }
 * - CustodyError: 422 { statusCode, error: 'CustodyError', message }
 *
 * 그 외 에러는 Nest 기본 처리
 */
@Catch(StakingError, CustodyError)
export class StakingExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(StakingExceptionFilter.name);

  constructor(private readonly adapterHost: HttpAdapterHost) {}

  catch(exception: StakingError | CustodyError, host: ArgumentsHost): void {
    const { httpAdapter } = this.adapterHost;
    const response = host.switchToHttp().getResponse();

    if (exception instanceof StakingError) {
      this.logger.warn(`${exception.code}: ${exception.message}`);
      httpAdapter.reply(
        response,
        { statusCode: HttpStatus.BAD_REQUEST, ...exception.toJSON() },
        HttpStatus.BAD_REQUEST,
      );
      return;
    }

    this.logger.warn(exception.message);
    httpAdapter.reply(
      response,
      {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        error: exception.name,
        message: exception.message,
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}
