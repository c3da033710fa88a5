import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  CatalogKeyError,
  ErrorCodes,
} from '../errors/catalog-key.errors';
import {
  RequestWithId,
  buildErrorEnvelope,
} from '../interfaces/api-response.interface';

const STATUS_BY_CODE: Record<ErrorCodes, HttpStatus> = {
  [ErrorCodes.INVALID_ARGUMENT]: HttpStatus.BAD_REQUEST,
  [ErrorCodes.INVALID_INPUT]: HttpStatus.BAD_REQUEST,
  [ErrorCodes.VALIDATION_ERROR]: HttpStatus.UNPROCESSABLE_ENTITY,
  [ErrorCodes.INTERNAL_SERVER_ERROR]: HttpStatus.INTERNAL_SERVER_ERROR,
};

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<RequestWithId>();
    const res = ctx.getResponse<Response>();

    if (exception instanceof CatalogKeyError) {
      const status = STATUS_BY_CODE[exception.code];
      res
        .status(status)
        .json(
          buildErrorEnvelope(req, status, exception.code, exception.message, {
            name: exception.name,
          }),
        );
      return;
    }

    const error = exception instanceof Error ? exception : null;
    this.logger.error(
      `${ErrorCodes.INTERNAL_SERVER_ERROR}: ${error?.message ?? String(exception)}`,
      error?.stack,
      `${req.method} ${req.originalUrl || req.url}`,
    );

    const status = HttpStatus.INTERNAL_SERVER_ERROR;
    const message =
      process.env.NODE_ENV === 'production'
        ? '서버 내부 오류가 발생했습니다.'
        : error?.message || 'Unknown error';
    res
      .status(status)
      .json(
        buildErrorEnvelope(req, status, ErrorCodes.INTERNAL_SERVER_ERROR, message, {
          name: error?.name,
          stack: error?.stack,
        }),
      );
  }
}
