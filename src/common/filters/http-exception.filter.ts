import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
} from '@nestjs/common';
import type { Response } from 'express';
import {
  RequestWithId,
  buildErrorEnvelope,
} from '../interfaces/api-response.interface';

// ValidationPipe 400 등 Nest HttpException 처리
@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  catch(exception: HttpException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const req = ctx.getRequest<RequestWithId>();
    const res = ctx.getResponse<Response>();

    const status = exception.getStatus();
    const payload = exception.getResponse();
    let message = exception.message;
    let code = exception.name || 'HTTP_EXCEPTION';

    if (typeof payload === 'string') {
      message = payload;
    } else {
      if ('message' in payload) {
        if (Array.isArray(payload.message)) message = payload.message.join(', ');
        else if (typeof payload.message === 'string') message = payload.message;
      }
      if ('error' in payload && typeof payload.error === 'string') {
        code = payload.error;
      }
    }

    res
      .status(status)
      .json(buildErrorEnvelope(req, status, code, message, payload));
  }
}
