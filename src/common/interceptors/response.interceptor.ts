import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import type { Response } from 'express';
import { Observable, map } from 'rxjs';
import {
  ApiEnvelope,
  RequestWithId,
} from '../interfaces/api-response.interface';

@Injectable()
export class ResponseTransformInterceptor<T>
  implements NestInterceptor<T, ApiEnvelope<T>>
{
  intercept(
    context: ExecutionContext,
    next: CallHandler<T>,
  ): Observable<ApiEnvelope<T>> {
    const ctx = context.switchToHttp();
    const req = ctx.getRequest<RequestWithId>();
    const res = ctx.getResponse<Response>();

    const path = req.originalUrl || req.url;
    const t0 = Date.now();

    return next.handle().pipe(
      map((data) => ({
        statusCode: res.statusCode,
        timestamp: new Date().toISOString(),
        path,
        requestId: req.requestId ?? null,
        message: 'OK',
        code: 'OK',
        data,
        error: null,
        meta: { elapsedMs: Date.now() - t0 },
      })),
    );
  }
}
