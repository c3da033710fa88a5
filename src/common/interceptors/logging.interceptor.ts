import {
  CallHandler,
  ExecutionContext,
  Injectable,
  Logger,
  NestInterceptor,
} from '@nestjs/common';
import type { Response } from 'express';
import { Observable, tap } from 'rxjs';
import { RequestWithId } from '../interfaces/api-response.interface';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const t0 = Date.now();
    const ctx = context.switchToHttp();
    const req = ctx.getRequest<RequestWithId>();
    const res = ctx.getResponse<Response>();

    const pfx = `[#${req.requestId ?? '-'}] ${req.method} ${req.originalUrl || req.url}`;

    return next.handle().pipe(
      tap({
        next: () => {
          const ms = Date.now() - t0;
          this.logger.log(`${pfx} ✅ 응답 | status=${res.statusCode} | ${ms}ms`);
        },
        error: (err: unknown) => {
          const ms = Date.now() - t0;
          const message = err instanceof Error ? err.message : String(err);
          this.logger.warn(`${pfx} ❌ 에러 | ${ms}ms | ${message}`);
        },
      }),
    );
  }
}
