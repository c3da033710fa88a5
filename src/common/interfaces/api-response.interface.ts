import type { Request } from 'express';

/**
 * 🎯 표준 API 응답 봉투
 * 성공(ResponseTransformInterceptor)과 실패(예외 필터) 모두 같은 구조를 쓴다.
 */
export interface ApiEnvelope<T = unknown> {
  statusCode: number;
  timestamp: string;
  path: string;
  requestId: string | null;
  message: string;
  code: string;
  data: T | null;
  error: { details: unknown } | null;
  meta: { elapsedMs: number };
}

export interface RequestWithId extends Request {
  requestId?: string;
}

export function buildErrorEnvelope(
  req: RequestWithId,
  statusCode: number,
  code: string,
  message: string,
  details: unknown,
): ApiEnvelope<null> {
  return {
    statusCode,
    timestamp: new Date().toISOString(),
    path: req.originalUrl || req.url,
    requestId: req.requestId ?? null,
    message,
    code,
    data: null,
    error: process.env.NODE_ENV === 'production' ? null : { details },
    meta: { elapsedMs: 0 },
  };
}
