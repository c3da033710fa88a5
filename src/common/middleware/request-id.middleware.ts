import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Response } from 'express';
import { randomUUID } from 'crypto';
import { RequestWithId } from '../interfaces/api-response.interface';

export const REQ_ID_HEADER = 'x-request-id';

@Injectable()
export class RequestIdMiddleware implements NestMiddleware {
  use(req: RequestWithId, res: Response, next: NextFunction) {
    const existing = req.headers[REQ_ID_HEADER] ?? req.headers['x-requestid'];
    const headerValue = Array.isArray(existing) ? existing[0] : existing;
    const id = headerValue || randomUUID();
    req.requestId = id;
    res.setHeader(REQ_ID_HEADER, id);
    next();
  }
}
