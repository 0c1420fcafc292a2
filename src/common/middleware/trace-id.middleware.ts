import { Injectable, NestMiddleware } from '@nestjs/common';
import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { asyncLocalStorage, RequestContext } from '../logger/request-context';

export const TRACE_ID_HEADER = 'X-Trace-ID';

@Injectable()
export class TraceIdMiddleware implements NestMiddleware {
  use(req: Request, res: Response, next: NextFunction): void {
    const traceId = req.get(TRACE_ID_HEADER)?.trim() || uuidv4();

    res.setHeader(TRACE_ID_HEADER, traceId);

    const context: RequestContext = {
      traceId,
      method: req.method,
      path: req.originalUrl,
      ip: req.ip || req.socket?.remoteAddress,
    };

    asyncLocalStorage.run(context, () => {
      next();
    });
  }
}
