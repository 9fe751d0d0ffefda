import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function attachTraceId(request: Request, response: Response, next: NextFunction): void {
  const inbound = request.header('x-trace-id');
  const traceId = typeof inbound === 'string' && UUID_PATTERN.test(inbound) ? inbound.toLowerCase() : randomUUID();
  response.locals.traceId = traceId;
  response.setHeader('x-trace-id', traceId);
  next();
}
