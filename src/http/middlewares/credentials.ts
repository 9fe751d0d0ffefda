import type { NextFunction, Request, Response } from 'express';

import type { Gate } from '../../services/gate.js';

export function readApiKey(request: Request): string | null {
  const header = request.header('x-api-key');
  if (typeof header !== 'string') {
    return null;
  }

  const value = header.trim();
  return value.length === 0 ? null : value;
}

export function readBearerToken(request: Request): string | null {
  const header = request.header('authorization');
  if (typeof header !== 'string') {
    return null;
  }

  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1] ?? null;
}

/** Aborts when the client goes away before the response has been written. */
export function abortOnClose(response: Response): AbortSignal {
  const controller = new AbortController();
  response.on('close', () => {
    if (!response.writableFinished) {
      controller.abort();
    }
  });

  return controller.signal;
}

/** Resolves the caller and applies the rate limit, without billing. */
export function createGateAuthMiddleware(gate: Gate) {
  return async function gateAuthMiddleware(request: Request, _response: Response, next: NextFunction): Promise<void> {
    try {
      request.tenantContext = await gate.authenticate(readApiKey(request));
      next();
    } catch (error) {
      next(error);
    }
  };
}
