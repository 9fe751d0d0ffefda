import type { NextFunction, Request, Response } from 'express';

import { AppError } from '../../errors/app-error.js';
import type { TokenIssuer } from '../../services/token-issuer.js';
import { readBearerToken } from './credentials.js';

export function createRequireAccount(tokenIssuer: TokenIssuer) {
  return async function requireAccount(request: Request, _response: Response, next: NextFunction): Promise<void> {
    const token = readBearerToken(request);
    if (token === null) {
      next(new AppError(401, 'INVALID_TOKEN', 'Provide a bearer token in the Authorization header.'));
      return;
    }

    try {
      const verification = await tokenIssuer.verify(token);
      if (verification.status === 'expired') {
        next(new AppError(401, 'EXPIRED_TOKEN', 'Session token has expired.'));
        return;
      }

      if (verification.status === 'invalid') {
        next(new AppError(401, 'INVALID_TOKEN', 'Session token is invalid.'));
        return;
      }

      request.accountId = verification.accountId;
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function getAccountId(request: Request): string {
  if (typeof request.accountId !== 'string') {
    throw new AppError(401, 'INVALID_TOKEN', 'Session token is required.');
  }

  return request.accountId;
}
