import { createHash, timingSafeEqual } from 'node:crypto';

import type { NextFunction, Request, Response } from 'express';

import { AppError } from '../../errors/app-error.js';
import { readBearerToken } from './credentials.js';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

export function createRequireAdmin(adminToken: string | undefined) {
  const expected = adminToken === undefined ? null : digest(adminToken);

  return function requireAdmin(request: Request, _response: Response, next: NextFunction): void {
    if (expected === null) {
      next(new AppError(503, 'ADMIN_NOT_CONFIGURED', 'Admin auth not configured.'));
      return;
    }

    const token = readBearerToken(request);
    if (token === null || !timingSafeEqual(digest(token), expected)) {
      next(new AppError(401, 'UNAUTHORIZED', 'Invalid admin credentials.'));
      return;
    }

    next();
  };
}
