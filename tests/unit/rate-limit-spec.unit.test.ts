import { describe, expect, it } from 'vitest';

import { AppError } from '../../src/errors/app-error.js';
import { parseRateLimit } from '../../src/limits/rate-limit-spec.js';
import { captureError } from '../helpers/errors.js';

describe('parseRateLimit', () => {
  it('parses a per-minute plan limit', () => {
    expect(parseRateLimit('10/minute')).toEqual({
      limit: 10,
      windowMs: 60_000,
      spec: '10/minute'
    });
  });

  it('accepts padded and mixed-case units and normalizes the spec', () => {
    expect(parseRateLimit(' 5 / Second ')).toEqual({
      limit: 5,
      windowMs: 1_000,
      spec: '5/second'
    });
    expect(parseRateLimit('1000/hour').windowMs).toBe(3_600_000);
  });

  it('rejects malformed and empty limits', () => {
    for (const spec of ['ten/minute', '10/week', '10/day', '10/minutes', '10', '0/minute']) {
      expect(() => parseRateLimit(spec)).toThrowError(AppError);
    }

    expect(captureError(() => parseRateLimit('0/minute'))).toMatchObject({
      statusCode: 500,
      code: 'RATE_LIMIT_INVALID'
    });
  });
});
