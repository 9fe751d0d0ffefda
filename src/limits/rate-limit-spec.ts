import { AppError } from '../errors/app-error.js';

export const RATE_LIMIT_PATTERN = /^\s*(\d+)\s*\/\s*(second|minute|hour)\s*$/i;

const WINDOW_MS = {
  second: 1_000,
  minute: 60_000,
  hour: 3_600_000
} as const;

type WindowUnit = keyof typeof WINDOW_MS;

export interface RateLimit {
  limit: number;
  windowMs: number;
  spec: string;
}

function isWindowUnit(value: string): value is WindowUnit {
  return Object.hasOwn(WINDOW_MS, value);
}

/**
 * Parses a plan rate limit such as `10/minute` or `1000/hour`.
 */
export function parseRateLimit(spec: string): RateLimit {
  const match = RATE_LIMIT_PATTERN.exec(spec);
  const countText = match?.[1];
  const unit = match?.[2]?.toLowerCase();

  if (countText === undefined || unit === undefined || !isWindowUnit(unit)) {
    throw new AppError(500, 'RATE_LIMIT_INVALID', `Rate limit "${spec}" is not in <count>/<unit> form.`);
  }

  const limit = Number.parseInt(countText, 10);
  if (limit <= 0) {
    throw new AppError(500, 'RATE_LIMIT_INVALID', `Rate limit "${spec}" must allow at least one request.`);
  }

  return {
    limit,
    windowMs: WINDOW_MS[unit],
    spec: `${limit}/${unit}`
  };
}
