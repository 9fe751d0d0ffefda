import { z } from 'zod';

import { RATE_LIMIT_PATTERN } from '../limits/rate-limit-spec.js';

const DEV_TOKEN_SECRET = 'dev-token-secret-change-me';

const booleanFlag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

const optionalUrl = z.preprocess(
  (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
  z.string().url().optional()
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(8000),
  DATABASE_URL: optionalUrl,
  USAGE_DATABASE_URL: optionalUrl,
  API_KEYS: z.string().default(''),
  RATE_LIMIT: z.string().regex(RATE_LIMIT_PATTERN, 'Expected "<count>/<second|minute|hour>".').default('60/minute'),
  TOKEN_SECRET: z.string().min(16).default(DEV_TOKEN_SECRET),
  TOKEN_TTL_HOURS: z.coerce.number().int().positive().default(24),
  ADMIN_TOKEN: z.preprocess(
    (value) => (typeof value === 'string' && value.length === 0 ? undefined : value),
    z.string().min(16).optional()
  ),
  DEFAULT_PLAN_ID: z.string().min(1).default('free'),
  QUOTA_HOLD_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  CHART_TTL_HOURS: z.coerce.number().positive().default(24),
  OTEL_ENABLED: booleanFlag.default(false),
  OTEL_SERVICE_NAME: z.string().min(1).default('chart-gate-api'),
  OTEL_METRIC_EXPORT_INTERVAL_MS: z.coerce.number().int().positive().default(30_000)
}).superRefine((env, context) => {
  if (env.NODE_ENV === 'production' && env.TOKEN_SECRET === DEV_TOKEN_SECRET) {
    context.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['TOKEN_SECRET'],
      message: 'TOKEN_SECRET must be set in production.'
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export function getEnv(overrides: Partial<Record<keyof Env, unknown>> = {}): Env {
  return envSchema.parse({
    ...process.env,
    ...overrides
  });
}

export function parseStaticKeys(value: string): string[] {
  return value
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}
