import type { EffectivePlan } from '../auth/tenant-context.js';
import { parseRateLimit, type RateLimit } from '../limits/rate-limit-spec.js';
import { parseStaticKeys, type Env } from './env.js';

export interface GateConfig {
  readonly staticKeys: readonly string[];
  readonly defaultRateLimit: RateLimit;
  /** Plan applied to static allow-list keys. */
  readonly fallbackPlan: EffectivePlan;
  /** Plan applied when no keys are configured anywhere. */
  readonly devPlan: EffectivePlan;
}

export interface GateConfigInput {
  staticKeys: readonly string[];
  rateLimit: string;
}

export function createGateConfig(input: GateConfigInput): GateConfig {
  const defaultRateLimit = Object.freeze(parseRateLimit(input.rateLimit));

  return Object.freeze({
    staticKeys: Object.freeze([...input.staticKeys]),
    defaultRateLimit,
    fallbackPlan: Object.freeze({
      planId: 'env_fallback',
      rateLimit: defaultRateLimit,
      monthlyQuota: null
    }),
    devPlan: Object.freeze({
      planId: 'dev_mode',
      rateLimit: null,
      monthlyQuota: null
    })
  });
}

export function gateConfigFromEnv(env: Env): GateConfig {
  return createGateConfig({
    staticKeys: parseStaticKeys(env.API_KEYS),
    rateLimit: env.RATE_LIMIT
  });
}
