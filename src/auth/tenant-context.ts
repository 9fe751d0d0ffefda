import { createHash } from 'node:crypto';

import type { RateLimit } from '../limits/rate-limit-spec.js';

export const AUTH_SOURCES = ['saas_db', 'env_fallback', 'dev_mode'] as const;

export type AuthSource = (typeof AUTH_SOURCES)[number];

export interface EffectivePlan {
  planId: string;
  /** Null means no short-window ceiling. */
  rateLimit: RateLimit | null;
  /** Null means no monthly ceiling. */
  monthlyQuota: number | null;
}

export interface TenantContext {
  tenantId: string | null;
  apiKeyId: string | null;
  plan: EffectivePlan;
  authSource: AuthSource;
  /** Key the rate limiter counts against. */
  identity: string;
}

export const ANONYMOUS_IDENTITY = 'anonymous';

export function tenantIdentity(tenantId: string): string {
  return `tenant:${tenantId}`;
}

// Raw credentials never end up as map keys or log fields.
export function credentialIdentity(credential: string | null): string {
  if (credential === null) {
    return ANONYMOUS_IDENTITY;
  }

  const digest = createHash('sha256').update(credential).digest('hex');
  return `credential:${digest.slice(0, 32)}`;
}
