import { createHash, timingSafeEqual } from 'node:crypto';

import type { GateConfig } from '../config/gate-config.js';
import { AppError, guardStorage } from '../errors/app-error.js';
import { parseRateLimit } from '../limits/rate-limit-spec.js';
import type { ApiKeyService } from '../services/api-key-service.js';
import { credentialIdentity, tenantIdentity, type AuthSource, type TenantContext } from './tenant-context.js';

/** The resolver stamps `authSource` from the strategy that produced it. */
export type ResolvedIdentity = Omit<TenantContext, 'authSource'>;

export type StrategyOutcome =
  | { kind: 'resolved'; context: ResolvedIdentity }
  | { kind: 'rejected'; error: AppError }
  | { kind: 'skip' };

export interface ResolutionStrategy {
  readonly source: AuthSource;
  resolve(credential: string | null): Promise<StrategyOutcome>;
}

const SKIP: StrategyOutcome = { kind: 'skip' };

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

export function tenantKeyStrategy(apiKeyService: ApiKeyService): ResolutionStrategy {
  return {
    source: 'saas_db',
    async resolve(credential) {
      if (credential === null) {
        return SKIP;
      }

      const lookup = await guardStorage(() => apiKeyService.findBySecret(credential));

      if (lookup.status === 'not_found') {
        return SKIP;
      }

      // A revoked key is never downgraded to a later source.
      if (lookup.status === 'revoked') {
        return {
          kind: 'rejected',
          error: new AppError(401, 'UNAUTHORIZED', 'API key has been revoked.')
        };
      }

      if (lookup.tenant.status !== 'active') {
        return {
          kind: 'rejected',
          error: new AppError(403, 'TENANT_SUSPENDED', 'Tenant account is suspended.')
        };
      }

      return {
        kind: 'resolved',
        context: {
          tenantId: lookup.tenant.id,
          apiKeyId: lookup.apiKey.id,
          plan: {
            planId: lookup.plan.id,
            rateLimit: parseRateLimit(lookup.plan.rateLimit),
            monthlyQuota: lookup.plan.monthlyQuota
          },
          identity: tenantIdentity(lookup.tenant.id)
        }
      };
    }
  };
}

export function staticKeyStrategy(config: GateConfig): ResolutionStrategy {
  const keyDigests = config.staticKeys.map(digest);

  return {
    source: 'env_fallback',
    async resolve(credential) {
      if (credential === null || keyDigests.length === 0) {
        return SKIP;
      }

      // timingSafeEqual needs equal-length inputs, so compare digests.
      const presented = digest(credential);
      let matched = false;
      for (const keyDigest of keyDigests) {
        matched = timingSafeEqual(presented, keyDigest) || matched;
      }

      if (!matched) {
        return SKIP;
      }

      return {
        kind: 'resolved',
        context: {
          tenantId: null,
          apiKeyId: null,
          plan: config.fallbackPlan,
          identity: credentialIdentity(credential)
        }
      };
    }
  };
}

/** Admits everything, but only while no static keys are configured. */
export function devModeStrategy(config: GateConfig): ResolutionStrategy {
  return {
    source: 'dev_mode',
    async resolve(credential) {
      if (config.staticKeys.length > 0) {
        return SKIP;
      }

      return {
        kind: 'resolved',
        context: {
          tenantId: null,
          apiKeyId: null,
          plan: config.devPlan,
          identity: credentialIdentity(credential)
        }
      };
    }
  };
}
