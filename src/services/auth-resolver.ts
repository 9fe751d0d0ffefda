import {
  devModeStrategy,
  staticKeyStrategy,
  tenantKeyStrategy,
  type ResolutionStrategy
} from '../auth/resolution-strategies.js';
import type { TenantContext } from '../auth/tenant-context.js';
import type { GateConfig } from '../config/gate-config.js';
import { unauthorized } from '../errors/app-error.js';
import type { ApiKeyService } from './api-key-service.js';

/**
 * Tries each strategy in order. The first one that resolves or rejects
 * decides the outcome; if every strategy skips, the request is unauthorized.
 */
export class AuthResolver {
  public constructor(private readonly strategies: readonly ResolutionStrategy[]) {}

  public static withDefaultStrategies(apiKeyService: ApiKeyService, config: GateConfig): AuthResolver {
    return new AuthResolver([
      tenantKeyStrategy(apiKeyService),
      staticKeyStrategy(config),
      devModeStrategy(config)
    ]);
  }

  public async resolve(credential: string | null): Promise<TenantContext> {
    for (const strategy of this.strategies) {
      const outcome = await strategy.resolve(credential);

      if (outcome.kind === 'resolved') {
        return { ...outcome.context, authSource: strategy.source };
      }

      if (outcome.kind === 'rejected') {
        console.log('auth_rejected', { source: strategy.source, code: outcome.error.code });
        throw outcome.error;
      }
    }

    throw unauthorized(credential === null ? 'Missing API key. Provide X-API-Key header.' : 'Invalid API key.');
  }
}
