import { createGateConfig, type GateConfig } from '../../src/config/gate-config.js';
import { InMemoryKeyRepository } from '../../src/repositories/in-memory-key-repository.js';
import { InMemoryUsageRepository } from '../../src/repositories/in-memory-usage-repository.js';
import type { Plan, Tenant } from '../../src/repositories/key-repository.js';
import { ApiKeyService } from '../../src/services/api-key-service.js';
import { AuthResolver } from '../../src/services/auth-resolver.js';
import { Gate } from '../../src/services/gate.js';
import { QuotaTracker } from '../../src/services/quota-tracker.js';
import { RateLimiter } from '../../src/services/rate-limiter.js';

export interface TestClock {
  time: number;
  now(): Date;
  advance(ms: number): void;
}

export function createClock(start: string): TestClock {
  const clock: TestClock = {
    time: Date.parse(start),
    now: () => new Date(clock.time),
    advance: (ms) => {
      clock.time += ms;
    }
  };

  return clock;
}

export interface GateFixture {
  clock: TestClock;
  config: GateConfig;
  keyRepository: InMemoryKeyRepository;
  usageRepository: InMemoryUsageRepository;
  apiKeyService: ApiKeyService;
  rateLimiter: RateLimiter;
  quotaTracker: QuotaTracker;
  resolver: AuthResolver;
  gate: Gate;
}

export interface GateFixtureOptions {
  plans?: readonly Plan[];
  staticKeys?: readonly string[];
  rateLimit?: string;
  start?: string;
}

export function createGateFixture(options: GateFixtureOptions = {}): GateFixture {
  const clock = createClock(options.start ?? '2026-03-15T12:00:00.000Z');
  const config = createGateConfig({
    staticKeys: options.staticKeys ?? [],
    rateLimit: options.rateLimit ?? '60/minute'
  });
  const keyRepository = new InMemoryKeyRepository(options.plans);
  const usageRepository = new InMemoryUsageRepository();
  const apiKeyService = new ApiKeyService(keyRepository);
  const rateLimiter = new RateLimiter({ now: () => clock.time, sweepIntervalMs: 0 });
  const quotaTracker = new QuotaTracker(usageRepository, { now: clock.now });
  const resolver = AuthResolver.withDefaultStrategies(apiKeyService, config);

  return {
    clock,
    config,
    keyRepository,
    usageRepository,
    apiKeyService,
    rateLimiter,
    quotaTracker,
    resolver,
    gate: new Gate(resolver, rateLimiter, quotaTracker)
  };
}

export async function seedTenantWithKey(
  fixture: GateFixture,
  email: string,
  planId = 'free'
): Promise<{ tenant: Tenant; secret: string }> {
  const tenant = await fixture.keyRepository.createTenant({
    name: email,
    email,
    passwordHash: 'not-used-in-this-test',
    planId
  });

  if (tenant === null) {
    throw new Error(`Tenant ${email} already exists.`);
  }

  const { secret } = await fixture.apiKeyService.createKey(tenant.id, 'Default');
  return { tenant, secret };
}
