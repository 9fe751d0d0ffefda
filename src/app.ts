import express, { type Express } from 'express';
import helmet from 'helmet';
import rateLimit, { ipKeyGenerator } from 'express-rate-limit';
import { Pool } from 'pg';

import type { ChartService } from './charts/chart-service.js';
import { InMemoryChartService } from './charts/in-memory-chart-service.js';
import { getEnv, type Env } from './config/env.js';
import { gateConfigFromEnv, type GateConfig } from './config/gate-config.js';
import { AppError } from './errors/app-error.js';
import { errorHandler } from './errors/error-handler.js';
import { attachRequestTelemetry } from './http/middlewares/request-telemetry.js';
import { attachTraceId } from './http/middlewares/trace-id.js';
import { createAccountRoutes } from './http/routes/account-routes.js';
import { createAdminRoutes } from './http/routes/admin-routes.js';
import { createChartRoutes } from './http/routes/chart-routes.js';
import { createUsageRoutes } from './http/routes/usage-routes.js';
import { InMemoryKeyRepository } from './repositories/in-memory-key-repository.js';
import { InMemoryUsageRepository } from './repositories/in-memory-usage-repository.js';
import type { KeyRepository } from './repositories/key-repository.js';
import { PostgresKeyRepository } from './repositories/postgres-key-repository.js';
import { PostgresUsageRepository } from './repositories/postgres-usage-repository.js';
import type { UsageRepository } from './repositories/usage-repository.js';
import { AccountService } from './services/account-service.js';
import { ApiKeyService } from './services/api-key-service.js';
import { AuthResolver } from './services/auth-resolver.js';
import { Gate } from './services/gate.js';
import { QuotaTracker } from './services/quota-tracker.js';
import { RateLimiter } from './services/rate-limiter.js';
import { TenantService } from './services/tenant-service.js';
import { TokenIssuer } from './services/token-issuer.js';
import { instrumentPgPool, type StoreName } from './telemetry/pg-instrumentation.js';

const SERVICE_VERSION = '0.1.0';

export interface CreateAppOptions {
  envOverrides?: Partial<Record<keyof Env, unknown>>;
  keyRepository?: KeyRepository;
  usageRepository?: UsageRepository;
  chartService?: ChartService;
  rateLimiter?: RateLimiter;
  now?: () => Date;
}

export interface AppRuntime {
  app: Express;
  env: Env;
  gateConfig: GateConfig;
  keyRepository: KeyRepository;
  usageRepository: UsageRepository;
  apiKeyService: ApiKeyService;
  tokenIssuer: TokenIssuer;
  gate: Gate;
  close(): Promise<void>;
}

function createGlobalRateLimiter() {
  return rateLimit({
    windowMs: 60_000,
    limit: 600,
    standardHeaders: 'draft-8',
    legacyHeaders: false,
    keyGenerator: (request) => ipKeyGenerator(request.ip ?? '')
  });
}

function createAccountRateLimiter() {
  return rateLimit({
    windowMs: 15 * 60_000,
    limit: 30,
    standardHeaders: 'draft-8',
    legacyHeaders: false,
    keyGenerator: (request) => {
      const body = typeof request.body === 'object' && request.body !== null ? request.body as Record<string, unknown> : {};
      const emailValue = typeof body.email === 'string' ? body.email.toLowerCase() : 'unknown-email';
      return `${ipKeyGenerator(request.ip ?? '')}:${emailValue}`;
    }
  });
}

function hasValue(value: string | undefined): value is string {
  return typeof value === 'string' && value.length > 0;
}

export function createApp(options: CreateAppOptions = {}): AppRuntime {
  const env = getEnv(options.envOverrides);
  const gateConfig = gateConfigFromEnv(env);
  const app = express();

  const pools = new Map<string, Pool>();
  const getPool = (connectionString: string, store: StoreName): Pool => {
    const existing = pools.get(connectionString);
    if (existing !== undefined) {
      return existing;
    }

    const pool = new Pool({ connectionString });
    instrumentPgPool(pool, store);
    pool.on('error', (error) => {
      console.error('pg_pool_error', { store, error: error.message });
    });
    pools.set(connectionString, pool);
    return pool;
  };

  const usageDatabaseUrl = env.USAGE_DATABASE_URL ?? env.DATABASE_URL;

  const keyRepository = options.keyRepository ?? (
    hasValue(env.DATABASE_URL)
      ? new PostgresKeyRepository(getPool(env.DATABASE_URL, 'accounts'))
      : new InMemoryKeyRepository()
  );
  const usageRepository = options.usageRepository ?? (
    hasValue(usageDatabaseUrl)
      ? new PostgresUsageRepository(getPool(usageDatabaseUrl, 'usage'))
      : new InMemoryUsageRepository()
  );
  const chartService = options.chartService ?? new InMemoryChartService({
    ttlHours: env.CHART_TTL_HOURS,
    now: options.now
  });

  const apiKeyService = new ApiKeyService(keyRepository);
  const tenantService = new TenantService(keyRepository);
  const accountService = new AccountService(keyRepository, {
    defaultPlanId: env.DEFAULT_PLAN_ID
  });
  const tokenIssuer = new TokenIssuer({
    secret: env.TOKEN_SECRET,
    ttlHours: env.TOKEN_TTL_HOURS,
    now: options.now
  });
  const rateLimiter = options.rateLimiter ?? new RateLimiter({
    sweepIntervalMs: env.NODE_ENV === 'test' ? 0 : 60_000
  });
  const quotaTracker = new QuotaTracker(usageRepository, {
    now: options.now,
    holdTtlMs: env.QUOTA_HOLD_TTL_SECONDS * 1_000
  });
  const gate = new Gate(
    AuthResolver.withDefaultStrategies(apiKeyService, gateConfig),
    rateLimiter,
    quotaTracker
  );

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(express.json({ limit: '2mb' }));
  app.use(attachTraceId);
  if (env.NODE_ENV !== 'test') {
    app.use(attachRequestTelemetry);
  }

  app.use(createGlobalRateLimiter());

  app.get('/health', (_request, response) => {
    response.status(200).json({
      status: 'ok',
      version: SERVICE_VERSION
    });
  });

  app.use(['/v1/account/login', '/v1/account/register'], createAccountRateLimiter());
  app.use('/v1/account', createAccountRoutes({
    accountService,
    tenantService,
    apiKeyService,
    quotaTracker,
    tokenIssuer
  }));
  app.use('/admin/v1', createAdminRoutes({
    tenantService,
    apiKeyService,
    quotaTracker,
    adminToken: env.ADMIN_TOKEN
  }));
  app.use('/v1/charts', createChartRoutes(gate, chartService));
  app.use('/v1/usage', createUsageRoutes(gate, quotaTracker));

  app.use((_request, _response, next) => {
    next(new AppError(404, 'NOT_FOUND', 'Route not found.'));
  });

  app.use(errorHandler);

  return {
    app,
    env,
    gateConfig,
    keyRepository,
    usageRepository,
    apiKeyService,
    tokenIssuer,
    gate,
    async close() {
      rateLimiter.close();
      await Promise.all(Array.from(pools.values(), (pool) => pool.end()));
    }
  };
}
