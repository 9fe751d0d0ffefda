import request from 'supertest';
import { afterEach, describe, expect, it, vi } from 'vitest';

import type { AppRuntime } from '../../src/app.js';
import { DEFAULT_PLANS } from '../../src/repositories/default-plans.js';
import { InMemoryKeyRepository } from '../../src/repositories/in-memory-key-repository.js';
import { RateLimiter } from '../../src/services/rate-limiter.js';
import { createTestRuntime, seedTenant } from '../helpers/create-test-runtime.js';
import { createClock } from '../helpers/gate-fixture.js';

interface ErrorResponse {
  code: string;
  message: string;
  traceId: string;
  details?: Record<string, unknown>;
}

interface ChartResponse {
  chart: {
    id: string;
    embedUrl: string;
    chartType: string;
    title: string | null;
    createdAt: string;
  };
}

interface UsageResponse {
  authSource: string;
  plan: {
    planId: string;
    rateLimit: string | null;
    monthlyQuota: number | null;
  };
  usage: {
    requestCount: number;
    inFlight: number;
    monthlyQuota: number | null;
    remaining: number | null;
    periodStart: string;
    periodEnd: string;
  } | null;
}

const FIXED_NOW = new Date('2026-03-15T12:00:00.000Z');
const CHART_DATA = 'month,sales\nJan,10\nFeb,14';
const STATIC_KEY = 'static-test-key';

function createChart(runtime: AppRuntime, apiKey: string | null, body: object = { data: CHART_DATA }) {
  const pending = request(runtime.app).post('/v1/charts');
  return apiKey === null ? pending.send(body) : pending.set('x-api-key', apiKey).send(body);
}

describe('charts integration', () => {
  let runtime: AppRuntime | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    await runtime?.close();
    runtime = undefined;
  });

  it('reports health without credentials', async () => {
    runtime = createTestRuntime();

    const response = await request(runtime.app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', version: '0.1.0' });
  });

  it('admits anonymous callers in dev mode without metering them', async () => {
    runtime = createTestRuntime();

    const chartResponse = await createChart(runtime, null, { data: CHART_DATA, chartType: 'bar', title: 'Sales' });
    expect(chartResponse.status).toBe(201);
    const { chart } = chartResponse.body as ChartResponse;
    expect(chart.id).toMatch(/^[0-9a-f]{32}$/);
    expect(chart.embedUrl.endsWith(`/v1/charts/${chart.id}/embed`)).toBe(true);
    expect(chart.chartType).toBe('bar');
    expect(chart.title).toBe('Sales');

    const usageResponse = await request(runtime.app).get('/v1/usage');
    expect(usageResponse.status).toBe(200);
    expect(usageResponse.body).toEqual({
      authSource: 'dev_mode',
      plan: { planId: 'dev_mode', rateLimit: null, monthlyQuota: null },
      usage: null
    } satisfies UsageResponse);
  });

  it('requires a listed key once static keys are configured', async () => {
    runtime = createTestRuntime({ envOverrides: { API_KEYS: `${STATIC_KEY},another-static-key` } });

    const missing = await createChart(runtime, null);
    expect(missing.status).toBe(401);
    expect(missing.body).toMatchObject({
      code: 'UNAUTHORIZED',
      message: 'Missing API key. Provide X-API-Key header.'
    });

    const wrong = await createChart(runtime, 'not-a-listed-key');
    expect(wrong.status).toBe(401);
    expect((wrong.body as ErrorResponse).message).toBe('Invalid API key.');

    const listed = await createChart(runtime, STATIC_KEY);
    expect(listed.status).toBe(201);

    const usageResponse = await request(runtime.app).get('/v1/usage').set('x-api-key', STATIC_KEY);
    expect(usageResponse.body).toEqual({
      authSource: 'env_fallback',
      plan: { planId: 'env_fallback', rateLimit: '60/minute', monthlyQuota: null },
      usage: null
    } satisfies UsageResponse);
  });

  it('rate limits with a Retry-After header', async () => {
    runtime = createTestRuntime({
      envOverrides: { API_KEYS: STATIC_KEY, RATE_LIMIT: '2/minute' },
      rateLimiter: new RateLimiter({ now: () => FIXED_NOW.getTime(), sweepIntervalMs: 0 })
    });

    expect((await createChart(runtime, STATIC_KEY)).status).toBe(201);
    expect((await createChart(runtime, STATIC_KEY)).status).toBe(201);

    const limited = await createChart(runtime, STATIC_KEY);
    expect(limited.status).toBe(429);
    expect(limited.headers['retry-after']).toBe('60');
    expect(limited.body).toMatchObject({
      code: 'RATE_LIMITED',
      message: 'Rate limit exceeded: 2/minute.',
      details: { retryAfterSeconds: 60 }
    });
  });

  it('meters tenant requests and rejects past the monthly quota', async () => {
    runtime = createTestRuntime({
      keyRepository: new InMemoryKeyRepository([
        ...DEFAULT_PLANS,
        { id: 'tiny', name: 'Tiny', rateLimit: '10/minute', monthlyQuota: 2 }
      ]),
      now: () => FIXED_NOW
    });
    const { tenant, secret } = await seedTenant(runtime, 'owner@acme.test', 'tiny');

    expect((await createChart(runtime, secret)).status).toBe(201);
    expect((await createChart(runtime, secret)).status).toBe(201);

    const exceeded = await createChart(runtime, secret);
    expect(exceeded.status).toBe(429);
    expect(exceeded.headers['retry-after']).toBeUndefined();
    expect(exceeded.body).toMatchObject({
      code: 'QUOTA_EXCEEDED',
      message: 'Monthly quota exceeded.',
      details: { limit: 2, used: 2, periodEnd: '2026-04-01' }
    });

    const usageResponse = await request(runtime.app).get('/v1/usage').set('x-api-key', secret);
    expect(usageResponse.status).toBe(200);
    const usage = usageResponse.body as UsageResponse;
    expect(usage.authSource).toBe('saas_db');
    expect(usage.plan).toEqual({ planId: 'tiny', rateLimit: '10/minute', monthlyQuota: 2 });
    expect(usage.usage).toMatchObject({
      requestCount: 2,
      inFlight: 0,
      monthlyQuota: 2,
      remaining: 0,
      periodStart: '2026-03-01',
      periodEnd: '2026-04-01'
    });
    expect(await runtime.usageRepository.findUsage(tenant.id, '2026-03-01')).toMatchObject({ count: 2, reserved: 0 });
  });

  it('does not bill requests that fail validation or chart creation', async () => {
    runtime = createTestRuntime({ now: () => FIXED_NOW });
    const { tenant, secret } = await seedTenant(runtime, 'owner@acme.test');

    const invalid = await createChart(runtime, secret, { chartType: 'radar' });
    expect(invalid.status).toBe(400);
    expect((invalid.body as ErrorResponse).code).toBe('VALIDATION_ERROR');

    const blank = await createChart(runtime, secret, { data: '   ' });
    expect(blank.status).toBe(400);
    expect(blank.body).toMatchObject({
      code: 'CHART_INPUT_INVALID',
      message: "Provide 'data' with at least one row."
    });

    expect(await runtime.usageRepository.findUsage(tenant.id, '2026-03-01')).toMatchObject({ count: 0, reserved: 0 });
  });

  it('reports a missing or unknown key before looking at the body', async () => {
    runtime = createTestRuntime({ envOverrides: { API_KEYS: STATIC_KEY } });

    const missing = await createChart(runtime, null, { chartType: 'radar' });
    expect(missing.status).toBe(401);
    expect((missing.body as ErrorResponse).code).toBe('UNAUTHORIZED');

    const wrong = await createChart(runtime, 'not-a-listed-key', {});
    expect(wrong.status).toBe(401);
    expect((wrong.body as ErrorResponse).message).toBe('Invalid API key.');

    const invalid = await createChart(runtime, STATIC_KEY, {});
    expect(invalid.status).toBe(400);
    expect((invalid.body as ErrorResponse).code).toBe('VALIDATION_ERROR');
  });

  it('expires stored charts after CHART_TTL_HOURS', async () => {
    const clock = createClock('2026-03-15T12:00:00.000Z');
    runtime = createTestRuntime({ envOverrides: { API_KEYS: STATIC_KEY, CHART_TTL_HOURS: 2 }, now: clock.now });

    const created = await createChart(runtime, STATIC_KEY);
    const chartId = (created.body as ChartResponse).chart.id;

    clock.advance(2 * 3_600_000 - 1_000);
    expect((await request(runtime.app).get(`/v1/charts/${chartId}/embed`)).status).toBe(200);

    clock.advance(1_000);
    const read = await request(runtime.app).get(`/v1/charts/${chartId}`).set('x-api-key', STATIC_KEY);
    expect(read.status).toBe(404);
    expect((read.body as ErrorResponse).code).toBe('CHART_NOT_FOUND');

    const embed = await request(runtime.app).get(`/v1/charts/${chartId}/embed`);
    expect(embed.status).toBe(404);
    expect((embed.body as ErrorResponse).code).toBe('CHART_NOT_FOUND');
  });

  it('rejects malformed JSON bodies', async () => {
    runtime = createTestRuntime();

    const response = await request(runtime.app)
      .post('/v1/charts')
      .set('content-type', 'application/json')
      .send('{"data":');

    expect(response.status).toBe(400);
    expect((response.body as ErrorResponse).code).toBe('INVALID_JSON');
  });

  it('hides one tenant\'s charts from another', async () => {
    runtime = createTestRuntime();
    const owner = await seedTenant(runtime, 'owner@acme.test');
    const other = await seedTenant(runtime, 'owner@other.test');

    const created = await createChart(runtime, owner.secret);
    const chartId = (created.body as ChartResponse).chart.id;

    const ownRead = await request(runtime.app).get(`/v1/charts/${chartId}`).set('x-api-key', owner.secret);
    expect(ownRead.status).toBe(200);
    expect((ownRead.body as ChartResponse).chart.id).toBe(chartId);

    const foreignRead = await request(runtime.app).get(`/v1/charts/${chartId}`).set('x-api-key', other.secret);
    expect(foreignRead.status).toBe(404);
    expect((foreignRead.body as ErrorResponse).code).toBe('CHART_NOT_FOUND');
  });

  it('serves embeds publicly with the title escaped', async () => {
    runtime = createTestRuntime({ envOverrides: { API_KEYS: STATIC_KEY } });

    const created = await createChart(runtime, STATIC_KEY, { data: CHART_DATA, title: '<b>"Q1"</b>' });
    const chartId = (created.body as ChartResponse).chart.id;

    const embed = await request(runtime.app).get(`/v1/charts/${chartId}/embed`);
    expect(embed.status).toBe(200);
    expect(embed.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(embed.text).toContain('<figcaption>&lt;b&gt;&quot;Q1&quot;&lt;/b&gt;</figcaption>');
    expect(embed.text).toContain(`data-chart-id="${chartId}" data-chart-type="auto"`);

    const missing = await request(runtime.app).get('/v1/charts/0123456789abcdef0123456789abcdef/embed');
    expect(missing.status).toBe(404);
  });

  it('rejects revoked keys and suspended tenants', async () => {
    runtime = createTestRuntime();
    const revoked = await seedTenant(runtime, 'revoked@acme.test');
    const suspended = await seedTenant(runtime, 'suspended@acme.test');
    await runtime.apiKeyService.revokeKey(revoked.apiKeyId);
    await runtime.keyRepository.updateTenantStatus(suspended.tenant.id, 'suspended');

    const revokedResponse = await createChart(runtime, revoked.secret);
    expect(revokedResponse.status).toBe(401);
    expect(revokedResponse.body).toMatchObject({ code: 'UNAUTHORIZED', message: 'API key has been revoked.' });

    const suspendedResponse = await createChart(runtime, suspended.secret);
    expect(suspendedResponse.status).toBe(403);
    expect((suspendedResponse.body as ErrorResponse).code).toBe('TENANT_SUSPENDED');
  });

  it('answers 503 when the key store is down instead of falling back to dev mode', async () => {
    runtime = createTestRuntime();
    vi.spyOn(runtime.keyRepository, 'findApiKeyCandidates').mockRejectedValue(new Error('connection refused'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const response = await createChart(runtime, 'ck_placeholder_key_value');

    expect(response.status).toBe(503);
    expect(response.body).toMatchObject({
      code: 'STORAGE_UNAVAILABLE',
      message: 'Backing store is unavailable.'
    });
    expect(typeof (response.body as ErrorResponse).traceId).toBe('string');
  });

  it('returns NOT_FOUND for unknown routes', async () => {
    runtime = createTestRuntime();

    const response = await request(runtime.app).get('/v1/unknown');

    expect(response.status).toBe(404);
    expect((response.body as ErrorResponse).code).toBe('NOT_FOUND');
  });
});
