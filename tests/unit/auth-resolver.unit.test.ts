import { describe, expect, it, vi } from 'vitest';

import type { ResolutionStrategy } from '../../src/auth/resolution-strategies.js';
import { ANONYMOUS_IDENTITY, credentialIdentity } from '../../src/auth/tenant-context.js';
import { createGateConfig } from '../../src/config/gate-config.js';
import { AuthResolver } from '../../src/services/auth-resolver.js';
import { captureRejection } from '../helpers/errors.js';
import { createGateFixture, seedTenantWithKey } from '../helpers/gate-fixture.js';

const STATIC_KEY = 'static-test-key';

describe('AuthResolver', () => {
  it('resolves a tenant key with its plan limits', async () => {
    const fixture = createGateFixture({ staticKeys: [STATIC_KEY] });
    const { tenant, secret } = await seedTenantWithKey(fixture, 'owner@acme.test', 'pro');

    const context = await fixture.resolver.resolve(secret);

    expect(context).toMatchObject({
      tenantId: tenant.id,
      authSource: 'saas_db',
      identity: `tenant:${tenant.id}`,
      plan: {
        planId: 'pro',
        rateLimit: { limit: 100, windowMs: 60_000, spec: '100/minute' },
        monthlyQuota: 10_000
      }
    });
  });

  it('falls back to the static allow-list with the default rate limit and no quota', async () => {
    const fixture = createGateFixture({ staticKeys: [STATIC_KEY, 'second-static-key'], rateLimit: '5/second' });

    const context = await fixture.resolver.resolve('second-static-key');

    expect(context).toEqual({
      tenantId: null,
      apiKeyId: null,
      authSource: 'env_fallback',
      identity: credentialIdentity('second-static-key'),
      plan: {
        planId: 'env_fallback',
        rateLimit: { limit: 5, windowMs: 1_000, spec: '5/second' },
        monthlyQuota: null
      }
    });
  });

  it('prefers the tenant key when the same secret is also on the static allow-list', async () => {
    const fixture = createGateFixture();
    const { tenant, secret } = await seedTenantWithKey(fixture, 'owner@acme.test');
    const resolver = AuthResolver.withDefaultStrategies(
      fixture.apiKeyService,
      createGateConfig({ staticKeys: [secret], rateLimit: '60/minute' })
    );

    const context = await resolver.resolve(secret);

    expect(context.authSource).toBe('saas_db');
    expect(context.tenantId).toBe(tenant.id);
  });

  it('explains a missing credential separately from a wrong one', async () => {
    const fixture = createGateFixture({ staticKeys: [STATIC_KEY] });

    expect(await captureRejection(fixture.resolver.resolve(null))).toMatchObject({
      statusCode: 401,
      code: 'UNAUTHORIZED',
      message: 'Missing API key. Provide X-API-Key header.'
    });
    expect(await captureRejection(fixture.resolver.resolve('wrong-key'))).toMatchObject({
      statusCode: 401,
      code: 'UNAUTHORIZED',
      message: 'Invalid API key.'
    });
  });

  it('admits everything in dev mode with an unrestricted plan', async () => {
    const fixture = createGateFixture();

    expect(await fixture.resolver.resolve(null)).toEqual({
      tenantId: null,
      apiKeyId: null,
      authSource: 'dev_mode',
      identity: ANONYMOUS_IDENTITY,
      plan: { planId: 'dev_mode', rateLimit: null, monthlyQuota: null }
    });
    expect((await fixture.resolver.resolve('anything')).authSource).toBe('dev_mode');
  });

  it('rejects a revoked tenant key even in dev mode', async () => {
    const fixture = createGateFixture();
    const { tenant, secret } = await seedTenantWithKey(fixture, 'owner@acme.test');
    const [apiKey] = await fixture.apiKeyService.listKeys(tenant.id);
    await fixture.apiKeyService.revokeKey(apiKey?.id ?? 'missing');

    expect(await captureRejection(fixture.resolver.resolve(secret))).toMatchObject({
      statusCode: 401,
      code: 'UNAUTHORIZED',
      message: 'API key has been revoked.'
    });
  });

  it('rejects keys of a suspended tenant without falling through', async () => {
    const fixture = createGateFixture();
    const { tenant, secret } = await seedTenantWithKey(fixture, 'owner@acme.test');
    await fixture.keyRepository.updateTenantStatus(tenant.id, 'suspended');

    expect(await captureRejection(fixture.resolver.resolve(secret))).toMatchObject({
      statusCode: 403,
      code: 'TENANT_SUSPENDED'
    });
  });

  it('fails closed when the key store is unavailable', async () => {
    const fixture = createGateFixture();
    vi.spyOn(fixture.keyRepository, 'findApiKeyCandidates').mockRejectedValue(new Error('connection refused'));

    expect(await captureRejection(fixture.resolver.resolve('ck_placeholder_key_value'))).toMatchObject({
      statusCode: 503,
      code: 'STORAGE_UNAVAILABLE'
    });
  });

  it('labels the context with the source of the strategy that resolved it', async () => {
    const strategy: ResolutionStrategy = {
      source: 'env_fallback',
      resolve: async () => ({
        kind: 'resolved',
        context: {
          tenantId: null,
          apiKeyId: null,
          plan: { planId: 'custom', rateLimit: null, monthlyQuota: null },
          identity: ANONYMOUS_IDENTITY
        }
      })
    };

    const context = await new AuthResolver([strategy]).resolve(null);

    expect(context).toEqual({
      tenantId: null,
      apiKeyId: null,
      plan: { planId: 'custom', rateLimit: null, monthlyQuota: null },
      identity: ANONYMOUS_IDENTITY,
      authSource: 'env_fallback'
    });
  });
});
