import { Router } from 'express';
import { z } from 'zod';

import type { ApiKeyRecord } from '../../repositories/key-repository.js';
import type { AccountService } from '../../services/account-service.js';
import type { ApiKeyService } from '../../services/api-key-service.js';
import type { QuotaTracker } from '../../services/quota-tracker.js';
import type { TenantService } from '../../services/tenant-service.js';
import type { IssuedToken, TokenIssuer } from '../../services/token-issuer.js';
import { createRequireAccount, getAccountId } from '../middlewares/require-account.js';

const registerSchema = z.object({
  name: z.string().trim().min(1).max(200),
  email: z.string().email(),
  password: z.string().min(12)
});

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1)
});

const createKeySchema = z.object({
  name: z.string().trim().min(1).max(100).default('Default')
});

const keyParamsSchema = z.object({
  keyId: z.string().uuid()
});

function serializeToken(issued: IssuedToken) {
  return {
    accessToken: issued.token,
    tokenType: 'bearer',
    expiresAt: issued.expiresAt.toISOString()
  };
}

export function serializeApiKey(apiKey: ApiKeyRecord) {
  return {
    id: apiKey.id,
    name: apiKey.name,
    keyPrefix: apiKey.keyPrefix,
    createdAt: apiKey.createdAt.toISOString(),
    revokedAt: apiKey.revokedAt === null ? null : apiKey.revokedAt.toISOString()
  };
}

export interface AccountRouteServices {
  accountService: AccountService;
  tenantService: TenantService;
  apiKeyService: ApiKeyService;
  quotaTracker: QuotaTracker;
  tokenIssuer: TokenIssuer;
}

export function createAccountRoutes(services: AccountRouteServices): Router {
  const { accountService, tenantService, apiKeyService, quotaTracker, tokenIssuer } = services;
  const router = Router();
  const requireAccount = createRequireAccount(tokenIssuer);

  router.post('/register', async (request, response, next) => {
    try {
      const payload = registerSchema.parse(request.body);
      const tenant = await accountService.register(payload);
      const issued = await tokenIssuer.issue(tenant.id);

      response.status(201).json(serializeToken(issued));
    } catch (error) {
      next(error);
    }
  });

  router.post('/login', async (request, response, next) => {
    try {
      const payload = loginSchema.parse(request.body);
      const tenant = await accountService.login(payload.email, payload.password);
      const issued = await tokenIssuer.issue(tenant.id);

      response.status(200).json(serializeToken(issued));
    } catch (error) {
      next(error);
    }
  });

  router.get('/me', requireAccount, async (request, response, next) => {
    try {
      const tenant = await tenantService.getTenant(getAccountId(request));

      response.status(200).json({
        tenant: {
          id: tenant.id,
          name: tenant.name,
          email: tenant.email,
          status: tenant.status,
          createdAt: tenant.createdAt.toISOString(),
          plan: tenant.plan
        }
      });
    } catch (error) {
      next(error);
    }
  });

  router.post('/keys', requireAccount, async (request, response, next) => {
    try {
      const payload = createKeySchema.parse(request.body ?? {});
      const result = await apiKeyService.createKey(getAccountId(request), payload.name);

      response.status(201).json({
        apiKey: serializeApiKey(result.apiKey),
        key: result.secret
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/keys', requireAccount, async (request, response, next) => {
    try {
      const apiKeys = await apiKeyService.listKeys(getAccountId(request));

      response.status(200).json({
        apiKeys: apiKeys.map(serializeApiKey)
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/keys/:keyId', requireAccount, async (request, response, next) => {
    try {
      const params = keyParamsSchema.parse(request.params);
      const apiKey = await apiKeyService.revokeKey(params.keyId, getAccountId(request));

      response.status(200).json({
        status: 'revoked',
        apiKey: serializeApiKey(apiKey)
      });
    } catch (error) {
      next(error);
    }
  });

  router.get('/usage', requireAccount, async (request, response, next) => {
    try {
      const tenant = await tenantService.getTenant(getAccountId(request));
      const current = await quotaTracker.getUsage(tenant.id, tenant.plan.monthlyQuota);
      const history = await quotaTracker.listHistory(tenant.id);

      response.status(200).json({
        current,
        history
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
