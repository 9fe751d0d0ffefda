import { Router } from 'express';
import { z } from 'zod';

import { TENANT_STATUSES } from '../../repositories/key-repository.js';
import type { ApiKeyService } from '../../services/api-key-service.js';
import type { QuotaTracker } from '../../services/quota-tracker.js';
import type { TenantService, TenantSummary } from '../../services/tenant-service.js';
import { createRequireAdmin } from '../middlewares/require-admin.js';
import { serializeApiKey } from './account-routes.js';

const tenantParamsSchema = z.object({
  tenantId: z.string().uuid()
});

const keyParamsSchema = tenantParamsSchema.extend({
  keyId: z.string().uuid()
});

const updateTenantSchema = z.object({
  status: z.enum(TENANT_STATUSES).optional(),
  planId: z.string().min(1).optional()
}).refine((value) => value.status !== undefined || value.planId !== undefined, {
  message: 'Provide status or planId.'
});

const createKeySchema = z.object({
  name: z.string().trim().min(1).max(100).default('Default')
});

export interface AdminRouteServices {
  tenantService: TenantService;
  apiKeyService: ApiKeyService;
  quotaTracker: QuotaTracker;
  adminToken: string | undefined;
}

export function createAdminRoutes(services: AdminRouteServices): Router {
  const { tenantService, apiKeyService, quotaTracker } = services;
  const router = Router();
  router.use(createRequireAdmin(services.adminToken));

  router.get('/plans', async (_request, response, next) => {
    try {
      const plans = await tenantService.listPlans();
      response.status(200).json({ plans });
    } catch (error) {
      next(error);
    }
  });

  router.get('/tenants', async (_request, response, next) => {
    try {
      const tenants = await tenantService.listTenants();
      response.status(200).json({ tenants });
    } catch (error) {
      next(error);
    }
  });

  router.get('/tenants/:tenantId', async (request, response, next) => {
    try {
      const params = tenantParamsSchema.parse(request.params);
      const tenant = await tenantService.getTenant(params.tenantId);
      response.status(200).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.patch('/tenants/:tenantId', async (request, response, next) => {
    try {
      const params = tenantParamsSchema.parse(request.params);
      const payload = updateTenantSchema.parse(request.body);

      let tenant: TenantSummary | null = null;
      if (payload.planId !== undefined) {
        tenant = await tenantService.setPlan(params.tenantId, payload.planId);
      }

      if (payload.status !== undefined) {
        tenant = await tenantService.setStatus(params.tenantId, payload.status);
      }

      response.status(200).json({ tenant });
    } catch (error) {
      next(error);
    }
  });

  router.get('/tenants/:tenantId/keys', async (request, response, next) => {
    try {
      const params = tenantParamsSchema.parse(request.params);
      await tenantService.requireTenant(params.tenantId);
      const apiKeys = await apiKeyService.listKeys(params.tenantId);
      response.status(200).json({ apiKeys: apiKeys.map(serializeApiKey) });
    } catch (error) {
      next(error);
    }
  });

  router.post('/tenants/:tenantId/keys', async (request, response, next) => {
    try {
      const params = tenantParamsSchema.parse(request.params);
      const payload = createKeySchema.parse(request.body ?? {});
      const result = await apiKeyService.createKey(params.tenantId, payload.name);

      response.status(201).json({
        apiKey: serializeApiKey(result.apiKey),
        key: result.secret
      });
    } catch (error) {
      next(error);
    }
  });

  router.delete('/tenants/:tenantId/keys/:keyId', async (request, response, next) => {
    try {
      const params = keyParamsSchema.parse(request.params);
      const apiKey = await apiKeyService.revokeKey(params.keyId, params.tenantId);
      response.status(200).json({ status: 'revoked', apiKey: serializeApiKey(apiKey) });
    } catch (error) {
      next(error);
    }
  });

  router.get('/tenants/:tenantId/usage', async (request, response, next) => {
    try {
      const params = tenantParamsSchema.parse(request.params);
      const tenant = await tenantService.getTenant(params.tenantId);
      const current = await quotaTracker.getUsage(tenant.id, tenant.plan.monthlyQuota);
      const history = await quotaTracker.listHistory(tenant.id);
      response.status(200).json({ current, history });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
