import { Router } from 'express';

import type { Gate } from '../../services/gate.js';
import type { QuotaTracker } from '../../services/quota-tracker.js';
import { createGateAuthMiddleware } from '../middlewares/credentials.js';

export function createUsageRoutes(gate: Gate, quotaTracker: QuotaTracker): Router {
  const router = Router();
  router.use(createGateAuthMiddleware(gate));

  router.get('/', async (request, response, next) => {
    try {
      const context = request.tenantContext;
      if (context === undefined) {
        throw new Error('Gate did not attach a tenant context.');
      }

      const plan = {
        planId: context.plan.planId,
        rateLimit: context.plan.rateLimit?.spec ?? null,
        monthlyQuota: context.plan.monthlyQuota
      };

      // Static-key and dev-mode callers have no tenant and nothing is metered for them.
      const usage = context.tenantId === null
        ? null
        : await quotaTracker.getUsage(context.tenantId, context.plan.monthlyQuota);

      response.status(200).json({
        authSource: context.authSource,
        plan,
        usage
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
