import type { TenantContext } from '../auth/tenant-context.js';

declare global {
  namespace Express {
    interface Request {
      tenantContext?: TenantContext;
      accountId?: string;
    }
  }
}
