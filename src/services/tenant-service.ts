import { AppError } from '../errors/app-error.js';
import type { KeyRepository, Plan, Tenant, TenantStatus } from '../repositories/key-repository.js';

export interface TenantSummary extends Tenant {
  plan: Plan;
}

export class TenantService {
  public constructor(private readonly keyRepository: KeyRepository) {}

  public async getTenant(tenantId: string): Promise<TenantSummary> {
    const tenant = await this.requireTenant(tenantId);
    return this.withPlan(tenant);
  }

  public async listTenants(): Promise<Tenant[]> {
    return this.keyRepository.listTenants();
  }

  public async listPlans(): Promise<Plan[]> {
    return this.keyRepository.listPlans();
  }

  /**
   * Applies to every later request. Usage already counted in the current
   * period is left as it is.
   */
  public async setPlan(tenantId: string, planId: string): Promise<TenantSummary> {
    const plan = await this.keyRepository.findPlanById(planId);
    if (plan === null) {
      throw new AppError(404, 'PLAN_NOT_FOUND', 'Plan not found.');
    }

    const tenant = await this.keyRepository.updateTenantPlan(tenantId, plan.id);
    if (tenant === null) {
      throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found.');
    }

    return { ...tenant, plan };
  }

  public async setStatus(tenantId: string, status: TenantStatus): Promise<TenantSummary> {
    const tenant = await this.keyRepository.updateTenantStatus(tenantId, status);
    if (tenant === null) {
      throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found.');
    }

    return this.withPlan(tenant);
  }

  public async requireTenant(tenantId: string): Promise<Tenant> {
    const tenant = await this.keyRepository.findTenantById(tenantId);
    if (tenant === null) {
      throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found.');
    }

    return tenant;
  }

  private async withPlan(tenant: Tenant): Promise<TenantSummary> {
    const plan = await this.keyRepository.findPlanById(tenant.planId);
    if (plan === null) {
      throw new AppError(500, 'PLAN_MISSING', `Plan ${tenant.planId} is not configured.`);
    }

    return { ...tenant, plan };
  }
}
