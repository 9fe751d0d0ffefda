import { randomUUID } from 'node:crypto';

import { DEFAULT_PLANS } from './default-plans.js';
import type {
  ApiKeyCandidate,
  ApiKeyRecord,
  CreateApiKeyInput,
  CreateTenantInput,
  KeyRepository,
  Plan,
  RevokeApiKeyInput,
  Tenant,
  TenantCredentials,
  TenantStatus
} from './key-repository.js';

function cloneTenant(tenant: Tenant): Tenant {
  return {
    ...tenant,
    createdAt: new Date(tenant.createdAt),
    updatedAt: new Date(tenant.updatedAt)
  };
}

function cloneApiKey(record: ApiKeyRecord): ApiKeyRecord {
  return {
    id: record.id,
    tenantId: record.tenantId,
    name: record.name,
    keyPrefix: record.keyPrefix,
    createdAt: new Date(record.createdAt),
    revokedAt: record.revokedAt === null ? null : new Date(record.revokedAt)
  };
}

interface TenantInternalRecord extends Tenant {
  passwordHash: string;
}

interface ApiKeyInternalRecord extends ApiKeyRecord {
  secretHash: string;
}

export class InMemoryKeyRepository implements KeyRepository {
  private readonly plansById = new Map<string, Plan>();

  private readonly tenantsById = new Map<string, TenantInternalRecord>();

  private readonly tenantIdsByEmail = new Map<string, string>();

  private readonly apiKeysById = new Map<string, ApiKeyInternalRecord>();

  public constructor(plans: readonly Plan[] = DEFAULT_PLANS) {
    for (const plan of plans) {
      this.plansById.set(plan.id, { ...plan });
    }
  }

  public createTenant(input: CreateTenantInput): Promise<Tenant | null> {
    const normalizedEmail = input.email.trim().toLowerCase();
    if (this.tenantIdsByEmail.has(normalizedEmail)) {
      return Promise.resolve(null);
    }

    const now = new Date();
    const record: TenantInternalRecord = {
      id: randomUUID(),
      name: input.name,
      email: normalizedEmail,
      planId: input.planId,
      status: 'active',
      passwordHash: input.passwordHash,
      createdAt: now,
      updatedAt: now
    };

    this.tenantsById.set(record.id, record);
    this.tenantIdsByEmail.set(normalizedEmail, record.id);
    return Promise.resolve(this.toTenant(record));
  }

  public findTenantById(tenantId: string): Promise<Tenant | null> {
    const record = this.tenantsById.get(tenantId);
    return Promise.resolve(record === undefined ? null : this.toTenant(record));
  }

  public findTenantCredentialsByEmail(email: string): Promise<TenantCredentials | null> {
    const tenantId = this.tenantIdsByEmail.get(email.trim().toLowerCase());
    const record = tenantId === undefined ? undefined : this.tenantsById.get(tenantId);
    if (record === undefined) {
      return Promise.resolve(null);
    }

    return Promise.resolve({
      tenant: this.toTenant(record),
      passwordHash: record.passwordHash
    });
  }

  public listTenants(): Promise<Tenant[]> {
    const tenants = Array.from(this.tenantsById.values())
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime())
      .map((record) => this.toTenant(record));

    return Promise.resolve(tenants);
  }

  public updateTenantPlan(tenantId: string, planId: string): Promise<Tenant | null> {
    const record = this.tenantsById.get(tenantId);
    if (record === undefined) {
      return Promise.resolve(null);
    }

    record.planId = planId;
    record.updatedAt = new Date();
    return Promise.resolve(this.toTenant(record));
  }

  public updateTenantStatus(tenantId: string, status: TenantStatus): Promise<Tenant | null> {
    const record = this.tenantsById.get(tenantId);
    if (record === undefined) {
      return Promise.resolve(null);
    }

    record.status = status;
    record.updatedAt = new Date();
    return Promise.resolve(this.toTenant(record));
  }

  public findPlanById(planId: string): Promise<Plan | null> {
    const plan = this.plansById.get(planId);
    return Promise.resolve(plan === undefined ? null : { ...plan });
  }

  public listPlans(): Promise<Plan[]> {
    return Promise.resolve(Array.from(this.plansById.values(), (plan) => ({ ...plan })));
  }

  public createApiKey(input: CreateApiKeyInput): Promise<ApiKeyRecord> {
    const record: ApiKeyInternalRecord = {
      id: randomUUID(),
      tenantId: input.tenantId,
      name: input.name,
      keyPrefix: input.keyPrefix,
      secretHash: input.secretHash,
      createdAt: new Date(),
      revokedAt: null
    };

    this.apiKeysById.set(record.id, record);
    return Promise.resolve(cloneApiKey(record));
  }

  public listApiKeys(tenantId: string): Promise<ApiKeyRecord[]> {
    const records = Array.from(this.apiKeysById.values())
      .filter((record) => record.tenantId === tenantId)
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime())
      .map(cloneApiKey);

    return Promise.resolve(records);
  }

  public revokeApiKey(input: RevokeApiKeyInput): Promise<ApiKeyRecord | null> {
    const record = this.apiKeysById.get(input.apiKeyId);
    if (record === undefined || (input.tenantId !== null && record.tenantId !== input.tenantId)) {
      return Promise.resolve(null);
    }

    if (record.revokedAt === null) {
      record.revokedAt = new Date(input.revokedAt);
    }

    return Promise.resolve(cloneApiKey(record));
  }

  public findApiKeyCandidates(keyPrefix: string): Promise<ApiKeyCandidate[]> {
    const candidates: ApiKeyCandidate[] = [];

    for (const record of this.apiKeysById.values()) {
      if (record.keyPrefix !== keyPrefix) {
        continue;
      }

      const tenant = this.tenantsById.get(record.tenantId);
      const plan = tenant === undefined ? undefined : this.plansById.get(tenant.planId);
      if (tenant === undefined || plan === undefined) {
        continue;
      }

      candidates.push({
        apiKey: cloneApiKey(record),
        secretHash: record.secretHash,
        tenant: this.toTenant(tenant),
        plan: { ...plan }
      });
    }

    return Promise.resolve(candidates);
  }

  private toTenant(record: TenantInternalRecord): Tenant {
    return cloneTenant({
      id: record.id,
      name: record.name,
      email: record.email,
      planId: record.planId,
      status: record.status,
      createdAt: record.createdAt,
      updatedAt: record.updatedAt
    });
  }
}
