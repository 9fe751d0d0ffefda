export const TENANT_STATUSES = ['active', 'suspended'] as const;

export type TenantStatus = (typeof TENANT_STATUSES)[number];

export interface Plan {
  id: string;
  name: string;
  rateLimit: string;
  monthlyQuota: number | null;
}

export interface Tenant {
  id: string;
  name: string;
  email: string;
  planId: string;
  status: TenantStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface TenantCredentials {
  tenant: Tenant;
  passwordHash: string;
}

export interface ApiKeyRecord {
  id: string;
  tenantId: string;
  name: string;
  keyPrefix: string;
  createdAt: Date;
  revokedAt: Date | null;
}

/**
 * A stored key sharing the presented key's prefix, joined with its owner.
 * Revoked keys are included so callers can tell "revoked" from "unknown".
 */
export interface ApiKeyCandidate {
  apiKey: ApiKeyRecord;
  secretHash: string;
  tenant: Tenant;
  plan: Plan;
}

export interface CreateTenantInput {
  name: string;
  email: string;
  passwordHash: string;
  planId: string;
}

export interface CreateApiKeyInput {
  tenantId: string;
  name: string;
  keyPrefix: string;
  secretHash: string;
}

export interface RevokeApiKeyInput {
  apiKeyId: string;
  tenantId: string | null;
  revokedAt: Date;
}

export interface KeyRepository {
  /** Returns null when the email is already registered. */
  createTenant(input: CreateTenantInput): Promise<Tenant | null>;
  findTenantById(tenantId: string): Promise<Tenant | null>;
  findTenantCredentialsByEmail(email: string): Promise<TenantCredentials | null>;
  listTenants(): Promise<Tenant[]>;
  updateTenantPlan(tenantId: string, planId: string): Promise<Tenant | null>;
  updateTenantStatus(tenantId: string, status: TenantStatus): Promise<Tenant | null>;

  findPlanById(planId: string): Promise<Plan | null>;
  listPlans(): Promise<Plan[]>;

  createApiKey(input: CreateApiKeyInput): Promise<ApiKeyRecord>;
  listApiKeys(tenantId: string): Promise<ApiKeyRecord[]>;
  revokeApiKey(input: RevokeApiKeyInput): Promise<ApiKeyRecord | null>;
  findApiKeyCandidates(keyPrefix: string): Promise<ApiKeyCandidate[]>;
}
