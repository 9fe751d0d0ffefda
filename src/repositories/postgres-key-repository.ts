import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

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

interface PlanRow {
  id: string;
  name: string;
  rate_limit: string;
  monthly_quota: number | null;
}

interface TenantRow {
  id: string;
  name: string;
  email: string;
  plan_id: string;
  status: TenantStatus;
  password_hash: string;
  created_at: Date;
  updated_at: Date;
}

interface ApiKeyRow {
  id: string;
  tenant_id: string;
  name: string;
  key_prefix: string;
  secret_hash: string;
  created_at: Date;
  revoked_at: Date | null;
}

interface ApiKeyCandidateRow {
  key_id: string;
  key_tenant_id: string;
  key_name: string;
  key_prefix: string;
  secret_hash: string;
  key_created_at: Date;
  key_revoked_at: Date | null;
  tenant_name: string;
  tenant_email: string;
  tenant_plan_id: string;
  tenant_status: TenantStatus;
  tenant_created_at: Date;
  tenant_updated_at: Date;
  plan_name: string;
  plan_rate_limit: string;
  plan_monthly_quota: number | null;
}

const TENANT_COLUMNS = 'id, name, email, plan_id, status, password_hash, created_at, updated_at';

function mapPlan(row: PlanRow): Plan {
  return {
    id: row.id,
    name: row.name,
    rateLimit: row.rate_limit,
    monthlyQuota: row.monthly_quota
  };
}

function mapTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    planId: row.plan_id,
    status: row.status,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapApiKey(row: ApiKeyRow): ApiKeyRecord {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    name: row.name,
    keyPrefix: row.key_prefix,
    createdAt: row.created_at,
    revokedAt: row.revoked_at
  };
}

function mapCandidate(row: ApiKeyCandidateRow): ApiKeyCandidate {
  return {
    apiKey: {
      id: row.key_id,
      tenantId: row.key_tenant_id,
      name: row.key_name,
      keyPrefix: row.key_prefix,
      createdAt: row.key_created_at,
      revokedAt: row.key_revoked_at
    },
    secretHash: row.secret_hash,
    tenant: {
      id: row.key_tenant_id,
      name: row.tenant_name,
      email: row.tenant_email,
      planId: row.tenant_plan_id,
      status: row.tenant_status,
      createdAt: row.tenant_created_at,
      updatedAt: row.tenant_updated_at
    },
    plan: {
      id: row.tenant_plan_id,
      name: row.plan_name,
      rateLimit: row.plan_rate_limit,
      monthlyQuota: row.plan_monthly_quota
    }
  };
}

function getSingleRow<T>(rows: T[]): T | null {
  const [row] = rows;
  return row ?? null;
}

export class PostgresKeyRepository implements KeyRepository {
  public constructor(private readonly pool: Pool) {}

  public async createTenant(input: CreateTenantInput): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `
      INSERT INTO tenants (
        id,
        name,
        email,
        password_hash,
        plan_id,
        status,
        created_at,
        updated_at
      )
      VALUES ($1, $2, $3, $4, $5, 'active', NOW(), NOW())
      ON CONFLICT (email) DO NOTHING
      RETURNING ${TENANT_COLUMNS}
      `,
      [randomUUID(), input.name, input.email.trim().toLowerCase(), input.passwordHash, input.planId]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async findTenantById(tenantId: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `SELECT ${TENANT_COLUMNS} FROM tenants WHERE id = $1 LIMIT 1`,
      [tenantId]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async findTenantCredentialsByEmail(email: string): Promise<TenantCredentials | null> {
    const result = await this.pool.query<TenantRow>(
      `SELECT ${TENANT_COLUMNS} FROM tenants WHERE email = $1 LIMIT 1`,
      [email.trim().toLowerCase()]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      return null;
    }

    return {
      tenant: mapTenant(row),
      passwordHash: row.password_hash
    };
  }

  public async listTenants(): Promise<Tenant[]> {
    const result = await this.pool.query<TenantRow>(
      `SELECT ${TENANT_COLUMNS} FROM tenants ORDER BY created_at DESC, id DESC`
    );

    return result.rows.map(mapTenant);
  }

  public async updateTenantPlan(tenantId: string, planId: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `
      UPDATE tenants
      SET plan_id = $2,
          updated_at = NOW()
      WHERE id = $1
      RETURNING ${TENANT_COLUMNS}
      `,
      [tenantId, planId]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async updateTenantStatus(tenantId: string, status: TenantStatus): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `
      UPDATE tenants
      SET status = $2,
          updated_at = NOW()
      WHERE id = $1
      RETURNING ${TENANT_COLUMNS}
      `,
      [tenantId, status]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async findPlanById(planId: string): Promise<Plan | null> {
    const result = await this.pool.query<PlanRow>(
      'SELECT id, name, rate_limit, monthly_quota FROM plans WHERE id = $1 LIMIT 1',
      [planId]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapPlan(row);
  }

  public async listPlans(): Promise<Plan[]> {
    const result = await this.pool.query<PlanRow>(
      'SELECT id, name, rate_limit, monthly_quota FROM plans ORDER BY monthly_quota ASC NULLS LAST, id ASC'
    );

    return result.rows.map(mapPlan);
  }

  public async createApiKey(input: CreateApiKeyInput): Promise<ApiKeyRecord> {
    const result = await this.pool.query<ApiKeyRow>(
      `
      INSERT INTO api_keys (
        id,
        tenant_id,
        name,
        key_prefix,
        secret_hash,
        created_at,
        revoked_at
      )
      VALUES ($1, $2, $3, $4, $5, NOW(), NULL)
      RETURNING *
      `,
      [randomUUID(), input.tenantId, input.name, input.keyPrefix, input.secretHash]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Failed to create API key.');
    }

    return mapApiKey(row);
  }

  public async listApiKeys(tenantId: string): Promise<ApiKeyRecord[]> {
    const result = await this.pool.query<ApiKeyRow>(
      `
      SELECT *
      FROM api_keys
      WHERE tenant_id = $1
      ORDER BY created_at DESC, id DESC
      `,
      [tenantId]
    );

    return result.rows.map(mapApiKey);
  }

  public async revokeApiKey(input: RevokeApiKeyInput): Promise<ApiKeyRecord | null> {
    const result = await this.pool.query<ApiKeyRow>(
      `
      UPDATE api_keys
      SET revoked_at = COALESCE(revoked_at, $3)
      WHERE id = $1
        AND ($2::uuid IS NULL OR tenant_id = $2::uuid)
      RETURNING *
      `,
      [input.apiKeyId, input.tenantId, input.revokedAt]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapApiKey(row);
  }

  public async findApiKeyCandidates(keyPrefix: string): Promise<ApiKeyCandidate[]> {
    const result = await this.pool.query<ApiKeyCandidateRow>(
      `
      SELECT
        k.id AS key_id,
        k.tenant_id AS key_tenant_id,
        k.name AS key_name,
        k.key_prefix,
        k.secret_hash,
        k.created_at AS key_created_at,
        k.revoked_at AS key_revoked_at,
        t.name AS tenant_name,
        t.email AS tenant_email,
        t.plan_id AS tenant_plan_id,
        t.status AS tenant_status,
        t.created_at AS tenant_created_at,
        t.updated_at AS tenant_updated_at,
        p.name AS plan_name,
        p.rate_limit AS plan_rate_limit,
        p.monthly_quota AS plan_monthly_quota
      FROM api_keys k
      JOIN tenants t ON t.id = k.tenant_id
      JOIN plans p ON p.id = t.plan_id
      WHERE k.key_prefix = $1
      `,
      [keyPrefix]
    );

    return result.rows.map(mapCandidate);
  }
}
