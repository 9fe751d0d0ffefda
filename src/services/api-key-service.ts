import { createHmac, randomBytes, timingSafeEqual } from 'node:crypto';

import { AppError } from '../errors/app-error.js';
import type { ApiKeyCandidate, ApiKeyRecord, KeyRepository, Plan, Tenant } from '../repositories/key-repository.js';

export const API_KEY_PREFIX = 'ck_';

// Long enough to spread keys across the index, short enough to show in listings.
export const KEY_LOOKUP_PREFIX_LENGTH = 12;

export interface CreateApiKeyResult {
  apiKey: ApiKeyRecord;
  secret: string;
}

export type ApiKeyLookup =
  | { status: 'live'; apiKey: ApiKeyRecord; tenant: Tenant; plan: Plan }
  | { status: 'revoked'; apiKey: ApiKeyRecord }
  | { status: 'not_found' };

function digestSecret(rawKey: string, salt: string): Buffer {
  return createHmac('sha256', salt).update(rawKey).digest();
}

function createSecretHash(rawKey: string): string {
  const salt = randomBytes(16).toString('hex');
  return `${salt}:${digestSecret(rawKey, salt).toString('hex')}`;
}

function matchesSecretHash(rawKey: string, secretHash: string): boolean {
  const separator = secretHash.indexOf(':');
  if (separator <= 0) {
    return false;
  }

  const salt = secretHash.slice(0, separator);
  const expected = Buffer.from(secretHash.slice(separator + 1), 'hex');
  const actual = digestSecret(rawKey, salt);

  return expected.length === actual.length && timingSafeEqual(expected, actual);
}

export class ApiKeyService {
  public constructor(private readonly keyRepository: KeyRepository) {}

  /**
   * Resolves a presented key against stored keys sharing its prefix. Every
   * candidate is compared so the work done does not depend on which one matched.
   */
  public async findBySecret(presentedSecret: string): Promise<ApiKeyLookup> {
    if (!presentedSecret.startsWith(API_KEY_PREFIX) || presentedSecret.length <= KEY_LOOKUP_PREFIX_LENGTH) {
      return { status: 'not_found' };
    }

    const candidates = await this.keyRepository.findApiKeyCandidates(
      presentedSecret.slice(0, KEY_LOOKUP_PREFIX_LENGTH)
    );

    let match: ApiKeyCandidate | null = null;
    for (const candidate of candidates) {
      const matches = matchesSecretHash(presentedSecret, candidate.secretHash);
      if (matches && match === null) {
        match = candidate;
      }
    }

    if (match === null) {
      return { status: 'not_found' };
    }

    if (match.apiKey.revokedAt !== null) {
      return { status: 'revoked', apiKey: match.apiKey };
    }

    return {
      status: 'live',
      apiKey: match.apiKey,
      tenant: match.tenant,
      plan: match.plan
    };
  }

  public async createKey(tenantId: string, name: string): Promise<CreateApiKeyResult> {
    const tenant = await this.keyRepository.findTenantById(tenantId);
    if (tenant === null) {
      throw new AppError(404, 'TENANT_NOT_FOUND', 'Tenant not found.');
    }

    const normalizedName = name.trim();
    if (normalizedName.length === 0) {
      throw new AppError(400, 'API_KEY_NAME_INVALID', 'API key name must not be empty.');
    }

    const rawKey = `${API_KEY_PREFIX}${randomBytes(32).toString('base64url')}`;
    const apiKey = await this.keyRepository.createApiKey({
      tenantId: tenant.id,
      name: normalizedName,
      keyPrefix: rawKey.slice(0, KEY_LOOKUP_PREFIX_LENGTH),
      secretHash: createSecretHash(rawKey)
    });

    return {
      apiKey,
      secret: rawKey
    };
  }

  public async listKeys(tenantId: string): Promise<ApiKeyRecord[]> {
    return this.keyRepository.listApiKeys(tenantId);
  }

  /**
   * Revocation is idempotent; the first revocation time is kept. Pass a
   * tenant id to restrict the operation to keys that tenant owns.
   */
  public async revokeKey(apiKeyId: string, tenantId: string | null = null): Promise<ApiKeyRecord> {
    const record = await this.keyRepository.revokeApiKey({
      apiKeyId,
      tenantId,
      revokedAt: new Date()
    });

    if (record === null) {
      throw new AppError(404, 'API_KEY_NOT_FOUND', 'Key not found.');
    }

    return record;
  }
}
