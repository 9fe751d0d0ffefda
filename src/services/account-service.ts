import argon2 from 'argon2';

import { AppError } from '../errors/app-error.js';
import type { KeyRepository, Tenant } from '../repositories/key-repository.js';

export interface AccountServiceConfig {
  defaultPlanId: string;
}

export interface RegisterAccountInput {
  name: string;
  email: string;
  password: string;
}

async function hashPassword(password: string): Promise<string> {
  return argon2.hash(password, {
    type: argon2.argon2id,
    memoryCost: 19_456,
    timeCost: 2,
    parallelism: 1
  });
}

export class AccountService {
  public constructor(
    private readonly keyRepository: KeyRepository,
    private readonly config: AccountServiceConfig
  ) {}

  public async register(input: RegisterAccountInput): Promise<Tenant> {
    this.validatePasswordStrength(input.password);

    const plan = await this.keyRepository.findPlanById(this.config.defaultPlanId);
    if (plan === null) {
      throw new AppError(500, 'PLAN_MISSING', `Plan ${this.config.defaultPlanId} is not configured.`);
    }

    const tenant = await this.keyRepository.createTenant({
      name: input.name.trim(),
      email: input.email.trim().toLowerCase(),
      passwordHash: await hashPassword(input.password),
      planId: plan.id
    });

    if (tenant === null) {
      throw new AppError(409, 'EMAIL_TAKEN', 'Email already registered.');
    }

    return tenant;
  }

  public async login(email: string, password: string): Promise<Tenant> {
    const credentials = await this.keyRepository.findTenantCredentialsByEmail(email.trim().toLowerCase());
    if (credentials === null) {
      throw new AppError(401, 'INVALID_CREDENTIALS', 'Invalid email or password.');
    }

    const validPassword = await argon2.verify(credentials.passwordHash, password);
    if (!validPassword || credentials.tenant.status !== 'active') {
      throw new AppError(401, 'INVALID_CREDENTIALS', 'Invalid email or password.');
    }

    return credentials.tenant;
  }

  private validatePasswordStrength(password: string): void {
    if (password.length < 12) {
      throw new AppError(400, 'PASSWORD_WEAK', 'Password must be at least 12 characters long.');
    }
  }
}
