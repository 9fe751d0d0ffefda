import type { TenantContext } from '../auth/tenant-context.js';
import { AppError, ThrottledError } from '../errors/app-error.js';
import { recordGateDecision, recordUsageCommit } from '../telemetry/metrics.js';
import type { AuthResolver } from './auth-resolver.js';
import type { QuotaReservation, QuotaTracker } from './quota-tracker.js';
import type { RateLimiter } from './rate-limiter.js';

export interface Admission {
  context: TenantContext;
  /** Null when the request is not counted against a tenant quota. */
  reservation: QuotaReservation | null;
  remainingRequests: number | null;
  remainingQuota: number | null;
}

export type GateHandler<T> = (context: TenantContext, signal: AbortSignal) => Promise<T>;

export interface GateRunOptions {
  signal?: AbortSignal;
}

function rejectionOutcome(error: unknown): string {
  return error instanceof AppError ? error.code.toLowerCase() : 'error';
}

/**
 * Per-request admission: resolve identity, check the rate limit, hold a quota
 * slot, run the handler and bill it only once it has succeeded.
 */
export class Gate {
  public constructor(
    private readonly authResolver: AuthResolver,
    private readonly rateLimiter: RateLimiter,
    private readonly quotaTracker: QuotaTracker
  ) {}

  /** Identity and rate checks only, for endpoints that are not billed. */
  public async authenticate(credential: string | null): Promise<TenantContext> {
    const { context } = await this.checkRate(credential);
    recordGateDecision({ outcome: 'authenticated', auth_source: context.authSource });
    return context;
  }

  public async admit(credential: string | null): Promise<Admission> {
    const { context, remainingRequests } = await this.checkRate(credential);

    const tenantId = context.tenantId;
    if (tenantId === null) {
      recordGateDecision({ outcome: 'admitted', auth_source: context.authSource });
      return { context, reservation: null, remainingRequests, remainingQuota: null };
    }

    const decision = await this.guard(context.authSource, () => (
      this.quotaTracker.reserve(tenantId, context.plan.monthlyQuota)
    ));

    if (decision.outcome === 'quota_exceeded') {
      logRejection(context, 'quota_exceeded');
      throw new AppError(429, 'QUOTA_EXCEEDED', 'Monthly quota exceeded.', {
        limit: decision.limit,
        used: decision.used,
        periodEnd: decision.periodEnd
      });
    }

    recordGateDecision({ outcome: 'admitted', auth_source: context.authSource });
    return {
      context,
      reservation: decision.reservation,
      remainingRequests,
      remainingQuota: decision.remaining
    };
  }

  public async complete(admission: Admission): Promise<void> {
    if (admission.reservation === null) {
      return;
    }

    const billed = await this.quotaTracker.commit(admission.reservation);
    if (!billed) {
      console.warn('usage_hold_expired', {
        tenantId: admission.context.tenantId,
        periodStart: admission.reservation.periodStart
      });
      return;
    }

    recordUsageCommit({ plan_id: admission.context.plan.planId });
  }

  public async abandon(admission: Admission): Promise<void> {
    if (admission.reservation === null) {
      return;
    }

    await this.quotaTracker.release(admission.reservation);
  }

  /**
   * Usage is committed only when the handler resolves and the signal was not
   * aborted first. Any other exit, a failed commit included, releases the hold
   * and rethrows.
   */
  public async run<T>(credential: string | null, handler: GateHandler<T>, options: GateRunOptions = {}): Promise<T> {
    const signal = options.signal ?? new AbortController().signal;
    const admission = await this.admit(credential);

    try {
      throwIfCancelled(signal);
      const result = await handler(admission.context, signal);
      throwIfCancelled(signal);
      await this.complete(admission);
      return result;
    } catch (error) {
      await this.abandonQuietly(admission);
      throw error;
    }
  }

  // A hold this cannot release is reclaimed once its lease expires.
  private async abandonQuietly(admission: Admission): Promise<void> {
    await this.abandon(admission).catch((releaseError: unknown) => {
      console.error('quota_release_failed', {
        tenantId: admission.context.tenantId,
        error: releaseError instanceof Error ? releaseError.message : String(releaseError)
      });
    });
  }

  private async checkRate(credential: string | null): Promise<{ context: TenantContext; remainingRequests: number | null }> {
    const context = await this.guard(null, () => this.authResolver.resolve(credential));
    const decision = this.rateLimiter.allow(context.identity, context.plan.rateLimit);

    if (!decision.allowed) {
      logRejection(context, 'rate_limited');
      throw new ThrottledError(
        'RATE_LIMITED',
        `Rate limit exceeded: ${context.plan.rateLimit?.spec ?? 'unknown'}.`,
        decision.retryAfterSeconds
      );
    }

    return { context, remainingRequests: decision.remaining };
  }

  private async guard<T>(authSource: string | null, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      recordGateDecision({ outcome: rejectionOutcome(error), auth_source: authSource ?? 'unresolved' });
      throw error;
    }
  }
}

function logRejection(context: TenantContext, outcome: 'rate_limited' | 'quota_exceeded'): void {
  recordGateDecision({ outcome, auth_source: context.authSource });
  console.log('gate_rejected', {
    outcome,
    authSource: context.authSource,
    tenantId: context.tenantId,
    planId: context.plan.planId
  });
}

function throwIfCancelled(signal: AbortSignal): void {
  if (signal.aborted) {
    throw new AppError(499, 'REQUEST_CANCELLED', 'Request was cancelled before it completed.');
  }
}
