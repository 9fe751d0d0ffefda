import { randomUUID } from 'node:crypto';

import { guardStorage } from '../errors/app-error.js';
import { usagePeriodFor } from '../limits/usage-period.js';
import type { UsageHold, UsageRecord, UsageRepository } from '../repositories/usage-repository.js';

export type QuotaReservation = UsageHold;

export type QuotaDecision =
  | { outcome: 'admitted'; remaining: number | null; reservation: QuotaReservation }
  | { outcome: 'quota_exceeded'; limit: number; used: number; periodEnd: string };

export interface UsageSummary {
  tenantId: string;
  period: string;
  periodStart: string;
  periodEnd: string;
  requestCount: number;
  inFlight: number;
  monthlyQuota: number | null;
  remaining: number | null;
}

export interface UsageHistoryEntry {
  period: string;
  periodStart: string;
  requestCount: number;
}

export interface QuotaTrackerOptions {
  now?: () => Date;
  historyLimit?: number;
  /** How long a hold counts against the quota before the next reservation may reclaim it. */
  holdTtlMs?: number;
}

const DEFAULT_HISTORY_LIMIT = 12;
const DEFAULT_HOLD_TTL_MS = 5 * 60_000;

/**
 * Monthly quota per tenant, in two counters: `count` (committed) and
 * `reserved` (admitted, not yet committed). A request is admitted only while
 * `count + reserved` is below the quota, so concurrent admissions can never
 * commit past it.
 *
 * Each hold is leased. A hold that is neither committed nor released within
 * `holdTtlMs` stops counting and is dropped by the next reservation for the
 * period, so a lost release or a crashed process cannot pin quota.
 */
export class QuotaTracker {
  private readonly now: () => Date;

  private readonly historyLimit: number;

  private readonly holdTtlMs: number;

  public constructor(
    private readonly usageRepository: UsageRepository,
    options: QuotaTrackerOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
    this.holdTtlMs = options.holdTtlMs ?? DEFAULT_HOLD_TTL_MS;
  }

  public async reserve(tenantId: string, monthlyQuota: number | null): Promise<QuotaDecision> {
    const now = this.now();
    const period = usagePeriodFor(now);
    const reservation: QuotaReservation = {
      holdId: randomUUID(),
      tenantId,
      periodStart: period.start
    };
    const result = await guardStorage(() => this.usageRepository.tryReserve({
      ...reservation,
      periodEnd: period.end,
      limit: monthlyQuota,
      now,
      expiresAt: new Date(now.getTime() + this.holdTtlMs)
    }));

    if (!result.reserved) {
      return {
        outcome: 'quota_exceeded',
        limit: monthlyQuota ?? 0,
        used: result.record.count + result.record.reserved,
        periodEnd: period.end
      };
    }

    return {
      outcome: 'admitted',
      remaining: monthlyQuota === null
        ? null
        : Math.max(monthlyQuota - result.record.count - result.record.reserved, 0),
      reservation
    };
  }

  /**
   * Records one completed request against the period the hold was taken in.
   * Resolves false when the hold had already expired and been reclaimed; the
   * request is then not billed.
   */
  public async commit(reservation: QuotaReservation): Promise<boolean> {
    const record = await guardStorage(() => this.usageRepository.commitReservation(reservation));
    return record !== null;
  }

  /** Settling a hold twice is a no-op. */
  public async release(reservation: QuotaReservation): Promise<void> {
    await guardStorage(() => this.usageRepository.releaseReservation(reservation));
  }

  public async getUsage(tenantId: string, monthlyQuota: number | null): Promise<UsageSummary> {
    const period = usagePeriodFor(this.now());
    const record = await guardStorage(() => this.usageRepository.findUsage(tenantId, period.start));
    const requestCount = record?.count ?? 0;
    const inFlight = record?.reserved ?? 0;

    return {
      tenantId,
      period: period.period,
      periodStart: period.start,
      periodEnd: period.end,
      requestCount,
      inFlight,
      monthlyQuota,
      remaining: monthlyQuota === null ? null : Math.max(monthlyQuota - requestCount - inFlight, 0)
    };
  }

  public async listHistory(tenantId: string, limit: number = this.historyLimit): Promise<UsageHistoryEntry[]> {
    const records = await guardStorage(() => this.usageRepository.listUsage(tenantId, limit));
    return records.map(toHistoryEntry);
  }
}

function toHistoryEntry(record: UsageRecord): UsageHistoryEntry {
  return {
    period: record.periodStart.slice(0, 7),
    periodStart: record.periodStart,
    requestCount: record.count
  };
}
