import type {
  ReserveUsageInput,
  ReserveUsageResult,
  UsageHold,
  UsageRecord,
  UsageRepository
} from './usage-repository.js';

interface StoredUsage {
  record: UsageRecord;
  /** Hold id to lease expiry, epoch ms. */
  holds: Map<string, number>;
}

function snapshot(stored: StoredUsage): UsageRecord {
  return {
    ...stored.record,
    reserved: stored.holds.size,
    updatedAt: new Date(stored.record.updatedAt)
  };
}

function recordKey(tenantId: string, periodStart: string): string {
  return `${tenantId}:${periodStart}`;
}

export class InMemoryUsageRepository implements UsageRepository {
  private readonly usageByKey = new Map<string, StoredUsage>();

  public tryReserve(input: ReserveUsageInput): Promise<ReserveUsageResult> {
    const key = recordKey(input.tenantId, input.periodStart);
    let stored = this.usageByKey.get(key);
    if (stored === undefined) {
      stored = {
        record: {
          tenantId: input.tenantId,
          periodStart: input.periodStart,
          periodEnd: input.periodEnd,
          count: 0,
          reserved: 0,
          updatedAt: new Date()
        },
        holds: new Map()
      };
      this.usageByKey.set(key, stored);
    }

    const now = input.now.getTime();
    for (const [holdId, expiresAt] of stored.holds) {
      if (expiresAt <= now) {
        stored.holds.delete(holdId);
      }
    }

    if (input.limit !== null && stored.record.count + stored.holds.size >= input.limit) {
      return Promise.resolve({ reserved: false, record: snapshot(stored) });
    }

    stored.holds.set(input.holdId, input.expiresAt.getTime());
    stored.record.updatedAt = new Date();
    return Promise.resolve({ reserved: true, record: snapshot(stored) });
  }

  public commitReservation(hold: UsageHold): Promise<UsageRecord | null> {
    const stored = this.usageByKey.get(recordKey(hold.tenantId, hold.periodStart));
    if (stored === undefined || !stored.holds.delete(hold.holdId)) {
      return Promise.resolve(null);
    }

    stored.record.count += 1;
    stored.record.updatedAt = new Date();
    return Promise.resolve(snapshot(stored));
  }

  public releaseReservation(hold: UsageHold): Promise<UsageRecord | null> {
    const stored = this.usageByKey.get(recordKey(hold.tenantId, hold.periodStart));
    if (stored === undefined || !stored.holds.delete(hold.holdId)) {
      return Promise.resolve(null);
    }

    stored.record.updatedAt = new Date();
    return Promise.resolve(snapshot(stored));
  }

  public findUsage(tenantId: string, periodStart: string): Promise<UsageRecord | null> {
    const stored = this.usageByKey.get(recordKey(tenantId, periodStart));
    return Promise.resolve(stored === undefined ? null : snapshot(stored));
  }

  public listUsage(tenantId: string, limit: number): Promise<UsageRecord[]> {
    const records = Array.from(this.usageByKey.values())
      .filter((stored) => stored.record.tenantId === tenantId)
      .sort((left, right) => right.record.periodStart.localeCompare(left.record.periodStart))
      .slice(0, limit)
      .map(snapshot);

    return Promise.resolve(records);
  }

  /** Seeds a period record directly, replacing any existing one and its holds. */
  public seedUsage(record: Omit<UsageRecord, 'updatedAt' | 'reserved'>): void {
    this.usageByKey.set(recordKey(record.tenantId, record.periodStart), {
      record: {
        ...record,
        reserved: 0,
        updatedAt: new Date()
      },
      holds: new Map()
    });
  }
}
