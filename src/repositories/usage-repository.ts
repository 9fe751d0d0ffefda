export interface UsageRecord {
  tenantId: string;
  periodStart: string;
  periodEnd: string;
  /** Committed requests; never decreases. */
  count: number;
  /** Live holds: admitted requests whose outcome is not yet known. */
  reserved: number;
  updatedAt: Date;
}

/** One admitted request, held against a period until committed, released or expired. */
export interface UsageHold {
  holdId: string;
  tenantId: string;
  periodStart: string;
}

export interface ReserveUsageInput extends UsageHold {
  periodEnd: string;
  /** Null admits unconditionally. */
  limit: number | null;
  now: Date;
  expiresAt: Date;
}

export type ReserveUsageResult =
  | { reserved: true; record: UsageRecord }
  | { reserved: false; record: UsageRecord };

export interface UsageRepository {
  /**
   * Creates the period record when missing, drops holds that expired at or
   * before `now`, then takes one hold if `count + reserved` is still below the
   * limit. Reclaim, check and increment happen as a single step.
   */
  tryReserve(input: ReserveUsageInput): Promise<ReserveUsageResult>;
  /**
   * Converts the hold into a committed request. Returns null, counting
   * nothing, when the hold is unknown: already settled or reclaimed.
   */
  commitReservation(hold: UsageHold): Promise<UsageRecord | null>;
  /** Drops the hold without counting it. Null when the hold is unknown. */
  releaseReservation(hold: UsageHold): Promise<UsageRecord | null>;
  findUsage(tenantId: string, periodStart: string): Promise<UsageRecord | null>;
  /** Most recent periods first. */
  listUsage(tenantId: string, limit: number): Promise<UsageRecord[]>;
}
