import type { Pool, PoolClient } from 'pg';

import type {
  ReserveUsageInput,
  ReserveUsageResult,
  UsageHold,
  UsageRecord,
  UsageRepository
} from './usage-repository.js';

interface UsageRecordRow {
  tenant_id: string;
  period_start: string;
  period_end: string;
  count: number;
  reserved: number;
  updated_at: Date;
}

// DATE columns are read back as text so no local-time conversion happens.
const USAGE_COLUMNS = `
  tenant_id,
  period_start::TEXT AS period_start,
  period_end::TEXT AS period_end,
  count,
  reserved,
  updated_at
`;

function mapUsageRecord(row: UsageRecordRow): UsageRecord {
  return {
    tenantId: row.tenant_id,
    periodStart: row.period_start,
    periodEnd: row.period_end,
    count: row.count,
    reserved: row.reserved,
    updatedAt: row.updated_at
  };
}

function getSingleRow<T>(rows: T[]): T | null {
  const [row] = rows;
  return row ?? null;
}

async function withTransaction<T>(pool: Pool, callback: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

// Every write takes the period row lock before touching usage_holds, so
// reservations for one (tenant, period) serialize and never deadlock.
async function lockUsageRecord(client: PoolClient, tenantId: string, periodStart: string): Promise<boolean> {
  const result = await client.query(
    `
    SELECT 1
    FROM usage_records
    WHERE tenant_id = $1
      AND period_start = $2::date
    FOR UPDATE
    `,
    [tenantId, periodStart]
  );

  return (result.rowCount ?? 0) > 0;
}

async function settleHold(
  client: PoolClient,
  hold: UsageHold,
  countIncrement: 0 | 1
): Promise<UsageRecord | null> {
  if (!(await lockUsageRecord(client, hold.tenantId, hold.periodStart))) {
    return null;
  }

  const deleted = await client.query(
    'DELETE FROM usage_holds WHERE id = $1 AND tenant_id = $2 AND period_start = $3::date',
    [hold.holdId, hold.tenantId, hold.periodStart]
  );
  if ((deleted.rowCount ?? 0) === 0) {
    return null;
  }

  const result = await client.query<UsageRecordRow>(
    `
    UPDATE usage_records
    SET count = count + $3,
        reserved = GREATEST(reserved - 1, 0),
        updated_at = NOW()
    WHERE tenant_id = $1
      AND period_start = $2::date
    RETURNING ${USAGE_COLUMNS}
    `,
    [hold.tenantId, hold.periodStart, countIncrement]
  );

  const row = getSingleRow(result.rows);
  return row === null ? null : mapUsageRecord(row);
}

export class PostgresUsageRepository implements UsageRepository {
  public constructor(private readonly pool: Pool) {}

  public async tryReserve(input: ReserveUsageInput): Promise<ReserveUsageResult> {
    await this.pool.query(
      `
      INSERT INTO usage_records (
        tenant_id,
        period_start,
        period_end,
        count,
        reserved,
        updated_at
      )
      VALUES ($1, $2::date, $3::date, 0, 0, NOW())
      ON CONFLICT (tenant_id, period_start) DO NOTHING
      `,
      [input.tenantId, input.periodStart, input.periodEnd]
    );

    return withTransaction(this.pool, async (client) => {
      if (!(await lockUsageRecord(client, input.tenantId, input.periodStart))) {
        throw new Error('Usage record disappeared during reservation.');
      }

      await client.query(
        `
        DELETE FROM usage_holds
        WHERE tenant_id = $1
          AND period_start = $2::date
          AND expires_at <= $3
        `,
        [input.tenantId, input.periodStart, input.now]
      );

      const current = await client.query<UsageRecordRow>(
        `
        UPDATE usage_records AS records
        SET reserved = (
              SELECT COUNT(*)::INTEGER
              FROM usage_holds AS holds
              WHERE holds.tenant_id = records.tenant_id
                AND holds.period_start = records.period_start
            ),
            updated_at = NOW()
        WHERE records.tenant_id = $1
          AND records.period_start = $2::date
        RETURNING ${USAGE_COLUMNS}
        `,
        [input.tenantId, input.periodStart]
      );

      const currentRow = getSingleRow(current.rows);
      if (currentRow === null) {
        throw new Error('Usage record disappeared during reservation.');
      }

      if (input.limit !== null && currentRow.count + currentRow.reserved >= input.limit) {
        return { reserved: false, record: mapUsageRecord(currentRow) };
      }

      await client.query(
        `
        INSERT INTO usage_holds (id, tenant_id, period_start, expires_at)
        VALUES ($1, $2, $3::date, $4)
        `,
        [input.holdId, input.tenantId, input.periodStart, input.expiresAt]
      );

      const reserved = await client.query<UsageRecordRow>(
        `
        UPDATE usage_records
        SET reserved = reserved + 1,
            updated_at = NOW()
        WHERE tenant_id = $1
          AND period_start = $2::date
        RETURNING ${USAGE_COLUMNS}
        `,
        [input.tenantId, input.periodStart]
      );

      const reservedRow = getSingleRow(reserved.rows);
      if (reservedRow === null) {
        throw new Error('Usage record disappeared during reservation.');
      }

      return { reserved: true, record: mapUsageRecord(reservedRow) };
    });
  }

  public async commitReservation(hold: UsageHold): Promise<UsageRecord | null> {
    return withTransaction(this.pool, (client) => settleHold(client, hold, 1));
  }

  public async releaseReservation(hold: UsageHold): Promise<UsageRecord | null> {
    return withTransaction(this.pool, (client) => settleHold(client, hold, 0));
  }

  public async findUsage(tenantId: string, periodStart: string): Promise<UsageRecord | null> {
    const result = await this.pool.query<UsageRecordRow>(
      `
      SELECT ${USAGE_COLUMNS}
      FROM usage_records
      WHERE tenant_id = $1
        AND period_start = $2::date
      LIMIT 1
      `,
      [tenantId, periodStart]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapUsageRecord(row);
  }

  public async listUsage(tenantId: string, limit: number): Promise<UsageRecord[]> {
    const result = await this.pool.query<UsageRecordRow>(
      `
      SELECT ${USAGE_COLUMNS}
      FROM usage_records
      WHERE tenant_id = $1
      ORDER BY period_start DESC
      LIMIT $2
      `,
      [tenantId, limit]
    );

    return result.rows.map(mapUsageRecord);
  }
}
