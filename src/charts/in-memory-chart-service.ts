import { randomUUID } from 'node:crypto';

import type { TenantContext } from '../auth/tenant-context.js';
import { AppError } from '../errors/app-error.js';
import type { ChartRecord, ChartService, CreateChartInput } from './chart-service.js';

function cloneChart(record: ChartRecord): ChartRecord {
  return {
    ...record,
    createdAt: new Date(record.createdAt)
  };
}

export interface InMemoryChartServiceOptions {
  ttlHours?: number;
  now?: () => Date;
}

const DEFAULT_TTL_HOURS = 24;

/**
 * Stores accepted chart requests as-is; rendering happens elsewhere. Records
 * expire `ttlHours` after creation: every save purges expired records and
 * reads never return one.
 */
export class InMemoryChartService implements ChartService {
  private readonly chartsById = new Map<string, ChartRecord>();

  private readonly ttlMs: number;

  private readonly now: () => Date;

  public constructor(options: InMemoryChartServiceOptions = {}) {
    this.ttlMs = (options.ttlHours ?? DEFAULT_TTL_HOURS) * 3_600_000;
    this.now = options.now ?? (() => new Date());
  }

  public createChart(input: CreateChartInput, context: TenantContext, signal: AbortSignal): Promise<ChartRecord> {
    if (signal.aborted) {
      return Promise.reject(new AppError(499, 'REQUEST_CANCELLED', 'Request was cancelled before it completed.'));
    }

    const data = input.data.trim();
    if (data.length === 0) {
      return Promise.reject(new AppError(400, 'CHART_INPUT_INVALID', "Provide 'data' with at least one row."));
    }

    const createdAt = this.now();
    this.purgeExpired(createdAt);

    const record: ChartRecord = {
      id: randomUUID().replaceAll('-', ''),
      tenantId: context.tenantId,
      chartType: input.chartType,
      title: input.title,
      data,
      createdAt
    };

    this.chartsById.set(record.id, record);
    return Promise.resolve(cloneChart(record));
  }

  public getChart(chartId: string): Promise<ChartRecord | null> {
    const record = this.chartsById.get(chartId);
    if (record === undefined) {
      return Promise.resolve(null);
    }

    if (this.isExpired(record, this.now())) {
      this.chartsById.delete(chartId);
      return Promise.resolve(null);
    }

    return Promise.resolve(cloneChart(record));
  }

  public get storedCharts(): number {
    return this.chartsById.size;
  }

  private isExpired(record: ChartRecord, now: Date): boolean {
    return now.getTime() - record.createdAt.getTime() >= this.ttlMs;
  }

  private purgeExpired(now: Date): void {
    for (const [chartId, record] of this.chartsById) {
      if (this.isExpired(record, now)) {
        this.chartsById.delete(chartId);
      }
    }
  }
}
