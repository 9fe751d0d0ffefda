import type { TenantContext } from '../auth/tenant-context.js';

export const CHART_TYPES = ['auto', 'line', 'bar', 'scatter', 'pie'] as const;

export type ChartType = (typeof CHART_TYPES)[number];

export interface CreateChartInput {
  data: string;
  chartType: ChartType;
  title: string | null;
}

export interface ChartRecord {
  id: string;
  tenantId: string | null;
  chartType: ChartType;
  title: string | null;
  data: string;
  createdAt: Date;
}

/**
 * The chart pipeline behind the gate. Implementations should stop work when
 * the signal aborts; the gate will not bill a cancelled request either way.
 */
export interface ChartService {
  createChart(input: CreateChartInput, context: TenantContext, signal: AbortSignal): Promise<ChartRecord>;
  getChart(chartId: string): Promise<ChartRecord | null>;
}
