import { describe, expect, it } from 'vitest';

import type { TenantContext } from '../../src/auth/tenant-context.js';
import { InMemoryChartService } from '../../src/charts/in-memory-chart-service.js';
import { captureRejection } from '../helpers/errors.js';
import { createClock } from '../helpers/gate-fixture.js';

const CONTEXT: TenantContext = {
  tenantId: '5f0c1b9e-5a43-4b8e-9d51-0f2f3c3e8a11',
  apiKeyId: null,
  plan: { planId: 'free', rateLimit: null, monthlyQuota: 100 },
  authSource: 'saas_db',
  identity: 'tenant:5f0c1b9e-5a43-4b8e-9d51-0f2f3c3e8a11'
};

function createService(ttlHours = 1) {
  const clock = createClock('2026-03-15T12:00:00.000Z');
  const service = new InMemoryChartService({ ttlHours, now: clock.now });
  return { clock, service };
}

function createChart(service: InMemoryChartService, data = 'x,y\n1,2') {
  return service.createChart({ data, chartType: 'line', title: null }, CONTEXT, new AbortController().signal);
}

describe('InMemoryChartService', () => {
  it('stores the trimmed data with the creation time and tenant', async () => {
    const { service } = createService();

    const chart = await createChart(service, '  x,y\n1,2  ');

    expect(chart).toMatchObject({
      tenantId: CONTEXT.tenantId,
      chartType: 'line',
      title: null,
      data: 'x,y\n1,2',
      createdAt: new Date('2026-03-15T12:00:00.000Z')
    });
    expect(await service.getChart(chart.id)).toEqual(chart);
  });

  it('stops returning a chart once its lifetime has passed', async () => {
    const { clock, service } = createService();
    const chart = await createChart(service);

    clock.advance(3_600_000 - 1);
    expect((await service.getChart(chart.id))?.id).toBe(chart.id);

    clock.advance(1);
    expect(await service.getChart(chart.id)).toBeNull();
    expect(service.storedCharts).toBe(0);
  });

  it('purges expired charts when a new one is saved', async () => {
    const { clock, service } = createService();
    await createChart(service);
    await createChart(service);

    clock.advance(30 * 60_000);
    const recent = await createChart(service);
    expect(service.storedCharts).toBe(3);

    clock.advance(30 * 60_000);
    await createChart(service);

    expect(service.storedCharts).toBe(2);
    expect((await service.getChart(recent.id))?.id).toBe(recent.id);
  });

  it('rejects blank data and cancelled requests', async () => {
    const { service } = createService();
    const controller = new AbortController();
    controller.abort();

    expect(await captureRejection(createChart(service, '   '))).toMatchObject({
      statusCode: 400,
      code: 'CHART_INPUT_INVALID'
    });
    expect(await captureRejection(
      service.createChart({ data: 'x,y\n1,2', chartType: 'auto', title: null }, CONTEXT, controller.signal)
    )).toMatchObject({
      statusCode: 499,
      code: 'REQUEST_CANCELLED'
    });
    expect(service.storedCharts).toBe(0);
  });
});
