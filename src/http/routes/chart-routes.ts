import type { Request } from 'express';
import { Router } from 'express';
import { z } from 'zod';

import { CHART_TYPES, type ChartRecord, type ChartService } from '../../charts/chart-service.js';
import { AppError } from '../../errors/app-error.js';
import type { Gate } from '../../services/gate.js';
import { abortOnClose, createGateAuthMiddleware, readApiKey } from '../middlewares/credentials.js';

const createChartSchema = z.object({
  data: z.string().min(1).max(1_000_000),
  chartType: z.enum(CHART_TYPES).default('auto'),
  title: z.string().trim().min(1).max(200).optional()
});

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (character) => HTML_ESCAPES[character] ?? character);
}

function embedUrl(request: Request, chartId: string): string {
  return `${request.protocol}://${request.get('host') ?? 'localhost'}/v1/charts/${encodeURIComponent(chartId)}/embed`;
}

function serializeChart(request: Request, chart: ChartRecord) {
  return {
    id: chart.id,
    embedUrl: embedUrl(request, chart.id),
    chartType: chart.chartType,
    title: chart.title,
    createdAt: chart.createdAt.toISOString()
  };
}

function renderEmbed(chart: ChartRecord): string {
  const title = escapeHtml(chart.title ?? 'Chart');
  return [
    '<!doctype html>',
    '<html lang="en">',
    `<head><meta charset="utf-8"><title>${title}</title></head>`,
    `<body><figure class="chart" data-chart-id="${escapeHtml(chart.id)}" data-chart-type="${chart.chartType}">`,
    `<figcaption>${title}</figcaption></figure></body>`,
    '</html>'
  ].join('\n');
}

export function createChartRoutes(gate: Gate, chartService: ChartService): Router {
  const router = Router();
  const authenticate = createGateAuthMiddleware(gate);

  router.post('/', async (request, response, next) => {
    try {
      const signal = abortOnClose(response);

      // Parsed after admission: a bad credential is reported before a bad body.
      const chart = await gate.run(readApiKey(request), (context, handlerSignal) => {
        request.tenantContext = context;
        const payload = createChartSchema.parse(request.body);
        return chartService.createChart(
          {
            data: payload.data,
            chartType: payload.chartType,
            title: payload.title ?? null
          },
          context,
          handlerSignal
        );
      }, { signal });

      response.status(201).json({
        chart: serializeChart(request, chart)
      });
    } catch (error) {
      next(error);
    }
  });

  // Public: embeds are loaded by third-party pages without credentials.
  router.get('/:chartId/embed', async (request, response, next) => {
    try {
      const chart = await chartService.getChart(request.params.chartId);
      if (chart === null) {
        throw new AppError(404, 'CHART_NOT_FOUND', 'Chart not found.');
      }

      response.status(200).type('html').send(renderEmbed(chart));
    } catch (error) {
      next(error);
    }
  });

  router.get<'/:chartId'>('/:chartId', authenticate, async (request, response, next) => {
    try {
      const chart = await chartService.getChart(request.params.chartId);
      const tenantId = request.tenantContext?.tenantId ?? null;
      if (chart === null || (chart.tenantId !== null && chart.tenantId !== tenantId)) {
        throw new AppError(404, 'CHART_NOT_FOUND', 'Chart not found.');
      }

      response.status(200).json({
        chart: serializeChart(request, chart)
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
