import { performance } from 'node:perf_hooks';

import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { NextFunction, Request, Response } from 'express';

import { recordHttpRequest, type HttpRequestAttributes } from '../../telemetry/metrics.js';

const tracer = trace.getTracer('chart-gate');

function traceIdOf(response: Response): string {
  return typeof response.locals.traceId === 'string' ? response.locals.traceId : 'unknown-trace';
}

// Gate callers carry a tenant context, portal callers an account id.
function callerSource(request: Request): string {
  if (request.tenantContext !== undefined) {
    return request.tenantContext.authSource;
  }

  return request.accountId === undefined ? 'none' : 'account_token';
}

export function attachRequestTelemetry(request: Request, response: Response, next: NextFunction): void {
  const startTime = performance.now();
  const traceId = traceIdOf(response);
  const span = tracer.startSpan(`${request.method} ${request.baseUrl}${request.path}`, {
    attributes: {
      'http.method': request.method,
      'http.trace_id': traceId
    }
  });

  response.on('finish', () => {
    const durationMs = performance.now() - startTime;
    const route = `${request.baseUrl}${typeof request.route?.path === 'string' ? request.route.path : request.path}`;
    const attributes: HttpRequestAttributes = {
      method: request.method,
      route,
      status_code: response.statusCode,
      auth_source: callerSource(request)
    };

    recordHttpRequest(attributes, durationMs);

    span.setAttributes({
      'http.route': route,
      'http.status_code': response.statusCode,
      'chart_gate.auth_source': attributes.auth_source
    });
    span.setStatus({ code: response.statusCode >= 500 ? SpanStatusCode.ERROR : SpanStatusCode.OK });
    span.end();

    console.log('http_request', {
      traceId,
      method: request.method,
      path: request.originalUrl,
      statusCode: response.statusCode,
      durationMs: Number(durationMs.toFixed(2)),
      authSource: attributes.auth_source,
      tenantId: request.tenantContext?.tenantId ?? request.accountId ?? null
    });
  });

  next();
}
