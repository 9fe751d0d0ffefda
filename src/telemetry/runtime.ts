import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { ConsoleMetricExporter, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { ConsoleSpanExporter } from '@opentelemetry/sdk-trace-base';

import type { Env } from '../config/env.js';

export interface TelemetryRuntime {
  enabled: boolean;
  shutdown(): Promise<void>;
}

const disabledRuntime: TelemetryRuntime = {
  enabled: false,
  shutdown: () => Promise.resolve()
};

export async function startTelemetry(env: Env): Promise<TelemetryRuntime> {
  if (!env.OTEL_ENABLED || env.NODE_ENV === 'test') {
    return disabledRuntime;
  }

  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);

  const sdk = new NodeSDK({
    serviceName: env.OTEL_SERVICE_NAME,
    traceExporter: new ConsoleSpanExporter(),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new ConsoleMetricExporter(),
      exportIntervalMillis: env.OTEL_METRIC_EXPORT_INTERVAL_MS
    }),
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-fs': { enabled: false }
      })
    ]
  });

  await Promise.resolve(sdk.start());
  console.log('telemetry_started', { serviceName: env.OTEL_SERVICE_NAME });

  return {
    enabled: true,
    shutdown: () => sdk.shutdown()
  };
}
