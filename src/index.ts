import 'dotenv/config';

import { getEnv } from './config/env.js';
import { createApp } from './app.js';
import { startTelemetry } from './telemetry/runtime.js';

async function main(): Promise<void> {
  const env = getEnv();
  const telemetry = await startTelemetry(env);

  const runtime = createApp();
  const { gateConfig } = runtime;

  const server = runtime.app.listen(runtime.env.PORT, () => {
    console.log('server_started', {
      port: runtime.env.PORT,
      staticKeys: gateConfig.staticKeys.length,
      devMode: gateConfig.staticKeys.length === 0,
      defaultRateLimit: gateConfig.defaultRateLimit.spec
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) {
      return;
    }

    shuttingDown = true;
    console.log('server_stopping', { signal });
    server.close(() => {
      runtime
        .close()
        .then(() => telemetry.shutdown())
        .then(() => {
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('shutdown_failed', { error: error instanceof Error ? error.message : String(error) });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  console.error('startup_failed', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
