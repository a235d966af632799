/**
 * Application Entry Point
 *
 * Starts the Express HTTP server and the staging sweeper in a single process.
 *
 * Startup:
 * 1. Log environment configuration
 * 2. Prepare the staging directory and sweep anything already expired
 * 3. Start the periodic sweeper
 * 4. Start Express server on configured port
 *
 * Shutdown (SIGTERM/SIGINT):
 * 1. Stop the sweeper
 * 2. Stop accepting new HTTP connections, let in-flight requests finish
 * 3. Exit process
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import { appConfig } from './config.js';
import { startSweeper } from './staging/sweeper.js';
import { errorMessage } from './transfer/errors.js';
import { buildDependencies, createTempFileStore } from './webhook/dependencies.js';
import { createApp } from './webhook/index.js';

async function main() {
  console.log('[startup] Drive/Airtable bridge starting...');
  console.log('[startup] Environment:', appConfig.isDev ? 'development' : 'production');
  console.log('[startup] Public base URL:', appConfig.server.publicBaseUrl);
  console.log('[startup] Attachment delivery:', appConfig.staging.delivery);

  const store = createTempFileStore();
  await store.init();
  const swept = await store.sweep(Date.now());
  console.log(`[startup] Staging directory ready: ${store.rootDir} (${swept} expired file(s) removed)`);

  const stopSweeper = startSweeper(store, appConfig.staging.sweepIntervalSeconds * 1000);

  const app = createApp(buildDependencies(store));
  const server = app.listen(appConfig.server.port, () => {
    console.log(`[startup] Server listening on port ${appConfig.server.port}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`[shutdown] Received ${signal}, shutting down gracefully...`);
    stopSweeper();

    server.close((err) => {
      if (err) {
        console.error('[shutdown] HTTP server close failed:', err.message);
        process.exit(1);
      }
      console.log('[shutdown] HTTP server closed');
      process.exit(0);
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', errorMessage(err));
  process.exit(1);
});
