import { serve } from '@hono/node-server';
import { SessionPool } from './browser/pool.js';
import { createChromiumLauncher } from './browser/playwright.js';
import { buildCarrierRegistry, loadCarrierProfiles } from './carriers/index.js';
import { loadConfig, loadEnvFile } from './config.js';
import { describeError } from './errors.js';
import { createLogger } from './logger.js';
import { SERVICE_NAME, createApp } from './server.js';
import { TrackingService } from './tracking.js';

async function main(): Promise<void> {
  const config = loadConfig(loadEnvFile());
  const log = createLogger({ level: config.logLevel, format: config.logFormat }, { service: SERVICE_NAME });

  const profiles = await loadCarrierProfiles(config.carrierProfilesPath, {
    defaultCarrierUrl: config.carrierUrl,
  });
  const registry = buildCarrierRegistry(profiles, { resultTimeoutMs: config.resultTimeoutMs });

  const pool = new SessionPool({
    maxSessions: config.maxSessions,
    queueTimeoutMs: config.queueTimeoutMs,
    launch: createChromiumLauncher(config.browser, log),
    logger: log,
  });

  const service = new TrackingService({
    registry,
    pool,
    logger: log,
    attempts: config.scrapeAttempts,
    retryDelayMs: config.retryDelayMs,
    header: config.resultHeader,
  });

  const app = createApp({
    service,
    registry,
    pool,
    logger: log,
    retryAfterSeconds: Math.max(1, Math.ceil(config.queueTimeoutMs / 1000)),
  });

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
    log.info(`${SERVICE_NAME} running on http://${config.host}:${info.port}`, {
      carriers: registry.list(),
      maxSessions: config.maxSessions,
    });
  });

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info('Shutting down', { signal });

    server.close((err) => {
      if (err) log.error('HTTP server close failed', err);
    });
    pool
      .close()
      .then(() => {
        log.info('All browser sessions released');
        process.exit(0);
      })
      .catch((err: unknown) => {
        log.error('Session pool shutdown failed', err);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${describeError(err)}`);
  process.exit(1);
});
