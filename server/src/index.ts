import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { createAppContext } from './context.js';
import type { AppContext } from './context.js';
import { loadConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';

const DRAIN_BUDGET_MS = 60_000;
const FORCE_EXIT_MS = 90_000;

let server: ReturnType<typeof serve> | null = null;
let shuttingDown = false;
let stateLoaded = false;

function shutdown(ctx: AppContext, signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal, controllers: ctx.manager.controllerStatus() }, 'Graceful shutdown initiated');

  // In-flight jobs finish and their results are persisted before exit
  const drained = ctx.manager.settle().then(
    () => logger.info('Pipelines drained and snapshot flushed'),
    (err: unknown) => logger.warn({ err }, 'Drain failed during shutdown'),
  );

  server.close(() => {
    Promise.race([
      drained,
      new Promise((resolve) => setTimeout(resolve, DRAIN_BUDGET_MS).unref()),
    ])
      .then(() => ctx.manager.flush())
      .then(() => flushSentry(2000))
      .catch((err: unknown) => {
        logger.warn({ err }, 'Shutdown flush tasks failed');
      })
      .finally(() => {
        logger.info('HTTP server closed');
        process.exit(0);
      });
  });

  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, FORCE_EXIT_MS).unref();
}

export async function startServer() {
  if (server) return server;

  initSentry();
  const config = loadConfig();
  const ctx = createAppContext(config);
  const app = createApp(ctx, {
    isShuttingDown: () => shuttingDown,
    isStateLoaded: () => stateLoaded,
  });

  logger.info({ port: config.port, storage: config.storage.driver }, 'Certificate desk server starting');
  await ctx.manager.load();
  stateLoaded = true;

  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown(ctx, 'SIGTERM'));
  process.on('SIGINT', () => shutdown(ctx, 'SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown(ctx, 'UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    captureError(err, { source: 'uncaughtException' });
    logger.error({ err }, 'Uncaught exception');
    shutdown(ctx, 'UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer().catch((err: unknown) => {
    logger.fatal({ err }, 'Server failed to start');
    process.exit(1);
  });
}
