import { Hono } from 'hono';
import { cors } from 'hono/cors';
import type { AppContext } from './context.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createProfileRoutes } from './routes/profiles.js';
import { createSettingsRoutes } from './routes/settings.js';
import { createEventRoutes, getEventRouteStats } from './routes/events.js';
import { getJobMetrics } from './lib/job-metrics.js';
import { captureError } from './lib/sentry.js';
import logger from './lib/logger.js';
import { STATE_KEY } from './storage/object-store.js';

export interface AppRuntime {
  isShuttingDown(): boolean;
  isStateLoaded(): boolean;
}

const HEALTH_CHECK_CACHE_TTL_MS = 5_000;
const OPERATIONAL_PATHS = new Set(['/health', '/ready', '/metrics']);

export function createApp(ctx: AppContext, runtime: AppRuntime) {
  const app = new Hono();
  const isProduction = ctx.config.nodeEnv === 'production';
  const startTime = Date.now();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (runtime.isShuttingDown() && !OPERATIONAL_PATHS.has(c.req.path)) {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
    const forwardedProto = c.req.header('x-forwarded-proto')?.split(',')[0]?.trim().toLowerCase();
    const requestIsHttps = forwardedProto === 'https' || new URL(c.req.url).protocol === 'https:';
    if (isProduction && requestIsHttps) {
      c.header('Strict-Transport-Security', 'max-age=63072000; includeSubDomains; preload');
    }
  });

  app.use('*', cors({ origin: ctx.config.allowedOrigins }));

  let cachedStorageCheck: { checkedAt: number; storageOk: boolean } | null = null;

  async function checkStorage(now = Date.now()) {
    if (cachedStorageCheck && now - cachedStorageCheck.checkedAt < HEALTH_CHECK_CACHE_TTL_MS) {
      return { ...cachedStorageCheck, cached: true };
    }
    let storageOk = false;
    try {
      await ctx.store.exists(STATE_KEY);
      storageOk = true;
    } catch (err) {
      logger.warn({ err }, 'Storage health check failed');
    }
    cachedStorageCheck = { checkedAt: now, storageOk };
    return { ...cachedStorageCheck, cached: false };
  }

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: runtime.isShuttingDown() ? 'draining' : 'ok',
      shutting_down: runtime.isShuttingDown(),
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/ready', async (c) => {
    c.header('Cache-Control', 'no-store');
    const storage = await checkStorage();
    const stateLoaded = runtime.isStateLoaded();
    const ready = !runtime.isShuttingDown() && stateLoaded && storage.storageOk;
    return c.json({
      ready,
      shutting_down: runtime.isShuttingDown(),
      state_loaded: stateLoaded,
      storage_ok: storage.storageOk,
      cached: storage.cached,
      checked_at: new Date(storage.checkedAt).toISOString(),
      timestamp: new Date().toISOString(),
    }, ready ? 200 : 503);
  });

  app.get('/metrics', (c) => {
    c.header('Cache-Control', 'no-store');
    const memUsage = process.memoryUsage();
    return c.json({
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      shutting_down: runtime.isShuttingDown(),
      profiles: ctx.manager.listProfiles().length,
      controllers: ctx.manager.controllerStatus(),
      jobs: getJobMetrics(),
      persistence: ctx.manager.persistenceStats(),
      events: getEventRouteStats(),
      memory: {
        rss_mb: Math.round(memUsage.rss / 1024 / 1024),
        heap_used_mb: Math.round(memUsage.heapUsed / 1024 / 1024),
        heap_total_mb: Math.round(memUsage.heapTotal / 1024 / 1024),
      },
      node_version: process.version,
    });
  });

  app.route('/api/profiles', createProfileRoutes(ctx));
  app.route('/api/settings', createSettingsRoutes(ctx));
  app.route('/api/events', createEventRoutes(ctx));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    captureError(err, { path: c.req.path, method: c.req.method, requestId });
    c.get('log').error({ err }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
