import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import type { AppContext } from '../context.js';
import type { ManagerEvent } from '../manager/events.js';

const HEARTBEAT_MS = 10_000;

let totalConnections = 0;
let replacedConnections = 0;

export function getEventRouteStats() {
  return { total_sse_connections: totalConnections, replaced_sse_connections: replacedConnections };
}

/**
 * GET /events: the one live view of profile state.
 *
 * The manager keeps a single subscriber, so opening a stream takes over from
 * any stream already open; the older one is closed.
 */
export function createEventRoutes(ctx: AppContext) {
  const events = new Hono();
  let closeCurrent: (() => void) | null = null;

  events.get('/', (c) => {
    const log = c.get('log');
    return streamSSE(c, async (stream) => {
      let closed = false;
      let release: () => void = () => undefined;
      const done = new Promise<void>((resolve) => {
        release = resolve;
      });
      const close = () => {
        if (closed) return;
        closed = true;
        release();
      };

      if (closeCurrent) {
        replacedConnections += 1;
        log.info('Replacing existing event stream');
        closeCurrent();
      }
      closeCurrent = close;
      totalConnections += 1;

      const emit = (event: ManagerEvent) => {
        if (closed) return;
        stream.writeSSE({ event: event.type, data: JSON.stringify(event) }).catch(() => {
          log.warn('SSE write failed — closing event stream');
          close();
        });
      };
      const unsubscribe = ctx.manager.subscribe(emit);
      stream.onAbort(close);

      let heartbeat: NodeJS.Timeout | undefined;
      try {
        await stream.writeSSE({
          event: 'connected',
          data: JSON.stringify({
            type: 'connected',
            profiles: ctx.manager.listProfiles(),
            inference_url: ctx.manager.getInferenceUrl(),
            certificate_config: ctx.manager.getCertificateConfig(),
          }),
        });

        heartbeat = setInterval(() => {
          stream.writeSSE({ event: 'heartbeat', data: '' }).catch(() => {
            log.warn('SSE heartbeat failed — closing event stream');
            close();
          });
        }, HEARTBEAT_MS);
        heartbeat.unref();

        await done;
      } finally {
        clearInterval(heartbeat);
        unsubscribe();
        if (closeCurrent === close) closeCurrent = null;
        totalConnections = Math.max(0, totalConnections - 1);
      }
    });
  });

  return events;
}
