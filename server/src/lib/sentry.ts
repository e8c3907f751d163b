import { createRequire } from 'node:module';
import logger from './logger.js';

type SentryEvent = Record<string, unknown>;

type SentryLike = {
  init: (options: {
    dsn: string;
    environment?: string;
    tracesSampleRate?: number;
    beforeSend?: (event: SentryEvent) => SentryEvent | null;
  }) => void;
  withScope: (callback: (scope: { setExtra: (key: string, value: unknown) => void }) => void) => void;
  captureException: (err: unknown) => void;
  flush: (timeoutMs?: number) => Promise<unknown>;
};

const require = createRequire(import.meta.url);
let sentryModule: SentryLike | null | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSentryLike(value: unknown): value is SentryLike {
  return isRecord(value)
    && typeof value.init === 'function'
    && typeof value.withScope === 'function'
    && typeof value.captureException === 'function'
    && typeof value.flush === 'function';
}

// @sentry/node is optional; the service runs without it installed.
function getSentry(): SentryLike | null {
  if (sentryModule !== undefined) return sentryModule;
  try {
    const loaded: unknown = require('@sentry/node');
    sentryModule = isSentryLike(loaded) ? loaded : null;
  } catch {
    sentryModule = null;
  }
  return sentryModule;
}

const SENSITIVE_ENV_KEYS = [
  'SUPABASE_SERVICE_ROLE_KEY',
  'SENTRY_DSN',
];

const SENSITIVE_FIELD_RE = /key|token|secret|authorization|signature/i;

export function scrubEvent(event: SentryEvent): SentryEvent {
  const extra = event.extra;
  if (isRecord(extra)) {
    for (const key of SENSITIVE_ENV_KEYS) {
      if (key in extra) extra[key] = '[REDACTED]';
    }
  }

  // Signed storage URLs carry their token in breadcrumb data
  const breadcrumbs = event.breadcrumbs;
  if (Array.isArray(breadcrumbs)) {
    for (const crumb of breadcrumbs) {
      if (!isRecord(crumb) || !isRecord(crumb.data)) continue;
      for (const key of Object.keys(crumb.data)) {
        if (SENSITIVE_FIELD_RE.test(key)) crumb.data[key] = '[REDACTED]';
      }
    }
  }
  return event;
}

export function initSentry(): void {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.info('SENTRY_DSN not set — Sentry disabled');
    return;
  }
  const Sentry = getSentry();
  if (!Sentry) {
    logger.warn('Sentry requested but @sentry/node is not installed — continuing without Sentry');
    return;
  }

  Sentry.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0.1,
    beforeSend: scrubEvent,
  });

  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  if (!process.env.SENTRY_DSN) return;
  const Sentry = getSentry();
  if (!Sentry) return;

  Sentry.withScope((scope) => {
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        scope.setExtra(key, value);
      }
    }
    Sentry.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!process.env.SENTRY_DSN) return;
  const Sentry = getSentry();
  if (!Sentry) return;
  try {
    await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ err }, 'Sentry flush failed');
  }
}
