import pino from 'pino';
import type { Logger } from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type { Logger };

/**
 * Creates a child logger scoped to a single profile.
 */
export function createProfileLogger(
  profileId: string | null,
  extra?: Record<string, unknown>,
) {
  return logger.child({ profileId, ...extra });
}

export default logger;
