import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Falls back to `info` for unset or unknown values. */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? '';
  return isLogLevel(normalized) ? normalized : 'info';
}

export const logger = pino({
  name: 'cognisync',
  level: resolveLogLevel(process.env['LOG_LEVEL']),
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ['apiKey', '*.apiKey', 'headers.authorization'],
    censor: '[redacted]',
  },
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

/** One child per module; the component name shows up on every line it writes. */
export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
