import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  const match = LOG_LEVELS.find((level) => level === envLevel);
  if (match) {
    return match;
  }
  // Keep vitest output readable unless a level is asked for explicitly.
  return process.env['VITEST'] === 'true' ? 'silent' : 'info';
}

export const logger = pino({
  name: 'ideaweaver',
  level: getLogLevel(),
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
