import { pino, type Logger, type LevelWithSilent } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export type UtilLogLevel = LevelWithSilent;

export function isLogLevel(value: string): value is UtilLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env['LOG_LEVEL'] ?? 'info';
const logLevel: UtilLogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export const logger = pino({
  name: 'cable-modem-exporter',
  level: logLevel,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"time":"${new Date().toISOString()}"`,
});

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}

/**
 * Change the root log level at runtime (child loggers follow unless they
 * were given their own level).
 */
export function setLogLevel(level: UtilLogLevel): void {
  logger.level = level;
}
