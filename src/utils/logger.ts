import { pino, type LoggerOptions, type Logger as PinoLogger } from 'pino';

const isDev = process.env['NODE_ENV'] !== 'production';

// Build options conditionally to satisfy exactOptionalPropertyTypes
const options: LoggerOptions = {
  level: process.env['STRATUM_LOG_LEVEL'] ?? (isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

// Only add transport in dev mode
if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export type Logger = PinoLogger;

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

/**
 * Shorten raw backend text before it goes into a log line.
 */
export function truncateForLog(text: string, maxLength = 2000): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}... [${text.length - maxLength} more chars]`;
}
