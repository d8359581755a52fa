import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';

export type { Logger };

export interface CreateLoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const pinoOptions: LoggerOptions = {
    level: options.level ?? 'info',
    base: {
      service: 'morphir-extension-host',
    },
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}

/** Process-wide fallback for callers that do not pass a logger. */
export const defaultLogger: Logger = createLogger({
  level: process.env.MORPHIR_EXT_LOG_LEVEL ?? 'info',
});

const GUEST_LEVELS = new Set(['debug', 'info', 'warn', 'error']);

/** Route a guest `log` host call onto the matching pino level. */
export function logGuestMessage(logger: Logger, level: string, message: string): void {
  const normalized = level.toLowerCase();
  switch (GUEST_LEVELS.has(normalized) ? normalized : 'info') {
    case 'debug':
      logger.debug(message);
      break;
    case 'warn':
      logger.warn(message);
      break;
    case 'error':
      logger.error(message);
      break;
    default:
      logger.info(message);
  }
}
