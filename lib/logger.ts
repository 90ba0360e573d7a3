import pino, { type Logger } from 'pino';
import { CONFIG } from './config';

export type { Logger };

export function createLogger(level: string): Logger {
  return pino({
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: 'subdomain-scout',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export const logger: Logger = createLogger(CONFIG.logLevel);

// Child logger factory for modules
export function createModuleLogger(module: string): Logger {
  return logger.child({ module });
}

export default logger;
