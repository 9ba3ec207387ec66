import pino, { type Logger } from 'pino';
import type { LoggingConfig } from './config/index.js';

export function createLogger(config: LoggingConfig): Logger {
  const usePrettyLogs = config.format === 'pretty' && process.env.NODE_ENV !== 'production';
  const logger = pino({
    level: config.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (config.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  return logger;
}
