import pino, { type Logger } from 'pino';
import type { Config } from './config/index.js';

export function createLogger(logging: Config['logging']): Logger {
  const usePrettyLogs = logging.format === 'pretty' && process.env.NODE_ENV !== 'production';

  const logger = pino({
    name: 'prompt-gateway',
    level: logging.level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (logging.format === 'pretty' && process.env.NODE_ENV === 'production') {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  return logger;
}
