/**
 * Logger module - structured logging, optionally rotated to a file
 */

import pino, { Logger, LoggerOptions } from 'pino';
import * as path from 'path';

const isTest = process.env.NODE_ENV === 'test';
const logDir = process.env.LOG_DIR;

const options: LoggerOptions = {
  level: isTest ? 'silent' : process.env.LOG_LEVEL || 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
};

// File rotation only when a log directory is configured; stdout otherwise
if (logDir && !isTest) {
  options.transport = {
    target: 'pino-roll',
    options: {
      file: path.join(logDir, 'server.log'),
      size: process.env.LOG_MAX_SIZE || '100m',
      frequency: process.env.LOG_FREQUENCY || 'daily',
      limit: { count: parseInt(process.env.LOG_MAX_FILES || '7', 10) },
      mkdir: true,
    },
  };
}

export const logger: Logger = pino(options);

// Child loggers per module
export const createLogger = (name: string): Logger => {
  return logger.child({ module: name });
};

export type { Logger };

export default logger;
