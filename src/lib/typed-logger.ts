import { logger } from './logger';

type LogData = Record<string, unknown>;

/**
 * Message-first logger wrapper: `typedLogger.warn('message', { context })`
 * instead of pino's object-first call order.
 */
export const typedLogger = {
  info: (message: string, data?: LogData) => {
    if (data) {
      logger.info(data, message);
    } else {
      logger.info(message);
    }
  },

  error: (message: string, data?: LogData) => {
    if (data) {
      logger.error(data, message);
    } else {
      logger.error(message);
    }
  },

  warn: (message: string, data?: LogData) => {
    if (data) {
      logger.warn(data, message);
    } else {
      logger.warn(message);
    }
  },

  debug: (message: string, data?: LogData) => {
    if (data) {
      logger.debug(data, message);
    } else {
      logger.debug(message);
    }
  },

};

export default typedLogger;
