import pino from 'pino';
import { config, isDevelopment } from '@/config';

// Custom log levels
const customLevels = {
  security: 45,
  performance: 25,
};

const pinoConfig: pino.LoggerOptions<keyof typeof customLevels> = {
  level: config.LOG_LEVEL,
  customLevels,
  useOnlyCustomLevels: false,
  formatters: {
    level: (label) => ({ level: label }),
    bindings: (bindings) => ({
      pid: bindings.pid,
      hostname: bindings.hostname,
      service: 'quest-engine',
      version: process.env.npm_package_version || '1.0.0',
    }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      'photo.data',
      'proof.photo.data',
      'token',
      'secret',
      'authorization',
      'req.headers.authorization',
      'req.headers.cookie',
    ],
    censor: '[REDACTED]',
  },
};

const transports: pino.TransportTargetOptions[] = [];

if (isDevelopment) {
  transports.push({
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname,service,version',
      messageFormat: '{service}[{pid}] {msg}',
      errorLikeObjectKeys: ['err', 'error'],
    },
  });
}

export type CustomLogger = pino.Logger<keyof typeof customLevels>;

export const logger: CustomLogger = pino(
  pinoConfig,
  transports.length > 0 ? pino.transport({ targets: transports }) : undefined
);

export const securityLogger: CustomLogger = logger.child({ component: 'security' });
export const gameLogger: CustomLogger = logger.child({ component: 'game' });
export const performanceLogger: CustomLogger = logger.child({ component: 'performance' });

/**
 * Log security events (anti-cheat flags, suspicious completions)
 */
export const logSecurity = (
  event: string,
  severity: 'low' | 'medium' | 'high' | 'critical',
  details: Record<string, unknown> = {}
) => {
  securityLogger.security({
    event,
    severity,
    details,
    timestamp: new Date().toISOString(),
  });
};

/**
 * Log game events
 */
export const logGame = (
  event: string,
  characterId: string,
  details: Record<string, unknown> = {}
) => {
  gameLogger.info({
    event,
    characterId,
    details,
    timestamp: new Date().toISOString(),
  });
};

/**
 * Log performance metrics
 */
export const logPerformance = (
  operation: string,
  duration: number,
  details: Record<string, unknown> = {}
) => {
  performanceLogger.performance({
    operation,
    duration,
    details,
    timestamp: new Date().toISOString(),
  });
};

/**
 * Log errors with context
 */
export const logError = (
  error: Error,
  context: Record<string, unknown> = {}
) => {
  logger.error({
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    context,
    timestamp: new Date().toISOString(),
  });
};

export default logger;
