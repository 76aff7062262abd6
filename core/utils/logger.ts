import winston from 'winston';
import { loggingConfig, type LoggedService } from '@core/config/logging';

/**
 * The subset of the winston logger the evaluation pipeline relies on.
 * Components accept this so tests can pass a spy.
 */
export interface ILogger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export interface ILoggerFactory {
  createServiceLogger(serviceName: LoggedService): winston.Logger;
}

// Add colors to Winston
winston.addColors(loggingConfig.colors);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    let msg = `${String(timestamp)} [${level}]${service ? ` [${String(service)}]` : ''} ${String(message)}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

/**
 * Explicit LOG_LEVEL wins, then test mode, then EVALCONF_DEBUG, then the
 * level configured for the service.
 */
function getServiceLogLevel(serviceName: LoggedService): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.EVALCONF_DEBUG === 'true') {
    return 'debug';
  }

  return loggingConfig.services[serviceName].level;
}

/**
 * Factory service for creating Winston loggers
 */
export class LoggerFactory implements ILoggerFactory {
  /**
   * Create a service-specific logger
   */
  createServiceLogger(serviceName: LoggedService): winston.Logger {
    const level = getServiceLogLevel(serviceName);
    const quiet = process.env.NODE_ENV === 'test' && !process.env.TEST_LOG_LEVEL;

    return winston.createLogger({
      level,
      levels: loggingConfig.levels,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      // winston warns about a logger without transports, so tests get a silent one
      transports: [
        new winston.transports.Console({
          format: consoleFormat,
          level,
          silent: quiet,
          stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']
        })
      ]
    });
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggedService): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

export const artifactsLogger = createServiceLogger('artifacts');
export const classpathLogger = createServiceLogger('classpath');
export const wrapperLogger = createServiceLogger('wrapper');
export const compilerLogger = createServiceLogger('compiler');
export const loaderLogger = createServiceLogger('loader');
export const evaluatorLogger = createServiceLogger('evaluator');
export const configLogger = createServiceLogger('config');
