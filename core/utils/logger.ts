import winston from 'winston';
import { loggingConfig, type LoggerServiceName } from '@core/config/logging';

// Add colors to Winston
winston.addColors(loggingConfig.colors);

const allLevels = Object.keys(loggingConfig.levels);

// Create formatters
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.colorize({ all: loggingConfig.format.colorize }),
  winston.format.printf(({ level, message, timestamp, service, ...metadata }) => {
    // Concise output unless debug mode is on
    if (process.env.BRL_CHECK_DEBUG !== 'true') {
      return `${level}: ${message}`;
    }

    let msg = `${timestamp} [${level}]${service ? ` [${service}]` : ''} ${message}`;
    if (Object.keys(metadata).length > 0) {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }
    return msg;
  })
);

const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: loggingConfig.format.timestamp }),
  winston.format.json()
);

/**
 * Resolve the effective level for a service from the environment.
 */
function resolveLevel(fallback: string): string {
  // Explicit LOG_LEVEL takes precedence
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }

  // During tests, respect TEST_LOG_LEVEL or default to error for minimal output
  if (process.env.NODE_ENV === 'test') {
    return process.env.TEST_LOG_LEVEL || 'error';
  }

  if (process.env.BRL_CHECK_DEBUG === 'true') {
    return 'debug';
  }

  return fallback;
}

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [];

  // Console transport (but not during silent test)
  if (process.env.NODE_ENV !== 'test' || process.env.TEST_LOG_LEVEL) {
    transports.push(new winston.transports.Console({
      format: consoleFormat,
      // Harness output owns stdout
      stderrLevels: allLevels
    }));
  }

  const logFile = process.env.BRL_CHECK_LOG_FILE;
  if (logFile) {
    transports.push(new winston.transports.File({
      filename: logFile,
      format: fileFormat,
      maxsize: loggingConfig.files.maxSize,
      maxFiles: loggingConfig.files.maxFiles,
      tailable: loggingConfig.files.tailable
    }));
  }

  return transports;
}

const serviceLoggers = new Map<LoggerServiceName, winston.Logger>();

/**
 * Factory for service-specific Winston loggers
 */
export class LoggerFactory {
  /**
   * Create (or return the cached) logger for a service
   */
  createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
    const existing = serviceLoggers.get(serviceName);
    if (existing) {
      return existing;
    }

    const transports = createTransports();
    const logger = winston.createLogger({
      level: resolveLevel(loggingConfig.services[serviceName].level),
      levels: loggingConfig.levels,
      defaultMeta: { service: serviceName },
      transports,
      // winston complains when writing with no transports
      silent: transports.length === 0
    });

    serviceLoggers.set(serviceName, logger);
    return logger;
  }
}

export const loggerFactory = new LoggerFactory();

export function createServiceLogger(serviceName: LoggerServiceName): winston.Logger {
  return loggerFactory.createServiceLogger(serviceName);
}

/**
 * Change the level of every service logger and its transports.
 * An explicit LOG_LEVEL in the environment still wins.
 */
export function setLogLevel(level: string): void {
  const effective = process.env.LOG_LEVEL || level;
  for (const logger of serviceLoggers.values()) {
    logger.level = effective;
    logger.transports.forEach(transport => {
      transport.level = effective;
    });
  }
}

// Create service loggers
export const cliLogger = createServiceLogger('cli');
export const configLogger = createServiceLogger('config');
export const parserLogger = createServiceLogger('parser');
export const interpreterLogger = createServiceLogger('interpreter');
export const verifierLogger = createServiceLogger('verifier');

export const logger = cliLogger;

export default logger;
