import { config } from 'winston';

export const loggingConfig = {
  // Log levels in order of increasing verbosity
  levels: config.npm.levels,

  // Color scheme for different log levels
  colors: config.npm.colors,

  // File configuration (only used when BRL_CHECK_LOG_FILE is set)
  files: {
    maxSize: 5242880, // 5MB
    maxFiles: 5,
    tailable: true
  },

  // Format configuration
  format: {
    timestamp: 'YYYY-MM-DD HH:mm:ss',
    colorize: true
  },

  // Service-specific settings
  services: {
    cli: {
      level: 'warn'
    },
    config: {
      level: 'warn'
    },
    parser: {
      level: 'warn'
    },
    interpreter: {
      level: 'warn'
    },
    verifier: {
      level: 'warn'
    }
  }
} as const;

export type LoggerServiceName = keyof typeof loggingConfig.services;
