import { CheckError, ErrorSeverity } from '@core/errors/CheckError';

/**
 * Thrown when a configuration file exists but cannot be used.
 */
export class ConfigurationError extends CheckError {
  public readonly configPath: string;

  constructor(message: string, configPath: string, cause?: unknown) {
    super(`Invalid configuration in ${configPath}: ${message}`, {
      code: 'CONFIG_ERROR',
      severity: ErrorSeverity.Fatal,
      details: { configPath },
      sourceLocation: { filePath: configPath },
      cause
    });
    this.name = 'ConfigurationError';
    this.configPath = configPath;
  }
}
