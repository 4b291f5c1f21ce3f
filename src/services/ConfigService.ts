import type { EnvironmentRecord, LogLevel, RuntimeConfig } from '../types';
import { isLogLevel, Logger } from './Logger';

const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_ENVIRONMENT = 'development';

/**
 * Configuration service for runtime settings (log level, environment name)
 */
export class ConfigService {
  private readonly env: EnvironmentRecord;
  private cachedConfig?: RuntimeConfig;

  constructor(env: EnvironmentRecord = process.env) {
    this.env = env;
  }

  getConfig(): RuntimeConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const rawLevel = (this.env['LOG_LEVEL'] ?? '').trim().toLowerCase();
    this.cachedConfig = {
      environment: this.env['ENVIRONMENT'] || this.env['NODE_ENV'] || DEFAULT_ENVIRONMENT,
      logLevel: isLogLevel(rawLevel) ? rawLevel : DEFAULT_LOG_LEVEL,
    };
    return this.cachedConfig;
  }

  /**
   * Variables available to `${VAR}` substitution in connection profiles
   */
  getEnvironment(): EnvironmentRecord {
    return this.env;
  }

  createLogger(service: string): Logger {
    const { environment, logLevel } = this.getConfig();
    return new Logger({ service, environment }, { level: logLevel });
  }
}
