import dotenv from 'dotenv';
import { FtxClientConfig } from '../types';
import { LOG_LEVELS, LogLevel, isLogLevel } from '../utils';
import { DEFAULT_FTX_ENDPOINT } from '../exchanges/ftx/ftx-auth';

export interface EnvironmentConfig {
  ftx: Required<Pick<FtxClientConfig, 'endpoint' | 'apiKey' | 'apiSecret'>> &
    Pick<FtxClientConfig, 'subaccountName'>;
  logLevel: LogLevel;
}

export class EnvironmentValidator {
  private static validateRequired(key: string, value: string | undefined): string {
    if (!value || value.trim() === '') {
      throw new Error(`Required environment variable ${key} is missing or empty`);
    }
    return value.trim();
  }

  private static validateOptional(value: string | undefined): string | undefined {
    return value && value.trim() !== '' ? value.trim() : undefined;
  }

  /**
   * Read FTX settings from an environment map
   *
   * @throws Error when a required variable is missing or LOG_LEVEL is not a known level
   */
  static validate(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
    const logLevel = env.LOG_LEVEL || 'info';
    if (!isLogLevel(logLevel)) {
      throw new Error(`Invalid LOG_LEVEL: ${logLevel}. Must be one of: ${LOG_LEVELS.join(', ')}`);
    }

    return {
      ftx: {
        endpoint: this.validateOptional(env.FTX_API_ENDPOINT) ?? DEFAULT_FTX_ENDPOINT,
        apiKey: this.validateRequired('FTX_API_KEY', env.FTX_API_KEY),
        apiSecret: this.validateRequired('FTX_API_SECRET', env.FTX_API_SECRET),
        subaccountName: this.validateOptional(env.FTX_SUBACCOUNT),
      },
      logLevel,
    };
  }
}

/**
 * Load .env into process.env and validate it
 */
export function loadEnvironment(): EnvironmentConfig {
  dotenv.config();
  return EnvironmentValidator.validate(process.env);
}
