import dotenv from 'dotenv';
import { AppConfig, LoggingConfig, RenamerConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private readonly config: AppConfig;

  private constructor(private readonly env: NodeJS.ProcessEnv) {
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      dotenv.config();
      ConfigManager.instance = new ConfigManager(process.env);
    }
    return ConfigManager.instance;
  }

  /**
   * Build a manager over an explicit environment (tests, embedding)
   */
  static fromEnv(env: NodeJS.ProcessEnv): ConfigManager {
    return new ConfigManager(env);
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.file.maxSize = this.getNumber('LOG_FILE_MAX_SIZE', config.logging.file.maxSize);
    config.logging.file.maxFiles = this.getNumber('LOG_FILE_MAX_FILES', config.logging.file.maxFiles);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );
    config.logging.console.colorize = this.getBoolean(
      'LOG_CONSOLE_COLORIZE',
      config.logging.console.colorize
    );

    // Renamer configuration
    config.renamer.dryRun = this.getBoolean('RENAMER_DRY_RUN', config.renamer.dryRun);
    config.renamer.registryFile = this.env.RENAMER_REGISTRY_FILE || undefined;
    config.renamer.ignorePatterns = this.getStringArray(
      'RENAMER_IGNORE_PATTERNS',
      config.renamer.ignorePatterns
    );

    return config;
  }

  private getString(key: string, defaultValue?: string): string {
    const value = this.env[key];
    if (value) {
      return value;
    }
    if (defaultValue === undefined) {
      throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
    }
    return defaultValue;
  }

  private getNumber(key: string, defaultValue?: number): number {
    const value = this.env[key];
    if (!value) {
      if (defaultValue === undefined) {
        throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
      }
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue?: boolean): boolean {
    const value = this.env[key];
    if (!value) {
      if (defaultValue === undefined) {
        throw new ConfigurationError(key, `Required environment variable ${key} is not set`);
      }
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getStringArray(key: string, defaultValue?: string[]): string[] {
    const value = this.env[key];
    if (!value) {
      return defaultValue || [];
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const matched = validValues.find(valid => valid === value);
    if (matched === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return matched;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  getRenamerConfig(): RenamerConfig {
    return this.config.renamer;
  }
}
