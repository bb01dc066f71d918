import dotenv from 'dotenv';
import type { AppConfig, ScanConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = this.loadConfig();
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    config.env = this.getEnum('NODE_ENV', config.env, ['development', 'production', 'test']);

    // Logging configuration
    config.logging.level = this.getEnum('LOG_LEVEL', config.logging.level, [
      'error',
      'warn',
      'info',
      'debug',
    ]);
    config.logging.file.enabled = this.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
    config.logging.file.path = this.getString('LOG_FILE_PATH', config.logging.file.path);
    config.logging.console.enabled = this.getBoolean(
      'LOG_CONSOLE_ENABLED',
      config.logging.console.enabled
    );

    // Scan configuration
    config.scan.concurrency = this.getNumber('SCAN_CONCURRENCY', config.scan.concurrency);
    config.scan.organizationFolder = this.getString(
      'SCAN_ORGANIZATION_FOLDER',
      config.scan.organizationFolder
    );
    config.scan.cacheFileName = this.getString('SCAN_CACHE_FILE', config.scan.cacheFileName);
    config.scan.scratchDir = this.getString('SCAN_SCRATCH_DIR', config.scan.scratchDir);
    config.scan.constrainedMountPatterns = this.getStringArray(
      'SCAN_CONSTRAINED_MOUNT_PATTERNS',
      config.scan.constrainedMountPatterns
    );
    config.scan.maxStringScanBytes = this.getNumber(
      'SCAN_MAX_STRING_BYTES',
      config.scan.maxStringScanBytes
    );
    config.scan.conflictMaxAttempts = this.getNumber(
      'SCAN_CONFLICT_MAX_ATTEMPTS',
      config.scan.conflictMaxAttempts
    );
    config.scan.heuristicsFile = process.env.HEURISTICS_FILE || undefined;

    return config;
  }

  private getString(key: string, defaultValue: string): string {
    return process.env[key] || defaultValue;
  }

  private getNumber(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
      throw new ConfigurationError(key, `Environment variable ${key} must be a valid number`);
    }
    return parsed;
  }

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getStringArray(key: string, defaultValue: string[]): string[] {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    return value
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = process.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getScanConfig(): ScanConfig {
    return this.config.scan;
  }

  reload(): void {
    dotenv.config();
    this.config = this.loadConfig();
  }

  validate(): void {
    const errors: string[] = [];

    if (this.config.scan.concurrency < 1) {
      errors.push('SCAN_CONCURRENCY must be at least 1');
    }
    if (this.config.scan.maxStringScanBytes < 16) {
      errors.push('SCAN_MAX_STRING_BYTES must be at least 16');
    }
    if (this.config.scan.conflictMaxAttempts < 1) {
      errors.push('SCAN_CONFLICT_MAX_ATTEMPTS must be at least 1');
    }
    if (!this.config.scan.organizationFolder.trim()) {
      errors.push('SCAN_ORGANIZATION_FOLDER must not be empty');
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        'scan',
        `Configuration validation failed:\n${errors.join('\n')}`
      );
    }
  }
}
