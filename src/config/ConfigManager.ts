import dotenv from 'dotenv';
import { z } from 'zod';
import { AppConfig, LanguageProviderMap, UploadMode } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/index.js';
import { findLanguage } from '../utils/languages.js';

type Environment = Record<string, string | undefined>;

export interface ConfigManagerOptions {
  /** Variables to read instead of process.env */
  env?: Environment;
  /** Load a .env file into process.env first (defaults to true when env is not given) */
  loadDotenv?: boolean;
}

const languageProviderMapSchema = z.record(
  z.string().length(2),
  z.array(z.string().min(1)).nullable()
);

export class ConfigManager {
  private readonly env: Environment;
  private readonly config: AppConfig;

  constructor(options: ConfigManagerOptions = {}) {
    if (options.loadDotenv ?? options.env === undefined) {
      dotenv.config();
    }
    this.env = options.env ?? process.env;
    this.config = this.loadConfig();
  }

  private loadConfig(): AppConfig {
    const config: AppConfig = structuredClone(defaultConfig);

    // Library layout
    config.library.rootPath = this.getString('MEDIA_ROOT_PATH', config.library.rootPath);
    config.library.moviesPath = this.getString('CLOUD_MOVIE_PATH', config.library.moviesPath);
    config.library.tvPath = this.getString('CLOUD_TV_PATH', config.library.tvPath);

    // History window
    config.history.originalNamesLog = this.getString(
      'ORIGINAL_NAMES_LOG',
      config.history.originalNamesLog
    );
    const limit = this.getNumber('RESULTS_LIMIT', config.history.resultsLimit ?? 0);
    if (limit < 0) {
      throw new ConfigurationError('RESULTS_LIMIT', 'RESULTS_LIMIT must be zero (no limit) or positive');
    }
    config.history.resultsLimit = limit === 0 ? null : limit;

    // Subtitles
    config.subtitles.languages = this.getLanguageMap('SUBTITLE_LANGUAGES', config.subtitles.languages);
    config.subtitles.tempPath = this.getString('SUBTITLES_TEMP_PATH', config.subtitles.tempPath);
    config.subtitles.showAliasesPath = this.env.SHOW_ALIASES_PATH || undefined;

    // External tools
    config.guessit.binary = this.getString('GUESSIT_BINARY', config.guessit.binary);

    // Providers (API key optional)
    config.providers.opensubtitles.apiKey = this.env.OPENSUBTITLES_API_KEY || undefined;
    config.providers.opensubtitles.baseUrl = this.getString(
      'OPENSUBTITLES_BASE_URL',
      config.providers.opensubtitles.baseUrl
    );
    config.providers.opensubtitles.userAgent = this.getString(
      'OPENSUBTITLES_USER_AGENT',
      config.providers.opensubtitles.userAgent
    );

    // Provider cache
    config.cache.directory = this.getString('CACHE_DIR', config.cache.directory);
    config.cache.expirationDays = this.getNumber('CACHE_EXPIRATION_DAYS', config.cache.expirationDays);

    // Upload
    config.upload.mode = this.getEnum<UploadMode>('UPLOAD_MODE', config.upload.mode, ['library', 'rclone']);
    config.upload.rcloneBinary = this.getString('RCLONE_BINARY', config.upload.rcloneBinary);
    config.upload.remote = this.getString('RCLONE_REMOTE', config.upload.remote);
    config.upload.remotePath = this.env.RCLONE_REMOTE_PATH ?? config.upload.remotePath;

    // Drive migration
    config.migration.odrivePython = this.getString('ODRIVE_PYTHON', config.migration.odrivePython);
    config.migration.odriveScript = this.getString('ODRIVE_SCRIPT', config.migration.odriveScript);
    config.migration.rcloneBinary = config.upload.rcloneBinary;
    config.migration.remote = config.upload.remote;
    config.migration.acdPrefix = this.getString('ACD_PREFIX', config.migration.acdPrefix);
    config.migration.logName = this.getString('MIGRATION_LOG_NAME', config.migration.logName);

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

  private getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  private getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(key, `Environment variable ${key} must be one of: ${validValues.join(', ')}`);
    }
    return match;
  }

  /**
   * Parse a JSON object such as {"he":["opensubtitles"],"en":null}
   */
  private getLanguageMap(key: string, defaultValue: LanguageProviderMap): LanguageProviderMap {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(value);
    } catch {
      throw new ConfigurationError(key, `Environment variable ${key} must be a JSON object`);
    }

    const parsed = languageProviderMapSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new ConfigurationError(key, `Environment variable ${key} is invalid: ${issues.join('; ')}`);
    }
    return parsed.data;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  /**
   * Validate cross-field rules.
   * Throws on errors, returns non-fatal warnings for the caller to log.
   */
  validate(): string[] {
    const errors: string[] = [];
    const warnings: string[] = [];

    const languageCodes = Object.keys(this.config.subtitles.languages);
    if (languageCodes.length === 0) {
      errors.push('At least one subtitle language must be configured');
    }
    for (const code of languageCodes) {
      if (!findLanguage(code)) {
        errors.push(`Unknown subtitle language code: ${code}`);
      }
    }

    if (!this.config.subtitles.extension.startsWith('.')) {
      errors.push('Subtitle extension must start with a dot');
    }

    if (this.config.upload.mode === 'rclone' && !this.config.upload.remote) {
      errors.push('RCLONE_REMOTE is required when UPLOAD_MODE is rclone');
    }

    if (!this.config.providers.opensubtitles.apiKey) {
      warnings.push('OpenSubtitles API key not provided - OpenSubtitles provider will be disabled');
    }

    if (errors.length > 0) {
      throw new ConfigurationError(
        'validation',
        `Configuration validation failed:\n${errors.join('\n')}`
      );
    }

    return warnings;
  }
}
