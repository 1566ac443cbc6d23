import path from 'path';
import { ConfigManager } from './config/ConfigManager.js';
import { AppConfig } from './config/types.js';
import { ConfigurationError } from './errors/index.js';
import { closeLogger, createLogger, type LogTransport, type Logger } from './logging/logger.js';
import { LogWindowReader } from './services/history/LogWindowReader.js';
import { GuessitGuesser } from './services/media/GuessitGuesser.js';
import { MediaPathReconstructor } from './services/media/MediaPathReconstructor.js';
import { ShowNameFormatter } from './services/media/ShowNameFormatter.js';
import { DriveMigrationService, MigrationOutcome } from './services/migration/DriveMigrationService.js';
import { OpenSubtitlesClient } from './services/providers/opensubtitles/OpenSubtitlesClient.js';
import { OpenSubtitlesProvider } from './services/providers/opensubtitles/OpenSubtitlesProvider.js';
import { SubtitleCache } from './services/providers/SubtitleCache.js';
import { SubtitleProvider } from './services/providers/SubtitleProvider.js';
import { SubtitleProviderRegistry } from './services/providers/SubtitleProviderRegistry.js';
import { SubtitleSearchService } from './services/providers/SubtitleSearchService.js';
import { SubtitleAcquirer } from './services/subtitles/SubtitleAcquirer.js';
import { SubtitleGapDetector } from './services/subtitles/SubtitleGapDetector.js';
import { MonitorSummary, SubtitleMonitor } from './services/subtitles/SubtitleMonitor.js';
import { createUploader } from './services/upload/index.js';
import { MediaGuesser } from './types/media.js';
import { LanguagePreference, SubtitleUploader } from './types/subtitles.js';
import { createErrorLogContext } from './utils/errorHandling.js';
import { findLanguage } from './utils/languages.js';
import { CommandRunner } from './utils/processRunner.js';

export const MONITOR_LOG_NAME = 'subtitles-monitor';

export interface AppOptions {
  configManager?: ConfigManager;
  /** Extra log transports (tests capture output through these) */
  transports?: LogTransport[];
  /** Runs guessit, rclone and odrive */
  runner?: CommandRunner;
  guesser?: MediaGuesser;
  /** Replaces the providers built from configuration */
  providers?: SubtitleProvider[];
  uploader?: SubtitleUploader;
}

export interface MonitorRunOptions {
  /** Overrides RESULTS_LIMIT; 0 or null = whole log */
  limit?: number | null;
}

export type MigrationRunResult = { kind: 'usage' } | MigrationOutcome;

/**
 * Composition root. Every run gets its own context (logger, cache,
 * services); nothing is shared through module state.
 */
export class App {
  private readonly config: AppConfig;
  private readonly warnings: string[];
  private readonly loggers: Logger[] = [];

  constructor(private readonly options: AppOptions = {}) {
    const configManager = options.configManager ?? new ConfigManager();
    this.warnings = configManager.validate();
    this.config = configManager.getConfig();
  }

  getConfig(): AppConfig {
    return this.config;
  }

  async runMonitor(runOptions: MonitorRunOptions = {}): Promise<MonitorSummary> {
    const logger = this.createLogger(MONITOR_LOG_NAME);
    for (const warning of this.warnings) {
      logger.warn(warning);
    }

    try {
      const monitor = await this.buildMonitor(logger, runOptions);
      return await monitor.run();
    } catch (error) {
      // Loop failures were already logged as critical by the monitor
      if (error instanceof ConfigurationError) {
        logger.error(error.message, createErrorLogContext(error));
      }
      throw error;
    }
  }

  /**
   * `migrate` takes exactly one path
   */
  async runMigration(paths: string[]): Promise<MigrationRunResult> {
    const [inputPath] = paths;
    if (paths.length !== 1 || inputPath === undefined) {
      return { kind: 'usage' };
    }

    const { logName, ...migration } = this.config.migration;
    const logger = this.createLogger(logName);
    const service = new DriveMigrationService(
      { ...migration, ...(this.options.runner && { runner: this.options.runner }) },
      logger
    );
    return service.migrate(inputPath);
  }

  /**
   * Flush and close every logger opened by this App
   */
  async close(): Promise<void> {
    await Promise.all(this.loggers.splice(0).map(logger => closeLogger(logger)));
  }

  private createLogger(name: string): Logger {
    const logger = createLogger(this.config.logging, {
      name,
      ...(this.options.transports && { transports: this.options.transports }),
    });
    this.loggers.push(logger);
    return logger;
  }

  private async buildMonitor(logger: Logger, runOptions: MonitorRunOptions): Promise<SubtitleMonitor> {
    const { library, history, subtitles } = this.config;
    const preferences = this.resolvePreferences();

    const cache = new SubtitleCache(
      { directory: this.config.cache.directory, expirationDays: this.config.cache.expirationDays },
      logger
    );

    const registry = new SubtitleProviderRegistry(logger);
    for (const provider of this.options.providers ?? this.buildProviders(cache, logger)) {
      registry.register(provider);
    }

    const guesser =
      this.options.guesser ??
      new GuessitGuesser(logger, {
        binary: this.config.guessit.binary,
        timeoutMs: this.config.guessit.timeoutMs,
        ...(this.options.runner && { runner: this.options.runner }),
      });
    const showNames = await ShowNameFormatter.fromFile(subtitles.showAliasesPath, logger);

    const uploader = this.options.uploader ?? createUploader(this.config.upload, logger, this.options.runner);
    const acquirer = new SubtitleAcquirer(
      new SubtitleSearchService(registry, logger),
      uploader,
      preferences,
      {
        tempPath: path.resolve(subtitles.tempPath),
        subtitleExtension: subtitles.extension,
        libraryRoot: library.rootPath,
      },
      logger
    );

    const limit = runOptions.limit !== undefined ? runOptions.limit : history.resultsLimit;
    return new SubtitleMonitor(
      {
        reader: new LogWindowReader(logger),
        reconstructor: new MediaPathReconstructor(guesser, showNames, library, logger),
        gapDetector: new SubtitleGapDetector(subtitles.extension, logger),
        acquirer,
        cache,
      },
      {
        originalNamesLog: history.originalNamesLog,
        resultsLimit: limit && limit > 0 ? limit : null,
        libraryRoot: library.rootPath,
        languages: preferences.map(preference => preference.language),
      },
      logger
    );
  }

  private buildProviders(cache: SubtitleCache, logger: Logger): SubtitleProvider[] {
    const { opensubtitles } = this.config.providers;
    if (!opensubtitles.apiKey) {
      return [];
    }
    const client = new OpenSubtitlesClient(
      {
        apiKey: opensubtitles.apiKey,
        baseUrl: opensubtitles.baseUrl,
        userAgent: opensubtitles.userAgent,
        timeoutMs: opensubtitles.timeoutMs,
        cache,
      },
      logger
    );
    return [new OpenSubtitlesProvider(client, logger)];
  }

  private resolvePreferences(): LanguagePreference[] {
    return Object.entries(this.config.subtitles.languages).map(([code, providers]) => {
      const language = findLanguage(code);
      if (!language) {
        throw new ConfigurationError('SUBTITLE_LANGUAGES', `Unknown subtitle language code: ${code}`);
      }
      return { language, providers };
    });
  }
}
