/**
 * SubtitleMonitor
 *
 * One run over the newest entries of the original-names log:
 *
 *   original path -> canonical library path -> missing sidecars -> acquire
 *
 * Entries, and the languages of one entry, are handled strictly in order.
 * Modelled per-item failures are outcomes and never stop the run; anything
 * else is logged as critical and re-thrown to the caller.
 */

import type { Logger } from 'winston';
import { LogWindowReader } from '../history/LogWindowReader.js';
import { MediaPathReconstructor } from '../media/MediaPathReconstructor.js';
import { SubtitleCache } from '../providers/SubtitleCache.js';
import { SubtitleGapDetector } from './SubtitleGapDetector.js';
import { SubtitleAcquirer } from './SubtitleAcquirer.js';
import { ResultAggregator } from './ResultAggregator.js';
import { ConfigurationError } from '../../errors/index.js';
import { createErrorLogContext } from '../../utils/errorHandling.js';
import { isDirectory, isFile } from '../../utils/fsChecks.js';
import { Language, LanguageCount } from '../../types/subtitles.js';

export interface SubtitleMonitorOptions {
  originalNamesLog: string;
  /** null = every entry in the log */
  resultsLimit: number | null;
  libraryRoot: string;
  /** Configured languages, in gap-filling order */
  languages: Language[];
}

export interface SubtitleMonitorDependencies {
  reader: LogWindowReader;
  reconstructor: MediaPathReconstructor;
  gapDetector: SubtitleGapDetector;
  acquirer: SubtitleAcquirer;
  cache?: SubtitleCache;
}

export interface MonitorSummary {
  /** Entries read from the log window */
  entries: number;
  /** Canonical videos found in the library */
  checked: number;
  results: LanguageCount[];
}

export class SubtitleMonitor {
  constructor(
    private readonly deps: SubtitleMonitorDependencies,
    private readonly options: SubtitleMonitorOptions,
    private readonly logger: Logger
  ) {}

  async run(): Promise<MonitorSummary> {
    this.logger.info('Subtitles Monitor started!');
    await this.verifyPaths();

    try {
      const aggregator = new ResultAggregator();

      if (this.deps.cache) {
        this.logger.debug('Setting subtitles cache...');
        await this.deps.cache.load();
      }

      this.logger.info('Going over the original names file...');
      const entries = await this.deps.reader.readWindow(
        this.options.originalNamesLog,
        this.options.resultsLimit
      );
      this.logger.info(`Searching for subtitles for the ${entries.length} newest videos...`);

      let checked = 0;
      for (const originalPath of entries) {
        if (await this.processEntry(originalPath, aggregator)) {
          checked++;
        }
      }

      const results = aggregator.summarize();
      this.logger.info(`All done! The results are: ${aggregator.format()}`, { entries: entries.length, checked });
      return { entries: entries.length, checked, results };
    } catch (error) {
      this.logger.error('Critical exception occurred!', createErrorLogContext(error));
      throw error;
    } finally {
      await this.flushCache();
    }
  }

  /**
   * Returns true when the canonical video existed and was checked
   */
  private async processEntry(originalPath: string, aggregator: ResultAggregator): Promise<boolean> {
    const reconstruction = await this.deps.reconstructor.reconstruct(originalPath);
    if (reconstruction.status === 'unusable') {
      this.logger.warn(`Couldn't work out the library path for: ${originalPath}`, {
        reason: reconstruction.reason,
      });
      return false;
    }

    const { canonicalPath, descriptor } = reconstruction;
    if (!(await isFile(canonicalPath))) {
      this.logger.info(`Couldn't find: ${canonicalPath}`);
      return false;
    }

    this.logger.info(`Checking subtitles for: ${canonicalPath}`);
    const missing = await this.deps.gapDetector.findGaps(canonicalPath, this.options.languages);

    for (const language of missing) {
      const outcome = await this.deps.acquirer.acquire(
        { originalPath, canonicalPath, descriptor },
        language
      );
      if (outcome.kind === 'saved') {
        aggregator.record(language.alpha3);
      }
    }
    return true;
  }

  private async verifyPaths(): Promise<void> {
    if (!(await isFile(this.options.originalNamesLog))) {
      throw new ConfigurationError(
        'history.originalNamesLog',
        `Couldn't read original names file (${this.options.originalNamesLog})! Stopping...`
      );
    }
    if (!(await isDirectory(this.options.libraryRoot))) {
      throw new ConfigurationError(
        'library.rootPath',
        "Couldn't find media root directory! Stopping..."
      );
    }
  }

  /**
   * Cache write failures are logged as warnings; the run's results stand
   */
  private async flushCache(): Promise<void> {
    if (!this.deps.cache) {
      return;
    }
    try {
      await this.deps.cache.flush();
    } catch (error) {
      this.logger.warn('Could not persist the provider cache', createErrorLogContext(error));
    }
  }
}
