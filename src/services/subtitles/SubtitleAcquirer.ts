/**
 * SubtitleAcquirer
 *
 * Fills one gap: searches providers for one video and one language, writes
 * the best match to the scratch directory and hands it to the uploader.
 *
 * Outcomes:
 * - saved:         written to scratch (uploaded or not); counts as acquired.
 *                  The scratch copy is removed once uploaded and kept otherwise.
 * - no-result:     no provider had a match
 * - empty-content: a match arrived without a payload; not counted
 * - not-a-video:   the search collaborator rejected the file
 * - save-failed:   the scratch write failed; not counted
 */

import fs from 'fs-extra';
import path from 'path';
import type { Logger } from 'winston';
import {
  AcquisitionOutcome,
  AcquisitionTarget,
  Language,
  LanguagePreference,
  SubtitleSearcher,
  SubtitleUploader,
} from '../../types/subtitles.js';
import { createErrorLogContext, getErrorMessage } from '../../utils/errorHandling.js';
import { getSidecarPath } from './sidecar.js';

export interface SubtitleAcquirerOptions {
  /** Scratch directory for downloaded files */
  tempPath: string;
  subtitleExtension: string;
  /** Library root, used to express upload destinations relative to it */
  libraryRoot: string;
}

export class SubtitleAcquirer {
  private readonly providersByLanguage: Map<string, string[] | null>;

  constructor(
    private readonly searcher: SubtitleSearcher,
    private readonly uploader: SubtitleUploader,
    preferences: LanguagePreference[],
    private readonly options: SubtitleAcquirerOptions,
    private readonly logger: Logger
  ) {
    this.providersByLanguage = new Map(
      preferences.map(preference => [preference.language.alpha3, preference.providers])
    );
  }

  async acquire(target: AcquisitionTarget, language: Language): Promise<AcquisitionOutcome> {
    this.logger.info(`Searching ${language.alpha3} subtitles for file: ${target.originalPath}`);

    // Absent or null preference means every registered provider
    const providers = this.providersByLanguage.get(language.alpha3) ?? null;
    const outcome = await this.searcher.search(
      { path: target.canonicalPath, originalPath: target.originalPath, descriptor: target.descriptor },
      [language],
      providers
    );

    if (outcome.kind === 'not-a-video') {
      this.logger.info('Not a video file. Moving on...', { reason: outcome.reason });
      return { kind: 'not-a-video', reason: outcome.reason };
    }

    const match = outcome.matches.get(language.alpha3) ?? null;
    if (!match) {
      this.logger.info('No subtitles were found. Moving on...');
      return { kind: 'no-result' };
    }

    this.logger.info('Subtitles found! Saving files...', {
      provider: match.providerId,
      release: match.releaseName,
    });

    if (!match.content || match.content.length === 0) {
      this.logger.debug(`Skipping subtitle from ${match.providerId}: no content`);
      return { kind: 'empty-content', providerId: match.providerId };
    }

    const libraryPath = getSidecarPath(target.canonicalPath, language, this.options.subtitleExtension);
    const scratchPath = path.join(this.options.tempPath, path.basename(libraryPath));

    this.logger.info(`Saving ${match.providerId} subtitles to: ${scratchPath}`);
    try {
      await fs.outputFile(scratchPath, match.content);
    } catch (error) {
      this.logger.error(`Failed to save subtitles in path: ${scratchPath}`, {
        error: getErrorMessage(error),
      });
      return { kind: 'save-failed', path: scratchPath, error: getErrorMessage(error) };
    }

    const uploaded = await this.upload(scratchPath, libraryPath);
    if (uploaded) {
      await this.removeScratch(scratchPath);
    }
    return { kind: 'saved', path: scratchPath, uploaded };
  }

  private async removeScratch(scratchPath: string): Promise<void> {
    try {
      await fs.remove(scratchPath);
    } catch (error) {
      this.logger.warn(`Could not remove scratch file: ${scratchPath}`, createErrorLogContext(error));
    }
  }

  /**
   * Upload failures are logged and reported as `false`; the acquisition still counts.
   */
  private async upload(scratchPath: string, libraryPath: string): Promise<boolean> {
    this.logger.info(`Uploading ${scratchPath}`, { uploader: this.uploader.name });
    try {
      await this.uploader.upload({
        localPath: scratchPath,
        libraryPath,
        relativePath: path.relative(this.options.libraryRoot, libraryPath),
      });
      return true;
    } catch (error) {
      this.logger.error(
        `Failed to upload file: ${scratchPath}`,
        createErrorLogContext(error, { libraryPath })
      );
      return false;
    }
  }
}
