/**
 * Subtitle Search Service
 *
 * Finds the best subtitle per language for one video. Providers are asked
 * in registry order; for each language the first candidate that downloads
 * wins. A provider failure (any ApplicationError) is logged and the next
 * provider is tried. Anything else propagates.
 */

import path from 'path';
import type { Logger } from 'winston';
import { SubtitleProviderRegistry } from './SubtitleProviderRegistry.js';
import { SubtitleProvider } from './SubtitleProvider.js';
import { VIDEO_EXTENSIONS } from '../../config/constants.js';
import { ApplicationError } from '../../errors/index.js';
import { createErrorLogContext } from '../../utils/errorHandling.js';
import {
  Language,
  SearchOutcome,
  SubtitleMatch,
  SubtitleSearcher,
  SubtitleVideo,
} from '../../types/subtitles.js';

export class SubtitleSearchService implements SubtitleSearcher {
  constructor(
    private readonly registry: SubtitleProviderRegistry,
    private readonly logger: Logger
  ) {}

  async search(
    video: SubtitleVideo,
    languages: Language[],
    providerSubset: string[] | null
  ): Promise<SearchOutcome> {
    const extension = path.extname(video.path).toLowerCase();
    if (!VIDEO_EXTENSIONS.has(extension)) {
      return {
        kind: 'not-a-video',
        reason: extension ? `unsupported extension ${extension}` : 'no file extension',
      };
    }

    const providers = this.registry.resolve(providerSubset);
    const matches = new Map<string, SubtitleMatch | null>();
    for (const language of languages) {
      matches.set(language.alpha3, await this.findBest(video, language, providers));
    }
    return { kind: 'results', matches };
  }

  private async findBest(
    video: SubtitleVideo,
    language: Language,
    providers: SubtitleProvider[]
  ): Promise<SubtitleMatch | null> {
    for (const provider of providers) {
      const candidates = await this.guard(provider, 'listSubtitles', () =>
        provider.listSubtitles(video, language)
      );
      if (!candidates) {
        continue;
      }

      for (const candidate of candidates) {
        const download = await this.guard(provider, 'downloadContent', async () => ({
          content: await provider.downloadContent(candidate),
        }));
        if (!download) {
          continue;
        }
        return {
          providerId: provider.id,
          language,
          ...(candidate.releaseName !== undefined && { releaseName: candidate.releaseName }),
          content: download.content,
        };
      }
    }
    return null;
  }

  /**
   * Run a provider call; provider-side failures become null
   */
  private async guard<T>(
    provider: SubtitleProvider,
    operation: string,
    call: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await call();
    } catch (error) {
      if (!(error instanceof ApplicationError)) {
        throw error;
      }
      this.logger.warn(
        `Subtitle provider ${provider.id} failed`,
        createErrorLogContext(error, { provider: provider.id, operation })
      );
      return null;
    }
  }
}
