/**
 * OpenSubtitles Provider
 *
 * Adapts OpenSubtitlesClient to the SubtitleProvider contract: builds the
 * search query from the media descriptor and turns a candidate into bytes
 * through the two-step download (link request, then file fetch).
 */

import type { Logger } from 'winston';
import { SubtitleProvider } from '../SubtitleProvider.js';
import {
  OPENSUBTITLES_PROVIDER_ID,
  OpenSubtitlesClient,
  OpenSubtitlesSearchParams,
} from './OpenSubtitlesClient.js';
import { Language, SubtitleCandidate, SubtitleVideo } from '../../../types/subtitles.js';
import { ValidationError } from '../../../errors/index.js';

export class OpenSubtitlesProvider implements SubtitleProvider {
  readonly id = OPENSUBTITLES_PROVIDER_ID;

  constructor(
    private readonly client: OpenSubtitlesClient,
    private readonly logger: Logger
  ) {}

  async listSubtitles(video: SubtitleVideo, language: Language): Promise<SubtitleCandidate[]> {
    const params = this.buildSearchParams(video, language);
    const results = await this.client.searchSubtitles(params);

    const candidates: SubtitleCandidate[] = [];
    for (const result of results) {
      const { attributes } = result;
      // The API may answer with regional variants ("pt-BR") or other languages
      if (attributes.language?.toLowerCase() !== language.alpha2) {
        continue;
      }
      const file = attributes.files[0];
      if (!file) {
        continue;
      }
      candidates.push({
        providerId: this.id,
        fileId: String(file.file_id),
        language,
        ...(attributes.release && { releaseName: attributes.release }),
      });
    }

    this.logger.debug('OpenSubtitles candidates', {
      video: video.path,
      language: language.alpha3,
      results: results.length,
      candidates: candidates.length,
    });
    return candidates;
  }

  async downloadContent(candidate: SubtitleCandidate): Promise<Buffer | null> {
    const fileId = Number(candidate.fileId);
    if (!Number.isInteger(fileId)) {
      throw new ValidationError(`Invalid OpenSubtitles file id: ${candidate.fileId}`, {
        service: 'OpenSubtitlesProvider',
        operation: 'downloadContent',
      });
    }

    const download = await this.client.requestDownload(fileId);
    const content = await this.client.fetchFile(download.link);
    return content.length > 0 ? content : null;
  }

  private buildSearchParams(video: SubtitleVideo, language: Language): OpenSubtitlesSearchParams {
    const { descriptor } = video;
    if (descriptor.kind === 'episode') {
      return {
        query: descriptor.title,
        languages: language.alpha2,
        type: 'episode',
        season_number: descriptor.season,
        episode_number: descriptor.episode,
      };
    }
    return {
      query: descriptor.title,
      languages: language.alpha2,
      type: 'movie',
      ...(descriptor.year !== undefined && { year: descriptor.year }),
    };
  }
}
