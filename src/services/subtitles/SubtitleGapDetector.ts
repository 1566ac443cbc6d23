import type { Logger } from 'winston';
import { Language } from '../../types/subtitles.js';
import { isFile } from '../../utils/fsChecks.js';
import { getSidecarPath } from './sidecar.js';

/**
 * Finds the configured languages that have no sidecar subtitle next to a video.
 * Filesystem only; providers are never consulted here.
 */
export class SubtitleGapDetector {
  constructor(
    private readonly subtitleExtension: string,
    private readonly logger: Logger
  ) {}

  /**
   * @returns missing languages, in configured order
   */
  async findGaps(canonicalVideoPath: string, languages: Language[]): Promise<Language[]> {
    const gaps: Language[] = [];

    for (const language of languages) {
      const sidecarPath = getSidecarPath(canonicalVideoPath, language, this.subtitleExtension);
      if (!(await isFile(sidecarPath))) {
        gaps.push(language);
      }
    }

    this.logger.debug('Subtitle gaps detected', {
      videoPath: canonicalVideoPath,
      missing: gaps.map(language => language.alpha3),
    });

    return gaps;
  }
}
