/**
 * MediaPathReconstructor
 *
 * Rebuilds where a historical (pre-organization) file now lives in the
 * organized library:
 *
 *   Movie:   <root>/<movies>/<Title> (<Year>)/<Title> (<Year>)<ext>
 *   Episode: <root>/<tv>/<Show>/Season <SS>/<Show> - S<SS>E<EE><ext>
 *
 * The guess is narrowed to a MediaDescriptor first; path building is a pure
 * function of (descriptor, layout).
 */

import path from 'path';
import type { Logger } from 'winston';
import { LibraryConfig } from '../../config/types.js';
import {
  EpisodeDescriptor,
  MediaDescriptor,
  MediaGuess,
  MediaGuesser,
  MovieDescriptor,
  ReconstructionResult,
  ShowNameNormalizer,
} from '../../types/media.js';
import { toTitleCase } from '../../utils/titleCase.js';

export class MediaPathReconstructor {
  constructor(
    private readonly guesser: MediaGuesser,
    private readonly showNames: ShowNameNormalizer,
    private readonly layout: LibraryConfig,
    private readonly logger: Logger
  ) {}

  /**
   * Guess, describe and place a historical path.
   * Malformed names come back as `unusable`, never as an exception.
   */
  async reconstruct(rawPath: string): Promise<ReconstructionResult> {
    const guess = await this.guesser.guess(rawPath);
    if (!guess) {
      return { status: 'unusable', reason: 'filename could not be parsed' };
    }

    const described = this.describe(rawPath, guess);
    if ('reason' in described) {
      return { status: 'unusable', reason: described.reason };
    }

    const canonicalPath = this.buildCanonicalPath(described);
    this.logger.debug('Reconstructed canonical path', { rawPath, canonicalPath, kind: described.kind });
    return { status: 'ok', descriptor: described, canonicalPath };
  }

  /**
   * Narrow a raw guess into a descriptor. Episode titles go through the
   * show-name normalizer, movie titles are title-cased.
   */
  describe(rawPath: string, guess: MediaGuess): MediaDescriptor | { reason: string } {
    const title = guess.title?.trim();
    if (!title) {
      return { reason: 'no title could be guessed' };
    }

    const extension = path.extname(rawPath);

    if (guess.episode !== undefined) {
      if (guess.season === undefined) {
        return { reason: `episode ${guess.episode} has no season number` };
      }
      const episode: EpisodeDescriptor = {
        kind: 'episode',
        title: this.showNames.format(title),
        season: guess.season,
        episode: guess.episode,
        extension,
      };
      return episode;
    }

    const movie: MovieDescriptor = {
      kind: 'movie',
      title: toTitleCase(title),
      extension,
    };
    if (guess.year !== undefined) {
      movie.year = guess.year;
    }
    return movie;
  }

  buildCanonicalPath(descriptor: MediaDescriptor): string {
    if (descriptor.kind === 'episode') {
      const season = pad(descriptor.season);
      const episode = pad(descriptor.episode);
      return path.join(
        this.layout.rootPath,
        this.layout.tvPath,
        descriptor.title,
        `Season ${season}`,
        `${descriptor.title} - S${season}E${episode}${descriptor.extension}`
      );
    }

    const name = descriptor.year !== undefined
      ? `${descriptor.title} (${descriptor.year})`
      : descriptor.title;
    return path.join(this.layout.rootPath, this.layout.moviesPath, name, `${name}${descriptor.extension}`);
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}
