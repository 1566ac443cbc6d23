/**
 * Media descriptors
 *
 * The guesser's open-ended output is narrowed into one of these shapes
 * as soon as it crosses into the pipeline.
 */

/**
 * Raw guess from the filename guesser (subset of guessit's JSON output)
 */
export interface MediaGuess {
  title?: string;
  year?: number;
  season?: number;
  episode?: number;
  /** guessit's own classification: 'movie' | 'episode' */
  type?: string;
}

export interface MovieDescriptor {
  kind: 'movie';
  title: string;
  year?: number;
  /** Includes the leading dot (".mp4") */
  extension: string;
}

export interface EpisodeDescriptor {
  kind: 'episode';
  title: string;
  season: number;
  episode: number;
  extension: string;
}

export type MediaDescriptor = MovieDescriptor | EpisodeDescriptor;

/**
 * Outcome of rebuilding a canonical library path from a historical path
 */
export type ReconstructionResult =
  | { status: 'ok'; descriptor: MediaDescriptor; canonicalPath: string }
  | { status: 'unusable'; reason: string };

/**
 * Filename guesser collaborator
 */
export interface MediaGuesser {
  guess(rawPath: string): Promise<MediaGuess | null>;
}

/**
 * Show-name normalization collaborator (localized / alternate titles)
 */
export interface ShowNameNormalizer {
  format(title: string): string;
}
