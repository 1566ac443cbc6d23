import { Language, SubtitleCandidate, SubtitleVideo } from '../../types/subtitles.js';

/**
 * A subtitle source. Implementations throw ApplicationError subclasses
 * (ProviderError, NetworkError, ...) for provider-side failures.
 */
export interface SubtitleProvider {
  readonly id: string;

  /**
   * Candidates for one language, in the provider's own order
   */
  listSubtitles(video: SubtitleVideo, language: Language): Promise<SubtitleCandidate[]>;

  /**
   * Raw subtitle bytes, or null when the provider served an empty file
   */
  downloadContent(candidate: SubtitleCandidate): Promise<Buffer | null>;
}
