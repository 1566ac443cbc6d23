import type { MediaDescriptor } from './media.js';

export interface Language {
  /** ISO 639-1, used in sidecar names (".he.srt") */
  alpha2: string;
  /** ISO 639-2, used to key run results ("heb") */
  alpha3: string;
  name: string;
}

/**
 * A configured language and its provider restriction (null = all providers)
 */
export interface LanguagePreference {
  language: Language;
  providers: string[] | null;
}

/**
 * The video handed to subtitle providers
 */
export interface SubtitleVideo {
  /** Canonical path inside the library */
  path: string;
  /** Historical path; carries release details the canonical name dropped */
  originalPath: string;
  descriptor: MediaDescriptor;
}

/**
 * A provider's candidate before download
 */
export interface SubtitleCandidate {
  providerId: string;
  /** Provider-specific handle used to download the file */
  fileId: string;
  language: Language;
  releaseName?: string;
}

/**
 * Best match for one language, after download
 */
export interface SubtitleMatch {
  providerId: string;
  language: Language;
  releaseName?: string;
  /** null when the provider answered with an empty payload */
  content: Buffer | null;
}

export type SearchOutcome =
  | { kind: 'not-a-video'; reason: string }
  | { kind: 'results'; matches: Map<string, SubtitleMatch | null> };

/**
 * Subtitle search collaborator: one video, several languages, optional provider subset
 */
export interface SubtitleSearcher {
  search(
    video: SubtitleVideo,
    languages: Language[],
    providerSubset: string[] | null
  ): Promise<SearchOutcome>;
}

export interface UploadRequest {
  /** Scratch file to upload */
  localPath: string;
  /** Where the sidecar belongs inside the library */
  libraryPath: string;
  /** libraryPath relative to the library root */
  relativePath: string;
}

/**
 * Upload collaborator. Throws on failure; callers decide how fatal that is.
 */
export interface SubtitleUploader {
  readonly name: string;
  upload(request: UploadRequest): Promise<void>;
}

export interface AcquisitionTarget {
  originalPath: string;
  canonicalPath: string;
  descriptor: MediaDescriptor;
}

export type AcquisitionOutcome =
  | { kind: 'saved'; path: string; uploaded: boolean }
  | { kind: 'no-result' }
  | { kind: 'empty-content'; providerId: string }
  | { kind: 'not-a-video'; reason: string }
  | { kind: 'save-failed'; path: string; error: string };

export interface LanguageCount {
  language: string;
  count: number;
}
