export interface LibraryConfig {
  /** Mounted, decrypted root of the organized library */
  rootPath: string;
  /** Movie subtree, relative to rootPath */
  moviesPath: string;
  /** TV subtree, relative to rootPath */
  tvPath: string;
}

export interface HistoryConfig {
  /** Append-only log of original (pre-organization) file paths */
  originalNamesLog: string;
  /** Newest entries to process; null means the whole log */
  resultsLimit: number | null;
}

/**
 * Provider subset per language, keyed by ISO 639-1 code.
 * null = query every registered provider.
 */
export type LanguageProviderMap = Record<string, string[] | null>;

export interface SubtitlesConfig {
  extension: string;
  /** Insertion order is the order gaps are detected and filled in */
  languages: LanguageProviderMap;
  /** Scratch directory downloaded subtitles are written to before upload */
  tempPath: string;
  /** Optional JSON alias table for show titles */
  showAliasesPath?: string | undefined;
}

export interface GuessitConfig {
  binary: string;
  timeoutMs: number;
}

export interface ProvidersConfig {
  opensubtitles: {
    apiKey?: string | undefined;
    baseUrl: string;
    userAgent: string;
    timeoutMs: number;
  };
}

export interface CacheConfig {
  directory: string;
  expirationDays: number;
}

export type UploadMode = 'library' | 'rclone';

export interface UploadConfig {
  mode: UploadMode;
  rcloneBinary: string;
  remote: string;
  remotePath: string;
}

export interface MigrationConfig {
  odrivePython: string;
  odriveScript: string;
  rcloneBinary: string;
  remote: string;
  /** Local mount prefix stripped from paths to build the remote path */
  acdPrefix: string;
  /** Base name of the migration's own rotated log files */
  logName: string;
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: string;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  library: LibraryConfig;
  history: HistoryConfig;
  subtitles: SubtitlesConfig;
  guessit: GuessitConfig;
  providers: ProvidersConfig;
  cache: CacheConfig;
  upload: UploadConfig;
  migration: MigrationConfig;
  logging: LoggingConfig;
}
