/**
 * Application-wide Constants
 */

/**
 * Time durations in milliseconds
 */
export const TIME = {
  ONE_SECOND: 1000,
  ONE_DAY: 86400000,
} as const;

/**
 * Extensions subtitle providers accept as video files
 */
export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set([
  '.3gp',
  '.asf',
  '.avi',
  '.divx',
  '.flv',
  '.m2ts',
  '.m4v',
  '.mk3d',
  '.mkv',
  '.mov',
  '.mp4',
  '.mpeg',
  '.mpg',
  '.ogm',
  '.ogv',
  '.rm',
  '.rmvb',
  '.ts',
  '.vob',
  '.webm',
  '.wmv',
  '.xvid',
]);

/**
 * Provider cache file inside the cache directory
 */
export const CACHE_FILE_NAME = 'subtitle-cache.json';

/**
 * Lock file taken around provider cache writes
 */
export const CACHE_LOCK = {
  RETRY_MS: 50,
  TIMEOUT_MS: 10000,
  /** A lock untouched for this long belongs to a run that died */
  STALE_MS: 60000,
} as const;
