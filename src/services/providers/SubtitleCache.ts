/**
 * SubtitleCache
 *
 * File-backed cache for provider search responses, owned by one run.
 *
 * - load() reads the cache file and drops expired entries
 * - get()/set() work in memory
 * - flush() writes the file back when something changed
 *
 * Writers take `<file>.lock` (created with the `wx` flag) before touching
 * the file. Under the lock, flush() re-reads the file, lays this run's
 * entries over the live ones already stored, writes a temp file unique to
 * the writer and renames it into place. Overlapping runs therefore keep
 * each other's entries. A lock older than `staleMs` is removed.
 *
 * A corrupt or unreadable cache file is logged and replaced; it never
 * stops a run.
 */

import path from 'path';
import { randomUUID } from 'crypto';
import fs from 'fs-extra';
import { z } from 'zod';
import type { Logger } from 'winston';
import { CACHE_FILE_NAME, CACHE_LOCK, TIME } from '../../config/constants.js';
import { ApplicationError, FileSystemError, ErrorCode } from '../../errors/index.js';
import { createErrorLogContext, getErrorCode, toError } from '../../utils/errorHandling.js';

export interface SubtitleCacheLockOptions {
  retryMs?: number;
  timeoutMs?: number;
  staleMs?: number;
}

export interface SubtitleCacheOptions {
  directory: string;
  expirationDays: number;
  fileName?: string;
  /** Clock used for expiry (defaults to Date.now) */
  now?: () => number;
  lock?: SubtitleCacheLockOptions;
}

const cacheFileSchema = z.record(
  z.object({
    value: z.unknown(),
    expiresAt: z.number(),
  })
);

type StoredEntries = z.infer<typeof cacheFileSchema>;

interface CacheEntry {
  value: unknown;
  expiresAt: number;
}

type StoredCache =
  | { status: 'missing' }
  | { status: 'unreadable'; error: unknown }
  | { status: 'invalid' }
  | { status: 'ok'; entries: StoredEntries };

export class SubtitleCache {
  private readonly filePath: string;
  private readonly lockPath: string;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly lock: Required<SubtitleCacheLockOptions>;
  private entries: Map<string, CacheEntry> = new Map();
  private dirty = false;

  constructor(
    private readonly options: SubtitleCacheOptions,
    private readonly logger: Logger
  ) {
    this.filePath = path.join(options.directory, options.fileName ?? CACHE_FILE_NAME);
    this.lockPath = `${this.filePath}.lock`;
    this.ttlMs = options.expirationDays * TIME.ONE_DAY;
    this.now = options.now ?? Date.now;
    this.lock = {
      retryMs: options.lock?.retryMs ?? CACHE_LOCK.RETRY_MS,
      timeoutMs: options.lock?.timeoutMs ?? CACHE_LOCK.TIMEOUT_MS,
      staleMs: options.lock?.staleMs ?? CACHE_LOCK.STALE_MS,
    };
  }

  get size(): number {
    return this.entries.size;
  }

  async load(): Promise<void> {
    this.entries = new Map();
    this.dirty = false;

    const stored = await this.readStored();
    switch (stored.status) {
      case 'missing':
        this.logger.debug('No provider cache file yet', { path: this.filePath });
        return;
      case 'unreadable':
        this.logger.warn(
          'Provider cache file is unreadable, starting empty',
          createErrorLogContext(stored.error, { path: this.filePath })
        );
        this.dirty = true;
        return;
      case 'invalid':
        this.logger.warn('Provider cache file has an unexpected shape, starting empty', { path: this.filePath });
        this.dirty = true;
        return;
      case 'ok':
        break;
    }

    const live = this.liveEntries(stored.entries);
    this.entries = new Map(Object.entries(live));
    const expired = Object.keys(stored.entries).length - this.entries.size;
    if (expired > 0) {
      this.dirty = true;
    }

    this.logger.debug('Loaded provider cache', { path: this.filePath, entries: this.entries.size, expired });
  }

  get(key: string): unknown {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.dirty = true;
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: unknown): void {
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
    this.dirty = true;
  }

  async flush(): Promise<void> {
    if (!this.dirty) {
      return;
    }

    let written: number;
    try {
      await fs.ensureDir(this.options.directory);
      written = await this.withLock(async () => {
        const stored = await this.readStored();
        const merged = {
          ...(stored.status === 'ok' ? this.liveEntries(stored.entries) : {}),
          ...Object.fromEntries(this.entries),
        };

        const tempPath = `${this.filePath}.${process.pid}.${randomUUID()}.tmp`;
        await fs.writeJson(tempPath, merged);
        await fs.move(tempPath, this.filePath, { overwrite: true });
        return Object.keys(merged).length;
      });
    } catch (error) {
      if (error instanceof ApplicationError) {
        throw error;
      }
      throw new FileSystemError(
        `Failed to write provider cache: ${this.filePath}`,
        ErrorCode.FS_WRITE_FAILED,
        this.filePath,
        false,
        { service: 'SubtitleCache', operation: 'flush' },
        toError(error)
      );
    }

    this.dirty = false;
    this.logger.debug('Flushed provider cache', { path: this.filePath, entries: written });
  }

  private async readStored(): Promise<StoredCache> {
    if (!(await fs.pathExists(this.filePath))) {
      return { status: 'missing' };
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(this.filePath);
    } catch (error) {
      return { status: 'unreadable', error };
    }

    const parsed = cacheFileSchema.safeParse(raw);
    if (!parsed.success) {
      return { status: 'invalid' };
    }
    return { status: 'ok', entries: parsed.data };
  }

  private liveEntries(entries: StoredEntries): Record<string, CacheEntry> {
    const now = this.now();
    const live: Record<string, CacheEntry> = {};
    for (const [key, entry] of Object.entries(entries)) {
      if (entry.expiresAt > now) {
        live[key] = { value: entry.value, expiresAt: entry.expiresAt };
      }
    }
    return live;
  }

  private async withLock<T>(task: () => Promise<T>): Promise<T> {
    await this.acquireLock();
    try {
      return await task();
    } finally {
      await fs.remove(this.lockPath);
    }
  }

  private async acquireLock(): Promise<void> {
    const deadline = Date.now() + this.lock.timeoutMs;

    for (;;) {
      try {
        await fs.writeFile(this.lockPath, String(process.pid), { flag: 'wx' });
        return;
      } catch (error) {
        if (getErrorCode(error) !== 'EEXIST') {
          throw error;
        }
      }

      const age = await this.lockAge();
      if (age === null) {
        continue;
      }
      if (age > this.lock.staleMs) {
        this.logger.warn('Removing stale provider cache lock', { path: this.lockPath, ageMs: age });
        await fs.remove(this.lockPath);
        continue;
      }
      if (Date.now() >= deadline) {
        throw new FileSystemError(
          `Provider cache is locked by another run: ${this.lockPath}`,
          ErrorCode.FS_WRITE_FAILED,
          this.lockPath,
          true,
          { service: 'SubtitleCache', operation: 'lock' }
        );
      }
      await new Promise(resolve => setTimeout(resolve, this.lock.retryMs));
    }
  }

  /** Milliseconds since the lock was written, or null once it is gone */
  private async lockAge(): Promise<number | null> {
    try {
      const stat = await fs.stat(this.lockPath);
      return Date.now() - stat.mtimeMs;
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }
}
