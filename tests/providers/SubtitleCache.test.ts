import path from 'path';
import fs from 'fs-extra';
import { SubtitleCache } from '../../src/services/providers/SubtitleCache.js';
import { FileSystemError } from '../../src/errors/index.js';
import { createTempDir, removeTempDir, touch } from '../helpers/fs.js';
import { createTestLogger, flushLogs } from '../helpers/logger.js';

const DAY = 86400000;

describe('SubtitleCache', () => {
  let tempDir: string;
  let now: number;

  beforeEach(async () => {
    tempDir = await createTempDir();
    now = Date.UTC(2024, 0, 1);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  function createCache(testLogger = createTestLogger()): SubtitleCache {
    return new SubtitleCache(
      { directory: tempDir, expirationDays: 30, fileName: 'cache.json', now: () => now },
      testLogger.logger
    );
  }

  it('should start empty without a cache file', async () => {
    const cache = createCache();
    await cache.load();

    expect(cache.size).toBe(0);
    expect(cache.get('missing')).toBeUndefined();
  });

  it('should persist entries across instances', async () => {
    const first = createCache();
    await first.load();
    first.set('search:movie', { data: [1, 2] });
    await first.flush();

    const second = createCache();
    await second.load();

    expect(second.get('search:movie')).toEqual({ data: [1, 2] });
    await expect(fs.readJson(path.join(tempDir, 'cache.json'))).resolves.toEqual({
      'search:movie': { value: { data: [1, 2] }, expiresAt: now + 30 * DAY },
    });
  });

  it('should expire entries after the configured days', async () => {
    const cache = createCache();
    await cache.load();
    cache.set('key', 'value');

    now += 30 * DAY - 1;
    expect(cache.get('key')).toBe('value');

    now += 1;
    expect(cache.get('key')).toBeUndefined();
  });

  it('should drop expired entries when loading', async () => {
    await fs.writeJson(path.join(tempDir, 'cache.json'), {
      fresh: { value: 1, expiresAt: now + DAY },
      stale: { value: 2, expiresAt: now - DAY },
    });

    const cache = createCache();
    await cache.load();

    expect(cache.size).toBe(1);
    expect(cache.get('fresh')).toBe(1);
    expect(cache.get('stale')).toBeUndefined();
  });

  it('should not write the file when nothing changed', async () => {
    const cache = createCache();
    await cache.load();
    await cache.flush();

    await expect(fs.pathExists(path.join(tempDir, 'cache.json'))).resolves.toBe(false);
  });

  it('should start over from a corrupt cache file', async () => {
    await touch(path.join(tempDir, 'cache.json'), '{ not json');
    const testLogger = createTestLogger();
    const cache = createCache(testLogger);

    await cache.load();

    expect(cache.size).toBe(0);
    await flushLogs();
    expect(testLogger.messages('warn')).toEqual(['Provider cache file is unreadable, starting empty']);

    await cache.flush();
    await expect(fs.readJson(path.join(tempDir, 'cache.json'))).resolves.toEqual({});
  });

  it('should start over from a cache file with the wrong shape', async () => {
    await fs.writeJson(path.join(tempDir, 'cache.json'), { key: 'value' });
    const testLogger = createTestLogger();
    const cache = createCache(testLogger);

    await cache.load();

    expect(cache.size).toBe(0);
    await flushLogs();
    expect(testLogger.messages('warn')).toEqual([
      'Provider cache file has an unexpected shape, starting empty',
    ]);
  });

  it('should keep the entries of caches flushed concurrently on one directory', async () => {
    const first = createCache();
    const second = createCache();
    await Promise.all([first.load(), second.load()]);
    first.set('a', 'from first');
    second.set('b', 'from second');

    const results = await Promise.allSettled([first.flush(), second.flush()]);

    expect(results.map(result => result.status)).toEqual(['fulfilled', 'fulfilled']);
    await expect(fs.readJson(path.join(tempDir, 'cache.json'))).resolves.toEqual({
      a: { value: 'from first', expiresAt: now + 30 * DAY },
      b: { value: 'from second', expiresAt: now + 30 * DAY },
    });
    await expect(fs.readdir(tempDir)).resolves.toEqual(['cache.json']);
  });

  it('should let this run win over stored entries with the same key', async () => {
    await fs.writeJson(path.join(tempDir, 'cache.json'), {
      shared: { value: 'stored', expiresAt: now + DAY },
      expired: { value: 'old', expiresAt: now - DAY },
    });
    const cache = createCache();
    await cache.load();
    cache.set('shared', 'fresh');

    await cache.flush();

    await expect(fs.readJson(path.join(tempDir, 'cache.json'))).resolves.toEqual({
      shared: { value: 'fresh', expiresAt: now + 30 * DAY },
    });
  });

  it('should remove a stale lock left by a dead run', async () => {
    const lockPath = await touch(path.join(tempDir, 'cache.json.lock'), '12345');
    const twoMinutesAgo = new Date(Date.now() - 120000);
    await fs.utimes(lockPath, twoMinutesAgo, twoMinutesAgo);
    const testLogger = createTestLogger();
    const cache = createCache(testLogger);
    await cache.load();
    cache.set('key', 'value');

    await cache.flush();

    await expect(fs.readJson(path.join(tempDir, 'cache.json'))).resolves.toEqual({
      key: { value: 'value', expiresAt: now + 30 * DAY },
    });
    await expect(fs.pathExists(lockPath)).resolves.toBe(false);
    await flushLogs();
    expect(testLogger.messages('warn')).toEqual(['Removing stale provider cache lock']);
  });

  it('should give up when another run holds the lock', async () => {
    const lockPath = await touch(path.join(tempDir, 'cache.json.lock'), '12345');
    const cache = new SubtitleCache(
      { directory: tempDir, expirationDays: 30, fileName: 'cache.json', lock: { retryMs: 5, timeoutMs: 20 } },
      createTestLogger().logger
    );
    await cache.load();
    cache.set('key', 'value');

    const error = await cache.flush().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(FileSystemError);
    expect(error).toMatchObject({ message: `Provider cache is locked by another run: ${lockPath}` });
    await expect(fs.pathExists(lockPath)).resolves.toBe(true);
    await expect(fs.pathExists(path.join(tempDir, 'cache.json'))).resolves.toBe(false);
  });

  it('should raise a FileSystemError when the cache cannot be written', async () => {
    const blocker = await touch(path.join(tempDir, 'blocker'), 'file');
    const cache = new SubtitleCache({ directory: blocker, expirationDays: 30 }, createTestLogger().logger);
    await cache.load();
    cache.set('key', 'value');

    await expect(cache.flush()).rejects.toBeInstanceOf(FileSystemError);
  });
});
