import path from 'path';
import { AxiosError, AxiosAdapter } from 'axios';
import {
  OpenSubtitlesClient,
  OpenSubtitlesClientOptions,
} from '../../../src/services/providers/opensubtitles/OpenSubtitlesClient.js';
import { SubtitleCache } from '../../../src/services/providers/SubtitleCache.js';
import {
  ErrorCode,
  NetworkError,
  ProviderAuthenticationError,
  ProviderError,
  ProviderServerError,
  RateLimitError,
} from '../../../src/errors/index.js';
import { createStubAdapter, StubResponse } from '../../helpers/http.js';
import { createTempDir, removeTempDir } from '../../helpers/fs.js';
import { createTestLogger } from '../../helpers/logger.js';

const searchBody = {
  total_count: 1,
  data: [
    {
      id: '9001',
      type: 'subtitle',
      attributes: {
        language: 'he',
        release: 'Some.Movie.2019.1080p.BluRay',
        download_count: 120,
        files: [{ file_id: 4242, file_name: 'Some.Movie.2019.1080p.BluRay.srt' }],
      },
    },
  ],
};

function createClient(adapter: AxiosAdapter, overrides: Partial<OpenSubtitlesClientOptions> = {}) {
  return new OpenSubtitlesClient(
    {
      apiKey: 'test-secret',
      baseUrl: 'https://api.example.test/api/v1',
      userAgent: 'subtitle-monitor-tests',
      timeoutMs: 1000,
      retryPolicy: { maxAttempts: 1 },
      adapter,
      ...overrides,
    },
    createTestLogger().logger
  );
}

describe('OpenSubtitlesClient', () => {
  describe('searchSubtitles', () => {
    it('should send the query with the API key and user agent', async () => {
      const { adapter, requests } = createStubAdapter(() => ({ status: 200, data: searchBody }));
      const client = createClient(adapter);

      const results = await client.searchSubtitles({
        query: 'Some Movie',
        languages: 'he',
        type: 'movie',
        year: 2019,
      });

      expect(results).toEqual(searchBody.data);
      expect(requests).toHaveLength(1);
      expect(requests[0]?.method).toBe('get');
      expect(requests[0]?.url).toBe('/subtitles');
      expect(requests[0]?.params).toEqual({ query: 'Some Movie', languages: 'he', type: 'movie', year: 2019 });
      expect(requests[0]?.headers.get('Api-Key')).toBe('test-secret');
      expect(requests[0]?.headers.get('User-Agent')).toBe('subtitle-monitor-tests');
    });

    it('should serve repeated searches from the cache', async () => {
      const tempDir = await createTempDir();
      try {
        const cache = new SubtitleCache(
          { directory: path.join(tempDir, 'cache'), expirationDays: 30 },
          createTestLogger().logger
        );
        await cache.load();
        const { adapter, requests } = createStubAdapter(() => ({ status: 200, data: searchBody }));
        const client = createClient(adapter, { cache });
        const params = { query: 'Show', languages: 'en', type: 'episode' as const, season_number: 1, episode_number: 2 };

        await client.searchSubtitles(params);
        const second = await client.searchSubtitles(params);

        expect(second).toEqual(searchBody.data);
        expect(requests).toHaveLength(1);
        expect(cache.size).toBe(1);
      } finally {
        await removeTempDir(tempDir);
      }
    });

    it('should reject a response with an unexpected shape', async () => {
      const { adapter } = createStubAdapter(() => ({ status: 200, data: { data: [{ id: 1 }] } }));
      const client = createClient(adapter);

      const error = await client
        .searchSubtitles({ query: 'Some Movie', languages: 'he', type: 'movie' })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ code: ErrorCode.PROVIDER_INVALID_RESPONSE, providerName: 'opensubtitles' });
    });
  });

  describe('downloads', () => {
    it('should request a download link for a file id', async () => {
      const { adapter, requests } = createStubAdapter(() => ({
        status: 200,
        data: { link: 'https://dl.example.test/file/4242', file_name: 'x.srt', remaining: 19 },
      }));
      const client = createClient(adapter);

      const download = await client.requestDownload(4242);

      expect(download.link).toBe('https://dl.example.test/file/4242');
      expect(requests[0]?.method).toBe('post');
      expect(requests[0]?.url).toBe('/download');
      expect(requests[0]?.data).toEqual({ file_id: 4242 });
    });

    it('should fetch the file behind a link as bytes', async () => {
      const { adapter, requests } = createStubAdapter(() => ({ status: 200, data: Buffer.from('1\nsubs\n') }));
      const client = createClient(adapter);

      const content = await client.fetchFile('https://dl.example.test/file/4242');

      expect(content.toString('utf8')).toBe('1\nsubs\n');
      expect(requests[0]?.url).toBe('https://dl.example.test/file/4242');
      expect(requests[0]?.responseType).toBe('arraybuffer');
    });

    it('should not send the API key to the file host', async () => {
      const { adapter, requests } = createStubAdapter(() => ({ status: 200, data: Buffer.from('1\nsubs\n') }));
      const client = createClient(adapter);

      await client.fetchFile('https://dl.example.test/file/4242');

      expect(requests[0]?.headers.has('Api-Key')).toBe(false);
    });
  });

  describe('error conversion', () => {
    const search = (client: OpenSubtitlesClient) =>
      client.searchSubtitles({ query: 'Some Movie', languages: 'he', type: 'movie' }).catch((caught: unknown) => caught);

    it.each<[number, StubResponse['data'], new (...args: never[]) => Error]>([
      [401, { message: 'Invalid API key' }, ProviderAuthenticationError],
      [403, { message: 'Forbidden' }, ProviderAuthenticationError],
      [429, { message: 'Throttle limit reached' }, RateLimitError],
      [503, { message: 'Service unavailable' }, ProviderServerError],
      [404, { message: 'Not found' }, ProviderServerError],
    ])('should map HTTP %i to the matching error', async (status, data, errorClass) => {
      const { adapter } = createStubAdapter(() => ({ status, data }));

      await expect(search(createClient(adapter))).resolves.toBeInstanceOf(errorClass);
    });

    it('should carry the server message and retry-after header', async () => {
      const { adapter } = createStubAdapter(() => ({
        status: 429,
        data: { message: 'Throttle limit reached' },
        headers: { 'retry-after': '3' },
      }));

      const error = await search(createClient(adapter));

      expect(error).toBeInstanceOf(RateLimitError);
      expect(error).toMatchObject({ retryAfter: 3, message: 'Rate limit exceeded: Throttle limit reached' });
    });

    it('should map timeouts to a retryable network error', async () => {
      const { adapter } = createStubAdapter(config => {
        throw new AxiosError('timeout of 1000ms exceeded', 'ECONNABORTED', config);
      });

      const error = await search(createClient(adapter));

      expect(error).toBeInstanceOf(NetworkError);
      expect(error).toMatchObject({ code: ErrorCode.NETWORK_TIMEOUT, retryable: true });
    });

    it('should retry server errors before giving up', async () => {
      let calls = 0;
      const { adapter, requests } = createStubAdapter(() => {
        calls++;
        return calls === 1 ? { status: 502, data: { message: 'Bad gateway' } } : { status: 200, data: searchBody };
      });
      const client = createClient(adapter, {
        retryPolicy: { maxAttempts: 2, initialDelayMs: 1, maxDelayMs: 1, jitterFactor: 0 },
      });

      await expect(client.searchSubtitles({ query: 'Some Movie', languages: 'he', type: 'movie' })).resolves.toHaveLength(1);
      expect(requests).toHaveLength(2);
    });
  });
});
