/**
 * OpenSubtitles.com API Client
 * Handles all interactions with the OpenSubtitles REST API v1
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Logger } from 'winston';
import { RateLimiter } from '../utils/RateLimiter.js';
import { SubtitleCache } from '../SubtitleCache.js';
import {
  ErrorCode,
  NETWORK_RETRY_POLICY,
  NetworkError,
  ProviderAuthenticationError,
  ProviderError,
  ProviderServerError,
  RateLimitError,
  RetryPolicy,
  RetryStrategy,
} from '../../../errors/index.js';
import { hasMessage, toError } from '../../../utils/errorHandling.js';

export const OPENSUBTITLES_PROVIDER_ID = 'opensubtitles';

export interface OpenSubtitlesClientOptions {
  apiKey: string;
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  /** Search responses are cached here when given */
  cache?: SubtitleCache;
  retryPolicy?: Partial<RetryPolicy>;
  requestsPerSecond?: number;
  /** Transport override, used by tests */
  adapter?: AxiosAdapter;
}

export interface OpenSubtitlesSearchParams {
  query: string;
  languages: string;
  type: 'movie' | 'episode';
  year?: number;
  season_number?: number;
  episode_number?: number;
}

const searchResponseSchema = z.object({
  total_count: z.number().optional(),
  data: z.array(
    z.object({
      id: z.string(),
      attributes: z.object({
        language: z.string().nullable(),
        release: z.string().nullable().optional(),
        download_count: z.number().optional(),
        files: z.array(
          z.object({
            file_id: z.number(),
            file_name: z.string().nullable().optional(),
          })
        ),
      }),
    })
  ),
});

const downloadResponseSchema = z.object({
  link: z.string().url(),
  file_name: z.string().optional(),
  remaining: z.number().optional(),
});

export type OpenSubtitlesSubtitle = z.infer<typeof searchResponseSchema>['data'][number];
export type OpenSubtitlesDownload = z.infer<typeof downloadResponseSchema>;

export class OpenSubtitlesClient {
  private readonly client: AxiosInstance;
  private readonly retryStrategy: RetryStrategy;
  private readonly rateLimiter: RateLimiter;

  constructor(
    private readonly options: OpenSubtitlesClientOptions,
    private readonly logger: Logger
  ) {
    this.retryStrategy = new RetryStrategy(logger, {
      ...NETWORK_RETRY_POLICY,
      ...options.retryPolicy,
    });

    // The API allows 5 requests per second per IP
    this.rateLimiter = new RateLimiter({ requestsPerSecond: options.requestsPerSecond ?? 5 });

    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      headers: {
        'Api-Key': options.apiKey,
        'User-Agent': options.userAgent,
        Accept: 'application/json',
      },
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  // ============================================
  // Public API Methods
  // ============================================

  /**
   * Search subtitles (first result page)
   */
  async searchSubtitles(params: OpenSubtitlesSearchParams): Promise<OpenSubtitlesSubtitle[]> {
    const cacheKey = `${OPENSUBTITLES_PROVIDER_ID}:search:${JSON.stringify(params)}`;
    const cached = searchResponseSchema.safeParse(this.options.cache?.get(cacheKey));
    if (cached.success) {
      this.logger.debug('OpenSubtitles search served from cache', { params });
      return cached.data.data;
    }

    const body = await this.request('/subtitles', () =>
      this.client.get<unknown>('/subtitles', { params })
    );
    const response = this.parse(searchResponseSchema, body, '/subtitles');
    this.options.cache?.set(cacheKey, response);

    this.logger.debug('OpenSubtitles search completed', {
      params,
      results: response.data.length,
    });
    return response.data;
  }

  /**
   * Request a temporary download link for a subtitle file
   */
  async requestDownload(fileId: number): Promise<OpenSubtitlesDownload> {
    const body = await this.request('/download', () =>
      this.client.post<unknown>('/download', { file_id: fileId })
    );
    const download = this.parse(downloadResponseSchema, body, '/download');

    if (download.remaining !== undefined) {
      this.logger.debug('OpenSubtitles download quota', { remaining: download.remaining });
    }
    return download;
  }

  /**
   * Fetch the subtitle file behind a download link.
   * The link points at a file host, so the API credentials stay off this request.
   */
  async fetchFile(link: string): Promise<Buffer> {
    const body = await this.request(link, () =>
      axios.get<ArrayBuffer>(link, {
        responseType: 'arraybuffer',
        timeout: this.options.timeoutMs,
        ...(this.options.adapter && { adapter: this.options.adapter }),
      })
    );
    return Buffer.from(body);
  }

  // ============================================
  // Request plumbing
  // ============================================

  /**
   * Make API request with rate limiting and retry
   */
  private async request<T>(endpoint: string, send: () => Promise<{ data: T; status: number }>): Promise<T> {
    return this.retryStrategy.execute(async () => {
      try {
        const response = await this.rateLimiter.execute(send);
        this.logger.debug('OpenSubtitles API request successful', {
          endpoint,
          status: response.status,
        });
        return response.data;
      } catch (error) {
        throw this.convertToApplicationError(error, endpoint);
      }
    }, `OpenSubtitles ${endpoint}`);
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown, endpoint: string): T {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected response from OpenSubtitles ${endpoint}`,
        OPENSUBTITLES_PROVIDER_ID,
        ErrorCode.PROVIDER_INVALID_RESPONSE,
        false,
        {
          service: 'OpenSubtitlesClient',
          operation: 'parse',
          metadata: { endpoint, issues: parsed.error.issues.map(issue => issue.message) },
        }
      );
    }
    return parsed.data;
  }

  /**
   * Convert Axios errors to ApplicationError types
   */
  private convertToApplicationError(error: unknown, endpoint: string): Error {
    const context = {
      service: 'OpenSubtitlesClient',
      operation: 'request',
      metadata: { endpoint },
    };

    if (!axios.isAxiosError(error)) {
      return new NetworkError(
        `OpenSubtitles request failed: ${endpoint}`,
        ErrorCode.NETWORK_CONNECTION_FAILED,
        endpoint,
        context,
        toError(error)
      );
    }

    // Handle HTTP response errors
    if (error.response) {
      const status = error.response.status;
      const data: unknown = error.response.data;
      const message = hasMessage(data) ? data.message : error.message;
      const statusContext = { ...context, metadata: { ...context.metadata, status } };

      switch (status) {
        case 401:
        case 403:
          return new ProviderAuthenticationError(
            OPENSUBTITLES_PROVIDER_ID,
            `OpenSubtitles authentication failed: ${message}`,
            statusContext
          );

        case 429: {
          const retryAfter = Number(error.response.headers['retry-after']);
          return new RateLimitError(
            OPENSUBTITLES_PROVIDER_ID,
            Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : 1,
            `Rate limit exceeded: ${message}`,
            statusContext
          );
        }

        default:
          return new ProviderServerError(
            OPENSUBTITLES_PROVIDER_ID,
            status,
            `API error (${status}): ${message}`,
            statusContext,
            error
          );
      }
    }

    // Network errors (timeout, connection refused, etc.) - retryable
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new NetworkError(
        `OpenSubtitles request timeout: ${endpoint}`,
        ErrorCode.NETWORK_TIMEOUT,
        endpoint,
        { ...context, metadata: { ...context.metadata, code: error.code } },
        error
      );
    }

    return new NetworkError(
      `OpenSubtitles network error: ${error.message}`,
      ErrorCode.NETWORK_CONNECTION_FAILED,
      endpoint,
      { ...context, metadata: { ...context.metadata, code: error.code } },
      error
    );
  }
}
