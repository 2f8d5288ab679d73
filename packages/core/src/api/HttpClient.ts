/**
 * HTTP Client
 *
 * Provides a consistent HTTP client with:
 * - Bearer authentication from the session manager
 * - Reactive session refresh and a single retry on 401
 * - Hard per-request timeout
 * - Mapping of transport and HTTP failures onto the API error taxonomy
 * - Request logging
 */

import {
  isApiError,
  InvalidRequestError,
  NotFoundError,
  RateLimitedError,
  TransientError,
  UnauthorizedError,
} from '../types/errors';
import { ErrorBodySchema } from '../utils/validators';
import { validateSafe } from '../utils/validation';
import { createLogger, logRequest } from '../utils/logger';

const logger = createLogger('HttpClient');

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestConfig {
  url: string;
  method?: HttpMethod;
  params?: QueryParams;
  /** JSON-serialisable request body */
  data?: unknown;
  headers?: Record<string, string>;
  timeout?: number;
  skipAuth?: boolean;
  /** Cancels the request, reported as a transient failure */
  signal?: AbortSignal;
}

export interface HTTPClientConfig {
  baseURL?: string;
  timeout?: number;
  headers?: Record<string, string>;
}

/**
 * What the client needs from the session: a token to send, and a way to get a
 * new one when the service rejects it
 */
export interface AccessTokenSource {
  getAccessToken(): string | null;
  refresh(): Promise<void>;
}

/** Retry-After fallback when the header is absent or unreadable */
export const DEFAULT_RETRY_AFTER_MS = 1000;

export class HttpClient {
  private tokens: AccessTokenSource;
  private httpConfig: Required<HTTPClientConfig>;

  constructor(tokens: AccessTokenSource, httpConfig?: HTTPClientConfig) {
    this.tokens = tokens;
    this.httpConfig = {
      baseURL: httpConfig?.baseURL ?? '',
      timeout: httpConfig?.timeout ?? 10000,
      headers: httpConfig?.headers ?? {},
    };
  }

  /**
   * Perform HTTP request
   *
   * @param config - Request configuration
   * @returns Parsed JSON body, text body, or undefined for empty responses
   * @throws One of the API taxonomy errors
   */
  async request(config: RequestConfig): Promise<unknown> {
    return this.send(config, false);
  }

  private async send(config: RequestConfig, isRetry: boolean): Promise<unknown> {
    const method = config.method ?? 'GET';
    const url = this.buildURL(config.url, config.params);
    const headers = this.buildHeaders(config);

    logRequest(method, url, isRetry ? 2 : 1);

    const response = await this.fetchWithTimeout(url, {
      method,
      headers,
      body: config.data === undefined ? undefined : JSON.stringify(config.data),
      timeout: config.timeout ?? this.httpConfig.timeout,
      signal: config.signal,
    });

    if (response.status === 401 && !config.skipAuth && !isRetry) {
      logger.warn({ url }, 'Got 401, refreshing session');

      try {
        await this.tokens.refresh();
      } catch (error) {
        // An unreachable token endpoint stays transient
        throw isApiError(error)
          ? error
          : new UnauthorizedError('Session refresh failed after 401', error, { url });
      }
      return this.send(config, true);
    }

    if (!response.ok) {
      throw await this.handleErrorResponse(response, url);
    }

    return this.parseBody(response, url);
  }

  /**
   * Build full URL with query parameters
   */
  private buildURL(url: string, params?: QueryParams): string {
    const fullURL = url.startsWith('http') ? url : `${this.httpConfig.baseURL}${url}`;

    if (!params) {
      return fullURL;
    }

    const entries = Object.entries(params).filter(
      (entry): entry is [string, string | number | boolean] => entry[1] !== undefined
    );
    if (entries.length === 0) {
      return fullURL;
    }

    const urlObj = new URL(fullURL);
    entries.forEach(([key, value]) => {
      urlObj.searchParams.append(key, String(value));
    });
    return urlObj.toString();
  }

  /**
   * Build request headers
   */
  private buildHeaders(config: RequestConfig): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.httpConfig.headers,
      ...config.headers,
    };

    if (config.data !== undefined && !headers['Content-Type']) {
      headers['Content-Type'] = 'application/json';
    }

    if (!config.skipAuth) {
      const token = this.tokens.getAccessToken();
      if (token) {
        headers.Authorization = `Bearer ${token}`;
      }
    }

    return headers;
  }

  /**
   * Fetch with a hard timeout. Exceeding it is reported like a network failure.
   */
  private async fetchWithTimeout(
    url: string,
    options: {
      method: HttpMethod;
      headers: Record<string, string>;
      body?: string;
      timeout: number;
      signal?: AbortSignal;
    }
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeout);
    const cancel = (): void => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    }
    options.signal?.addEventListener('abort', cancel, { once: true });

    try {
      return await fetch(url, {
        method: options.method,
        headers: options.headers,
        body: options.body,
        signal: controller.signal,
      });
    } catch (error) {
      if (options.signal?.aborted) {
        throw new TransientError('Request cancelled', error, { url });
      }
      if (controller.signal.aborted) {
        throw new TransientError(`Request timeout after ${options.timeout}ms`, error, {
          url,
          timeout: options.timeout,
        });
      }
      throw new TransientError('Network request failed', error, { url });
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', cancel);
    }
  }

  /**
   * Parse a successful response body
   */
  private async parseBody(response: Response, url: string): Promise<unknown> {
    if (response.status === 204) {
      return undefined;
    }

    const text = await response.text();
    if (!text) {
      return undefined;
    }

    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('json')) {
      return text;
    }

    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch (error) {
      throw new InvalidRequestError('Malformed JSON response', response.status, error, { url });
    }
  }

  /**
   * Map an error response onto the taxonomy
   */
  private async handleErrorResponse(response: Response, url: string): Promise<Error> {
    const message = await this.readErrorMessage(response);
    const context = { url, statusCode: response.status };

    if (response.status === 401) {
      return new UnauthorizedError(message, undefined, context);
    }
    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.headers.get('retry-after'));
      return new RateLimitedError(message, retryAfterMs, context);
    }
    if (response.status === 404) {
      return new NotFoundError(message, context);
    }
    if (response.status >= 500) {
      return new TransientError(message, undefined, context, response.status);
    }
    return new InvalidRequestError(message, response.status, undefined, context);
  }

  private async readErrorMessage(response: Response): Promise<string> {
    const status = response.statusText ? `: ${response.statusText}` : '';
    const fallback = `HTTP ${response.status}${status}`;

    let text: string;
    try {
      text = await response.text();
    } catch {
      return fallback;
    }
    if (!text) {
      return fallback;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return text.slice(0, 200);
    }

    const body = validateSafe(ErrorBodySchema, json);
    if (!body) {
      return fallback;
    }
    if (typeof body.error === 'string') {
      return body.error_description ?? body.error;
    }
    return body.error.message;
  }
}

/**
 * Convert a Retry-After header (delta-seconds or HTTP date) to milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number {
  if (!value) {
    return DEFAULT_RETRY_AFTER_MS;
  }

  const seconds = Number(value);
  if (Number.isFinite(seconds) && value.trim() !== '') {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    return Math.max(0, date - now);
  }

  return DEFAULT_RETRY_AFTER_MS;
}
