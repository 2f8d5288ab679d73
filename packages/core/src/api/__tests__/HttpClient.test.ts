/**
 * Tests for HttpClient
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import { HttpClient, parseRetryAfter, DEFAULT_RETRY_AFTER_MS } from '../HttpClient';
import type { AccessTokenSource } from '../HttpClient';
import {
  InvalidRequestError,
  NotFoundError,
  RateLimitedError,
  TransientError,
  UnauthorizedError,
} from '../../types/errors';
import { API_URL, emptyResponse, jsonResponse } from '../../__tests__/fixtures';

describe('HttpClient', () => {
  let fetchMock: Mock<typeof fetch>;
  let refresh: Mock<() => Promise<void>>;
  let token: string | null;
  let client: HttpClient;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);

    token = 'test-token';
    refresh = vi.fn<() => Promise<void>>(async () => {
      token = 'test-token-2';
    });
    const tokens: AccessTokenSource = {
      getAccessToken: () => token,
      refresh,
    };
    client = new HttpClient(tokens, { baseURL: API_URL, timeout: 5000 });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  describe('requests', () => {
    it('should send a bearer token and query parameters', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ id: 'user1' }));

      const body = await client.request({
        url: '/me/player',
        params: { additional_types: 'episode', market: undefined, limit: 5 },
      });

      expect(body).toEqual({ id: 'user1' });
      expect(fetchMock).toHaveBeenCalledWith(
        'https://api.test/v1/me/player?additional_types=episode&limit=5',
        expect.objectContaining({
          method: 'GET',
          headers: expect.objectContaining({ Authorization: 'Bearer test-token' }),
        })
      );
    });

    it('should serialise a JSON body', async () => {
      fetchMock.mockResolvedValueOnce(emptyResponse());

      await client.request({ url: '/me/player', method: 'PUT', data: { device_ids: ['d1'] } });

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.method).toBe('PUT');
      expect(init?.body).toBe('{"device_ids":["d1"]}');
      expect(init?.headers).toEqual(
        expect.objectContaining({ 'Content-Type': 'application/json' })
      );
    });

    it('should leave out Authorization when skipAuth is set', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}));

      await client.request({ url: '/public', skipAuth: true });

      const init = fetchMock.mock.calls[0]?.[1];
      expect(init?.headers).not.toHaveProperty('Authorization');
    });

    it('should use absolute URLs as they are', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({}));

      await client.request({ url: 'https://other.test/thing' });

      expect(fetchMock).toHaveBeenCalledWith('https://other.test/thing', expect.anything());
    });

    it('should return undefined for 204 responses', async () => {
      fetchMock.mockResolvedValueOnce(emptyResponse(204));

      await expect(
        client.request({ url: '/me/player/next', method: 'POST' })
      ).resolves.toBeUndefined();
    });

    it('should return text bodies that are not JSON', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('snapshot-id', { status: 200, headers: { 'content-type': 'text/plain' } })
      );

      await expect(client.request({ url: '/text' })).resolves.toBe('snapshot-id');
    });

    it('should reject malformed JSON', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response('{', { status: 200, headers: { 'content-type': 'application/json' } })
      );

      await expect(client.request({ url: '/broken' })).rejects.toThrow(InvalidRequestError);
    });
  });

  describe('401 handling', () => {
    it('should refresh once and retry with the new token', async () => {
      fetchMock
        .mockResolvedValueOnce(jsonResponse({ error: { status: 401, message: 'expired' } }, 401))
        .mockResolvedValueOnce(jsonResponse({ ok: true }));

      const body = await client.request({ url: '/me' });

      expect(body).toEqual({ ok: true });
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledTimes(2);
      expect(fetchMock.mock.calls[1]?.[1]?.headers).toEqual(
        expect.objectContaining({ Authorization: 'Bearer test-token-2' })
      );
    });

    it('should report Unauthorized when the retry is rejected too', async () => {
      fetchMock.mockImplementation(async () =>
        jsonResponse({ error: { status: 401, message: 'The access token expired' } }, 401)
      );

      const error = await client.request({ url: '/me' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnauthorizedError);
      expect(error).toHaveProperty('message', 'The access token expired');
      expect(refresh).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('should report Unauthorized when the refresh fails', async () => {
      refresh.mockRejectedValueOnce(new Error('refresh token revoked'));
      fetchMock.mockResolvedValueOnce(emptyResponse(401));

      await expect(client.request({ url: '/me' })).rejects.toThrow(
        'Session refresh failed after 401'
      );
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should keep a transient refresh failure transient', async () => {
      const outage = new TransientError('HTTP 503', undefined, undefined, 503);
      refresh.mockRejectedValueOnce(outage);
      fetchMock.mockResolvedValueOnce(emptyResponse(401));

      const error = await client.request({ url: '/me' }).catch((e: unknown) => e);

      expect(error).toBe(outage);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('error mapping', () => {
    it('should map 429 to RateLimited with the retry-after delay', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ error: { status: 429, message: 'API rate limit exceeded' } }, 429, {
          'retry-after': '5',
        })
      );

      const error = await client.request({ url: '/me/player' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error).toHaveProperty('retryAfterMs', 5000);
      expect(error).toHaveProperty('message', 'API rate limit exceeded');
    });

    it('should map 404 to NotFound with a plain text message', async () => {
      fetchMock.mockResolvedValueOnce(new Response('nope', { status: 404 }));

      const error = await client
        .request({ url: '/playlists/missing/tracks' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toHaveProperty('message', 'nope');
    });

    it('should map 5xx to Transient', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response(null, { status: 503, statusText: 'Service Unavailable' })
      );

      const error = await client.request({ url: '/me' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toHaveProperty('message', 'HTTP 503: Service Unavailable');
      expect(error).toHaveProperty('statusCode', 503);
    });

    it('should map other 4xx to InvalidRequest using the error description', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ error: 'invalid_request', error_description: 'Bad offset' }, 400)
      );

      const error = await client.request({ url: '/me/playlists' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InvalidRequestError);
      expect(error).toHaveProperty('message', 'Bad offset');
      expect(error).toHaveProperty('statusCode', 400);
    });

    it('should map network failures to Transient', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(client.request({ url: '/me' })).rejects.toThrow('Network request failed');
    });

    it('should map timeouts to Transient', async () => {
      fetchMock.mockImplementationOnce(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );

      const error = await client.request({ url: '/slow', timeout: 10 }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toHaveProperty('message', 'Request timeout after 10ms');
    });

    it('should map a cancelled request to Transient', async () => {
      const controller = new AbortController();
      fetchMock.mockImplementationOnce(
        (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          })
      );

      const pending = client.request({ url: '/slow', signal: controller.signal });
      controller.abort();
      const error = await pending.catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransientError);
      expect(error).toHaveProperty('message', 'Request cancelled');
    });
  });
});

describe('parseRetryAfter', () => {
  it('should fall back when the header is missing', () => {
    expect(parseRetryAfter(null)).toBe(DEFAULT_RETRY_AFTER_MS);
  });

  it('should read delta-seconds', () => {
    expect(parseRetryAfter('2')).toBe(2000);
    expect(parseRetryAfter('0.5')).toBe(500);
  });

  it('should read an HTTP date', () => {
    const now = Date.UTC(2024, 0, 1, 12, 0, 0);
    const value = new Date(now + 3000).toUTCString();
    expect(parseRetryAfter(value, now)).toBe(3000);
  });

  it('should fall back on unreadable values', () => {
    expect(parseRetryAfter('soon')).toBe(DEFAULT_RETRY_AFTER_MS);
  });
});
