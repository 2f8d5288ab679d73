/**
 * Session Manager
 *
 * Owns the access/refresh token pair. Nothing outside the API gateway reads
 * the session; the HTTP client only ever sees the current access token.
 *
 * - Proactive refresh when the token is expired or about to expire
 * - Reactive refresh on 401 (driven by HttpClient)
 * - Single-flight refresh: concurrent callers share one in-progress refresh
 * - Persistence through a SessionStore after every successful refresh
 */

import type { Session, SessionStore } from './SessionStore';
import { TransientError, UnauthorizedError } from '../types/errors';
import { TokenResponseSchema } from '../utils/validators';
import { validate } from '../utils/validation';
import type { z } from 'zod';
import { createLogger } from '../utils/logger';

const logger = createLogger('SessionManager');

type TokenResponse = z.infer<typeof TokenResponseSchema>;

export interface SessionState {
  isValid: boolean;
  expiresAt: Date;
  timeUntilExpiry: number;
  needsRefresh: boolean;
}

export interface SessionManagerConfig {
  clientId: string;
  tokenUrl: string;
  /** Refresh this long before expiry */
  refreshMarginMs?: number;
  timeout?: number;
  now?: () => number;
}

export class SessionManager {
  private readonly config: Required<Omit<SessionManagerConfig, 'now'>>;
  private readonly now: () => number;
  private session: Session | null = null;
  private refreshPromise: Promise<void> | null = null;

  constructor(
    config: SessionManagerConfig,
    private readonly store: SessionStore
  ) {
    this.config = {
      clientId: config.clientId,
      tokenUrl: config.tokenUrl,
      refreshMarginMs: config.refreshMarginMs ?? 60_000,
      timeout: config.timeout ?? 10_000,
    };
    this.now = config.now ?? Date.now;
  }

  /**
   * Load a previously saved session
   *
   * @returns Whether a session was found
   * @throws StorageCorruptError if the stored session cannot be read
   */
  async initialize(): Promise<boolean> {
    this.session = await this.store.load();
    if (this.session) {
      logger.debug({ expiresAt: this.session.expiresAt }, 'Restored session from storage');
    }
    return this.session !== null;
  }

  /**
   * Create a session from a refresh token obtained elsewhere (login flow)
   */
  async authenticate(refreshToken: string): Promise<void> {
    this.session = { accessToken: '', refreshToken, expiresAt: 0 };
    await this.refresh();
    logger.info('Authentication successful');
  }

  hasSession(): boolean {
    return this.session !== null;
  }

  getAccessToken(): string | null {
    return this.session?.accessToken || null;
  }

  /**
   * Get current session state
   */
  getSessionState(): SessionState {
    if (!this.session) {
      return {
        isValid: false,
        expiresAt: new Date(0),
        timeUntilExpiry: 0,
        needsRefresh: false,
      };
    }

    const timeUntilExpiry = this.session.expiresAt - this.now();
    return {
      isValid: timeUntilExpiry > 0,
      expiresAt: new Date(this.session.expiresAt),
      timeUntilExpiry,
      needsRefresh: timeUntilExpiry < this.config.refreshMarginMs,
    };
  }

  /**
   * Refresh first if the token is expired or near expiry
   */
  async ensureFresh(): Promise<void> {
    if (!this.session) {
      throw new UnauthorizedError('Not authenticated');
    }
    if (this.getSessionState().needsRefresh) {
      await this.refresh();
    }
  }

  /**
   * Refresh the access token. Concurrent calls share the refresh in progress.
   *
   * @throws UnauthorizedError when the refresh token is rejected
   * @throws TransientError when the token endpoint cannot be reached
   */
  refresh(): Promise<void> {
    if (!this.refreshPromise) {
      this.refreshPromise = this.performRefresh().finally(() => {
        this.refreshPromise = null;
      });
    }
    return this.refreshPromise;
  }

  /**
   * Forget the session (logout)
   */
  async invalidate(): Promise<void> {
    this.session = null;
    await this.store.clear();
    logger.info('Session invalidated');
  }

  private async performRefresh(): Promise<void> {
    const current = this.session;
    if (!current) {
      throw new UnauthorizedError('Not authenticated');
    }

    logger.debug('Refreshing access token');

    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: current.refreshToken,
      client_id: this.config.clientId,
    });

    let response: Response;
    try {
      response = await fetch(this.config.tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
        signal: AbortSignal.timeout(this.config.timeout),
      });
    } catch (error) {
      throw new TransientError('Token endpoint unreachable', error, { url: this.config.tokenUrl });
    }

    if (response.status >= 500) {
      throw new TransientError(`Token refresh failed: HTTP ${response.status}`, undefined, {
        statusCode: response.status,
      });
    }

    if (!response.ok) {
      const errorText = await response.text().catch(() => '');
      throw new UnauthorizedError(`Token refresh rejected: HTTP ${response.status}`, undefined, {
        errorText,
      });
    }

    const token = await this.readTokenResponse(response);
    const next: Session = {
      accessToken: token.access_token,
      refreshToken: token.refresh_token ?? current.refreshToken,
      expiresAt: this.now() + token.expires_in * 1000,
    };

    // Someone logged out while the request was in flight
    if (this.session !== current) {
      throw new UnauthorizedError('Session changed during refresh');
    }
    this.session = next;

    try {
      await this.store.save(next);
    } catch (error) {
      logger.error({ err: error }, 'Failed to persist refreshed session');
    }

    logger.info({ expiresAt: new Date(next.expiresAt).toISOString() }, 'Session refreshed');
  }

  private async readTokenResponse(response: Response): Promise<TokenResponse> {
    try {
      return validate(TokenResponseSchema, await response.json(), 'token response');
    } catch (error) {
      throw new UnauthorizedError('Token refresh returned an unusable response', error);
    }
  }
}
