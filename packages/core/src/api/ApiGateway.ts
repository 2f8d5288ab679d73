/**
 * API Gateway
 *
 * The only component that talks to the remote service. Every call:
 * 1. makes sure the session is fresh (refreshing first when near expiry),
 * 2. issues the request through the HttpClient (which refreshes once on 401),
 * 3. validates and maps the response onto domain types,
 * 4. retries transient failures according to the retry policy,
 * and resolves to a Result. Calls never reject.
 */

import type { SessionManager } from '../auth/SessionManager';
import type { ApiError } from '../types/errors';
import { toApiError, TransientError, UnauthorizedError } from '../types/errors';
import type { Result } from '../types/result';
import { err, ok } from '../types/result';
import { createLogger } from '../utils/logger';
import { HttpClient } from './HttpClient';
import type {
  ApiOutcome,
  ApiRequest,
  OperationDef,
  OperationName,
  OperationTable,
  ParamsOf,
  ResponseOf,
} from './operations';
import { OPERATIONS } from './operations';
import type { RetryPolicy, Sleep } from './retry';
import { backoffDelay, DEFAULT_RETRY_POLICY, sleep } from './retry';

const logger = createLogger('ApiGateway');

export interface ApiGatewayConfig {
  apiUrl: string;
  requestTimeoutMs?: number;
  retryPolicy?: RetryPolicy;
  /** Waits between retries; replaced in tests */
  sleep?: Sleep;
  now?: () => number;
  operations?: OperationTable;
}

export class ApiGateway {
  private readonly http: HttpClient;
  private readonly retryPolicy: RetryPolicy;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly operations: OperationTable;
  private readonly closing = new AbortController();

  constructor(
    private readonly session: SessionManager,
    config: ApiGatewayConfig
  ) {
    this.http = new HttpClient(session, {
      baseURL: config.apiUrl,
      timeout: config.requestTimeoutMs,
    });
    this.retryPolicy = config.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.sleep = config.sleep ?? sleep;
    this.now = config.now ?? Date.now;
    this.operations = config.operations ?? OPERATIONS;
  }

  /**
   * Issue one operation
   *
   * @example
   * ```typescript
   * const result = await gateway.call('getPlaylists', { offset: 0, limit: 50 });
   * if (result.ok) {
   *   console.log(result.value.items.map((p) => p.name));
   * }
   * ```
   */
  async call<K extends OperationName>(
    operation: K,
    params: ParamsOf<K>
  ): Promise<Result<ResponseOf<K>, ApiError>> {
    const def: OperationDef<K> = this.operations[operation];

    for (let retry = 1; ; retry++) {
      if (this.closing.signal.aborted) {
        return err(new TransientError('Gateway closed', undefined, { operation }));
      }
      try {
        await this.session.ensureFresh();
        const route = def.describe(params, this.now());
        const body = await this.http.request({
          url: route.path,
          method: route.method,
          params: route.query,
          data: route.body,
          signal: this.closing.signal,
        });
        return ok(def.parse(body, this.now(), params));
      } catch (error) {
        const apiError = toApiError(error);
        const delay = backoffDelay(this.retryPolicy, apiError, retry);
        if (delay === null || this.closing.signal.aborted) {
          logger.debug(
            { operation, kind: apiError.kind, message: apiError.message },
            'Operation failed'
          );
          return err(apiError);
        }
        logger.warn({ operation, retry, delay, message: apiError.message }, 'Retrying operation');
        await this.sleep(delay, this.closing.signal);
      }
    }
  }

  /**
   * Issue a request carried as data, keeping the operation name on the outcome
   */
  async execute<K extends OperationName>(request: ApiRequest<K>): Promise<ApiOutcome<K>> {
    const result = await this.call(request.operation, request.params);
    return { operation: request.operation, result };
  }

  /**
   * Cancel in-flight requests and retry waits. Later calls fail at once.
   */
  close(): void {
    this.closing.abort();
  }

  /**
   * Try to get a working session back after an Unauthorized result: reload
   * whatever is stored (a login elsewhere may have replaced it), then refresh.
   */
  async reauthenticate(): Promise<Result<void, ApiError>> {
    try {
      const found = await this.session.initialize();
      if (!found) {
        return err(new UnauthorizedError('No stored session to restore'));
      }
      await this.session.refresh();
      logger.info('Re-authenticated');
      return ok(undefined);
    } catch (error) {
      const apiError = toApiError(error);
      logger.warn({ kind: apiError.kind, message: apiError.message }, 'Re-authentication failed');
      return err(apiError);
    }
  }
}
