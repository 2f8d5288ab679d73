/**
 * Command Queue
 *
 * Bounded FIFO of user-initiated commands, drained by a single worker that
 * issues one request at a time. Serial execution keeps contradictory playback
 * commands (pause, then play) in the order the user gave them.
 *
 * When the queue is full, the oldest command not yet started with the same
 * coalescing key is dropped to make room; only when there is no such
 * duplicate is the new command refused with QueueFullError.
 *
 * Every command taken off the queue is reported through `onComplete`, as a
 * failure if the executor throws.
 */

import type { ApiOutcome, ApiRequest, OperationName } from '../api/operations';
import type { Sleep } from '../api/retry';
import { sleep } from '../api/retry';
import type { ApiError } from '../types/errors';
import { QueueFullError, toApiError } from '../types/errors';
import type { Command, CommandCompletion } from '../types/events';
import type { Result } from '../types/result';
import { err, ok } from '../types/result';
import type { Sequencer } from '../utils/channel';
import { createLogger } from '../utils/logger';

const logger = createLogger('CommandQueue');

export type CommandExecutor = (request: ApiRequest) => Promise<ApiOutcome>;

export interface CommandQueueOptions {
  capacity: number;
  execute: CommandExecutor;
  sequencer: Sequencer;
  onComplete: (completion: CommandCompletion) => void;
  /** Called for commands removed without running (coalesced or cleared) */
  onDrop?: (command: Command) => void;
  sleep?: Sleep;
}

function failedOutcome<K extends OperationName>(
  request: ApiRequest<K>,
  error: ApiError
): ApiOutcome<K> {
  return { operation: request.operation, result: err(error) };
}

/**
 * Commands with the same key are interchangeable for coalescing
 */
export function coalescingKey(command: Command): string {
  return `${command.request.operation}:${command.resource}`;
}

export class CommandQueue {
  private readonly pending: Command[] = [];
  private current: Command | null = null;
  private worker: Promise<void> | null = null;
  private stopped = false;
  private readonly halt = new AbortController();
  private readonly sleep: Sleep;

  constructor(private readonly options: CommandQueueOptions) {
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Add a command and wake the worker
   */
  enqueue(command: Command): Result<void, QueueFullError> {
    if (this.stopped) {
      return err(new QueueFullError('Command queue is stopped', this.options.capacity));
    }

    if (this.pending.length >= this.options.capacity) {
      const key = coalescingKey(command);
      const index = this.pending.findIndex((queued) => coalescingKey(queued) === key);
      if (index === -1) {
        return err(
          new QueueFullError(`Command queue is full (${this.options.capacity})`, this.options.capacity, {
            operation: command.request.operation,
          })
        );
      }
      const [dropped] = this.pending.splice(index, 1);
      if (dropped) {
        logger.debug({ key, dropped: dropped.id, replacement: command.id }, 'Coalesced command');
        this.options.onDrop?.(dropped);
      }
    }

    this.pending.push(command);
    this.wake();
    return ok(undefined);
  }

  /**
   * Drop unstarted commands, all of them or those matching `predicate`
   *
   * @returns Number of commands removed
   */
  clear(predicate: (command: Command) => boolean = () => true): number {
    let removed = 0;
    for (let i = this.pending.length - 1; i >= 0; i--) {
      const command = this.pending[i];
      if (command && predicate(command)) {
        this.pending.splice(i, 1);
        this.options.onDrop?.(command);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Stop accepting commands and wait for the one in flight to finish. A
   * rate-limit pause in progress ends at once.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.pending.length = 0;
    this.halt.abort();
    if (this.worker) {
      await this.worker;
    }
  }

  /** Commands waiting to start */
  get size(): number {
    return this.pending.length;
  }

  /** Command currently being executed */
  get inFlight(): Command | null {
    return this.current;
  }

  /** Resolves once the worker has nothing left to do */
  async idle(): Promise<void> {
    while (this.worker) {
      await this.worker;
    }
  }

  private wake(): void {
    if (this.worker) {
      return;
    }
    this.worker = this.drain()
      .catch((error: unknown) => {
        this.current = null;
        logger.error({ err: error }, 'Command worker failed');
      })
      .finally(() => {
        this.worker = null;
        // A command may have arrived after the loop saw an empty queue
        if (this.pending.length > 0 && !this.stopped) {
          this.wake();
        }
      });
  }

  private async drain(): Promise<void> {
    let command = this.pending.shift();
    while (command && !this.stopped) {
      this.current = command;
      const seq = this.options.sequencer.next();
      logger.debug(
        { id: command.id, seq, operation: command.request.operation },
        'Issuing command'
      );

      let outcome: ApiOutcome;
      try {
        outcome = await this.options.execute(command.request);
      } catch (error) {
        logger.error({ id: command.id, err: error }, 'Command executor failed');
        outcome = failedOutcome(command.request, toApiError(error));
      }
      this.current = null;
      this.options.onComplete({ command, seq, outcome });

      // Hold the next command until the service is ready for it
      if (!outcome.result.ok && outcome.result.error.kind === 'rate_limited') {
        const delay = outcome.result.error.retryAfterMs;
        logger.info({ delay }, 'Rate limited, pausing command worker');
        await this.sleep(delay, this.halt.signal);
      }

      command = this.pending.shift();
    }
  }
}
