/**
 * Playback Poller
 *
 * Fetches playback state on a timer and reports results as events. The
 * interval adapts to what is on screen: `fastMs` while the now-playing view is
 * open, `slowMs` otherwise.
 *
 * - Never more than one poll in flight; a tick that finds one running is skipped
 * - RateLimited: nothing is fetched until retry-after has elapsed
 * - Unauthorized: emits session_expired and pauses until `resume()`
 */

import type { ApiError } from '../types/errors';
import type { AppEvent } from '../types/events';
import type { PlaybackSnapshot } from '../types/playback';
import type { Result } from '../types/result';
import type { ViewKind } from '../types/state';
import type { Sequencer } from '../utils/channel';
import { createLogger } from '../utils/logger';

const logger = createLogger('Poller');

export type PlaybackSource = () => Promise<Result<PlaybackSnapshot | null, ApiError>>;

export interface PollerOptions {
  fetchPlayback: PlaybackSource;
  sequencer: Sequencer;
  emit: (event: AppEvent) => void;
  fastMs: number;
  slowMs: number;
  now?: () => number;
}

export class Poller {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight = false;
  private pollRequested = false;
  private running = false;
  private paused = false;
  private interval: number;
  private blockedUntil = 0;
  private readonly now: () => number;

  constructor(private readonly options: PollerOptions) {
    this.interval = options.slowMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Start polling, with the first fetch right away
   */
  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    this.paused = false;
    this.schedule(0);
  }

  stop(): void {
    this.running = false;
    this.clearTimer();
  }

  /**
   * Pick the interval for the view now on screen
   */
  setView(view: ViewKind): void {
    const interval = view === 'now_playing' ? this.options.fastMs : this.options.slowMs;
    if (interval === this.interval) {
      return;
    }
    this.interval = interval;
    logger.debug({ view, interval }, 'Poll interval changed');
    if (this.canSchedule() && !this.inFlight) {
      this.schedule(this.delayUntilAllowed(interval));
    }
  }

  /**
   * Poll as soon as allowed, e.g. right after a transport command
   */
  pollNow(): void {
    if (!this.canSchedule()) {
      return;
    }
    if (this.inFlight) {
      this.pollRequested = true;
      return;
    }
    this.schedule(this.delayUntilAllowed(0));
  }

  /**
   * Stop polling until `resume()`. A poll in flight is discarded.
   */
  pause(): void {
    if (!this.running || this.paused) {
      return;
    }
    this.paused = true;
    this.clearTimer();
    logger.info('Polling paused');
  }

  /**
   * Resume after re-authentication
   */
  resume(): void {
    if (!this.running || !this.paused) {
      return;
    }
    this.paused = false;
    logger.info('Polling resumed');
    this.schedule(this.delayUntilAllowed(0));
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get currentInterval(): number {
    return this.interval;
  }

  private canSchedule(): boolean {
    return this.running && !this.paused;
  }

  private delayUntilAllowed(delay: number): number {
    return Math.max(delay, this.blockedUntil - this.now());
  }

  private schedule(delay: number): void {
    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch((error: unknown) => {
        this.inFlight = false;
        logger.error({ err: error }, 'Poll tick failed');
      });
    }, delay);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private async tick(): Promise<void> {
    if (!this.canSchedule()) {
      return;
    }
    if (this.inFlight) {
      logger.debug('Previous poll still in flight, skipping tick');
      return;
    }

    this.inFlight = true;
    this.pollRequested = false;
    const seq = this.options.sequencer.next();
    const result = await this.options.fetchPlayback();
    this.inFlight = false;

    if (!this.canSchedule()) {
      return;
    }

    if (result.ok) {
      this.options.emit({ type: 'snapshot_updated', seq, snapshot: result.value });
      this.schedule(this.pollRequested ? 0 : this.interval);
      return;
    }

    const error = result.error;
    switch (error.kind) {
      case 'rate_limited':
        this.blockedUntil = this.now() + error.retryAfterMs;
        logger.warn({ retryAfterMs: error.retryAfterMs }, 'Rate limited, backing off');
        this.options.emit({ type: 'poller_error', error });
        this.schedule(Math.max(error.retryAfterMs, this.interval));
        return;
      case 'unauthorized':
        this.paused = true;
        logger.warn('Session expired, polling paused');
        this.options.emit({ type: 'session_expired' });
        return;
      default:
        logger.warn({ kind: error.kind, message: error.message }, 'Poll failed');
        this.options.emit({ type: 'poller_error', error });
        this.schedule(this.interval);
    }
  }
}
