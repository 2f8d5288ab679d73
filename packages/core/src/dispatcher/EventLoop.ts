/**
 * Event loop
 *
 * The single writer of application state. Every producer (terminal input,
 * media keys, the command worker, the poller, the tick timer) pushes events
 * into one channel; the loop waits for the next event, takes the rest of the
 * batch already queued, reduces each event in order, runs the resulting side
 * effects, and draws one frame per batch.
 *
 * Network work started by side effects runs in background tasks whose results
 * come back as events. The loop itself only ever waits on the channel.
 */

import type { AppConfig } from '../config';
import type { ApiError, QueueFullError } from '../types/errors';
import type { AppEvent, Command, SideEffect } from '../types/events';
import type { Result } from '../types/result';
import type { AppState, ViewKind } from '../types/state';
import type { Clipboard, MediaControls } from '../integration/MediaControls';
import type { FrameSink } from '../render/frame';
import { render } from '../render/Renderer';
import { createInitialState } from '../state/AppState';
import { AsyncChannel } from '../utils/channel';
import { createLogger } from '../utils/logger';
import type { Keymap } from './keys';
import { buildKeymap } from './keys';
import type { ReduceContext } from './reducer';
import { reduce } from './reducer';

const logger = createLogger('EventLoop');

export interface CommandSink {
  enqueue(command: Command): Result<void, QueueFullError>;
  /** Drop every command not yet started */
  clear(): number;
}

export interface PollerControl {
  setView(view: ViewKind): void;
  pollNow(): void;
  pause(): void;
  resume(): void;
}

export interface EventLoopOptions {
  config: AppConfig;
  commands: CommandSink;
  poller: PollerControl;
  reauthenticate: () => Promise<Result<void, ApiError>>;
  /** Forget the stored session */
  logout: () => Promise<void>;
  sink: FrameSink;
  mediaControls: MediaControls;
  clipboard: Clipboard;
  initialState?: AppState;
  now?: () => number;
}

export class EventLoop {
  readonly events = new AsyncChannel<AppEvent>();
  private state: AppState;
  private readonly keymap: Keymap;
  private readonly now: () => number;
  private ticker: ReturnType<typeof setInterval> | null = null;
  private reauthInFlight = false;
  private frames = 0;

  constructor(private readonly options: EventLoopOptions) {
    this.state = options.initialState ?? createInitialState();
    this.keymap = buildKeymap(options.config.keys);
    this.now = options.now ?? Date.now;
  }

  /**
   * Push an event from any task
   */
  dispatch(event: AppEvent): boolean {
    return this.events.push(event);
  }

  getState(): AppState {
    return this.state;
  }

  /** Frames drawn so far */
  get frameCount(): number {
    return this.frames;
  }

  /**
   * Run until a quit effect or until the channel is closed
   *
   * @returns The final state
   */
  async run(): Promise<AppState> {
    this.startTicker();
    this.draw();

    try {
      while (this.state.running) {
        const first = await this.events.next();
        if (!first) {
          break;
        }
        this.processBatch([first, ...this.events.drain()]);
      }
    } finally {
      this.stopTicker();
    }

    logger.info({ frames: this.frames }, 'Event loop finished');
    return this.state;
  }

  /**
   * Apply a batch of events and draw once. Exposed for deterministic tests.
   */
  processBatch(batch: AppEvent[]): void {
    let redraw = false;

    for (const event of batch) {
      const ctx: ReduceContext = {
        now: this.now(),
        config: this.options.config,
        keymap: this.keymap,
      };
      const { state, effects } = reduce(this.state, event, ctx);
      this.state = state;

      for (const effect of effects) {
        if (effect.type === 'redraw') {
          redraw = true;
        } else {
          this.runEffect(effect);
        }
      }

      if (!this.state.running) {
        break;
      }
    }

    if (redraw) {
      this.draw();
    }
  }

  /**
   * Stop waiting for events; `run()` returns once the current batch is done
   */
  close(): void {
    this.events.close();
  }

  private draw(): void {
    const frame = render(this.state, this.now(), this.options.config.keys);
    try {
      this.options.sink.draw(frame);
      this.frames += 1;
    } catch (error) {
      logger.error({ err: error }, 'Failed to draw frame');
    }
  }

  private runEffect(effect: Exclude<SideEffect, { type: 'redraw' }>): void {
    switch (effect.type) {
      case 'enqueue': {
        const result = this.options.commands.enqueue(effect.command);
        if (!result.ok) {
          logger.debug(
            { command: effect.command.id, message: result.error.message },
            'Command not queued'
          );
          this.dispatch({ type: 'command_dropped', command: effect.command });
        }
        return;
      }
      case 'schedule_reauth':
        this.startReauth();
        return;
      case 'set_poller_view':
        this.options.poller.setView(effect.view);
        return;
      case 'poll_now':
        this.options.poller.pollNow();
        return;
      case 'resume_polling':
        this.options.poller.resume();
        return;
      case 'publish_metadata':
        try {
          this.options.mediaControls.publish(effect.metadata);
        } catch (error) {
          logger.warn({ err: error }, 'Failed to publish now playing metadata');
        }
        return;
      case 'copy_to_clipboard':
        this.options.clipboard.copy(effect.text).catch((error: unknown) => {
          logger.warn({ err: error }, 'Failed to copy to clipboard');
        });
        return;
      case 'logout': {
        const cleared = this.options.commands.clear();
        this.options.poller.pause();
        logger.info({ cleared }, 'Logging out');
        this.options.logout().catch((error: unknown) => {
          logger.error({ err: error }, 'Failed to clear the stored session');
        });
        return;
      }
      case 'quit':
        logger.info('Quit requested');
        return;
    }
  }

  private startReauth(): void {
    if (this.reauthInFlight) {
      return;
    }
    this.reauthInFlight = true;

    this.options
      .reauthenticate()
      .then((result) => {
        this.dispatch(
          result.ok ? { type: 'reauthenticated' } : { type: 'reauth_failed', error: result.error }
        );
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Re-authentication task failed');
      })
      .finally(() => {
        this.reauthInFlight = false;
      });
  }

  private startTicker(): void {
    this.ticker = setInterval(() => {
      this.dispatch({ type: 'timer_tick' });
    }, this.options.config.tickMs);
  }

  private stopTicker(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
  }
}
