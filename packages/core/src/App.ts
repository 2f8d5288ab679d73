/**
 * PlaydeckApp
 *
 * Wires the synchronization core together:
 * - SessionManager + ApiGateway (the only code that talks to the service)
 * - CommandQueue worker and Poller, sharing one Sequencer
 * - EventLoop, the single writer of application state
 *
 * The terminal package supplies the frame sink and pushes input events with
 * `dispatch`.
 */

import { ApiGateway } from './api/ApiGateway';
import type { Sleep } from './api/retry';
import { SessionManager } from './auth/SessionManager';
import type { SessionStore } from './auth/SessionStore';
import type { AppConfig } from './config';
import { EventLoop } from './dispatcher/EventLoop';
import type { Clipboard, MediaControls } from './integration/MediaControls';
import { MemoryClipboard, NoopMediaControls } from './integration/MediaControls';
import { Poller } from './poller/Poller';
import { CommandQueue } from './queue/CommandQueue';
import type { FrameSink } from './render/frame';
import { createInitialState } from './state/AppState';
import type { AppEvent } from './types/events';
import type { AppState, TerminalSize } from './types/state';
import { Sequencer } from './utils/channel';
import { createLogger } from './utils/logger';

const logger = createLogger('PlaydeckApp');

export interface AppOptions {
  config: AppConfig;
  store: SessionStore;
  sink: FrameSink;
  mediaControls?: MediaControls;
  clipboard?: Clipboard;
  size?: TerminalSize;
  /** Replaces waits between retries and after rate limits */
  sleep?: Sleep;
  now?: () => number;
}

export class PlaydeckApp {
  readonly session: SessionManager;
  readonly gateway: ApiGateway;
  readonly queue: CommandQueue;
  readonly poller: Poller;
  readonly loop: EventLoop;
  private readonly mediaControls: MediaControls;
  private unsubscribeMediaKeys: (() => void) | null = null;

  constructor(options: AppOptions) {
    const { config } = options;
    const sequencer = new Sequencer();

    this.mediaControls = options.mediaControls ?? new NoopMediaControls();

    this.session = new SessionManager(
      {
        clientId: config.clientId,
        tokenUrl: config.tokenUrl,
        timeout: config.requestTimeoutMs,
        now: options.now,
      },
      options.store
    );

    this.gateway = new ApiGateway(this.session, {
      apiUrl: config.apiUrl,
      requestTimeoutMs: config.requestTimeoutMs,
      sleep: options.sleep,
      now: options.now,
    });

    this.queue = new CommandQueue({
      capacity: config.queueCapacity,
      execute: (request) => this.gateway.execute(request),
      sequencer,
      onComplete: (completion) => this.dispatch({ type: 'command_completed', ...completion }),
      onDrop: (command) => this.dispatch({ type: 'command_dropped', command }),
      sleep: options.sleep,
    });

    this.poller = new Poller({
      fetchPlayback: () => this.gateway.call('getPlayback', {}),
      sequencer,
      emit: (event) => this.dispatch(event),
      fastMs: config.pollFastMs,
      slowMs: config.pollSlowMs,
      now: options.now,
    });

    this.loop = new EventLoop({
      config,
      commands: this.queue,
      poller: this.poller,
      reauthenticate: () => this.gateway.reauthenticate(),
      logout: () => this.session.invalidate(),
      sink: options.sink,
      mediaControls: this.mediaControls,
      clipboard: options.clipboard ?? new MemoryClipboard(),
      initialState: createInitialState(options.size),
      now: options.now,
    });
  }

  /**
   * Load the stored session
   *
   * @returns Whether a session was found
   * @throws StorageCorruptError if the stored session cannot be read
   */
  async initialize(): Promise<boolean> {
    return this.session.initialize();
  }

  /**
   * Start a session from a refresh token obtained by a login flow
   */
  async authenticate(refreshToken: string): Promise<void> {
    await this.session.authenticate(refreshToken);
  }

  /**
   * Push an event into the merged stream
   */
  dispatch(event: AppEvent): void {
    if (!this.loop.dispatch(event)) {
      logger.debug({ type: event.type }, 'Event after shutdown dropped');
    }
  }

  /**
   * Run until the user quits
   *
   * @returns The final application state
   */
  async run(): Promise<AppState> {
    this.unsubscribeMediaKeys = this.mediaControls.onMediaKey((key) => {
      this.dispatch({ type: 'media_key', key });
    });

    this.poller.start();
    this.dispatch({ type: 'started' });
    logger.info('Started');

    try {
      return await this.loop.run();
    } finally {
      await this.shutdown();
    }
  }

  /**
   * Ask the loop to finish after the current batch
   */
  stop(): void {
    this.loop.close();
  }

  private async shutdown(): Promise<void> {
    this.unsubscribeMediaKeys?.();
    this.unsubscribeMediaKeys = null;
    this.poller.stop();
    this.loop.close();
    // Ends retry waits so the command in flight settles promptly
    this.gateway.close();
    await this.queue.stop();
    logger.info('Stopped');
  }
}
