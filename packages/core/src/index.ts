/**
 * @playdeck/core
 *
 * Synchronization core of the Playdeck terminal client: API gateway, command
 * queue, poller, application state, dispatcher and renderer.
 *
 * @packageDocumentation
 */

// Application
export { PlaydeckApp } from './App';
export type { AppOptions } from './App';

// Configuration
export {
  loadConfig,
  defineConfig,
  AppConfigSchema,
  KeyBindingsSchema,
  DEFAULT_SESSION_FILE,
} from './config';
export type { AppConfig, KeyBindings } from './config';

// API
export { ApiGateway } from './api/ApiGateway';
export type { ApiGatewayConfig } from './api/ApiGateway';
export { HttpClient, parseRetryAfter, DEFAULT_RETRY_AFTER_MS } from './api/HttpClient';
export type { AccessTokenSource, HttpMethod, RequestConfig } from './api/HttpClient';
export { OPERATIONS, toTrack } from './api/operations';
export type {
  ApiOutcome,
  ApiRequest,
  OperationMap,
  OperationName,
  ParamsOf,
  ResponseOf,
} from './api/operations';
export { DEFAULT_RETRY_POLICY, backoffDelay } from './api/retry';
export type { BackoffRule, RetryPolicy, Sleep } from './api/retry';

// Session
export { SessionManager } from './auth/SessionManager';
export type { SessionManagerConfig, SessionState } from './auth/SessionManager';
export { FileSessionStore, MemorySessionStore, parseStoredSession } from './auth/SessionStore';
export type { Session, SessionStore } from './auth/SessionStore';

// Core tasks
export { CommandQueue, coalescingKey } from './queue/CommandQueue';
export type { CommandExecutor, CommandQueueOptions } from './queue/CommandQueue';
export { Poller } from './poller/Poller';
export type { PollerOptions, PlaybackSource } from './poller/Poller';
export { EventLoop } from './dispatcher/EventLoop';
export type { CommandSink, EventLoopOptions, PollerControl } from './dispatcher/EventLoop';
export {
  LOGGED_OUT_MESSAGE,
  PROGRESS_TOLERANCE_MS,
  reduce,
  RESTART_THRESHOLD_MS,
} from './dispatcher/reducer';
export type { ReduceContext, Transition } from './dispatcher/reducer';
export { buildKeymap, describeBindings, mediaKeyAction } from './dispatcher/keys';
export type { Action, Keymap } from './dispatcher/keys';

// State
export { createInitialState, visibleStatus } from './state/AppState';
export { appendPage, beginFetch, canLoadMore, createList, failFetch } from './state/lists';

// Rendering
export { render, formatDuration, viewTitle } from './render/Renderer';
export type {
  Column,
  Frame,
  FrameSink,
  FrameStatus,
  Gauge,
  PanelLine,
  PanelWidget,
  Playbar,
  TableWidget,
  Tone,
  Widget,
} from './render/frame';

// Side channels
export { MemoryClipboard, NoopMediaControls } from './integration/MediaControls';
export type { Clipboard, MediaControls } from './integration/MediaControls';

// Utilities
export { AsyncChannel, Sequencer } from './utils/channel';
export { EventEmitter } from './utils/events';
export type { EventListener, EventMap } from './utils/events';
export { createLogger, flushLogs, logError, logger } from './utils/logger';
export type { Logger } from './utils/logger';

// Types
export * from './types';
