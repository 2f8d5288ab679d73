/**
 * Dispatcher events and side effects
 *
 * Everything that can change application state arrives as an `AppEvent` on
 * the merged event stream. Everything the reducer wants done outside itself
 * leaves as a `SideEffect`.
 */

import type { ApiOutcome, ApiRequest } from '../api/operations';
import type { ApiError } from './errors';
import type { NowPlayingMetadata, PlaybackSnapshot } from './playback';
import type { OperationId, ViewKind } from './state';

export type MediaKey = 'play' | 'pause' | 'toggle' | 'next' | 'previous' | 'stop';

/**
 * Remote data a result writes to. Sequence numbers are compared per resource.
 */
export type Resource = 'playback' | 'devices' | 'user' | 'playlists' | 'tracks' | 'saved' | 'queue';

/**
 * A user intent bound for the remote service
 */
export interface Command {
  id: number;
  request: ApiRequest;
  resource: Resource;
  /** View generation for view-scoped fetches; null when the result outlives views */
  generation: number | null;
  /** Pending operation this command settles */
  op: OperationId | null;
}

export interface CommandCompletion {
  command: Command;
  /** Sequence number stamped when the request was issued */
  seq: number;
  outcome: ApiOutcome;
}

export type AppEvent =
  | { type: 'started' }
  | { type: 'key_press'; key: string }
  | { type: 'media_key'; key: MediaKey }
  | { type: 'resize'; columns: number; rows: number }
  | ({ type: 'command_completed' } & CommandCompletion)
  | { type: 'command_dropped'; command: Command }
  | { type: 'snapshot_updated'; seq: number; snapshot: PlaybackSnapshot | null }
  | { type: 'poller_error'; error: ApiError }
  | { type: 'session_expired' }
  | { type: 'reauthenticated' }
  | { type: 'reauth_failed'; error: ApiError }
  | { type: 'timer_tick' };

export type AppEventType = AppEvent['type'];

export type SideEffect =
  | { type: 'enqueue'; command: Command }
  | { type: 'redraw' }
  | { type: 'schedule_reauth' }
  | { type: 'set_poller_view'; view: ViewKind }
  | { type: 'poll_now' }
  | { type: 'resume_polling' }
  | { type: 'publish_metadata'; metadata: NowPlayingMetadata | null }
  | { type: 'copy_to_clipboard'; text: string }
  | { type: 'logout' }
  | { type: 'quit' };
