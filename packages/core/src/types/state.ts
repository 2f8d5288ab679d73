/**
 * Shared application state types
 *
 * `AppState` is owned by the dispatcher: it is only ever replaced by the
 * result of `reduce`, never mutated from a background task.
 */

import type { AlbumRef, Device, Playlist, Track, UserProfile } from './library';
import type { PlaybackSnapshot } from './playback';

// ============================================================================
// Views
// ============================================================================

export type ViewState =
  | { kind: 'library' }
  | { kind: 'search'; query: string }
  | { kind: 'playlist'; playlistId: string; name: string; uri: string | null }
  | { kind: 'album'; album: AlbumRef }
  | { kind: 'now_playing' }
  | { kind: 'devices' }
  | { kind: 'help' }
  | { kind: 'error'; message: string; reauth: boolean };

export type ViewKind = ViewState['kind'];

// ============================================================================
// Lists
// ============================================================================

export interface PaginatedList<T> {
  items: T[];
  /** Offset of the next page to fetch, null once the last page is loaded */
  cursor: number | null;
  total: number | null;
  /** A fetch for this list is in flight */
  loading: boolean;
  /** View generation that owns this list */
  generation: number;
}

// ============================================================================
// Pending operations & status
// ============================================================================

export type OperationId =
  | 'toggle-playback'
  | 'toggle-shuffle'
  | 'cycle-repeat'
  | 'set-volume'
  | 'toggle-save'
  | 'transfer-playback';

/** Fields of a snapshot an optimistic mutation may touch */
export type PlaybackPatch = Partial<
  Pick<
    PlaybackSnapshot,
    'isPlaying' | 'shuffle' | 'repeat' | 'volumePercent' | 'deviceId' | 'deviceName'
  >
>;

export interface PendingOperation {
  id: OperationId;
  /** Latest command issued for this operation; earlier completions are stale */
  commandId: number;
  /** Values shown while the command is in flight, kept across polls */
  optimistic: PlaybackPatch;
  /** Values to restore if the command fails */
  revert: PlaybackPatch;
  /** Saved flag flipped by toggle-save, and its previous value */
  saved?: { trackId: string; previous: boolean };
}

export type StatusSeverity = 'info' | 'success' | 'warning' | 'error';

export interface StatusMessage {
  text: string;
  severity: StatusSeverity;
  expiresAt: number;
}

// ============================================================================
// Application state
// ============================================================================

export interface TerminalSize {
  columns: number;
  rows: number;
}

export interface SearchInput {
  open: boolean;
  text: string;
}

export interface AppState {
  view: ViewState;
  /** Views to return to on "back" */
  history: ViewState[];
  /** Incremented on every view change; tags view-scoped fetches */
  generation: number;
  playlists: PaginatedList<Playlist> | null;
  tracks: PaginatedList<Track> | null;
  devices: Device[] | null;
  devicesLoading: boolean;
  /** Selected row in the current view's list */
  selection: number;
  user: UserProfile | null;
  playback: PlaybackSnapshot | null;
  /** Highest sequence number applied per resource */
  applied: Record<string, number>;
  pending: Partial<Record<OperationId, PendingOperation>>;
  /** Saved ("liked") flag per track id, as last reported */
  liked: Record<string, boolean>;
  status: StatusMessage | null;
  input: SearchInput;
  /** Accumulated seek position, applied on the next tick */
  seekTarget: number | null;
  size: TerminalSize;
  sessionExpired: boolean;
  /** The user logged out; nothing but re-authentication or quit is accepted */
  signedOut: boolean;
  /** A command moved the position since the last applied snapshot */
  positionMoved: boolean;
  /** A snapshot whose progress went backwards was held back once */
  progressHeld: boolean;
  nextCommandId: number;
  running: boolean;
}
