/**
 * Application state construction and small pure updates shared by the reducer
 */

import type { PlaybackSnapshot } from '../types/playback';
import type {
  AppState,
  PendingOperation,
  PlaybackPatch,
  StatusMessage,
  StatusSeverity,
  TerminalSize,
} from '../types/state';

export const DEFAULT_SIZE: TerminalSize = { columns: 80, rows: 24 };

export function createInitialState(size: TerminalSize = DEFAULT_SIZE): AppState {
  return {
    view: { kind: 'library' },
    history: [],
    generation: 0,
    playlists: null,
    tracks: null,
    devices: null,
    devicesLoading: false,
    selection: 0,
    user: null,
    playback: null,
    applied: {},
    pending: {},
    liked: {},
    status: null,
    input: { open: false, text: '' },
    seekTarget: null,
    size,
    sessionExpired: false,
    signedOut: false,
    positionMoved: false,
    progressHeld: false,
    nextCommandId: 1,
    running: true,
  };
}

// ============================================================================
// Status line
// ============================================================================

/**
 * Replace the status message; the new one expires `ttlMs` from now
 */
export function withStatus(
  state: AppState,
  text: string,
  severity: StatusSeverity,
  now: number,
  ttlMs: number
): AppState {
  const status: StatusMessage = { text, severity, expiresAt: now + ttlMs };
  return { ...state, status };
}

/**
 * Drop the status message once it has expired
 */
export function expireStatus(state: AppState, now: number): AppState {
  if (state.status && now >= state.status.expiresAt) {
    return { ...state, status: null };
  }
  return state;
}

export function visibleStatus(state: AppState, now: number): StatusMessage | null {
  return state.status && now < state.status.expiresAt ? state.status : null;
}

// ============================================================================
// Playback snapshots
// ============================================================================

export function applyPatch(snapshot: PlaybackSnapshot, patch: PlaybackPatch): PlaybackSnapshot {
  return { ...snapshot, ...patch };
}

/**
 * Lay the optimistic values of every pending operation over a snapshot, so a
 * poll taken before a command landed does not flicker the UI back
 */
export function withOptimistic(
  snapshot: PlaybackSnapshot,
  pending: AppState['pending']
): PlaybackSnapshot {
  const operations = Object.values(pending).filter(
    (operation): operation is PendingOperation => operation !== undefined
  );
  return operations.reduce((acc, operation) => applyPatch(acc, operation.optimistic), snapshot);
}

/**
 * Highest sequence number applied so far for a resource
 */
export function appliedSeq(state: AppState, resource: string): number {
  return state.applied[resource] ?? 0;
}

export function markApplied(state: AppState, resource: string, seq: number): AppState {
  if (seq <= appliedSeq(state, resource)) {
    return state;
  }
  return { ...state, applied: { ...state.applied, [resource]: seq } };
}
