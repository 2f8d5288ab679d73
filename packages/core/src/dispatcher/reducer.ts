/**
 * Dispatcher reducer
 *
 * `reduce(state, event, ctx)` is the only place application state changes.
 * It is pure: given the same state, event and context it returns the same new
 * state and the same list of side effects, and it never performs I/O.
 *
 * Stale results are dropped by three rules:
 * - sequence numbers: a result older than the newest applied for its resource
 * - generations: a view-scoped result issued for a view that has since been left
 * - pending operations: a completion for an operation that is no longer
 *   pending, or was re-issued since
 *
 * Displayed progress of one item never moves backwards on a poll alone: a
 * snapshot behind the interpolated position is held back once, and accepted
 * when the next poll confirms it or a command of ours moved the position.
 */

import type { ApiRequest } from '../api/operations';
import type { AppConfig } from '../config';
import type { ApiError } from '../types/errors';
import { describeError, SESSION_EXPIRED_MESSAGE } from '../types/errors';
import type { AppEvent, Command, CommandCompletion, Resource, SideEffect } from '../types/events';
import type { AlbumRef, Device, Page, Playlist, Track } from '../types/library';
import { LIKED_SONGS_ID, parseResourceUri } from '../types/library';
import type { NowPlayingMetadata, PlaybackSnapshot } from '../types/playback';
import { interpolateProgress, nextRepeatMode } from '../types/playback';
import type {
  AppState,
  OperationId,
  PaginatedList,
  PendingOperation,
  PlaybackPatch,
  StatusSeverity,
  ViewState,
} from '../types/state';
import {
  appliedSeq,
  applyPatch,
  expireStatus,
  markApplied,
  withOptimistic,
  withStatus,
} from '../state/AppState';
import { appendPage, beginFetch, canLoadMore, createList, failFetch } from '../state/lists';
import type { Action, Keymap } from './keys';
import { mediaKeyAction } from './keys';

export interface ReduceContext {
  now: number;
  config: AppConfig;
  keymap: Keymap;
}

export interface Transition {
  state: AppState;
  effects: SideEffect[];
}

/** "Previous" restarts the current item instead once this far in */
export const RESTART_THRESHOLD_MS = 3000;

/** Rows moved by page up / page down */
const PAGE_STEP = 10;

/** Tracks handed to the player when starting from a list without a context */
const PLAY_WINDOW = 50;

/** Backwards progress within this is clock jitter, not a seek */
export const PROGRESS_TOLERANCE_MS = 2000;

export const LOGGED_OUT_MESSAGE = 'Logged out. Press enter once a new session is stored';

// ============================================================================
// Draft: accumulates one transition
// ============================================================================

interface IssueOptions {
  generation?: number | null;
  op?: OperationId | null;
}

interface PendingOptions {
  op: OperationId;
  optimistic: PlaybackPatch;
  revert: PlaybackPatch;
  saved?: PendingOperation['saved'];
}

class Draft {
  readonly effects: SideEffect[] = [];
  private readonly initial: AppState;

  constructor(
    public state: AppState,
    readonly ctx: ReduceContext
  ) {
    this.initial = state;
  }

  update(patch: Partial<AppState>): void {
    this.state = { ...this.state, ...patch };
  }

  effect(effect: SideEffect): void {
    this.effects.push(effect);
  }

  status(text: string, severity: StatusSeverity): void {
    this.state = withStatus(this.state, text, severity, this.ctx.now, this.ctx.config.statusTtlMs);
  }

  /**
   * Build a command with the next command id and queue its enqueue effect
   */
  enqueue(request: ApiRequest, resource: Resource, options: IssueOptions = {}): Command {
    const command: Command = {
      id: this.state.nextCommandId,
      request,
      resource,
      generation: options.generation ?? null,
      op: options.op ?? null,
    };
    this.update({ nextCommandId: command.id + 1 });
    this.effect({ type: 'enqueue', command });
    return command;
  }

  /**
   * Enqueue a playback command, optionally as a pending operation with an
   * optimistic update. Re-issuing a pending operation keeps its first revert.
   */
  playbackCommand(request: ApiRequest, pending?: PendingOptions): Command {
    const command = this.enqueue(request, pending?.saved ? 'saved' : 'playback', {
      op: pending?.op ?? null,
    });
    if (!pending) {
      return command;
    }

    const existing = this.state.pending[pending.op];
    const operation: PendingOperation = {
      id: pending.op,
      commandId: command.id,
      optimistic: { ...existing?.optimistic, ...pending.optimistic },
      revert: existing?.revert ?? pending.revert,
      saved: existing?.saved ?? pending.saved,
    };
    const playback = this.state.playback
      ? applyPatch(this.state.playback, pending.optimistic)
      : null;
    this.update({ pending: { ...this.state.pending, [pending.op]: operation }, playback });
    return command;
  }

  result(): Transition {
    if (this.state !== this.initial && !this.effects.some((e) => e.type === 'redraw')) {
      this.effects.push({ type: 'redraw' });
    }
    return { state: this.state, effects: this.effects };
  }
}

// ============================================================================
// Entry point
// ============================================================================

export function reduce(state: AppState, event: AppEvent, ctx: ReduceContext): Transition {
  const d = new Draft(state, ctx);

  switch (event.type) {
    case 'started':
      d.enqueue({ operation: 'getUser', params: {} }, 'user');
      enterView(d, state.view, false);
      d.effect({ type: 'poll_now' });
      break;
    case 'key_press':
      onKey(d, event.key);
      break;
    case 'media_key':
      if (!d.state.signedOut) {
        perform(d, mediaKeyAction(event.key));
      }
      break;
    case 'resize':
      d.update({ size: { columns: event.columns, rows: event.rows } });
      break;
    case 'command_completed':
      if (!d.state.signedOut) {
        onCompleted(d, event);
      }
      break;
    case 'command_dropped':
      onDropped(d, event.command);
      break;
    case 'snapshot_updated':
      if (!d.state.signedOut) {
        applySnapshot(d, event.seq, event.snapshot);
      }
      break;
    case 'poller_error':
      if (!d.state.signedOut) {
        d.status(describeError(event.error), severityOf(event.error));
      }
      break;
    case 'session_expired':
      if (!d.state.signedOut) {
        expireSession(d, SESSION_EXPIRED_MESSAGE);
      }
      break;
    case 'reauthenticated':
      onReauthenticated(d);
      break;
    case 'reauth_failed':
      if (d.state.view.kind === 'error') {
        d.update({
          view: {
            kind: 'error',
            message: `Re-authentication failed: ${event.error.message}`,
            reauth: true,
          },
        });
      }
      break;
    case 'timer_tick':
      onTick(d);
      break;
  }

  return d.result();
}

function severityOf(error: ApiError): StatusSeverity {
  return error.kind === 'rate_limited' ? 'warning' : 'error';
}

// ============================================================================
// Input
// ============================================================================

function onKey(d: Draft, key: string): void {
  const { input, view } = d.state;

  if (input.open) {
    onPromptKey(d, key);
    return;
  }

  if (view.kind === 'error' && view.reauth && key === 'enter') {
    d.status('Re-authenticating…', 'info');
    d.effect({ type: 'schedule_reauth' });
    return;
  }

  const action = d.ctx.keymap.get(key);
  if (!action) {
    return;
  }
  if (d.state.signedOut) {
    // Re-authenticate or leave
    if (action === 'quit' || action === 'back') {
      perform(d, 'quit');
    }
    return;
  }
  perform(d, action);
}

function onPromptKey(d: Draft, key: string): void {
  const { text } = d.state.input;

  switch (key) {
    case 'ctrl-c':
      perform(d, 'quit');
      return;
    case 'escape':
      d.update({ input: { open: false, text: '' } });
      return;
    case 'enter': {
      const query = text.trim();
      d.update({ input: { open: false, text: '' } });
      if (query) {
        enterView(d, { kind: 'search', query });
      }
      return;
    }
    case 'backspace':
      d.update({ input: { open: true, text: text.slice(0, -1) } });
      return;
    default:
      if (key.length === 1) {
        d.update({ input: { open: true, text: text + key } });
      }
  }
}

function perform(d: Draft, action: Action): void {
  switch (action) {
    case 'quit':
      d.update({ running: false });
      d.effect({ type: 'quit' });
      return;
    case 'back':
      goBack(d);
      return;
    case 'toggle_playback':
      setPlaying(d, null);
      return;
    case 'play':
      setPlaying(d, true);
      return;
    case 'pause':
      setPlaying(d, false);
      return;
    case 'next_track':
      transport(d, { operation: 'next', params: {} });
      return;
    case 'previous_track':
      previousTrack(d);
      return;
    case 'volume_up':
      changeVolume(d, d.ctx.config.volumeStep);
      return;
    case 'volume_down':
      changeVolume(d, -d.ctx.config.volumeStep);
      return;
    case 'seek_forwards':
      accumulateSeek(d, d.ctx.config.seekStepMs);
      return;
    case 'seek_backwards':
      accumulateSeek(d, -d.ctx.config.seekStepMs);
      return;
    case 'toggle_shuffle':
      toggleShuffle(d);
      return;
    case 'cycle_repeat':
      cycleRepeat(d);
      return;
    case 'open_search':
      d.update({ input: { open: true, text: '' } });
      return;
    case 'show_devices':
      enterView(d, { kind: 'devices' });
      return;
    case 'show_library':
      enterView(d, { kind: 'library' });
      return;
    case 'show_liked':
      enterView(d, {
        kind: 'playlist',
        playlistId: LIKED_SONGS_ID,
        name: 'Liked Songs',
        uri: null,
      });
      return;
    case 'show_now_playing':
      enterView(d, { kind: 'now_playing' });
      return;
    case 'show_help':
      enterView(d, { kind: 'help' });
      return;
    case 'load_more':
      loadMore(d);
      return;
    case 'copy_url':
      copyUrl(d);
      return;
    case 'toggle_save':
      toggleSave(d);
      return;
    case 'add_to_queue':
      addToQueue(d);
      return;
    case 'select_next':
      moveSelection(d, 1);
      return;
    case 'select_previous':
      moveSelection(d, -1);
      return;
    case 'page_down':
      moveSelection(d, PAGE_STEP);
      return;
    case 'page_up':
      moveSelection(d, -PAGE_STEP);
      return;
    case 'activate':
      activate(d);
      return;
    case 'jump_to_album':
      jumpToAlbum(d);
      return;
    case 'jump_to_context':
      jumpToContext(d);
      return;
    case 'copy_album_url':
      copyAlbumUrl(d);
      return;
    case 'logout':
      logout(d);
      return;
  }
}

// ============================================================================
// Navigation
// ============================================================================

function sameView(a: ViewState, b: ViewState): boolean {
  if (a.kind === 'playlist' && b.kind === 'playlist') {
    return a.playlistId === b.playlistId;
  }
  if (a.kind === 'search' && b.kind === 'search') {
    return a.query === b.query;
  }
  if (a.kind === 'album' && b.kind === 'album') {
    return a.album.id === b.album.id;
  }
  return a.kind === b.kind;
}

/**
 * Switch to a fresh instance of `view`. The previous view's lists are dropped
 * and the generation moves on, so its in-flight fetches are discarded when
 * they land.
 */
function enterView(d: Draft, view: ViewState, push = true): void {
  const previous = d.state.view;
  const history =
    push && previous.kind !== 'error' && !sameView(previous, view)
      ? [...d.state.history, previous]
      : d.state.history;
  const generation = d.state.generation + 1;
  const { pageSize } = d.ctx.config;

  d.update({
    view,
    history,
    generation,
    selection: 0,
    playlists: null,
    tracks: null,
    devices: null,
    devicesLoading: false,
  });

  switch (view.kind) {
    case 'library':
    case 'search':
    case 'playlist':
    case 'album': {
      const request = listRequest(view, 0, pageSize);
      if (!request) {
        break;
      }
      if (view.kind === 'library') {
        d.update({ playlists: createList<Playlist>(generation) });
        d.enqueue(request, 'playlists', { generation });
      } else {
        d.update({ tracks: createList<Track>(generation) });
        d.enqueue(request, 'tracks', { generation });
      }
      break;
    }
    case 'devices':
      d.update({ devicesLoading: true });
      d.enqueue({ operation: 'getDevices', params: {} }, 'devices', { generation });
      break;
    case 'now_playing':
      d.effect({ type: 'poll_now' });
      break;
    case 'help':
    case 'error':
      break;
  }

  d.effect({ type: 'set_poller_view', view: view.kind });
}

function goBack(d: Draft): void {
  const history = d.state.history;
  const previous = history[history.length - 1];
  if (!previous) {
    perform(d, 'quit');
    return;
  }
  d.update({ history: history.slice(0, -1) });
  enterView(d, previous, false);
}

function listRequest(view: ViewState, offset: number, limit: number): ApiRequest | null {
  switch (view.kind) {
    case 'library':
      return { operation: 'getPlaylists', params: { offset, limit } };
    case 'search':
      return { operation: 'search', params: { query: view.query, offset, limit } };
    case 'playlist':
      return view.playlistId === LIKED_SONGS_ID
        ? { operation: 'getSavedTracks', params: { offset, limit } }
        : { operation: 'getPlaylistItems', params: { playlistId: view.playlistId, offset, limit } };
    case 'album':
      return { operation: 'getAlbumTracks', params: { album: view.album, offset, limit } };
    default:
      return null;
  }
}

/**
 * Fetch the next page of the current view's list, unless one is in flight
 * or the list is complete
 */
function loadMore(d: Draft): void {
  const view = d.state.view;
  const pageSize = d.ctx.config.pageSize;

  if (view.kind === 'library') {
    const list = d.state.playlists;
    if (!canLoadMore(list) || list.cursor === null) {
      return;
    }
    const request = listRequest(view, list.cursor, pageSize);
    if (request) {
      d.update({ playlists: beginFetch(list) });
      d.enqueue(request, 'playlists', { generation: list.generation });
    }
    return;
  }

  const list = d.state.tracks;
  if (!canLoadMore(list) || list.cursor === null) {
    return;
  }
  const request = listRequest(view, list.cursor, pageSize);
  if (request) {
    d.update({ tracks: beginFetch(list) });
    d.enqueue(request, 'tracks', { generation: list.generation });
  }
}

function listLength(state: AppState): number {
  switch (state.view.kind) {
    case 'library':
      return state.playlists?.items.length ?? 0;
    case 'search':
    case 'playlist':
    case 'album':
      return state.tracks?.items.length ?? 0;
    case 'devices':
      return state.devices?.length ?? 0;
    default:
      return 0;
  }
}

function moveSelection(d: Draft, delta: number): void {
  const length = listLength(d.state);
  if (length === 0) {
    return;
  }
  const target = d.state.selection + delta;
  if (target >= length) {
    loadMore(d);
  }
  const selection = Math.min(Math.max(target, 0), length - 1);
  if (selection !== d.state.selection) {
    d.update({ selection });
  }
}

function selectedTrack(state: AppState): Track | null {
  const { kind } = state.view;
  if (kind !== 'search' && kind !== 'playlist' && kind !== 'album') {
    return null;
  }
  return state.tracks?.items[state.selection] ?? null;
}

function activate(d: Draft): void {
  const { view, selection } = d.state;

  switch (view.kind) {
    case 'library': {
      const playlist = d.state.playlists?.items[selection];
      if (playlist) {
        enterView(d, {
          kind: 'playlist',
          playlistId: playlist.id,
          name: playlist.name,
          uri: playlist.uri,
        });
      }
      return;
    }
    case 'search':
    case 'playlist':
    case 'album': {
      const track = selectedTrack(d.state);
      if (!track) {
        return;
      }
      const contextUri = contextOf(view);
      const request: ApiRequest = contextUri
        ? { operation: 'play', params: { contextUri, offsetUri: track.uri } }
        : {
            operation: 'play',
            params: {
              uris: (d.state.tracks?.items ?? [])
                .slice(selection, selection + PLAY_WINDOW)
                .map((item) => item.uri),
            },
          };
      transport(d, request);
      return;
    }
    case 'devices': {
      const device = d.state.devices?.[selection];
      if (device) {
        transferPlayback(d, device);
      }
      return;
    }
    case 'error':
      if (!view.reauth) {
        goBack(d);
      }
      return;
    case 'now_playing':
    case 'help':
      return;
  }
}

function contextOf(view: ViewState): string | null {
  switch (view.kind) {
    case 'playlist':
      return view.uri;
    case 'album':
      return view.album.uri;
    default:
      return null;
  }
}

function albumOf(track: Track): AlbumRef | null {
  const parsed = track.albumUri ? parseResourceUri(track.albumUri) : null;
  if (!track.albumUri || parsed?.type !== 'album') {
    return null;
  }
  return { id: parsed.id, name: track.album, uri: track.albumUri, url: track.albumUrl };
}

/**
 * Open the album of the playing item
 */
function jumpToAlbum(d: Draft): void {
  const item = d.state.playback?.item;
  const album = item ? albumOf(item) : null;
  if (!album) {
    d.status('Nothing playing from an album', 'warning');
    return;
  }
  enterView(d, { kind: 'album', album });
}

/**
 * Open the playlist, album or liked songs the current item plays from
 */
function jumpToContext(d: Draft): void {
  const playback = d.state.playback;
  const contextUri = playback?.contextUri;
  const parsed = contextUri ? parseResourceUri(contextUri) : null;
  if (!contextUri || !parsed) {
    d.status('Not playing from a playlist or album', 'warning');
    return;
  }

  switch (parsed.type) {
    case 'playlist': {
      const known = d.state.playlists?.items.find((playlist) => playlist.id === parsed.id);
      enterView(d, {
        kind: 'playlist',
        playlistId: parsed.id,
        name: known?.name ?? 'Playlist',
        uri: contextUri,
      });
      return;
    }
    case 'album': {
      const item = playback?.item;
      const album = item ? albumOf(item) : null;
      enterView(d, {
        kind: 'album',
        album:
          album?.uri === contextUri
            ? album
            : { id: parsed.id, name: 'Album', uri: contextUri, url: null },
      });
      return;
    }
    case 'collection':
      perform(d, 'show_liked');
      return;
    default:
      d.status(`Cannot open ${parsed.type} contexts`, 'warning');
  }
}

// ============================================================================
// Playback commands
// ============================================================================

function transport(d: Draft, request: ApiRequest): void {
  d.playbackCommand(request);
}

function requirePlayback(d: Draft): PlaybackSnapshot | null {
  const playback = d.state.playback;
  if (!playback) {
    d.status('No active device, choose one from the device list', 'warning');
  }
  return playback;
}

function isPending(d: Draft, op: OperationId): boolean {
  return d.state.pending[op] !== undefined;
}

/**
 * Play, pause, or (with `desired` null) toggle
 */
function setPlaying(d: Draft, desired: boolean | null): void {
  if (isPending(d, 'toggle-playback')) {
    return;
  }
  const playback = requirePlayback(d);
  if (!playback) {
    return;
  }
  const target = desired ?? !playback.isPlaying;
  if (target === playback.isPlaying) {
    return;
  }

  // Freeze interpolated progress so the gauge neither jumps nor drifts
  d.update({
    playback: {
      ...playback,
      progressMs: interpolateProgress(playback, d.ctx.now),
      updatedAt: d.ctx.now,
    },
  });
  d.playbackCommand(
    target ? { operation: 'play', params: {} } : { operation: 'pause', params: {} },
    {
      op: 'toggle-playback',
      optimistic: { isPlaying: target },
      revert: { isPlaying: playback.isPlaying },
    }
  );
}

function previousTrack(d: Draft): void {
  const playback = d.state.playback;
  if (playback && interpolateProgress(playback, d.ctx.now) >= RESTART_THRESHOLD_MS) {
    seekTo(d, 0);
    return;
  }
  transport(d, { operation: 'previous', params: {} });
}

function changeVolume(d: Draft, delta: number): void {
  const playback = requirePlayback(d);
  if (!playback) {
    return;
  }
  const current = playback.volumePercent;
  if (current === null) {
    d.status('This device does not support volume control', 'warning');
    return;
  }
  const volumePercent = Math.min(100, Math.max(0, current + delta));
  if (volumePercent === current) {
    return;
  }
  d.playbackCommand(
    { operation: 'setVolume', params: { volumePercent } },
    { op: 'set-volume', optimistic: { volumePercent }, revert: { volumePercent: current } }
  );
}

/**
 * Repeated seek keys move a target; the seek itself is issued on the next tick
 */
function accumulateSeek(d: Draft, delta: number): void {
  const playback = d.state.playback;
  if (!playback?.item) {
    return;
  }
  const base = d.state.seekTarget ?? interpolateProgress(playback, d.ctx.now);
  const seekTarget = Math.min(Math.max(base + delta, 0), playback.item.durationMs);
  d.update({ seekTarget });
}

function seekTo(d: Draft, positionMs: number): void {
  const playback = d.state.playback;
  if (!playback) {
    return;
  }
  d.update({
    playback: { ...playback, progressMs: positionMs, updatedAt: d.ctx.now },
    seekTarget: null,
  });
  transport(d, { operation: 'seek', params: { positionMs } });
}

function toggleShuffle(d: Draft): void {
  if (isPending(d, 'toggle-shuffle')) {
    return;
  }
  const playback = requirePlayback(d);
  if (!playback) {
    return;
  }
  const shuffle = !playback.shuffle;
  d.playbackCommand(
    { operation: 'setShuffle', params: { state: shuffle } },
    { op: 'toggle-shuffle', optimistic: { shuffle }, revert: { shuffle: playback.shuffle } }
  );
}

function cycleRepeat(d: Draft): void {
  if (isPending(d, 'cycle-repeat')) {
    return;
  }
  const playback = requirePlayback(d);
  if (!playback) {
    return;
  }
  const repeat = nextRepeatMode(playback.repeat);
  d.playbackCommand(
    { operation: 'setRepeat', params: { mode: repeat } },
    { op: 'cycle-repeat', optimistic: { repeat }, revert: { repeat: playback.repeat } }
  );
}

function transferPlayback(d: Draft, device: Device): void {
  if (isPending(d, 'transfer-playback')) {
    return;
  }
  const playback = d.state.playback;
  d.playbackCommand(
    { operation: 'transferPlayback', params: { deviceId: device.id, play: true } },
    {
      op: 'transfer-playback',
      optimistic: { deviceId: device.id, deviceName: device.name },
      revert: playback ? { deviceId: playback.deviceId, deviceName: playback.deviceName } : {},
    }
  );
}

function toggleSave(d: Draft): void {
  if (isPending(d, 'toggle-save')) {
    return;
  }
  const track = selectedTrack(d.state) ?? d.state.playback?.item ?? null;
  if (!track) {
    d.status('Nothing to save', 'warning');
    return;
  }
  const previous = d.state.liked[track.id] ?? false;
  const ids = [track.id];
  d.playbackCommand(
    previous
      ? { operation: 'removeSavedTracks', params: { ids } }
      : { operation: 'saveTracks', params: { ids } },
    { op: 'toggle-save', optimistic: {}, revert: {}, saved: { trackId: track.id, previous } }
  );
  d.update({ liked: { ...d.state.liked, [track.id]: !previous } });
}

function addToQueue(d: Draft): void {
  const track = selectedTrack(d.state);
  if (!track) {
    d.status('Select a track to add to the queue', 'warning');
    return;
  }
  d.enqueue({ operation: 'addToQueue', params: { uri: track.uri } }, 'queue');
}

function copyUrl(d: Draft): void {
  const url = d.state.playback?.item?.url;
  if (!url) {
    d.status('Nothing to copy', 'warning');
    return;
  }
  d.effect({ type: 'copy_to_clipboard', text: url });
  d.status(`Copied ${url}`, 'info');
}

function copyAlbumUrl(d: Draft): void {
  const url = d.state.playback?.item?.albumUrl;
  if (!url) {
    d.status('No album to copy', 'warning');
    return;
  }
  d.effect({ type: 'copy_to_clipboard', text: url });
  d.status(`Copied ${url}`, 'info');
}

// ============================================================================
// Results
// ============================================================================

function onCompleted(d: Draft, completion: CommandCompletion): void {
  const { command, seq, outcome } = completion;

  if (command.generation !== null && command.generation !== d.state.generation) {
    return;
  }

  if (!outcome.result.ok) {
    onFailure(d, command, seq, outcome.result.error);
    return;
  }

  switch (outcome.operation) {
    case 'getPlayback':
      if (outcome.result.ok) {
        applySnapshot(d, seq, outcome.result.value);
      }
      return;
    case 'getDevices':
      if (outcome.result.ok && seq >= appliedSeq(d.state, 'devices')) {
        const devices = outcome.result.value;
        const active = devices.findIndex((device) => device.isActive);
        d.state = markApplied(d.state, 'devices', seq);
        d.update({ devices, devicesLoading: false, selection: Math.max(active, 0) });
      }
      return;
    case 'getUser':
      if (outcome.result.ok && seq >= appliedSeq(d.state, 'user')) {
        d.state = markApplied(d.state, 'user', seq);
        d.update({ user: outcome.result.value });
      }
      return;
    case 'getPlaylists':
      if (outcome.result.ok) {
        applyPlaylistPage(d, command, seq, outcome.result.value);
      }
      return;
    case 'getPlaylistItems':
    case 'getSavedTracks':
    case 'getAlbumTracks':
    case 'search':
      if (outcome.result.ok) {
        applyTrackPage(d, command, seq, outcome.result.value);
      }
      return;
    case 'checkSavedTracks':
      if (outcome.result.ok && command.request.operation === 'checkSavedTracks') {
        applySavedFlags(d, command.request.params.ids, outcome.result.value);
      }
      return;
    case 'transferPlayback':
      settlePending(d, command, seq, false);
      d.state = markApplied(d.state, 'playback', seq);
      d.update({ positionMoved: true });
      d.status('Playback transferred', 'success');
      d.effect({ type: 'poll_now' });
      return;
    case 'play':
    case 'next':
    case 'previous':
    case 'seek':
      settlePending(d, command, seq, false);
      d.state = markApplied(d.state, 'playback', seq);
      d.update({ positionMoved: true });
      d.effect({ type: 'poll_now' });
      return;
    case 'pause':
    case 'setVolume':
    case 'setShuffle':
    case 'setRepeat':
      settlePending(d, command, seq, false);
      d.state = markApplied(d.state, 'playback', seq);
      d.effect({ type: 'poll_now' });
      return;
    case 'addToQueue':
      d.status('Added to queue', 'success');
      return;
    case 'saveTracks':
      settlePending(d, command, seq, false);
      d.status('Saved to Liked Songs', 'success');
      return;
    case 'removeSavedTracks':
      settlePending(d, command, seq, false);
      d.status('Removed from Liked Songs', 'success');
      return;
  }
}

function applyPlaylistPage(d: Draft, command: Command, seq: number, page: Page<Playlist>): void {
  const list = d.state.playlists;
  if (!list || list.generation !== command.generation || seq < appliedSeq(d.state, 'playlists')) {
    return;
  }
  d.state = markApplied(d.state, 'playlists', seq);
  d.update({ playlists: appendPage(list, page) });
}

function applyTrackPage(d: Draft, command: Command, seq: number, page: Page<Track>): void {
  const list = d.state.tracks;
  if (!list || list.generation !== command.generation || seq < appliedSeq(d.state, 'tracks')) {
    return;
  }
  d.state = markApplied(d.state, 'tracks', seq);
  d.update({ tracks: appendPage(list, page) });
}

function applySavedFlags(d: Draft, ids: string[], flags: boolean[]): void {
  const saving = d.state.pending['toggle-save']?.saved?.trackId;
  const liked = { ...d.state.liked };
  ids.forEach((id, index) => {
    const flag = flags[index];
    if (flag !== undefined && id !== saving) {
      liked[id] = flag;
    }
  });
  d.update({ liked });
}

function onFailure(d: Draft, command: Command, seq: number, error: ApiError): void {
  settlePending(d, command, seq, true);
  clearLoading(d, command);

  if (error.kind === 'unauthorized') {
    expireSession(d, describeError(error));
    return;
  }
  // Background checks fail quietly
  if (command.request.operation === 'checkSavedTracks') {
    return;
  }
  d.status(describeError(error), severityOf(error));
}

/**
 * A command that never ran: undo what issuing it did, without a message
 */
function onDropped(d: Draft, command: Command): void {
  settlePending(d, command, d.state.applied.playback ?? 0, true);
  if (command.generation === null || command.generation === d.state.generation) {
    clearLoading(d, command);
  }
}

function clearLoading(d: Draft, command: Command): void {
  if (command.generation === null) {
    return;
  }
  const clear = <T>(list: PaginatedList<T> | null) =>
    list && list.generation === command.generation ? failFetch(list) : list;

  switch (command.resource) {
    case 'playlists':
      d.update({ playlists: clear(d.state.playlists) });
      return;
    case 'tracks':
      d.update({ tracks: clear(d.state.tracks) });
      return;
    case 'devices':
      d.update({ devicesLoading: false });
      return;
    default:
      return;
  }
}

/**
 * Resolve the pending operation a command belongs to. Completions for
 * commands that are not the latest issued for the operation are ignored.
 */
function settlePending(d: Draft, command: Command, seq: number, failed: boolean): void {
  const op = command.op;
  if (!op) {
    return;
  }
  const operation = d.state.pending[op];
  if (!operation || operation.commandId !== command.id) {
    return;
  }

  const pending = { ...d.state.pending };
  delete pending[op];
  d.update({ pending });

  if (!failed) {
    return;
  }
  // A newer snapshot already says what the remote state is
  if (d.state.playback && seq >= appliedSeq(d.state, 'playback')) {
    d.update({ playback: applyPatch(d.state.playback, operation.revert) });
  }
  if (operation.saved) {
    d.update({ liked: { ...d.state.liked, [operation.saved.trackId]: operation.saved.previous } });
  }
}

function metadataOf(snapshot: PlaybackSnapshot | null): NowPlayingMetadata | null {
  if (!snapshot?.item) {
    return null;
  }
  return {
    title: snapshot.item.name,
    artists: snapshot.item.artists,
    album: snapshot.item.album,
    durationMs: snapshot.item.durationMs,
    isPlaying: snapshot.isPlaying,
  };
}

/**
 * Replace the playback snapshot, unless a newer one has already been applied
 */
function applySnapshot(d: Draft, seq: number, snapshot: PlaybackSnapshot | null): void {
  if (seq < appliedSeq(d.state, 'playback')) {
    return;
  }
  d.state = markApplied(d.state, 'playback', seq);

  const previous = d.state.playback;
  let next = snapshot ? withOptimistic(snapshot, d.state.pending) : null;
  const itemChanged = (previous?.item?.id ?? null) !== (next?.item?.id ?? null);

  let progressHeld = false;
  if (previous && next && !itemChanged && !d.state.positionMoved && !d.state.progressHeld) {
    const expected = interpolateProgress(previous, next.updatedAt);
    if (next.progressMs < expected - PROGRESS_TOLERANCE_MS) {
      next = { ...next, progressMs: expected };
      progressHeld = true;
    }
  }

  d.update({
    playback: next,
    seekTarget: itemChanged ? null : d.state.seekTarget,
    positionMoved: false,
    progressHeld,
  });

  if (itemChanged || previous?.isPlaying !== next?.isPlaying) {
    d.effect({ type: 'publish_metadata', metadata: metadataOf(next) });
  }

  const item = next?.item;
  if (item && itemChanged && d.state.liked[item.id] === undefined) {
    d.enqueue({ operation: 'checkSavedTracks', params: { ids: [item.id] } }, 'saved');
  }
}

// ============================================================================
// Session
// ============================================================================

function expireSession(d: Draft, message: string): void {
  if (d.state.sessionExpired) {
    d.status(message, 'error');
    return;
  }
  d.update({ sessionExpired: true });
  enterView(d, { kind: 'error', message, reauth: true });
  d.effect({ type: 'schedule_reauth' });
}

/**
 * Forget everything tied to the account. The event loop clears the command
 * queue, pauses the poller and drops the stored session.
 */
function logout(d: Draft): void {
  d.update({ history: [], input: { open: false, text: '' } });
  enterView(d, { kind: 'error', message: LOGGED_OUT_MESSAGE, reauth: true }, false);
  d.update({
    user: null,
    playback: null,
    pending: {},
    liked: {},
    seekTarget: null,
    sessionExpired: true,
    signedOut: true,
    positionMoved: false,
    progressHeld: false,
  });
  d.effect({ type: 'publish_metadata', metadata: null });
  d.effect({ type: 'logout' });
}

function onReauthenticated(d: Draft): void {
  const { signedOut } = d.state;
  d.update({ sessionExpired: false, signedOut: false });
  if (signedOut) {
    d.enqueue({ operation: 'getUser', params: {} }, 'user');
  }
  if (d.state.view.kind === 'error') {
    if (d.state.history.length > 0) {
      goBack(d);
    } else {
      enterView(d, { kind: 'library' }, false);
    }
  }
  d.status('Session restored', 'success');
  d.effect({ type: 'resume_polling' });
}

// ============================================================================
// Timer
// ============================================================================

function onTick(d: Draft): void {
  d.state = expireStatus(d.state, d.ctx.now);

  if (d.state.seekTarget !== null) {
    seekTo(d, d.state.seekTarget);
  }

  // Progress and spinners move between events
  const animating =
    d.state.playback?.isPlaying === true ||
    d.state.playlists?.loading === true ||
    d.state.tracks?.loading === true ||
    d.state.devicesLoading;
  if (animating) {
    d.effect({ type: 'redraw' });
  }
}
