/**
 * Renderer
 *
 * Pure function from application state to a frame. It reads state and never
 * changes it; whether a spinner row appears depends on the `loading` flag
 * alone, and partially loaded lists render whatever is loaded.
 */

import type { KeyBindings } from '../config';
import { describeBindings } from '../dispatcher/keys';
import type { Playlist, Track } from '../types/library';
import { interpolateProgress } from '../types/playback';
import type { AppState, OperationId, PaginatedList, ViewState } from '../types/state';
import { visibleStatus } from '../state/AppState';
import type { Frame, PanelLine, Playbar, TableWidget, Widget } from './frame';

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const SPINNER_INTERVAL_MS = 100;

/**
 * Format milliseconds as m:ss, or h:mm:ss past an hour
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const ss = String(seconds).padStart(2, '0');
  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, '0')}:${ss}`;
  }
  return `${minutes}:${ss}`;
}

export function spinnerFrame(now: number): string {
  const index = Math.floor(now / SPINNER_INTERVAL_MS) % SPINNER_FRAMES.length;
  return SPINNER_FRAMES[index] ?? SPINNER_FRAMES[0] ?? '';
}

export function viewTitle(view: ViewState): string {
  switch (view.kind) {
    case 'library':
      return 'Playlists';
    case 'search':
      return `Search: ${view.query}`;
    case 'playlist':
      return view.name;
    case 'album':
      return view.album.name;
    case 'now_playing':
      return 'Now Playing';
    case 'devices':
      return 'Devices';
    case 'help':
      return 'Help';
    case 'error':
      return 'Error';
  }
}

export function render(state: AppState, now: number, keys: KeyBindings): Frame {
  const status = visibleStatus(state, now);
  return {
    header: { title: viewTitle(state.view), user: state.user?.displayName ?? null },
    body: renderBody(state, now, keys),
    playbar: renderPlaybar(state, now),
    status: status ? { text: status.text, tone: status.severity } : null,
    prompt: state.input.open ? state.input.text : null,
  };
}

// ============================================================================
// Body
// ============================================================================

function renderBody(state: AppState, now: number, keys: KeyBindings): Widget {
  const view = state.view;
  switch (view.kind) {
    case 'library':
      return playlistTable(state.playlists, state.selection, now);
    case 'search':
    case 'playlist':
    case 'album':
      return trackTable(viewTitle(view), state.tracks, state.selection, state.liked, now);
    case 'devices':
      return deviceTable(state, now);
    case 'now_playing':
      return nowPlayingPanel(state, now);
    case 'help':
      return {
        kind: 'table',
        title: 'Help',
        columns: [
          { header: 'Key', weight: 1 },
          { header: 'Action', weight: 3 },
        ],
        rows: describeBindings(keys),
        selected: null,
        spinner: null,
        empty: '',
        footer: null,
      };
    case 'error':
      return {
        kind: 'panel',
        title: 'Error',
        lines: [
          { text: view.message, tone: 'error' },
          { text: '', tone: 'normal' },
          {
            text: view.reauth ? 'Press enter to retry, q to go back' : 'Press q to go back',
            tone: 'muted',
          },
        ],
      };
  }
}

function listTable<T>(
  title: string,
  list: PaginatedList<T> | null,
  selection: number,
  now: number,
  columns: TableWidget['columns'],
  toRow: (item: T) => string[],
  empty: string
): TableWidget {
  const items = list?.items ?? [];
  return {
    kind: 'table',
    title,
    columns,
    rows: items.map(toRow),
    selected: items.length > 0 ? Math.min(selection, items.length - 1) : null,
    spinner: list?.loading ? `${spinnerFrame(now)} Loading…` : null,
    empty,
    footer: list && list.total !== null ? listFooter(items.length, list.total, list.cursor) : null,
  };
}

function listFooter(loaded: number, total: number, cursor: number | null): string {
  return cursor === null ? `${loaded} items` : `${loaded} of ${total}, m for more`;
}

function playlistTable(
  list: PaginatedList<Playlist> | null,
  selection: number,
  now: number
): TableWidget {
  return listTable(
    'Playlists',
    list,
    selection,
    now,
    [
      { header: 'Name', weight: 3 },
      { header: 'Owner', weight: 2 },
      { header: 'Tracks', weight: 1 },
    ],
    (playlist) => [playlist.name, playlist.owner, String(playlist.trackCount)],
    'No playlists'
  );
}

function trackTable(
  title: string,
  list: PaginatedList<Track> | null,
  selection: number,
  liked: Record<string, boolean>,
  now: number
): TableWidget {
  return listTable(
    title,
    list,
    selection,
    now,
    [
      { header: 'Title', weight: 3 },
      { header: 'Artist', weight: 2 },
      { header: 'Album', weight: 2 },
      { header: 'Length', weight: 1 },
    ],
    (track) => [
      `${liked[track.id] ? '♥ ' : ''}${track.name}`,
      track.artists.join(', '),
      track.album,
      formatDuration(track.durationMs),
    ],
    'No tracks'
  );
}

function deviceTable(state: AppState, now: number): TableWidget {
  const devices = state.devices ?? [];
  return {
    kind: 'table',
    title: 'Devices',
    columns: [
      { header: 'Name', weight: 3 },
      { header: 'Type', weight: 1 },
      { header: 'Active', weight: 1 },
      { header: 'Volume', weight: 1 },
    ],
    rows: devices.map((device) => [
      device.name,
      device.type,
      device.isActive ? 'yes' : '',
      device.volumePercent === null ? '-' : `${device.volumePercent}%`,
    ]),
    selected: devices.length > 0 ? Math.min(state.selection, devices.length - 1) : null,
    spinner: state.devicesLoading ? `${spinnerFrame(now)} Loading…` : null,
    empty: 'No devices found. Open the app on a device and try again.',
    footer: null,
  };
}

function nowPlayingPanel(state: AppState, now: number): Widget {
  const playback = state.playback;
  if (!playback?.item) {
    return {
      kind: 'panel',
      title: 'Now Playing',
      lines: [{ text: 'Nothing is playing', tone: 'muted' }],
    };
  }

  const item = playback.item;
  const lines: PanelLine[] = [
    { text: item.name, tone: 'accent' },
    { text: item.artists.join(', '), tone: 'normal' },
    { text: item.album, tone: 'muted' },
    { text: '', tone: 'normal' },
    {
      text: `${formatDuration(currentPosition(state, now))} / ${formatDuration(item.durationMs)}`,
      tone: 'normal',
    },
  ];
  if (playback.deviceName) {
    lines.push({ text: `on ${playback.deviceName}`, tone: 'muted' });
  }
  if (state.liked[item.id]) {
    lines.push({ text: '♥ In your Liked Songs', tone: 'success' });
  }
  return { kind: 'panel', title: 'Now Playing', lines };
}

// ============================================================================
// Playbar
// ============================================================================

function currentPosition(state: AppState, now: number): number {
  const playback = state.playback;
  if (!playback) {
    return 0;
  }
  return state.seekTarget ?? interpolateProgress(playback, now);
}

function marker(state: AppState, op: OperationId): string {
  return state.pending[op] ? '…' : '';
}

function renderPlaybar(state: AppState, now: number): Playbar {
  const playback = state.playback;
  if (!playback) {
    return {
      title: 'Nothing playing',
      subtitle: 'Press d to choose a device',
      gauge: { ratio: 0, label: '0:00 / 0:00' },
      indicators: '',
    };
  }

  const item = playback.item;
  const duration = item?.durationMs ?? 0;
  const position = currentPosition(state, now);
  const icon = playback.isPlaying ? '▶' : '⏸';
  const volume = playback.volumePercent === null ? 'n/a' : `${playback.volumePercent}%`;

  const indicators = [
    `Vol ${volume}${marker(state, 'set-volume')}`,
    `Shuffle ${playback.shuffle ? 'on' : 'off'}${marker(state, 'toggle-shuffle')}`,
    `Repeat ${playback.repeat}${marker(state, 'cycle-repeat')}`,
  ];
  if (playback.deviceName) {
    indicators.push(`${playback.deviceName}${marker(state, 'transfer-playback')}`);
  }

  return {
    title: `${icon}${marker(state, 'toggle-playback')} ${item?.name ?? 'Nothing playing'}`,
    subtitle: item ? `${item.artists.join(', ')} · ${item.album}` : '',
    gauge: {
      ratio: duration > 0 ? Math.min(1, position / duration) : 0,
      label: `${formatDuration(position)} / ${formatDuration(duration)}`,
    },
    indicators: indicators.join('  '),
  };
}
