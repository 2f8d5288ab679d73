/**
 * Key bindings
 *
 * Maps normalized key names onto actions. Printable keys are the character
 * itself; named keys are lower-case (`enter`, `escape`, `backspace`, `up`,
 * `down`, `pageup`, `pagedown`, `ctrl-c`).
 */

import type { KeyBindings } from '../config';
import type { MediaKey } from '../types/events';

export type Action =
  | 'quit'
  | 'back'
  | 'toggle_playback'
  | 'play'
  | 'pause'
  | 'next_track'
  | 'previous_track'
  | 'volume_up'
  | 'volume_down'
  | 'seek_forwards'
  | 'seek_backwards'
  | 'toggle_shuffle'
  | 'cycle_repeat'
  | 'open_search'
  | 'show_devices'
  | 'show_library'
  | 'show_liked'
  | 'show_now_playing'
  | 'show_help'
  | 'load_more'
  | 'copy_url'
  | 'toggle_save'
  | 'add_to_queue'
  | 'select_next'
  | 'select_previous'
  | 'page_down'
  | 'page_up'
  | 'activate'
  | 'jump_to_album'
  | 'jump_to_context'
  | 'copy_album_url'
  | 'logout';

const CONFIGURABLE: Record<keyof KeyBindings, Action> = {
  back: 'back',
  togglePlayback: 'toggle_playback',
  nextTrack: 'next_track',
  previousTrack: 'previous_track',
  increaseVolume: 'volume_up',
  decreaseVolume: 'volume_down',
  seekForwards: 'seek_forwards',
  seekBackwards: 'seek_backwards',
  shuffle: 'toggle_shuffle',
  repeat: 'cycle_repeat',
  search: 'open_search',
  devices: 'show_devices',
  library: 'show_library',
  likedSongs: 'show_liked',
  nowPlaying: 'show_now_playing',
  help: 'show_help',
  loadMore: 'load_more',
  copyUrl: 'copy_url',
  toggleSave: 'toggle_save',
  addToQueue: 'add_to_queue',
  jumpToAlbum: 'jump_to_album',
  jumpToContext: 'jump_to_context',
  copyAlbumUrl: 'copy_album_url',
  logout: 'logout',
};

const FIXED: Record<string, Action> = {
  'ctrl-c': 'quit',
  escape: 'back',
  enter: 'activate',
  down: 'select_next',
  up: 'select_previous',
  j: 'select_next',
  k: 'select_previous',
  pagedown: 'page_down',
  pageup: 'page_up',
};

export type Keymap = ReadonlyMap<string, Action>;

/**
 * Build the key → action table. Configured bindings win over the fixed ones,
 * except `ctrl-c`, which always quits.
 */
export function buildKeymap(bindings: KeyBindings): Keymap {
  const map = new Map<string, Action>(Object.entries(FIXED));
  for (const name of Object.keys(CONFIGURABLE)) {
    if (isBindingName(name, bindings)) {
      map.set(bindings[name], CONFIGURABLE[name]);
    }
  }
  map.set('ctrl-c', 'quit');
  return map;
}

function isBindingName(name: string, bindings: KeyBindings): name is keyof KeyBindings {
  return name in bindings;
}

export function mediaKeyAction(key: MediaKey): Action {
  switch (key) {
    case 'play':
      return 'play';
    case 'pause':
    case 'stop':
      return 'pause';
    case 'toggle':
      return 'toggle_playback';
    case 'next':
      return 'next_track';
    case 'previous':
      return 'previous_track';
  }
}

/**
 * Rows of the help screen: key, action description
 */
export function describeBindings(bindings: KeyBindings): Array<[string, string]> {
  const label = (key: string) => (key === ' ' ? 'space' : key);
  return [
    [label(bindings.togglePlayback), 'Play / pause'],
    [label(bindings.nextTrack), 'Next track'],
    [label(bindings.previousTrack), 'Previous track (restart after 3s)'],
    [`${label(bindings.increaseVolume)} ${label(bindings.decreaseVolume)}`, 'Volume up / down'],
    [
      `${label(bindings.seekForwards)} ${label(bindings.seekBackwards)}`,
      'Seek forwards / backwards',
    ],
    [label(bindings.shuffle), 'Toggle shuffle'],
    [label(bindings.repeat), 'Cycle repeat (off, context, track)'],
    [label(bindings.search), 'Search tracks'],
    [label(bindings.library), 'Playlists'],
    [label(bindings.likedSongs), 'Liked songs'],
    [label(bindings.nowPlaying), 'Now playing'],
    [label(bindings.devices), 'Devices'],
    [label(bindings.loadMore), 'Load more'],
    [label(bindings.toggleSave), 'Save / unsave track'],
    [label(bindings.addToQueue), 'Add selected track to queue'],
    [label(bindings.copyUrl), 'Copy URL of playing track'],
    [label(bindings.copyAlbumUrl), 'Copy URL of playing album'],
    [label(bindings.jumpToAlbum), 'Open album of playing track'],
    [label(bindings.jumpToContext), 'Open playlist or album being played'],
    ['enter', 'Open / play selection'],
    ['j k / arrows', 'Move selection'],
    [`${label(bindings.back)} esc`, 'Back (quit at the root)'],
    [label(bindings.help), 'This help'],
    [label(bindings.logout), 'Log out'],
    ['ctrl-c', 'Quit'],
  ];
}
