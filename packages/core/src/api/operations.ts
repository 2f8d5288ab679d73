/**
 * Web API operations
 *
 * Each operation names the HTTP request it issues and how the response body
 * maps onto domain types. The gateway looks operations up by name, so adding
 * an endpoint is one entry in `OPERATIONS` plus one line in `OperationMap`.
 */

import type { z } from 'zod';
import type { AlbumRef, Device, Page, Playlist, Track, UserProfile } from '../types/library';
import type { PlaybackSnapshot, RepeatMode } from '../types/playback';
import type { Result } from '../types/result';
import type { ApiError } from '../types/errors';
import type { HttpMethod, QueryParams } from './HttpClient';
import {
  AlbumTrackPageSchema,
  DevicesResponseSchema,
  PlayableObjectSchema,
  PlaybackStateSchema,
  PlaylistItemPageSchema,
  PlaylistPageSchema,
  SavedContainsSchema,
  SavedTrackPageSchema,
  SearchResponseSchema,
  UserProfileSchema,
  DeviceObjectSchema,
} from '../utils/validators';
import { validate } from '../utils/validation';

type EmptyParams = Record<string, never>;

export interface OperationMap {
  getPlayback: { params: EmptyParams; response: PlaybackSnapshot | null };
  getDevices: { params: EmptyParams; response: Device[] };
  getUser: { params: EmptyParams; response: UserProfile };
  getPlaylists: { params: { offset: number; limit: number }; response: Page<Playlist> };
  getPlaylistItems: {
    params: { playlistId: string; offset: number; limit: number };
    response: Page<Track>;
  };
  getSavedTracks: { params: { offset: number; limit: number }; response: Page<Track> };
  getAlbumTracks: {
    params: { album: AlbumRef; offset: number; limit: number };
    response: Page<Track>;
  };
  search: { params: { query: string; offset: number; limit: number }; response: Page<Track> };
  checkSavedTracks: { params: { ids: string[] }; response: boolean[] };
  play: {
    params: { contextUri?: string; uris?: string[]; offsetUri?: string };
    response: void;
  };
  pause: { params: EmptyParams; response: void };
  next: { params: EmptyParams; response: void };
  previous: { params: EmptyParams; response: void };
  seek: { params: { positionMs: number }; response: void };
  setVolume: { params: { volumePercent: number }; response: void };
  setShuffle: { params: { state: boolean }; response: void };
  setRepeat: { params: { mode: RepeatMode }; response: void };
  transferPlayback: { params: { deviceId: string; play?: boolean }; response: void };
  addToQueue: { params: { uri: string }; response: void };
  saveTracks: { params: { ids: string[] }; response: void };
  removeSavedTracks: { params: { ids: string[] }; response: void };
}

export type OperationName = keyof OperationMap;
export type ParamsOf<K extends OperationName> = OperationMap[K]['params'];
export type ResponseOf<K extends OperationName> = OperationMap[K]['response'];

/**
 * A request as plain data: what the command queue carries
 */
export type ApiRequest<K extends OperationName = OperationName> = {
  [P in K]: { operation: P; params: ParamsOf<P> };
}[K];

/**
 * A completed request, discriminated by operation so the response is typed
 */
export type ApiOutcome<K extends OperationName = OperationName> = {
  [P in K]: { operation: P; result: Result<ResponseOf<P>, ApiError> };
}[K];

export interface HttpRoute {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
}

export interface OperationDef<K extends OperationName> {
  describe(params: ParamsOf<K>, now: number): HttpRoute;
  parse(body: unknown, now: number, params: ParamsOf<K>): ResponseOf<K>;
}

export type OperationTable = { [K in OperationName]: OperationDef<K> };

// ============================================================================
// Mapping helpers
// ============================================================================

type PlayableObject = z.infer<typeof PlayableObjectSchema>;

export function toTrack(item: PlayableObject): Track {
  if (item.type === 'episode') {
    return {
      id: item.id,
      uri: item.uri,
      name: item.name,
      artists: item.show.publisher ? [item.show.publisher] : [item.show.name],
      album: item.show.name,
      albumUri: item.show.uri ?? null,
      durationMs: item.duration_ms,
      url: item.external_urls?.spotify ?? null,
      albumUrl: item.show.external_urls?.spotify ?? null,
    };
  }
  return {
    id: item.id ?? item.uri,
    uri: item.uri,
    name: item.name,
    artists: item.artists.map((artist) => artist.name),
    album: item.album.name,
    albumUri: item.album.uri ?? null,
    durationMs: item.duration_ms,
    url: item.external_urls?.spotify ?? null,
    albumUrl: item.album.external_urls?.spotify ?? null,
  };
}

function toDevice(device: z.infer<typeof DeviceObjectSchema>): Device | null {
  if (!device.id) {
    return null;
  }
  return {
    id: device.id,
    name: device.name,
    type: device.type,
    isActive: device.is_active,
    volumePercent: device.volume_percent ?? null,
  };
}

function toPage<T>(
  paging: { offset: number; limit: number; total: number; next: string | null },
  items: T[],
  received: number
): Page<T> {
  return {
    items,
    offset: paging.offset,
    limit: paging.limit,
    total: paging.total,
    // The cursor advances by what the service returned, including entries we drop
    next: paging.next === null ? null : paging.offset + received,
  };
}

function isPresent<T>(value: T | null): value is T {
  return value !== null;
}

const noContent = () => undefined;

// ============================================================================
// Operation table
// ============================================================================

export const OPERATIONS: OperationTable = {
  getPlayback: {
    describe: () => ({
      method: 'GET',
      path: '/me/player',
      query: { additional_types: 'track,episode' },
    }),
    parse: (body, now) => {
      if (body === undefined) {
        return null;
      }
      const state = validate(PlaybackStateSchema, body, 'playback state');
      return {
        item: state.item ? toTrack(state.item) : null,
        isPlaying: state.is_playing,
        progressMs: state.progress_ms ?? 0,
        volumePercent: state.device.volume_percent ?? null,
        shuffle: state.shuffle_state,
        repeat: state.repeat_state,
        deviceId: state.device.id,
        deviceName: state.device.name,
        contextUri: state.context?.uri ?? null,
        updatedAt: now,
      };
    },
  },
  getDevices: {
    describe: () => ({ method: 'GET', path: '/me/player/devices' }),
    parse: (body) =>
      validate(DevicesResponseSchema, body, 'devices').devices.map(toDevice).filter(isPresent),
  },
  getUser: {
    describe: () => ({ method: 'GET', path: '/me' }),
    parse: (body) => {
      const user = validate(UserProfileSchema, body, 'user profile');
      return {
        id: user.id,
        displayName: user.display_name ?? user.id,
        country: user.country ?? null,
      };
    },
  },
  getPlaylists: {
    describe: ({ offset, limit }) => ({
      method: 'GET',
      path: '/me/playlists',
      query: { offset, limit },
    }),
    parse: (body) => {
      const page = validate(PlaylistPageSchema, body, 'playlists');
      const items = page.items.filter(isPresent).map((playlist) => ({
        id: playlist.id,
        uri: playlist.uri,
        name: playlist.name,
        owner: playlist.owner.display_name ?? playlist.owner.id,
        trackCount: playlist.tracks?.total ?? 0,
      }));
      return toPage(page, items, page.items.length);
    },
  },
  getPlaylistItems: {
    describe: ({ playlistId, offset, limit }) => ({
      method: 'GET',
      path: `/playlists/${encodeURIComponent(playlistId)}/tracks`,
      query: { offset, limit, additional_types: 'track,episode' },
    }),
    parse: (body) => {
      const page = validate(PlaylistItemPageSchema, body, 'playlist items');
      const items = page.items
        .map((entry) => (entry.track ? toTrack(entry.track) : null))
        .filter(isPresent);
      return toPage(page, items, page.items.length);
    },
  },
  getSavedTracks: {
    describe: ({ offset, limit }) => ({
      method: 'GET',
      path: '/me/tracks',
      query: { offset, limit },
    }),
    parse: (body) => {
      const page = validate(SavedTrackPageSchema, body, 'saved tracks');
      return toPage(
        page,
        page.items.map((entry) => toTrack(entry.track)),
        page.items.length
      );
    },
  },
  getAlbumTracks: {
    describe: ({ album, offset, limit }) => ({
      method: 'GET',
      path: `/albums/${encodeURIComponent(album.id)}/tracks`,
      query: { offset, limit },
    }),
    parse: (body, _now, { album }) => {
      const page = validate(AlbumTrackPageSchema, body, 'album tracks');
      const items = page.items.map((track) => ({
        ...toTrack({ ...track, album: { name: album.name, uri: album.uri } }),
        albumUrl: album.url,
      }));
      return toPage(page, items, page.items.length);
    },
  },
  search: {
    describe: ({ query, offset, limit }) => ({
      method: 'GET',
      path: '/search',
      query: { q: query, type: 'track', offset, limit },
    }),
    parse: (body) => {
      const { tracks } = validate(SearchResponseSchema, body, 'search results');
      return toPage(tracks, tracks.items.map(toTrack), tracks.items.length);
    },
  },
  checkSavedTracks: {
    describe: ({ ids }) => ({
      method: 'GET',
      path: '/me/tracks/contains',
      query: { ids: ids.join(',') },
    }),
    parse: (body) => validate(SavedContainsSchema, body, 'saved tracks check'),
  },
  play: {
    describe: ({ contextUri, uris, offsetUri }) => ({
      method: 'PUT',
      path: '/me/player/play',
      body: {
        context_uri: contextUri,
        uris,
        offset: offsetUri ? { uri: offsetUri } : undefined,
      },
    }),
    parse: noContent,
  },
  pause: {
    describe: () => ({ method: 'PUT', path: '/me/player/pause' }),
    parse: noContent,
  },
  next: {
    describe: () => ({ method: 'POST', path: '/me/player/next' }),
    parse: noContent,
  },
  previous: {
    describe: () => ({ method: 'POST', path: '/me/player/previous' }),
    parse: noContent,
  },
  seek: {
    describe: ({ positionMs }) => ({
      method: 'PUT',
      path: '/me/player/seek',
      query: { position_ms: Math.max(0, Math.round(positionMs)) },
    }),
    parse: noContent,
  },
  setVolume: {
    describe: ({ volumePercent }) => ({
      method: 'PUT',
      path: '/me/player/volume',
      query: { volume_percent: Math.min(100, Math.max(0, Math.round(volumePercent))) },
    }),
    parse: noContent,
  },
  setShuffle: {
    describe: ({ state }) => ({
      method: 'PUT',
      path: '/me/player/shuffle',
      query: { state },
    }),
    parse: noContent,
  },
  setRepeat: {
    describe: ({ mode }) => ({
      method: 'PUT',
      path: '/me/player/repeat',
      query: { state: mode },
    }),
    parse: noContent,
  },
  transferPlayback: {
    describe: ({ deviceId, play }) => ({
      method: 'PUT',
      path: '/me/player',
      body: { device_ids: [deviceId], play: play ?? false },
    }),
    parse: noContent,
  },
  addToQueue: {
    describe: ({ uri }) => ({
      method: 'POST',
      path: '/me/player/queue',
      query: { uri },
    }),
    parse: noContent,
  },
  saveTracks: {
    describe: ({ ids }) => ({
      method: 'PUT',
      path: '/me/tracks',
      query: { ids: ids.join(',') },
    }),
    parse: noContent,
  },
  removeSavedTracks: {
    describe: ({ ids }) => ({
      method: 'DELETE',
      path: '/me/tracks',
      query: { ids: ids.join(',') },
    }),
    parse: noContent,
  },
};
