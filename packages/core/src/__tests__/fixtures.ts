/**
 * Shared test data
 */

import { defineConfig } from '../config';
import type { AppConfig } from '../config';
import { buildKeymap } from '../dispatcher/keys';
import type { ReduceContext } from '../dispatcher/reducer';
import type { Device, Playlist, Track } from '../types/library';
import type { PlaybackSnapshot } from '../types/playback';

export const API_URL = 'https://api.test/v1';
export const TOKEN_URL = 'https://accounts.test/api/token';

export function testConfig(overrides: Parameters<typeof defineConfig>[0] = {}): AppConfig {
  return defineConfig({
    apiUrl: API_URL,
    tokenUrl: TOKEN_URL,
    sessionFile: '/tmp/playdeck-test/session.json',
    ...overrides,
  });
}

export function testContext(now = 1_000_000, config: AppConfig = testConfig()): ReduceContext {
  return { now, config, keymap: buildKeymap(config.keys) };
}

export function makeTrack(id: string, overrides: Partial<Track> = {}): Track {
  return {
    id,
    uri: `spotify:track:${id}`,
    name: `Track ${id}`,
    artists: ['Test Artist'],
    album: 'Test Album',
    albumUri: 'spotify:album:album1',
    durationMs: 200_000,
    url: `https://open.example.com/track/${id}`,
    albumUrl: 'https://open.example.com/album/album1',
    ...overrides,
  };
}

export function makePlaylist(id: string, overrides: Partial<Playlist> = {}): Playlist {
  return {
    id,
    uri: `spotify:playlist:${id}`,
    name: `Playlist ${id}`,
    owner: 'tester',
    trackCount: 10,
    ...overrides,
  };
}

export function makeDevice(id: string, overrides: Partial<Device> = {}): Device {
  return {
    id,
    name: `Device ${id}`,
    type: 'Computer',
    isActive: false,
    volumePercent: 50,
    ...overrides,
  };
}

export function makeSnapshot(overrides: Partial<PlaybackSnapshot> = {}): PlaybackSnapshot {
  return {
    item: makeTrack('t1'),
    isPlaying: false,
    progressMs: 10_000,
    volumePercent: 50,
    shuffle: false,
    repeat: 'off',
    deviceId: 'd1',
    deviceName: 'Desk',
    contextUri: null,
    updatedAt: 1_000_000,
    ...overrides,
  };
}

// ============================================================================
// Wire payloads
// ============================================================================

export function trackObject(id: string) {
  return {
    type: 'track',
    id,
    uri: `spotify:track:${id}`,
    name: `Track ${id}`,
    duration_ms: 180_000,
    artists: [{ name: 'Artist A' }, { name: 'Artist B' }],
    album: {
      name: 'Album',
      uri: 'spotify:album:a1',
      external_urls: { spotify: 'https://open.example.com/album/a1' },
    },
    external_urls: { spotify: `https://open.example.com/track/${id}` },
  };
}

export function playbackObject(overrides: Record<string, unknown> = {}) {
  return {
    device: { id: 'd1', name: 'Desk', type: 'Computer', is_active: true, volume_percent: 40 },
    shuffle_state: true,
    repeat_state: 'context',
    progress_ms: 1234,
    is_playing: true,
    item: trackObject('t1'),
    context: { uri: 'spotify:playlist:p1' },
    ...overrides,
  };
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function emptyResponse(status = 204): Response {
  return new Response(null, { status });
}
