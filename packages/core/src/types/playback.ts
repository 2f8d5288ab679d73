/**
 * Playback types
 */

import type { Track } from './library';

export type RepeatMode = 'off' | 'context' | 'track';

/**
 * Complete copy of remote playback state at one point in time.
 * Snapshots are replaced, never patched in place.
 */
export interface PlaybackSnapshot {
  item: Track | null;
  isPlaying: boolean;
  progressMs: number;
  volumePercent: number | null;
  shuffle: boolean;
  repeat: RepeatMode;
  deviceId: string | null;
  deviceName: string | null;
  contextUri: string | null;
  /** Local clock (ms) at which this snapshot was taken */
  updatedAt: number;
}

export const REPEAT_CYCLE: readonly RepeatMode[] = ['off', 'context', 'track'];

/**
 * Next repeat mode in the off → context → track → off cycle
 */
export function nextRepeatMode(mode: RepeatMode): RepeatMode {
  const index = REPEAT_CYCLE.indexOf(mode);
  return REPEAT_CYCLE[(index + 1) % REPEAT_CYCLE.length] ?? 'off';
}

/**
 * Progress as it should be displayed at `now`: the reported position plus the
 * time elapsed since the snapshot while playing, capped at the track length.
 */
export function interpolateProgress(snapshot: PlaybackSnapshot, now: number): number {
  const elapsed = snapshot.isPlaying ? Math.max(0, now - snapshot.updatedAt) : 0;
  const position = snapshot.progressMs + elapsed;
  if (!snapshot.item) {
    return position;
  }
  return Math.min(position, snapshot.item.durationMs);
}

/**
 * Metadata handed to the OS media-control side channel
 */
export interface NowPlayingMetadata {
  title: string;
  artists: string[];
  album: string;
  durationMs: number;
  isPlaying: boolean;
}
