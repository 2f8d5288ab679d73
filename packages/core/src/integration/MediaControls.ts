/**
 * OS side channels
 *
 * Media controls publish "now playing" metadata and report media-key presses;
 * the clipboard takes text to copy. Both are fire and forget: failures are
 * logged by the caller and never reach application state.
 */

import type { MediaKey } from '../types/events';
import type { NowPlayingMetadata } from '../types/playback';
import { EventEmitter } from '../utils/events';

export interface MediaControls {
  publish(metadata: NowPlayingMetadata | null): void;
  /**
   * @returns Function that removes the listener
   */
  onMediaKey(listener: (key: MediaKey) => void): () => void;
}

export interface Clipboard {
  copy(text: string): Promise<void>;
}

type MediaControlEvents = {
  media_key: MediaKey;
};

/**
 * Media controls for platforms without an integration. Keeps the last
 * published metadata and lets callers inject key presses.
 */
export class NoopMediaControls implements MediaControls {
  private readonly emitter = new EventEmitter<MediaControlEvents>();
  private metadata: NowPlayingMetadata | null = null;

  publish(metadata: NowPlayingMetadata | null): void {
    this.metadata = metadata;
  }

  onMediaKey(listener: (key: MediaKey) => void): () => void {
    return this.emitter.on('media_key', listener);
  }

  /**
   * Report a media key as if the OS had delivered it
   */
  press(key: MediaKey): void {
    this.emitter.emit('media_key', key);
  }

  get current(): NowPlayingMetadata | null {
    return this.metadata;
  }
}

/**
 * Clipboard that remembers what it was given
 */
export class MemoryClipboard implements Clipboard {
  text: string | null = null;

  async copy(text: string): Promise<void> {
    this.text = text;
  }
}
