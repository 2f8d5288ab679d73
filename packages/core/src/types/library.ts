/**
 * Library types
 *
 * Domain shapes the API Gateway maps service responses into. The renderer and
 * dispatcher only ever see these, never raw service payloads.
 */

export interface Track {
  id: string;
  uri: string;
  name: string;
  artists: string[];
  album: string;
  albumUri: string | null;
  durationMs: number;
  /** Public web link, used by "copy URL" */
  url: string | null;
  /** Web link of the album, or of the show for an episode */
  albumUrl: string | null;
}

/**
 * What the album view needs to know about its album before any page arrives
 */
export interface AlbumRef {
  id: string;
  name: string;
  uri: string;
  url: string | null;
}

export interface Playlist {
  id: string;
  uri: string;
  name: string;
  owner: string;
  trackCount: number;
}

export interface Device {
  id: string;
  name: string;
  type: string;
  isActive: boolean;
  volumePercent: number | null;
}

export interface UserProfile {
  id: string;
  displayName: string;
  country: string | null;
}

/**
 * One offset-addressed page of a remote collection
 */
export interface Page<T> {
  items: T[];
  offset: number;
  limit: number;
  total: number;
  /** Offset of the following page, or null on the last page */
  next: number | null;
}

/** Playlist id used for the user's saved ("liked") tracks */
export const LIKED_SONGS_ID = 'liked';

/**
 * Split a `spotify:<type>:<id>` URI. The saved-tracks collection
 * (`spotify:user:<user>:collection`) comes back as type `collection`.
 */
export function parseResourceUri(uri: string): { type: string; id: string } | null {
  const parts = uri.split(':');
  if (parts[0] !== 'spotify') {
    return null;
  }
  if (parts[parts.length - 1] === 'collection') {
    return { type: 'collection', id: parts[2] ?? '' };
  }
  // Older playlist URIs carry the owner: spotify:user:<user>:playlist:<id>
  if (parts.length === 5 && parts[1] === 'user' && parts[3] === 'playlist' && parts[4]) {
    return { type: 'playlist', id: parts[4] };
  }
  const [, type, id] = parts;
  if (parts.length !== 3 || !type || !id) {
    return null;
  }
  return { type, id };
}
