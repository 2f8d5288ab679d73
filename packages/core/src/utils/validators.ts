/**
 * Zod schemas for runtime validation of Web API responses
 *
 * These schemas describe the subset of each payload the client reads. Unknown
 * keys are stripped; missing optional fields default to null.
 */

import { z } from 'zod';

// ============================================================================
// Authentication Schemas
// ============================================================================

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().int().positive(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

export const StoredSessionSchema = z.object({
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: z.number().int().nonnegative(),
});

// ============================================================================
// Catalog Schemas
// ============================================================================

const ExternalUrlsSchema = z
  .object({ spotify: z.string().optional() })
  .optional()
  .nullable();

export const TrackObjectSchema = z.object({
  type: z.literal('track'),
  id: z.string().nullable(),
  uri: z.string(),
  name: z.string(),
  duration_ms: z.number().int().nonnegative(),
  artists: z.array(z.object({ name: z.string() })),
  album: z.object({
    name: z.string(),
    uri: z.string().optional().nullable(),
    external_urls: ExternalUrlsSchema,
  }),
  external_urls: ExternalUrlsSchema,
});

/** Album tracks come without their album */
export const SimplifiedTrackSchema = TrackObjectSchema.omit({ album: true });

export const EpisodeObjectSchema = z.object({
  type: z.literal('episode'),
  id: z.string(),
  uri: z.string(),
  name: z.string(),
  duration_ms: z.number().int().nonnegative(),
  show: z.object({
    name: z.string(),
    publisher: z.string().optional(),
    uri: z.string().optional().nullable(),
    external_urls: ExternalUrlsSchema,
  }),
  external_urls: ExternalUrlsSchema,
});

export const PlayableObjectSchema = z.discriminatedUnion('type', [
  TrackObjectSchema,
  EpisodeObjectSchema,
]);

export const DeviceObjectSchema = z.object({
  id: z.string().nullable(),
  name: z.string(),
  type: z.string(),
  is_active: z.boolean(),
  volume_percent: z.number().int().min(0).max(100).nullable().optional(),
});

export const PlaybackStateSchema = z.object({
  device: DeviceObjectSchema,
  shuffle_state: z.boolean(),
  repeat_state: z.enum(['off', 'track', 'context']),
  progress_ms: z.number().int().nonnegative().nullable(),
  is_playing: z.boolean(),
  item: PlayableObjectSchema.nullable(),
  context: z.object({ uri: z.string() }).nullable().optional(),
});

export const DevicesResponseSchema = z.object({
  devices: z.array(DeviceObjectSchema),
});

export const UserProfileSchema = z.object({
  id: z.string(),
  display_name: z.string().nullable().optional(),
  country: z.string().optional(),
});

export const SimplifiedPlaylistSchema = z.object({
  id: z.string(),
  uri: z.string(),
  name: z.string(),
  owner: z.object({
    id: z.string(),
    display_name: z.string().nullable().optional(),
  }),
  tracks: z.object({ total: z.number().int().nonnegative() }).nullable().optional(),
});

/**
 * Offset-based paging object around any item schema
 */
export function pagingSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    items: z.array(item),
    offset: z.number().int().nonnegative(),
    limit: z.number().int().nonnegative(),
    total: z.number().int().nonnegative(),
    next: z.string().nullable(),
  });
}

export const PlaylistPageSchema = pagingSchema(SimplifiedPlaylistSchema.nullable());

export const PlaylistItemPageSchema = pagingSchema(
  z.object({ track: PlayableObjectSchema.nullable() })
);

export const SavedTrackPageSchema = pagingSchema(z.object({ track: TrackObjectSchema }));

export const AlbumTrackPageSchema = pagingSchema(SimplifiedTrackSchema);

export const SearchResponseSchema = z.object({
  tracks: pagingSchema(TrackObjectSchema),
});

export const SavedContainsSchema = z.array(z.boolean());

// ============================================================================
// Error body
// ============================================================================

export const ErrorBodySchema = z.object({
  error: z.union([
    z.object({ status: z.number().optional(), message: z.string() }),
    z.string(),
  ]),
  error_description: z.string().optional(),
});
