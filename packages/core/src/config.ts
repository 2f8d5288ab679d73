/**
 * Application configuration
 *
 * Read from environment variables and validated with Zod. Poll intervals and
 * other timings are configuration so they can be tuned without code changes.
 */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { validate } from './utils/validation';

const intFromEnv = (fallback: number, min = 0) =>
  z.coerce.number().int().min(min).default(fallback);

export const KeyBindingsSchema = z.object({
  back: z.string().default('q'),
  togglePlayback: z.string().default(' '),
  nextTrack: z.string().default('n'),
  previousTrack: z.string().default('p'),
  increaseVolume: z.string().default('+'),
  decreaseVolume: z.string().default('-'),
  seekForwards: z.string().default('>'),
  seekBackwards: z.string().default('<'),
  shuffle: z.string().default('s'),
  repeat: z.string().default('r'),
  search: z.string().default('/'),
  devices: z.string().default('d'),
  library: z.string().default('l'),
  likedSongs: z.string().default('L'),
  nowPlaying: z.string().default('.'),
  help: z.string().default('?'),
  loadMore: z.string().default('m'),
  copyUrl: z.string().default('c'),
  toggleSave: z.string().default('S'),
  addToQueue: z.string().default('z'),
  jumpToAlbum: z.string().default('a'),
  jumpToContext: z.string().default('o'),
  copyAlbumUrl: z.string().default('C'),
  logout: z.string().default('X'),
});

export type KeyBindings = z.infer<typeof KeyBindingsSchema>;

/** `PLAYDECK_KEYS`: a JSON object of bindings to override, e.g. `{"shuffle":"x"}` */
const KeysJsonSchema = z
  .string()
  .transform((text, ctx) => {
    try {
      const value: unknown = JSON.parse(text);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Expected a JSON object' });
      return z.NEVER;
    }
  })
  .pipe(KeyBindingsSchema);

export const AppConfigSchema = z.object({
  clientId: z.string().min(1, 'PLAYDECK_CLIENT_ID is required'),
  apiUrl: z.string().url().default('https://api.spotify.com/v1'),
  tokenUrl: z.string().url().default('https://accounts.spotify.com/api/token'),
  sessionFile: z.string().min(1),
  pollFastMs: intFromEnv(1000, 250),
  pollSlowMs: intFromEnv(5000, 250),
  requestTimeoutMs: intFromEnv(10000, 100),
  queueCapacity: intFromEnv(32, 1),
  tickMs: intFromEnv(250, 16),
  statusTtlMs: intFromEnv(4000, 100),
  volumeStep: intFromEnv(10, 1),
  seekStepMs: intFromEnv(5000, 100),
  pageSize: intFromEnv(50, 1),
  keys: KeyBindingsSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_SESSION_FILE = path.join(os.homedir(), '.config', 'playdeck', 'session.json');

/**
 * Build configuration from environment variables
 *
 * @param env - Environment to read, `process.env` by default
 * @throws ValidationError if a value is missing or malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return validate(
    AppConfigSchema,
    {
      clientId: env.PLAYDECK_CLIENT_ID,
      apiUrl: env.PLAYDECK_API_URL,
      tokenUrl: env.PLAYDECK_TOKEN_URL,
      sessionFile: env.PLAYDECK_SESSION_FILE ?? DEFAULT_SESSION_FILE,
      pollFastMs: env.PLAYDECK_POLL_FAST_MS,
      pollSlowMs: env.PLAYDECK_POLL_SLOW_MS,
      requestTimeoutMs: env.PLAYDECK_REQUEST_TIMEOUT_MS,
      queueCapacity: env.PLAYDECK_QUEUE_CAPACITY,
      tickMs: env.PLAYDECK_TICK_MS,
      statusTtlMs: env.PLAYDECK_STATUS_TTL_MS,
      volumeStep: env.PLAYDECK_VOLUME_STEP,
      seekStepMs: env.PLAYDECK_SEEK_STEP_MS,
      pageSize: env.PLAYDECK_PAGE_SIZE,
      keys:
        env.PLAYDECK_KEYS === undefined
          ? undefined
          : validate(KeysJsonSchema, env.PLAYDECK_KEYS, 'PLAYDECK_KEYS'),
    },
    'configuration'
  );
}

/**
 * Configuration with defaults for everything, for tests and embedding
 */
export function defineConfig(overrides: Partial<z.input<typeof AppConfigSchema>> = {}): AppConfig {
  return validate(
    AppConfigSchema,
    {
      clientId: 'playdeck',
      sessionFile: DEFAULT_SESSION_FILE,
      ...overrides,
    },
    'configuration'
  );
}
