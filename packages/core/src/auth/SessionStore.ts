/**
 * Session persistence
 *
 * The session is stored as an opaque JSON blob. The file store writes it with
 * owner-only permissions and replaces it atomically (write to a temporary file,
 * then rename).
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { StorageCorruptError } from '../types/errors';
import { StoredSessionSchema } from '../utils/validators';
import { validateSafe } from '../utils/validation';
import { createLogger } from '../utils/logger';

const logger = createLogger('SessionStore');

export interface Session {
  accessToken: string;
  refreshToken: string;
  /** Expiry as epoch milliseconds */
  expiresAt: number;
}

export interface SessionStore {
  /**
   * @returns The stored session, or null when nothing is stored
   * @throws StorageCorruptError when stored data cannot be read back
   */
  load(): Promise<Session | null>;
  save(session: Session): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Parse a stored blob, throwing StorageCorruptError when it is not a session
 */
export function parseStoredSession(raw: string, source: string): Session {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new StorageCorruptError(`Session data in ${source} is not valid JSON`, error, { source });
  }

  const session = validateSafe(StoredSessionSchema, json);
  if (!session) {
    throw new StorageCorruptError(`Session data in ${source} is incomplete`, undefined, { source });
  }
  return session;
}

export class FileSessionStore implements SessionStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<Session | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug({ file: this.filePath }, 'No stored session');
        return null;
      }
      throw new StorageCorruptError(`Cannot read ${this.filePath}`, error, {
        file: this.filePath,
      });
    }

    return parseStoredSession(raw, this.filePath);
  }

  async save(session: Session): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify(session, null, 2), { mode: 0o600 });
    await fs.rename(tmp, this.filePath);

    logger.debug({ file: this.filePath, expiresAt: session.expiresAt }, 'Session saved');
  }

  async clear(): Promise<void> {
    try {
      await fs.unlink(this.filePath);
    } catch (error) {
      if (!isMissingFile(error)) {
        throw error;
      }
    }
  }
}

/**
 * In-memory store, serialising like the file store so round trips behave the same
 */
export class MemorySessionStore implements SessionStore {
  private blob: string | null;

  constructor(initial?: Session | string) {
    if (initial === undefined) {
      this.blob = null;
    } else {
      this.blob = typeof initial === 'string' ? initial : JSON.stringify(initial);
    }
  }

  async load(): Promise<Session | null> {
    return this.blob === null ? null : parseStoredSession(this.blob, 'memory');
  }

  async save(session: Session): Promise<void> {
    this.blob = JSON.stringify(session);
  }

  async clear(): Promise<void> {
    this.blob = null;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
