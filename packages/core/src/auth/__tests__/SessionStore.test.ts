/**
 * Tests for session persistence
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { FileSessionStore, MemorySessionStore, parseStoredSession } from '../SessionStore';
import { StorageCorruptError } from '../../types/errors';

const session = {
  accessToken: 'test-access',
  refreshToken: 'test-refresh',
  expiresAt: 1_700_000_000_000,
};

describe('FileSessionStore', () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'playdeck-session-'));
    file = path.join(dir, 'nested', 'session.json');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return null when nothing is stored', async () => {
    await expect(new FileSessionStore(file).load()).resolves.toBeNull();
  });

  it('should round-trip a session through the file', async () => {
    const store = new FileSessionStore(file);

    await store.save(session);

    await expect(new FileSessionStore(file).load()).resolves.toEqual(session);
  });

  it('should write the file readable by the owner only', async () => {
    await new FileSessionStore(file).save(session);

    const stat = await fs.stat(file);
    if (process.platform !== 'win32') {
      expect(stat.mode & 0o777).toBe(0o600);
    }
  });

  it('should leave no temporary file behind', async () => {
    await new FileSessionStore(file).save(session);

    await expect(fs.readdir(path.dirname(file))).resolves.toEqual(['session.json']);
  });

  it('should report corrupt files', async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, 'not json');

    await expect(new FileSessionStore(file).load()).rejects.toThrow(StorageCorruptError);
  });

  it('should clear the file and tolerate clearing twice', async () => {
    const store = new FileSessionStore(file);
    await store.save(session);

    await store.clear();
    await store.clear();

    await expect(store.load()).resolves.toBeNull();
  });
});

describe('MemorySessionStore', () => {
  it('should behave like the file store', async () => {
    const store = new MemorySessionStore();
    await expect(store.load()).resolves.toBeNull();

    await store.save(session);
    await expect(store.load()).resolves.toEqual(session);
  });
});

describe('parseStoredSession', () => {
  it('should reject incomplete sessions', () => {
    expect(() => parseStoredSession('{"accessToken":"a"}', 'test')).toThrow(
      'Session data in test is incomplete'
    );
  });

  it('should strip unknown fields', () => {
    expect(parseStoredSession(JSON.stringify({ ...session, extra: true }), 'test')).toEqual(session);
  });
});
