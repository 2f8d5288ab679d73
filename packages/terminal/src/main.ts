/**
 * playdeck executable
 *
 * Exit codes: 0 on a normal quit, 1 when configuration or the stored session
 * cannot be used.
 */

import {
  FileSessionStore,
  PlaydeckApp,
  PlaydeckError,
  StorageCorruptError,
  flushLogs,
  loadConfig,
  logError,
} from '@playdeck/core';
import type { AppConfig } from '@playdeck/core';
import { SystemClipboard } from './SystemClipboard';
import { TerminalSurface } from './TerminalSurface';

const LOGIN_HELP = `No stored session.

Set PLAYDECK_REFRESH_TOKEN to a refresh token for your account and run
playdeck again; the session is then kept in PLAYDECK_SESSION_FILE.`;

function fail(message: string): number {
  process.stderr.write(`playdeck: ${message}\n`);
  return 1;
}

async function main(): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    return fail(error instanceof Error ? error.message : String(error));
  }

  const surface = new TerminalSurface();
  const app = new PlaydeckApp({
    config,
    store: new FileSessionStore(config.sessionFile),
    sink: surface,
    clipboard: new SystemClipboard(),
    size: surface.size,
  });

  try {
    const found = await app.initialize();
    if (!found) {
      const refreshToken = process.env.PLAYDECK_REFRESH_TOKEN;
      if (!refreshToken) {
        return fail(LOGIN_HELP);
      }
      await app.authenticate(refreshToken);
    }
  } catch (error) {
    if (error instanceof StorageCorruptError) {
      logError(error, { file: config.sessionFile });
      return fail(`${error.message}. Remove the file and sign in again.`);
    }
    if (error instanceof PlaydeckError) {
      return fail(`Sign-in failed: ${error.message}`);
    }
    throw error;
  }

  surface.open({
    onKey: (key) => app.dispatch({ type: 'key_press', key }),
    onResize: (size) => app.dispatch({ type: 'resize', ...size }),
  });

  try {
    await app.run();
  } finally {
    surface.close();
  }
  return 0;
}

main()
  .then((code) => {
    flushLogs();
    process.exit(code);
  })
  .catch((error: unknown) => {
    logError(error, { phase: 'main' });
    flushLogs();
    process.stderr.write(`playdeck: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  });
