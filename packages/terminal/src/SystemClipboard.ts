/**
 * System clipboard through the platform's copy command
 */

import { spawn } from 'node:child_process';
import type { Clipboard } from '@playdeck/core';
import { createLogger } from '@playdeck/core';

const logger = createLogger('SystemClipboard');

export interface ClipboardCommand {
  command: string;
  args: string[];
}

/**
 * Copy command for a platform, or null when none is known
 */
export function clipboardCommand(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env
): ClipboardCommand | null {
  switch (platform) {
    case 'darwin':
      return { command: 'pbcopy', args: [] };
    case 'win32':
      return { command: 'clip', args: [] };
    case 'linux':
    case 'freebsd':
    case 'openbsd':
      return env.WAYLAND_DISPLAY
        ? { command: 'wl-copy', args: [] }
        : { command: 'xclip', args: ['-selection', 'clipboard'] };
    default:
      return null;
  }
}

export class SystemClipboard implements Clipboard {
  constructor(private readonly target: ClipboardCommand | null = clipboardCommand()) {}

  copy(text: string): Promise<void> {
    const target = this.target;
    if (!target) {
      return Promise.reject(new Error(`No clipboard command for ${process.platform}`));
    }

    return new Promise((resolve, reject) => {
      const child = spawn(target.command, target.args, { stdio: ['pipe', 'ignore', 'ignore'] });
      // EPIPE when the command exits before reading everything
      let writeError: Error | null = null;
      child.stdin.on('error', (error) => {
        writeError = error;
      });
      child.on('error', reject);
      child.on('close', (code) => {
        if (writeError) {
          reject(writeError);
        } else if (code === 0) {
          logger.debug({ command: target.command }, 'Copied to clipboard');
          resolve();
        } else {
          reject(new Error(`${target.command} exited with code ${code}`));
        }
      });
      child.stdin.end(text);
    });
  }
}
