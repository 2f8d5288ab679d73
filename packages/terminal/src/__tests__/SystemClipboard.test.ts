/**
 * Tests for SystemClipboard
 */

import { describe, it, expect } from 'vitest';
import { clipboardCommand, SystemClipboard } from '../SystemClipboard';

describe('clipboardCommand', () => {
  it('should pick the copy command for each platform', () => {
    expect(clipboardCommand('darwin', {})).toEqual({ command: 'pbcopy', args: [] });
    expect(clipboardCommand('win32', {})).toEqual({ command: 'clip', args: [] });
    expect(clipboardCommand('linux', {})).toEqual({
      command: 'xclip',
      args: ['-selection', 'clipboard'],
    });
  });

  it('should prefer wl-copy under Wayland', () => {
    expect(clipboardCommand('linux', { WAYLAND_DISPLAY: 'wayland-0' })).toEqual({
      command: 'wl-copy',
      args: [],
    });
  });

  it('should return null for platforms without a known command', () => {
    expect(clipboardCommand('aix', {})).toBeNull();
  });
});

describe('SystemClipboard', () => {
  it('should reject when there is no copy command', async () => {
    const clipboard = new SystemClipboard(null);

    await expect(clipboard.copy('text')).rejects.toThrow(
      `No clipboard command for ${process.platform}`
    );
  });

  it.skipIf(process.platform === 'win32')(
    'should reject when the command exits without reading the text',
    async () => {
      const clipboard = new SystemClipboard({ command: 'true', args: [] });

      await expect(clipboard.copy('x'.repeat(4_000_000))).rejects.toThrow('EPIPE');
    }
  );
});
