/**
 * Terminal surface (terminal-kit)
 *
 * Owns the real terminal: alternate screen, raw input, resize notifications,
 * and drawing painted frames.
 */

import termKit from 'terminal-kit';
import type { Frame, FrameSink, TerminalSize } from '@playdeck/core';
import { createLogger } from '@playdeck/core';
import type { PaintedLine } from './paintFrame';
import { paintFrame } from './paintFrame';

const logger = createLogger('TerminalSurface');

type Terminal = typeof termKit.terminal;

const NAMED_KEYS: Record<string, string> = {
  CTRL_C: 'ctrl-c',
  ENTER: 'enter',
  KP_ENTER: 'enter',
  ESCAPE: 'escape',
  BACKSPACE: 'backspace',
  UP: 'up',
  DOWN: 'down',
  LEFT: 'left',
  RIGHT: 'right',
  PAGE_UP: 'pageup',
  PAGE_DOWN: 'pagedown',
  TAB: 'tab',
};

/**
 * terminal-kit key name → the names the dispatcher understands.
 * Printable keys pass through as the character itself.
 */
export function normalizeKey(name: string): string {
  const named = NAMED_KEYS[name];
  if (named) {
    return named;
  }
  if (Array.from(name).length === 1) {
    return name;
  }
  return name.toLowerCase().replace(/_/g, '-');
}

export interface SurfaceHandlers {
  onKey(key: string): void;
  onResize(size: TerminalSize): void;
}

export class TerminalSurface implements FrameSink {
  private opened = false;

  constructor(private readonly term: Terminal = termKit.terminal) {}

  get size(): TerminalSize {
    return { columns: this.term.width, rows: this.term.height };
  }

  /**
   * Switch to the alternate screen and start delivering input
   */
  open(handlers: SurfaceHandlers): void {
    if (this.opened) {
      return;
    }
    this.opened = true;

    this.term.fullscreen(true);
    this.term.hideCursor();
    this.term.grabInput(true);

    this.term.on('key', (name: string) => {
      handlers.onKey(normalizeKey(name));
    });
    this.term.on('resize', (width: number, height: number) => {
      handlers.onResize({ columns: width, rows: height });
    });

    logger.debug(this.size, 'Terminal opened');
  }

  draw(frame: Frame): void {
    if (!this.opened) {
      return;
    }
    const lines = paintFrame(frame, this.term.width, this.term.height);
    lines.forEach((painted, index) => {
      this.term.moveTo(1, index + 1);
      this.write(painted);
    });
    this.term.styleReset();
  }

  /**
   * Give the terminal back in the state we found it
   */
  close(): void {
    if (!this.opened) {
      return;
    }
    this.opened = false;
    this.term.grabInput(false);
    this.term.styleReset();
    this.term.hideCursor(false);
    this.term.fullscreen(false);
    logger.debug('Terminal closed');
  }

  private write(painted: PaintedLine): void {
    const { text } = painted;
    if (painted.inverse) {
      this.term.inverse(text);
      return;
    }
    switch (painted.tone) {
      case 'normal':
        this.term.white(text);
        return;
      case 'muted':
        this.term.gray(text);
        return;
      case 'accent':
        this.term.cyan(text);
        return;
      case 'info':
        this.term.blue(text);
        return;
      case 'success':
        this.term.green(text);
        return;
      case 'warning':
        this.term.yellow(text);
        return;
      case 'error':
        this.term.red(text);
        return;
    }
  }
}
