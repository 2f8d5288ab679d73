/**
 * Tests for key normalization
 */

import { describe, it, expect } from 'vitest';
import { normalizeKey } from '../TerminalSurface';

describe('normalizeKey', () => {
  it('should map named keys onto dispatcher names', () => {
    expect(normalizeKey('CTRL_C')).toBe('ctrl-c');
    expect(normalizeKey('KP_ENTER')).toBe('enter');
    expect(normalizeKey('PAGE_DOWN')).toBe('pagedown');
    expect(normalizeKey('BACKSPACE')).toBe('backspace');
  });

  it('should pass printable characters through unchanged', () => {
    expect(normalizeKey('L')).toBe('L');
    expect(normalizeKey(' ')).toBe(' ');
    expect(normalizeKey('é')).toBe('é');
  });

  it('should lower-case other key names', () => {
    expect(normalizeKey('SHIFT_TAB')).toBe('shift-tab');
    expect(normalizeKey('F1')).toBe('f1');
  });
});
