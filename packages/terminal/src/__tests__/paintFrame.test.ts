/**
 * Tests for frame painting
 */

import { describe, it, expect } from 'vitest';
import type { Frame, TableWidget } from '@playdeck/core';
import { columnWidths, fit, paintFrame, paintGauge, scrollOffset } from '../paintFrame';

const playbar: Frame['playbar'] = {
  title: '▶ Song',
  subtitle: 'Band · Record',
  gauge: { ratio: 0.5, label: '1:00 / 2:00' },
  indicators: 'Vol 50%',
};

function playlists(overrides: Partial<TableWidget> = {}): TableWidget {
  return {
    kind: 'table',
    title: 'Playlists',
    columns: [
      { header: 'Name', weight: 1 },
      { header: 'Owner', weight: 1 },
    ],
    rows: [
      ['Mix', 'me'],
      ['Jazz', 'you'],
    ],
    selected: 1,
    spinner: null,
    empty: 'No playlists',
    footer: '2 items',
    ...overrides,
  };
}

function frame(overrides: Partial<Frame> = {}): Frame {
  return {
    header: { title: 'Playlists', user: 'Ada' },
    body: playlists(),
    playbar,
    status: null,
    prompt: null,
    ...overrides,
  };
}

describe('fit', () => {
  it('should pad short text and truncate long text', () => {
    expect(fit('ab', 4)).toBe('ab  ');
    expect(fit('abcdef', 4)).toBe('abc…');
    expect(fit('abcd', 4)).toBe('abcd');
    expect(fit('x', 0)).toBe('');
  });
});

describe('columnWidths', () => {
  it('should split by weight and give the remainder to the last column', () => {
    expect(columnWidths([3, 2, 1], 10)).toEqual([5, 3, 2]);
    expect(columnWidths([1, 1], 27)).toEqual([13, 14]);
    expect(columnWidths([1, 1], 0)).toEqual([0, 0]);
  });
});

describe('scrollOffset', () => {
  it('should keep the selected row in view', () => {
    expect(scrollOffset(null, 5, 10)).toBe(0);
    expect(scrollOffset(2, 5, 10)).toBe(0);
    expect(scrollOffset(7, 5, 10)).toBe(3);
    expect(scrollOffset(9, 5, 10)).toBe(5);
    expect(scrollOffset(3, 5, 4)).toBe(0);
  });
});

describe('paintGauge', () => {
  it('should fill the bar in proportion to progress', () => {
    expect(paintGauge(playbar, 30)).toBe('1:00 / 2:00 ████░░░░  Vol 50%');
  });
});

describe('paintFrame', () => {
  it('should fill the screen exactly', () => {
    const lines = paintFrame(frame(), 30, 10);

    expect(lines).toHaveLength(10);
    expect(lines.every((painted) => Array.from(painted.text).length === 30)).toBe(true);
  });

  it('should lay out header, body and playbar', () => {
    const lines = paintFrame(frame(), 30, 10);

    expect(lines.map((painted) => painted.text.trimEnd())).toEqual([
      'Playdeck · Playlists       Ada',
      '─'.repeat(30),
      'Playlists',
      '  Name          Owner',
      '> Jazz          you',
      '  2 items',
      '─'.repeat(30),
      '▶ Song · Band · Record',
      '1:00 / 2:00 ████░░░░  Vol 50%',
      '',
    ]);
  });

  it('should scroll to and highlight the selected row', () => {
    const lines = paintFrame(frame(), 30, 10);

    expect(lines[4]).toEqual({
      text: `> Jazz${' '.repeat(10)}you${' '.repeat(11)}`,
      tone: 'normal',
      inverse: true,
    });
    expect(lines.filter((painted) => painted.inverse)).toHaveLength(1);
  });

  it('should show the empty message for a list with no rows', () => {
    const lines = paintFrame(
      frame({ body: playlists({ rows: [], selected: null, footer: null }) }),
      30,
      10
    );

    expect(lines[4]).toEqual({ text: fit('  No playlists', 30), tone: 'muted', inverse: false });
  });

  it('should show a spinner instead of the empty message while loading', () => {
    const lines = paintFrame(
      frame({
        body: playlists({ rows: [], selected: null, spinner: '⠋ Loading…', footer: null }),
      }),
      30,
      10
    );

    expect(lines[4]).toEqual({ text: fit('  ⠋ Loading…', 30), tone: 'info', inverse: false });
  });

  it('should indent panel lines', () => {
    const lines = paintFrame(
      frame({
        body: {
          kind: 'panel',
          title: 'Error',
          lines: [{ text: 'Session expired', tone: 'error' }],
        },
      }),
      30,
      10
    );

    expect(lines[2]?.text.trimEnd()).toBe('Error');
    expect(lines[3]).toEqual({ text: fit('  Session expired', 30), tone: 'error', inverse: false });
  });

  it('should put the search prompt ahead of the status line', () => {
    const status = { text: 'Added to queue', tone: 'success' } as const;

    const withStatus = paintFrame(frame({ status }), 30, 10);
    expect(withStatus[9]).toEqual({
      text: fit('Added to queue', 30),
      tone: 'success',
      inverse: false,
    });

    const withPrompt = paintFrame(frame({ status, prompt: 'ab' }), 30, 10);
    expect(withPrompt[9]).toEqual({
      text: fit('Search: ab▏', 30),
      tone: 'accent',
      inverse: false,
    });
  });

  it('should leave the user name out when signed out', () => {
    const lines = paintFrame(frame({ header: { title: 'Devices', user: null } }), 30, 10);

    expect(lines[0]?.text).toBe(fit('Playdeck · Devices', 30));
  });
});
