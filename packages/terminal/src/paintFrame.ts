/**
 * Frame painting
 *
 * Lays a frame out on a fixed-size grid of text lines. Pure: the terminal
 * surface only writes the lines it gets back.
 *
 * Layout, top to bottom:
 *   header
 *   separator
 *   body (fills the remaining rows)
 *   separator
 *   playbar title
 *   progress gauge
 *   status line / search prompt
 */

import type { Frame, PanelWidget, Playbar, TableWidget, Tone } from '@playdeck/core';

export interface PaintedLine {
  text: string;
  tone: Tone;
  inverse: boolean;
}

const HEADER_ROWS = 2;
const FOOTER_ROWS = 4;
const ROW_MARKER = '> ';
const COLUMN_GAP = ' ';

function line(text: string, width: number, tone: Tone = 'normal', inverse = false): PaintedLine {
  return { text: fit(text, width), tone, inverse };
}

/**
 * Truncate with an ellipsis or pad with spaces to exactly `width` characters
 */
export function fit(text: string, width: number): string {
  if (width <= 0) {
    return '';
  }
  const chars = Array.from(text);
  if (chars.length > width) {
    return `${chars.slice(0, width - 1).join('')}…`;
  }
  return text + ' '.repeat(width - chars.length);
}

/**
 * Split `total` characters between columns in proportion to their weights;
 * the last column takes the rounding remainder
 */
export function columnWidths(weights: number[], total: number): number[] {
  const sum = weights.reduce((acc, weight) => acc + weight, 0);
  if (sum <= 0 || total <= 0) {
    return weights.map(() => 0);
  }
  const widths = weights.map((weight) => Math.floor((total * weight) / sum));
  const used = widths.reduce((acc, width) => acc + width, 0);
  const last = widths.length - 1;
  if (last >= 0) {
    widths[last] = (widths[last] ?? 0) + total - used;
  }
  return widths;
}

function formatRow(cells: string[], widths: number[]): string {
  return widths.map((width, index) => fit(cells[index] ?? '', width)).join(COLUMN_GAP);
}

/**
 * First row to show so that `selected` stays inside a window of `visible` rows
 */
export function scrollOffset(selected: number | null, visible: number, total: number): number {
  if (selected === null || visible <= 0 || total <= visible) {
    return 0;
  }
  return Math.min(Math.max(0, selected - visible + 1), total - visible);
}

function paintTable(table: TableWidget, width: number, height: number): PaintedLine[] {
  const lines: PaintedLine[] = [line(table.title, width, 'accent')];
  const inner = width - ROW_MARKER.length;
  const widths = columnWidths(
    table.columns.map((column) => column.weight),
    Math.max(0, inner - COLUMN_GAP.length * (table.columns.length - 1))
  );

  const blank = ' '.repeat(ROW_MARKER.length);
  const headers = table.columns.map((column) => column.header);
  lines.push(line(blank + formatRow(headers, widths), width, 'muted'));

  const reserved = (table.spinner ? 1 : 0) + (table.footer ? 1 : 0);
  const visible = Math.max(0, height - lines.length - reserved);

  if (table.rows.length === 0 && !table.spinner) {
    lines.push(line(`  ${table.empty}`, width, 'muted'));
  } else {
    const start = scrollOffset(table.selected, visible, table.rows.length);
    table.rows.slice(start, start + visible).forEach((cells, index) => {
      const selected = start + index === table.selected;
      const marker = selected ? ROW_MARKER : blank;
      lines.push(line(marker + formatRow(cells, widths), width, 'normal', selected));
    });
  }

  if (table.spinner) {
    lines.push(line(`  ${table.spinner}`, width, 'info'));
  }
  if (table.footer) {
    lines.push(line(`  ${table.footer}`, width, 'muted'));
  }
  return lines.slice(0, height);
}

function paintPanel(panel: PanelWidget, width: number, height: number): PaintedLine[] {
  const lines = [
    line(panel.title, width, 'accent'),
    ...panel.lines.map((entry) => line(`  ${entry.text}`, width, entry.tone)),
  ];
  return lines.slice(0, height);
}

/**
 * Progress bar with its label and indicators on one line
 */
export function paintGauge(playbar: Playbar, width: number): string {
  const { gauge, indicators } = playbar;
  const fixed = gauge.label.length + indicators.length + 4;
  const barWidth = Math.max(0, width - fixed);
  const filled = Math.round(Math.min(1, Math.max(0, gauge.ratio)) * barWidth);
  const bar = '█'.repeat(filled) + '░'.repeat(barWidth - filled);
  return `${gauge.label} ${bar}  ${indicators}`;
}

export function paintFrame(frame: Frame, width: number, height: number): PaintedLine[] {
  const separator = line('─'.repeat(width), width, 'muted');
  const user = frame.header.user ?? '';
  const title = `Playdeck · ${frame.header.title}`;
  const gap = Math.max(1, width - Array.from(title).length - Array.from(user).length);

  const bodyHeight = Math.max(0, height - HEADER_ROWS - FOOTER_ROWS);
  const body =
    frame.body.kind === 'table'
      ? paintTable(frame.body, width, bodyHeight)
      : paintPanel(frame.body, width, bodyHeight);
  while (body.length < bodyHeight) {
    body.push(line('', width));
  }

  const { playbar } = frame;
  const bottom =
    frame.prompt !== null
      ? line(`Search: ${frame.prompt}▏`, width, 'accent')
      : frame.status
        ? line(frame.status.text, width, frame.status.tone)
        : line('', width);

  const lines = [
    line(title + ' '.repeat(gap) + user, width, 'accent'),
    separator,
    ...body,
    separator,
    line(playbar.subtitle ? `${playbar.title} · ${playbar.subtitle}` : playbar.title, width),
    line(paintGauge(playbar, width), width, 'muted'),
    bottom,
  ];

  return lines.slice(0, height);
}
