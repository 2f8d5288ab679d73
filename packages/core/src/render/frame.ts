/**
 * Frame: the layout tree the renderer produces and a terminal surface paints
 */

export type Tone = 'normal' | 'muted' | 'accent' | 'info' | 'success' | 'warning' | 'error';

export interface Column {
  header: string;
  /** Relative share of the available width */
  weight: number;
}

export interface TableWidget {
  kind: 'table';
  title: string;
  columns: Column[];
  rows: string[][];
  /** Highlighted row, null when nothing is selectable */
  selected: number | null;
  /** Extra row shown while more data is loading */
  spinner: string | null;
  /** Shown instead of rows when there are none and nothing is loading */
  empty: string;
  footer: string | null;
}

export interface PanelLine {
  text: string;
  tone: Tone;
}

export interface PanelWidget {
  kind: 'panel';
  title: string;
  lines: PanelLine[];
}

export type Widget = TableWidget | PanelWidget;

export interface Gauge {
  /** 0..1 */
  ratio: number;
  label: string;
}

export interface Playbar {
  title: string;
  subtitle: string;
  gauge: Gauge;
  indicators: string;
}

export interface FrameStatus {
  text: string;
  tone: Tone;
}

export interface Frame {
  header: { title: string; user: string | null };
  body: Widget;
  playbar: Playbar;
  status: FrameStatus | null;
  /** Text being typed into the search prompt, null when the prompt is closed */
  prompt: string | null;
}

/**
 * Anything that can show a frame
 */
export interface FrameSink {
  draw(frame: Frame): void;
}
