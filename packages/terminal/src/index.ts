/**
 * @playdeck/terminal
 *
 * Terminal boundary of Playdeck: frame painting, the terminal-kit surface
 * and the system clipboard.
 *
 * @packageDocumentation
 */

export { paintFrame, paintGauge, fit, columnWidths, scrollOffset } from './paintFrame';
export type { PaintedLine } from './paintFrame';
export { TerminalSurface, normalizeKey } from './TerminalSurface';
export type { SurfaceHandlers } from './TerminalSurface';
export { SystemClipboard, clipboardCommand } from './SystemClipboard';
export type { ClipboardCommand } from './SystemClipboard';
