// Render Core - Styled text spans and lines

import { EMPTY_STYLE, patchStyle, type ScreenBuffer, type Style } from './buffer.js';

export type Alignment = 'left' | 'center' | 'right';

export interface Span {
  content: string;
  style: Style;
}

export interface Line {
  spans: Span[];
  alignment?: Alignment;
}

export function span(content: string, style: Style = EMPTY_STYLE): Span {
  return { content, style };
}

export function line(spans: Array<Span | string>, alignment?: Alignment): Line {
  return {
    spans: spans.map((s) => (typeof s === 'string' ? span(s) : s)),
    alignment,
  };
}

export function spanWidth(s: Span): number {
  return Array.from(s.content).length;
}

export function lineWidth(l: Line): number {
  return l.spans.reduce((total, s) => total + spanWidth(s), 0);
}

/**
 * Left offset of content `width` cells wide inside `available` cells
 */
export function alignOffset(alignment: Alignment, available: number, width: number): number {
  const free = Math.max(0, available - width);
  switch (alignment) {
    case 'center':
      return Math.floor(free / 2);
    case 'right':
      return free;
    default:
      return 0;
  }
}

/**
 * Draw `l` on row `y` between `x` and `x + width`, aligned with the line's own
 * alignment or `fallback`. Content past the right edge is cut.
 */
export function renderLine(
  buf: ScreenBuffer,
  l: Line,
  x: number,
  y: number,
  width: number,
  fallback: Alignment = 'left',
  baseStyle: Style = EMPTY_STYLE
): void {
  if (width <= 0) return;
  const offset = alignOffset(l.alignment ?? fallback, width, lineWidth(l));
  let cursor = x + offset;
  const end = x + width;
  for (const s of l.spans) {
    if (cursor >= end) break;
    cursor = buf.setString(cursor, y, s.content, patchStyle(baseStyle, s.style), end - cursor);
  }
}
