import type { Rect, ScreenBuffer } from './buffer.js';

/**
 * Anything that can draw itself into a region of a ScreenBuffer.
 * Implementations must not perform terminal I/O.
 */
export interface Widget {
  render(area: Rect, buf: ScreenBuffer): void;
}
