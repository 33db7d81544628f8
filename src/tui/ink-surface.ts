// Rendering Surface - flushes frames to the terminal through Ink

import React from 'react';
import { render, type Instance } from 'ink';

import { rect, type Rect } from './render/buffer.js';
import { FrameView } from './frame-view.js';
import type { RenderFn, Surface } from './types.js';

const DEFAULT_COLUMNS = 80;
const DEFAULT_ROWS = 24;

export interface InkSurfaceOptions {
  stdout?: NodeJS.WriteStream;
  stdin?: NodeJS.ReadStream;
}

export class InkSurface implements Surface {
  private instance: Instance | null = null;
  private readonly stdout: NodeJS.WriteStream;
  private readonly stdin: NodeJS.ReadStream;

  constructor(options: InkSurfaceOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stdin = options.stdin ?? process.stdin;
  }

  /**
   * Drawable area. Ink writes a newline after the frame, so the last terminal
   * row is left free to keep the frame from scrolling.
   */
  area(): Rect {
    const columns = this.stdout.columns || DEFAULT_COLUMNS;
    const rows = this.stdout.rows || DEFAULT_ROWS;
    return rect(0, 0, columns, Math.max(1, rows - 1));
  }

  draw(renderFn: RenderFn): void {
    const buffer = renderFn(this.area());
    const node = React.createElement(FrameView, { buffer });

    if (this.instance) {
      this.instance.rerender(node);
      return;
    }

    this.instance = render(node, {
      stdout: this.stdout,
      stdin: this.stdin,
      exitOnCtrlC: false,
      patchConsole: false,
    });
  }

  close(): void {
    if (!this.instance) return;
    this.instance.unmount();
    this.instance = null;
  }
}
