// Render Core - Bordered block with titles on the top and bottom edges

import { EMPTY_STYLE, innerRect, type Rect, type ScreenBuffer, type Style } from './buffer.js';
import { renderLine, type Alignment, type Line } from './text.js';
import type { Widget } from './widget.js';

export interface BorderSet {
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
}

export const BORDER_SETS = {
  plain: {
    topLeft: '┌',
    topRight: '┐',
    bottomLeft: '└',
    bottomRight: '┘',
    horizontal: '─',
    vertical: '│',
  },
  rounded: {
    topLeft: '╭',
    topRight: '╮',
    bottomLeft: '╰',
    bottomRight: '╯',
    horizontal: '─',
    vertical: '│',
  },
  thick: {
    topLeft: '┏',
    topRight: '┓',
    bottomLeft: '┗',
    bottomRight: '┛',
    horizontal: '━',
    vertical: '┃',
  },
  double: {
    topLeft: '╔',
    topRight: '╗',
    bottomLeft: '╚',
    bottomRight: '╝',
    horizontal: '═',
    vertical: '║',
  },
} as const satisfies Record<string, BorderSet>;

export type TitlePosition = 'top' | 'bottom';

export interface Title {
  line: Line;
  position: TitlePosition;
  alignment: Alignment;
}

export interface BlockOptions {
  borderSet?: BorderSet;
  borderStyle?: Style;
  titles?: Title[];
}

/**
 * A frame with all four borders. Titles overwrite the border row they sit on
 * and are clipped to the space between the corners.
 */
export class Block implements Widget {
  readonly borderSet: BorderSet;
  readonly borderStyle: Style;
  readonly titles: Title[];

  constructor(options: BlockOptions = {}) {
    this.borderSet = options.borderSet ?? BORDER_SETS.plain;
    this.borderStyle = options.borderStyle ?? EMPTY_STYLE;
    this.titles = options.titles ?? [];
  }

  title(line: Line, position: TitlePosition = 'top', alignment: Alignment = 'left'): Block {
    return new Block({
      borderSet: this.borderSet,
      borderStyle: this.borderStyle,
      titles: [...this.titles, { line, position, alignment }],
    });
  }

  inner(area: Rect): Rect {
    return innerRect(area);
  }

  render(area: Rect, buf: ScreenBuffer): void {
    if (area.width === 0 || area.height === 0) return;

    const set = this.borderSet;
    const style = this.borderStyle;
    const left = area.x;
    const right = area.x + area.width - 1;
    const top = area.y;
    const bottom = area.y + area.height - 1;

    for (let x = left + 1; x < right; x++) {
      buf.setCell(x, top, set.horizontal, style);
      buf.setCell(x, bottom, set.horizontal, style);
    }
    for (let y = top + 1; y < bottom; y++) {
      buf.setCell(left, y, set.vertical, style);
      buf.setCell(right, y, set.vertical, style);
    }
    buf.setCell(left, top, set.topLeft, style);
    buf.setCell(right, top, set.topRight, style);
    buf.setCell(left, bottom, set.bottomLeft, style);
    buf.setCell(right, bottom, set.bottomRight, style);

    const titleWidth = area.width - 2;
    for (const title of this.titles) {
      const row = title.position === 'top' ? top : bottom;
      renderLine(buf, title.line, left + 1, row, titleWidth, title.alignment, style);
    }
  }
}
