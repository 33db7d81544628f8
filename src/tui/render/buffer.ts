// Render Core - Styled cell grid that widgets draw into

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Style {
  color?: string;
  bold?: boolean;
}

export interface Cell {
  symbol: string;
  style: Style;
}

export const EMPTY_STYLE: Style = {};

export function rect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width: Math.max(0, width), height: Math.max(0, height) };
}

/**
 * Shrink a rect by `margin` cells on every side
 */
export function innerRect(area: Rect, margin = 1): Rect {
  return rect(area.x + margin, area.y + margin, area.width - margin * 2, area.height - margin * 2);
}

/**
 * Merge two styles, the right-hand side wins for every property it sets
 */
export function patchStyle(base: Style, patch: Style): Style {
  return {
    ...base,
    ...(patch.color !== undefined ? { color: patch.color } : {}),
    ...(patch.bold !== undefined ? { bold: patch.bold } : {}),
  };
}

export function sameStyle(a: Style, b: Style): boolean {
  return a.color === b.color && Boolean(a.bold) === Boolean(b.bold);
}

/**
 * A width x height grid of cells. Each code point takes exactly one cell.
 */
export class ScreenBuffer {
  readonly area: Rect;
  private cells: Cell[];

  constructor(area: Rect) {
    this.area = area;
    this.cells = Array.from({ length: area.width * area.height }, () => ({
      symbol: ' ',
      style: EMPTY_STYLE,
    }));
  }

  static empty(width: number, height: number): ScreenBuffer {
    return new ScreenBuffer(rect(0, 0, width, height));
  }

  contains(x: number, y: number): boolean {
    const { area } = this;
    return x >= area.x && x < area.x + area.width && y >= area.y && y < area.y + area.height;
  }

  cell(x: number, y: number): Cell {
    if (!this.contains(x, y)) {
      throw new RangeError(`Cell (${x}, ${y}) is outside the buffer`);
    }
    return this.cells[this.indexOf(x, y)];
  }

  setCell(x: number, y: number, symbol: string, style: Style = EMPTY_STYLE): void {
    if (!this.contains(x, y)) return;
    this.cells[this.indexOf(x, y)] = { symbol, style };
  }

  /**
   * Write `text` starting at (x, y), clipped to `maxWidth` cells and to the
   * buffer. Returns the x position after the last written cell.
   */
  setString(x: number, y: number, text: string, style: Style = EMPTY_STYLE, maxWidth = Infinity): number {
    let cursor = x;
    for (const symbol of Array.from(text)) {
      if (cursor - x >= maxWidth) break;
      this.setCell(cursor, y, symbol, style);
      cursor++;
    }
    return cursor;
  }

  /**
   * Rows as plain text, styles dropped
   */
  toLines(): string[] {
    const lines: string[] = [];
    for (let row = 0; row < this.area.height; row++) {
      const start = row * this.area.width;
      lines.push(
        this.cells
          .slice(start, start + this.area.width)
          .map((cell) => cell.symbol)
          .join('')
      );
    }
    return lines;
  }

  toString(): string {
    return this.toLines().join('\n');
  }

  row(y: number): Cell[] {
    const start = (y - this.area.y) * this.area.width;
    return this.cells.slice(start, start + this.area.width);
  }

  private indexOf(x: number, y: number): number {
    return (y - this.area.y) * this.area.width + (x - this.area.x);
  }
}
