// Render Core - Lines of text inside an optional block

import type { Rect, ScreenBuffer } from './buffer.js';
import type { Block } from './block.js';
import { renderLine, type Alignment, type Line } from './text.js';
import type { Widget } from './widget.js';

export class Paragraph implements Widget {
  constructor(
    readonly lines: Line[],
    readonly alignment: Alignment = 'left',
    readonly block?: Block
  ) {}

  centered(): Paragraph {
    return new Paragraph(this.lines, 'center', this.block);
  }

  withBlock(block: Block): Paragraph {
    return new Paragraph(this.lines, this.alignment, block);
  }

  render(area: Rect, buf: ScreenBuffer): void {
    let textArea = area;
    if (this.block) {
      this.block.render(area, buf);
      textArea = this.block.inner(area);
    }

    // Lines past the bottom of the area are dropped
    const visible = this.lines.slice(0, textArea.height);
    visible.forEach((l, index) => {
      renderLine(buf, l, textArea.x, textArea.y + index, textArea.width, this.alignment);
    });
  }
}
