// Frame View - draws a ScreenBuffer with Ink, one Text row per buffer row

import React from 'react';
import { Box, Text } from 'ink';
import { sameStyle, type Cell, type ScreenBuffer, type Style } from './render/buffer.js';

export interface Segment {
  text: string;
  style: Style;
}

/**
 * Group neighbouring cells that share a style
 */
export function rowSegments(cells: Cell[]): Segment[] {
  const segments: Segment[] = [];
  let current: Segment | null = null;

  for (const cell of cells) {
    if (current && sameStyle(current.style, cell.style)) {
      current.text += cell.symbol;
      continue;
    }
    current = { text: cell.symbol, style: cell.style };
    segments.push(current);
  }

  return segments;
}

export const FrameView: React.FC<{ buffer: ScreenBuffer }> = ({ buffer }) => {
  const { area } = buffer;
  const rows = Array.from({ length: area.height }, (_, offset) => rowSegments(buffer.row(area.y + offset)));

  return (
    <Box flexDirection="column">
      {rows.map((segments, y) => (
        <Text key={y} wrap="truncate-end">
          {segments.map((segment, index) => (
            <Text key={index} color={segment.style.color} bold={segment.style.bold}>
              {segment.text}
            </Text>
          ))}
        </Text>
      ))}
    </Box>
  );
};

export default FrameView;
