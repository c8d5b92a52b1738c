// ─── Block List Sidebar ─────────────────────────────────────────────────────
//
// Every block name in order, the current one highlighted.  The list scrolls
// so the current block stays in the upper third of the pane.

import React, { useMemo } from 'react';
import { Box, Text } from 'ink';
import type { Block } from '../types.js';
import { truncate } from '../render/text.js';

// ─── Props ──────────────────────────────────────────────────────────────────

export interface BlockListProps {
  blocks: readonly Block[];
  /** Position of the current block */
  position: number;
  /** Available width in columns */
  width: number;
  /** Available height in rows */
  height: number;
}

// ─── Component ──────────────────────────────────────────────────────────────

export const BlockList: React.FC<BlockListProps> = ({ blocks, position, width, height }) => {
  const contentWidth = Math.max(1, width - 4);
  const headerRows = 1;
  const availableRows = Math.max(1, height - headerRows - 2);

  const start = useMemo(() => {
    if (blocks.length <= availableRows) return 0;
    const preferred = Math.max(0, position - Math.floor(availableRows / 3));
    return Math.min(preferred, blocks.length - availableRows);
  }, [blocks.length, availableRows, position]);

  const visible = blocks.slice(start, start + availableRows);

  return (
    <Box flexDirection="column" width={width} height={height} borderStyle="single" borderColor="gray">
      <Box paddingLeft={1} paddingRight={1}>
        <Text bold color="cyan">{`◊ Blocks (${blocks.length})`}</Text>
      </Box>

      <Box flexDirection="column" flexGrow={1} paddingLeft={1}>
        {visible.map((block, i) => {
          const index = start + i;
          const isCurrent = index === position;
          const pages = block.pageCount > 1 ? ` ·${block.pageCount}` : '';
          const text = truncate(`${isCurrent ? '▸ ' : '  '}${block.name}${pages}`, contentWidth);
          return isCurrent ? (
            <Text key={index} bold color="yellow">{text}</Text>
          ) : (
            <Text key={index} dimColor>{text}</Text>
          );
        })}
      </Box>
    </Box>
  );
};
