// ─── Status Bar Component ───────────────────────────────────────────────────
//
// Bottom line: block position, page indicator, a progress bar through the
// document, and the latest command message (or the active prompt while typing).

import React from 'react';
import { Box, Text } from 'ink';
import { truncate } from '../render/text.js';

// ─── Props ──────────────────────────────────────────────────────────────────

export interface StatusBarProps {
  /** Position of the current block (0-based) */
  position: number;
  totalBlocks: number;
  /** `[page/total]` of the current block */
  pageIndicator: string;
  /** Latest navigation message; empty for none */
  message: string;
  /** Active prompt (`jump`, `:`) and what has been typed, else null */
  prompt: { label: string; text: string } | null;
  /** Follow mode is active */
  following: boolean;
  showLineNumbers: boolean;
  /** Available width in columns */
  width: number;
}

// ─── Component ──────────────────────────────────────────────────────────────

export const StatusBar: React.FC<StatusBarProps> = ({
  position,
  totalBlocks,
  pageIndicator,
  message,
  prompt,
  following,
  showLineNumbers,
  width,
}) => {
  if (prompt !== null) {
    return (
      <Box width={width} height={1}>
        <Text>
          <Text color="cyan" bold>{`${prompt.label} › `}</Text>
          <Text>{truncate(prompt.text, Math.max(1, width - prompt.label.length - 4))}</Text>
          <Text color="gray">{'█'}</Text>
        </Text>
      </Box>
    );
  }

  const posStr = `${totalBlocks === 0 ? 0 : position + 1}/${totalBlocks}`;
  const flags = [following ? 'FOLLOW' : '', showLineNumbers ? '#' : ''].filter(Boolean).join(' ');

  const fixedWidth = posStr.length + pageIndicator.length + flags.length + 12;
  const barWidth = message ? 0 : Math.max(0, Math.min(30, width - fixedWidth));
  const progress = totalBlocks <= 1 ? 1 : position / (totalBlocks - 1);
  const filled = Math.round(progress * barWidth);
  const bar = '█'.repeat(filled) + '░'.repeat(Math.max(0, barWidth - filled));

  // Only the first line of multi-line messages fits
  const messageStr = truncate(message.split('\n')[0] ?? '', Math.max(5, width - fixedWidth));

  return (
    <Box width={width} height={1}>
      <Text>
        <Text color="white" bold>{posStr}</Text>
        <Text dimColor> │ </Text>
        <Text color="cyan">{pageIndicator}</Text>
        <Text dimColor> │ </Text>
        {flags ? (
          <>
            <Text color="green" bold>{flags}</Text>
            <Text dimColor> │ </Text>
          </>
        ) : null}
        {message ? <Text color="yellow">{messageStr}</Text> : <Text color="green">{bar}</Text>}
      </Text>
    </Box>
  );
};
