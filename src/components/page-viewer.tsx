// ─── Page Viewer Component ──────────────────────────────────────────────────
//
// Shows one rendered page: a title row, the visible window of lines with an
// optional line-number gutter, and a scrollbar when the page is taller than
// the pane.

import React from 'react';
import { Box, Text } from 'ink';
import type { RenderedLine } from '../render/types.js';
import type { PageHeader } from '../render/page.js';
import { gutterWidth } from '../render/page.js';
import { truncate, truncateAnsi } from '../render/text.js';

// ─── Props ──────────────────────────────────────────────────────────────────

interface PageViewerProps {
  header: PageHeader;
  lines: readonly RenderedLine[];
  /** First visible line (0-based); clamped here */
  scrollOffset: number;
  /** Available width in columns */
  width: number;
  /** Available height in rows */
  height: number;
}

// ─── Component ──────────────────────────────────────────────────────────────

export const PageViewer: React.FC<PageViewerProps> = ({ header, lines, scrollOffset, width, height }) => {
  const viewportHeight = Math.max(1, height - 2);
  const maxScroll = Math.max(0, lines.length - viewportHeight);
  const offset = Math.max(0, Math.min(scrollOffset, maxScroll));
  const visible = lines.slice(offset, offset + viewportHeight);

  const showScrollbar = lines.length > viewportHeight;
  const gutter = gutterWidth(lines);
  const textWidth = Math.max(1, width - 2 - gutter - (showScrollbar ? 1 : 0));

  const thumbSize = Math.max(1, Math.round((viewportHeight / Math.max(1, lines.length)) * viewportHeight));
  const thumbPos = Math.round((offset / Math.max(1, maxScroll)) * (viewportHeight - thumbSize));

  const titleWidth = Math.max(1, width - header.indicator.length - 3);

  return (
    <Box flexDirection="column" width={width} height={height}>
      <Box width={width} justifyContent="space-between" paddingLeft={1} paddingRight={1}>
        <Text bold color="cyan">{truncate(header.title, titleWidth)}</Text>
        <Text dimColor>{header.indicator}</Text>
      </Box>

      <Box flexDirection="row" flexGrow={1}>
        <Box flexDirection="column" flexGrow={1} overflow="hidden" paddingLeft={1}>
          {visible.map((line, i) => (
            <LineComponent key={offset + i} line={line} gutter={gutter} maxWidth={textWidth} />
          ))}
          {visible.length < viewportHeight && <Box flexGrow={1} />}
        </Box>

        {showScrollbar && (
          <Box flexDirection="column" width={1}>
            {Array.from({ length: viewportHeight }).map((_, i) => {
              const isThumb = i >= thumbPos && i < thumbPos + thumbSize;
              return (
                <Text key={i} dimColor={!isThumb} color={isThumb ? 'cyan' : 'gray'}>
                  {isThumb ? '█' : '│'}
                </Text>
              );
            })}
          </Box>
        )}
      </Box>

      <Box justifyContent="center" width={width} height={1}>
        <Text dimColor>
          {showScrollbar
            ? `─── ${offset + 1}–${Math.min(offset + viewportHeight, lines.length)}/${lines.length} lines ───`
            : `─── ${lines.length} lines ───`}
        </Text>
      </Box>
    </Box>
  );
};

// ─── Line Rendering Sub-component ───────────────────────────────────────────

const HEADING_COLORS: Record<number, string> = {
  1: 'cyan',
  2: 'cyan',
  3: 'blue',
  4: 'magenta',
};

const LineComponent: React.FC<{ line: RenderedLine; gutter: number; maxWidth: number }> = ({
  line,
  gutter,
  maxWidth,
}) => {
  const gutterStr =
    gutter > 0 ? (line.lineNumber !== undefined ? String(line.lineNumber) : '').padStart(gutter - 2) + ' │' : '';
  const text = line.highlighted ? truncateAnsi(line.text, maxWidth) : truncate(line.text, maxWidth);

  return (
    <Text>
      {gutterStr ? <Text dimColor color="gray">{gutterStr}</Text> : null}
      {gutterStr ? ' ' : null}
      <StyledText line={line} text={text} />
    </Text>
  );
};

const StyledText: React.FC<{ line: RenderedLine; text: string }> = ({ line, text }) => {
  switch (line.style) {
    case 'heading':
      return <Text bold color={HEADING_COLORS[line.depth ?? 1] ?? 'white'}>{text}</Text>;
    case 'code':
      return line.highlighted ? <Text>{text}</Text> : <Text color="green">{text}</Text>;
    case 'code-border':
      return <Text color="green" dimColor>{text}</Text>;
    case 'blockquote':
      return <Text color="gray" italic>{text}</Text>;
    case 'hr':
    case 'table-separator':
      return <Text dimColor>{text}</Text>;
    case 'table-header':
      return <Text bold color="cyan">{text}</Text>;
    case 'table':
      return <Text color="blue">{text}</Text>;
    case 'diff-file':
      return <Text bold color="white">{text}</Text>;
    case 'hunk-header':
      return <Text color="cyan">{text}</Text>;
    case 'added':
      return <Text color="green">{text}</Text>;
    case 'removed':
      return <Text color="red">{text}</Text>;
    case 'meta':
      return <Text color="magenta" italic>{text}</Text>;
    case 'user':
      return <Text bold color="yellow">{text}</Text>;
    case 'tool':
      return <Text dimColor>{text}</Text>;
    case 'question':
      return <Text color="magenta">{text}</Text>;
    default:
      return <Text>{text}</Text>;
  }
};
