// ─── Help Overlay Component ─────────────────────────────────────────────────
//
// Modal list of keybindings grouped by category, toggled with '?'.

import React, { useMemo } from 'react';
import { Box, Text } from 'ink';
import { KEY_BINDINGS, type KeyBinding } from '../types.js';
import { truncate } from '../render/text.js';

// ─── Props ──────────────────────────────────────────────────────────────────

export interface HelpOverlayProps {
  /** Available width in columns */
  width: number;
  /** Available height in rows */
  height: number;
}

const CATEGORIES: Array<{ key: KeyBinding['category']; label: string; color: string }> = [
  { key: 'navigation', label: '◇ Blocks', color: 'cyan' },
  { key: 'paging', label: '▤ Pages', color: 'green' },
  { key: 'view', label: '◻ View', color: 'magenta' },
];

// ─── Component ──────────────────────────────────────────────────────────────

export const HelpOverlay: React.FC<HelpOverlayProps> = ({ width, height }) => {
  const sections = useMemo(
    () =>
      CATEGORIES.map((cat) => ({
        ...cat,
        bindings: KEY_BINDINGS.filter((b) => b.category === cat.key),
      })).filter((s) => s.bindings.length > 0),
    [],
  );

  const maxKeyWidth = useMemo(() => Math.max(...KEY_BINDINGS.map((b) => b.key.length)), []);

  const overlayWidth = Math.min(60, Math.max(40, width - 8));
  const overlayInnerWidth = overlayWidth - 4;

  // title + blank, per section a header, its bindings and a spacer, footer
  const contentLines = 2 + sections.reduce((n, s) => n + s.bindings.length + 2, 0) + 1;
  const overlayHeight = Math.min(contentLines + 4, height - 2);

  return (
    <Box
      flexDirection="column"
      width={overlayWidth}
      height={overlayHeight}
      borderStyle="double"
      borderColor="white"
      paddingLeft={1}
      paddingRight={1}
    >
      <Box justifyContent="center" width={overlayInnerWidth}>
        <Text bold color="white">{'⌨  Keyboard Shortcuts'}</Text>
      </Box>
      <Box height={1} />

      {sections.map((section, sectionIdx) => (
        <Box key={section.key} flexDirection="column">
          <Text bold color={section.color}>{section.label}</Text>
          {section.bindings.map((binding) => (
            <Text key={binding.key}>
              <Text color={section.color} bold>{binding.key.padEnd(maxKeyWidth)}</Text>
              <Text dimColor>{'  →  '}</Text>
              <Text>{truncate(binding.description, Math.max(5, overlayInnerWidth - maxKeyWidth - 7))}</Text>
            </Text>
          ))}
          {sectionIdx < sections.length - 1 && <Box height={1} />}
        </Box>
      ))}

      <Box flexGrow={1} />
      <Box justifyContent="center" width={overlayInnerWidth}>
        <Text dimColor italic>{'Press ? to close'}</Text>
      </Box>
    </Box>
  );
};
