// ─── Transcript Filter Selector ─────────────────────────────────────────────
//
// Shown before a transcript is parsed: what the file contains, with a
// toggle per category.  Digits toggle, Enter confirms, q or Esc quits.

import React, { useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type { TranscriptFilters } from '../types.js';
import { filtersFromScan, isFilterCategory, type ContentTypeCount } from '../parsers/jsonl.js';

// ─── Props ──────────────────────────────────────────────────────────────────

export interface FilterSelectorProps {
  /** Scan result; order is display order */
  counts: readonly ContentTypeCount[];
  fileName: string;
  onConfirm: (filters: TranscriptFilters) => void;
}

const LABELS: Record<ContentTypeCount['name'], string> = {
  user: 'User messages',
  assistant: 'Assistant replies',
  diff: 'File edits (diffs)',
  tool_result: 'Tool results',
  system: 'System entries',
  other: 'Other entries',
};

// ─── Component ──────────────────────────────────────────────────────────────

export const FilterSelector: React.FC<FilterSelectorProps> = ({ counts, fileName, onConfirm }) => {
  const { exit } = useApp();
  const [selection, setSelection] = useState<ContentTypeCount[]>(() => [...counts]);

  useInput((input, key) => {
    if (key.return) {
      onConfirm(filtersFromScan(selection));
      return;
    }
    if (input === 'q' || key.escape || (key.ctrl && input === 'c')) {
      exit();
      return;
    }

    const digit = Number.parseInt(input, 10);
    if (Number.isNaN(digit) || digit < 1 || digit > 9) return;
    const target = selection[digit - 1];
    if (!target || !isFilterCategory(target.name)) return;

    setSelection((current) =>
      current.map((c, i) => (i === digit - 1 ? { ...c, enabled: !c.enabled } : c)),
    );
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingLeft={1} paddingRight={1}>
      <Text bold color="cyan">{`◊ ${fileName}`}</Text>
      <Box height={1} />
      {selection.map((c, i) => {
        const toggleable = isFilterCategory(c.name);
        const box = toggleable ? (c.enabled ? '[x]' : '[ ]') : '   ';
        return (
          <Text key={c.name} dimColor={!toggleable}>
            <Text color="yellow">{toggleable ? `${i + 1}` : ' '}</Text>
            {` ${box} ${LABELS[c.name].padEnd(20)} `}
            <Text dimColor>{String(c.count).padStart(6)}</Text>
          </Text>
        );
      })}
      <Box height={1} />
      <Text dimColor italic>{'1-9 toggle · Enter view · q quit'}</Text>
    </Box>
  );
};
