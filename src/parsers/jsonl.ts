// ─── Conversation Transcripts → Blocks ──────────────────────────────────────

import path from 'node:path';
import type { Block, ConversationTurn, FilterCategory, TranscriptFilters, TurnPart, Parser } from '../types.js';
import { DEFAULT_FILTERS } from '../types.js';
import { createBlock } from '../blocks.js';
import { hunkPages } from '../pages.js';
import {
  contentItems,
  entrySchema,
  extractAssistantText,
  extractUserText,
  isToolResult,
  renderDiffPart,
  structuredPatchDiff,
  TurnAssembler,
  type LineInfo,
  type TranscriptEntry,
} from '../transcript.js';

/** Transcript categories, in display order. */
export const SCAN_CATEGORIES = ['user', 'assistant', 'diff', 'tool_result', 'system', 'other'] as const;

export type ScanCategory = (typeof SCAN_CATEGORIES)[number];

export interface ContentTypeCount {
  name: ScanCategory;
  count: number;
  /** Initial toggle state offered to the reader */
  enabled: boolean;
}

const ENABLED_BY_DEFAULT: ReadonlySet<ScanCategory> = new Set<ScanCategory>(['user', 'assistant', 'diff']);

const FILTER_CATEGORIES: ReadonlySet<string> = new Set<FilterCategory>(['user', 'assistant', 'diff', 'tool_result']);

export function isFilterCategory(name: string): name is FilterCategory {
  return FILTER_CATEGORIES.has(name);
}

/**
 * Filters from a (possibly edited) scan.  A category the transcript does
 * not contain stays off.
 */
export function filtersFromScan(counts: readonly ContentTypeCount[]): TranscriptFilters {
  const filters: TranscriptFilters = { user: false, assistant: false, diff: false, tool_result: false };
  for (const c of counts) {
    if (isFilterCategory(c.name)) filters[c.name] = c.enabled;
  }
  return filters;
}

/** Parse one raw line; `null` for blank, malformed or untyped lines. */
export function parseLineInfo(line: string): LineInfo | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(trimmed);
  } catch {
    return null;
  }

  const parsed = entrySchema.safeParse(raw);
  if (!parsed.success) return null;
  const entry = parsed.data;
  return { entry, type: entry.type, isToolResult: isToolResult(entry) };
}

/** Flatten turn parts into display text, parts separated by a blank line. */
export function turnContent(parts: readonly TurnPart[]): string {
  return parts
    .map((part) => {
      switch (part.type) {
        case 'diff':
          return renderDiffPart(part.content, part.meta ?? '');
        case 'question':
          return `[?] ${part.content}`;
        default:
          return part.content;
      }
    })
    .join('\n\n');
}

export function turnToBlock(turn: ConversationTurn, turnNumber: number): Block {
  const content = turnContent(turn.parts);
  return createBlock({
    name: `block-${turnNumber}`,
    content,
    pages: [{ kind: 'lines', text: content }],
    contentType: 'plain',
    sourceKind: 'chat',
    originLine: turn.originLine,
    parts: [...turn.parts],
  });
}

export class JsonlParser implements Parser {
  readonly filters: Readonly<TranscriptFilters>;

  constructor(filters: Readonly<TranscriptFilters> = DEFAULT_FILTERS) {
    this.filters = { ...filters };
  }

  detect(filePath: string): boolean {
    return filePath.toLowerCase().endsWith('.jsonl');
  }

  /** A fresh assembler with this parser's filters, for incremental use. */
  assembler(startAt = 0): TurnAssembler {
    return new TurnAssembler(this.filters, startAt);
  }

  parse(content: string): Block[] {
    const assembler = this.assembler();
    const blocks: Block[] = [];

    content.split('\n').forEach((line, i) => {
      const info = parseLineInfo(line);
      if (!info) return;
      const event = assembler.consume(info, i + 1);
      if (event.kind === 'opened' && event.closed) {
        blocks.push(turnToBlock(event.closed.turn, event.closed.number));
      }
    });

    const last = assembler.current;
    if (last) blocks.push(turnToBlock(last.turn, last.number));
    return blocks;
  }

  /**
   * Count entries per category, ignoring filters.  Only categories that
   * occur are returned.
   */
  scanContentTypes(content: string): ContentTypeCount[] {
    const counts = new Map<ScanCategory, number>();
    const bump = (name: ScanCategory) => counts.set(name, (counts.get(name) ?? 0) + 1);

    for (const line of content.split('\n')) {
      const info = parseLineInfo(line);
      if (!info) continue;

      if (info.isToolResult) {
        if (structuredPatchDiff(info.entry.toolUseResult)) bump('diff');
        bump('tool_result');
      } else if (info.type === 'user') {
        // Only entries that carry a message count; a bare envelope is nothing
        if (hasMessageContent(info.entry)) bump('user');
      } else if (info.type === 'assistant' || info.type === 'system') {
        bump(info.type);
      } else {
        bump('other');
      }
    }

    return SCAN_CATEGORIES.filter((name) => counts.has(name)).map((name) => ({
      name,
      count: counts.get(name) ?? 0,
      enabled: ENABLED_BY_DEFAULT.has(name),
    }));
  }

  /**
   * Build at most one block from a single line, without any turn state.
   * Tool results with a patch become a diff block; user and assistant
   * messages a one-part chat block.
   */
  parseSingleLine(line: string, turnNumber: number): Block | null {
    const info = parseLineInfo(line);
    if (!info) return null;
    const { entry } = info;

    if (info.isToolResult) {
      if (!this.filters.diff) return null;
      const patch = structuredPatchDiff(entry.toolUseResult);
      return patch ? diffBlock(patch.diff, patch.filePath, turnNumber) : null;
    }

    if (info.type === 'user' && this.filters.user) {
      const text = extractUserText(entry);
      return text ? turnToBlock({ parts: [{ type: 'user', content: text }], originLine: 0 }, turnNumber) : null;
    }

    if (info.type === 'assistant' && this.filters.assistant) {
      const text = extractAssistantText(entry);
      return text
        ? turnToBlock({ parts: [{ type: 'assistant', content: text }], originLine: 0 }, turnNumber)
        : null;
    }

    return null;
  }
}

function hasMessageContent(entry: TranscriptEntry): boolean {
  return typeof entry.message?.content === 'string' || contentItems(entry).length > 0;
}

function diffBlock(diff: string, filePath: string, turnNumber: number): Block {
  const pages = hunkPages(diff);
  return createBlock({
    name: filePath ? `diff: ${path.basename(filePath)}` : `diff-${turnNumber}`,
    content: diff,
    pages,
    contentType: 'diff',
    pageContentTypes: pages.map(() => 'diff' as const),
    pageMeta: pages.map(() => filePath),
    sourceKind: 'chat',
  });
}
