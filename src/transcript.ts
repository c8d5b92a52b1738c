// ─── Transcript Entries ─────────────────────────────────────────────────────
//
// A transcript is JSONL: one entry per line, each with a `type` and usually
// a `message` whose `content` is either a string or an array of typed items
// (`text`, `tool_use`, `tool_result`).  Everything here treats the entry as
// untrusted input: shapes are checked with zod, unknown fields ignored.

import path from 'node:path';
import { z } from 'zod';
import type { ConversationTurn, TranscriptFilters, TurnPart } from './types.js';
import { formatToolSummary, toolOutputFromResult, toolOutputFromText } from './tool-summary.js';

export const entrySchema = z
  .object({
    type: z.string(),
    message: z
      .object({ content: z.unknown() })
      .passthrough()
      .optional()
      .catch(undefined),
    toolUseResult: z.unknown().optional(),
  })
  .passthrough();

export type TranscriptEntry = z.infer<typeof entrySchema>;

type ContentItem = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The object items of an array `message.content`; `[]` for string content. */
export function contentItems(entry: TranscriptEntry): ContentItem[] {
  const content = entry.message?.content;
  return Array.isArray(content) ? content.filter(isRecord) : [];
}

/** A user entry whose content holds a `tool_result` item. */
export function isToolResult(entry: TranscriptEntry): boolean {
  return entry.type === 'user' && contentItems(entry).some((item) => item.type === 'tool_result');
}

export function extractUserText(entry: TranscriptEntry): string {
  const content = entry.message?.content;
  if (typeof content === 'string') return content;

  const texts: string[] = [];
  for (const item of contentItems(entry)) {
    if (item.type === 'text' && typeof item.text === 'string') {
      texts.push(item.text);
    } else if (item.type === 'tool_result' && typeof item.content === 'string') {
      texts.push(item.content);
    }
  }
  return texts.join('\n');
}

export function extractAssistantText(entry: TranscriptEntry): string {
  const content = entry.message?.content;
  if (typeof content === 'string') return content;

  const texts: string[] = [];
  for (const item of contentItems(entry)) {
    if (item.type !== 'text' || typeof item.text !== 'string') continue;
    // Raw tool-call markup leaks into some text items
    if (item.text.includes('<function_calls>') || item.text.includes('<invoke')) continue;
    texts.push(item.text);
  }
  return texts.join('\n');
}

// ─── Structured Patches ─────────────────────────────────────────────────────

const patchHunkSchema = z.object({
  oldStart: z.number().catch(0),
  oldLines: z.number().catch(0),
  newStart: z.number().catch(0),
  newLines: z.number().catch(0),
  lines: z.array(z.unknown()).catch([]),
});

const patchResultSchema = z.object({
  structuredPatch: z.array(z.unknown()).min(1),
  filePath: z.string().optional().catch(undefined),
});

export interface StructuredPatch {
  filePath: string;
  /** Synthesised unified diff text */
  diff: string;
}

/**
 * Rebuild a unified diff from an edit result's `structuredPatch`.  Returns
 * `null` when the result carries no (or an empty) patch.
 */
export function structuredPatchDiff(toolUseResult: unknown): StructuredPatch | null {
  const parsed = patchResultSchema.safeParse(toolUseResult);
  if (!parsed.success) return null;

  const filePath = parsed.data.filePath ?? '';
  const target = filePath || 'file';
  let diff = `--- a/${target}\n+++ b/${target}\n`;

  for (const raw of parsed.data.structuredPatch) {
    const hunk = patchHunkSchema.safeParse(raw);
    if (!hunk.success) continue;
    const { oldStart, oldLines, newStart, newLines, lines } = hunk.data;
    diff += `@@ -${Math.trunc(oldStart)},${Math.trunc(oldLines)} +${Math.trunc(newStart)},${Math.trunc(newLines)} @@\n`;
    for (const line of lines) {
      if (typeof line === 'string') diff += line + '\n';
    }
  }

  return { filePath, diff };
}

/** Body of a diff part: a filename banner plus the hunk lines. */
export function renderDiffPart(diff: string, filePath: string): string {
  const name = filePath ? path.basename(filePath) : 'file';
  const body = diff
    .replace(/\n+$/, '')
    .split('\n')
    .filter((line) => !line.startsWith('---') && !line.startsWith('+++'));
  return [`--- ${name} ---`, ...body].join('\n');
}

// ─── Questions ──────────────────────────────────────────────────────────────

const questionSchema = z.object({
  question: z.string().catch(''),
  header: z.string().catch(''),
  options: z
    .array(
      z.object({
        label: z.string().catch(''),
        description: z.string().catch(''),
      }),
    )
    .catch([]),
  multiSelect: z.boolean().catch(false),
});

const askInputSchema = z.object({ questions: z.array(z.unknown()) });

export type Question = z.infer<typeof questionSchema>;

/** Questions of the first `AskUserQuestion` tool call in an assistant entry. */
export function extractQuestions(entry: TranscriptEntry): Question[] {
  const call = contentItems(entry).find(
    (item) => item.type === 'tool_use' && item.name === 'AskUserQuestion',
  );
  if (!call) return [];

  const input = askInputSchema.safeParse(call.input);
  if (!input.success) return [];

  const questions: Question[] = [];
  for (const raw of input.data.questions) {
    const q = questionSchema.safeParse(raw);
    if (q.success) questions.push(q.data);
  }
  return questions;
}

/**
 * Render a question as a numbered option list.  `index` is 1-based; the
 * `Qn/m` prefix only appears when there is more than one question.
 */
export function formatQuestion(q: Question, index: number, total: number): string {
  const lines: string[] = [];
  const prefix = total > 1 ? `Q${index}/${total} ` : '';
  if (q.header || prefix) lines.push(`${prefix}${q.header}`.trimEnd());
  lines.push('', q.question, '');

  q.options.forEach((opt, i) => {
    lines.push(opt.description ? `  ${i + 1}. ${opt.label} - ${opt.description}` : `  ${i + 1}. ${opt.label}`);
  });
  lines.push(`  ${q.options.length + 1}. Other (custom text)`);

  if (q.multiSelect) lines.push('', '(multi-select: e.g. 1,3)');
  return lines.join('\n');
}

// ─── Tool Results ───────────────────────────────────────────────────────────

/**
 * One-line summary of a tool result entry, or `''`.  When `toolUseResult`
 * is missing, a bare string (errors) or a shape we do not know, the
 * `tool_result` item's own text is summarised instead.
 */
export function toolResultSummary(entry: TranscriptEntry): string {
  const output = entry.toolUseResult === undefined ? null : toolOutputFromResult(entry.toolUseResult);
  if (output) return formatToolSummary(output);

  const item = contentItems(entry).find((i) => i.type === 'tool_result');
  if (item && typeof item.content === 'string' && item.content.trim()) {
    return formatToolSummary(toolOutputFromText(item.content));
  }
  return '';
}

// ─── Turn Assembly ──────────────────────────────────────────────────────────

/** A parsed line, ready for dispatch. */
export interface LineInfo {
  entry: TranscriptEntry;
  type: string;
  isToolResult: boolean;
}

export interface OpenTurn {
  turn: ConversationTurn;
  /** 1-based turn number */
  number: number;
}

export type TurnEvent =
  | { kind: 'none' }
  /** A new turn started; `closed` is the turn it replaced, if any */
  | { kind: 'opened'; turn: OpenTurn; closed: OpenTurn | null }
  /** The open turn gained a part */
  | { kind: 'updated'; turn: OpenTurn };

const NONE: TurnEvent = { kind: 'none' };

/**
 * The turn state machine.  Fed one entry at a time, it groups a user message
 * and everything after it into a turn and reports what changed, so the
 * batch parser and follow mode build identical turns.
 */
export class TurnAssembler {
  private open: OpenTurn | null = null;
  private count: number;

  constructor(
    private readonly filters: Readonly<TranscriptFilters>,
    /** Turns already emitted elsewhere; numbering continues after them */
    startAt = 0,
  ) {
    this.count = startAt;
  }

  /** The turn still accumulating parts. */
  get current(): OpenTurn | null {
    return this.open;
  }

  consume(info: LineInfo, lineNumber: number): TurnEvent {
    const { entry } = info;

    if (info.isToolResult) return this.consumeToolResult(entry);

    if (info.type === 'user') {
      if (!this.filters.user) return NONE;
      const text = extractUserText(entry);
      if (!text) return NONE;

      const closed = this.open;
      this.count++;
      this.open = {
        turn: { parts: [{ type: 'user', content: text }], originLine: lineNumber },
        number: this.count,
      };
      return { kind: 'opened', turn: this.open, closed };
    }

    if (info.type === 'assistant') {
      if (!this.filters.assistant || !this.open) return NONE;
      const parts: TurnPart[] = [];
      const text = extractAssistantText(entry);
      if (text) parts.push({ type: 'assistant', content: text });

      const questions = extractQuestions(entry);
      questions.forEach((q, i) => {
        parts.push({ type: 'question', content: formatQuestion(q, i + 1, questions.length) });
      });
      return this.append(parts);
    }

    return NONE;
  }

  private consumeToolResult(entry: TranscriptEntry): TurnEvent {
    if (!this.open) return NONE;
    const parts: TurnPart[] = [];

    if (this.filters.diff) {
      const patch = structuredPatchDiff(entry.toolUseResult);
      if (patch) parts.push({ type: 'diff', content: patch.diff, meta: patch.filePath });
    }
    if (this.filters.tool_result) {
      const summary = toolResultSummary(entry);
      if (summary) parts.push({ type: 'tool_result', content: summary });
    }
    return this.append(parts);
  }

  private append(parts: TurnPart[]): TurnEvent {
    if (!this.open || parts.length === 0) return NONE;
    this.open.turn.parts.push(...parts);
    return { kind: 'updated', turn: this.open };
  }
}
