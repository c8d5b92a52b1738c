import { describe, expect, it } from 'vitest';
import {
  TurnAssembler,
  entrySchema,
  formatQuestion,
  renderDiffPart,
  structuredPatchDiff,
  toolResultSummary,
  type LineInfo,
} from './transcript.js';
import { DEFAULT_FILTERS } from './types.js';

function info(raw: Record<string, unknown>, isToolResult = false): LineInfo {
  const entry = entrySchema.parse(raw);
  return { entry, type: entry.type, isToolResult };
}

const user = (text: string) => info({ type: 'user', message: { content: text } });
const assistant = (text: string) => info({ type: 'assistant', message: { content: text } });

describe('structuredPatchDiff', () => {
  it('rebuilds a unified diff from the patch hunks', () => {
    const patch = structuredPatchDiff({
      structuredPatch: [{ oldStart: 3, oldLines: 2, newStart: 3, newLines: 3, lines: [' a', '+b', ' c'] }],
    });
    expect(patch).toEqual({ filePath: '', diff: '--- a/file\n+++ b/file\n@@ -3,2 +3,3 @@\n a\n+b\n c\n' });
  });

  it('returns null without a non-empty patch', () => {
    expect(structuredPatchDiff({ structuredPatch: [] })).toBeNull();
    expect(structuredPatchDiff('text')).toBeNull();
    expect(structuredPatchDiff(undefined)).toBeNull();
  });
});

describe('renderDiffPart', () => {
  it('replaces the file headers with a banner', () => {
    const diff = '--- a/src/x.ts\n+++ b/src/x.ts\n@@ -1 +1 @@\n-a\n+b\n';
    expect(renderDiffPart(diff, 'src/x.ts')).toBe('--- x.ts ---\n@@ -1 +1 @@\n-a\n+b');
    expect(renderDiffPart(diff, '')).toBe('--- file ---\n@@ -1 +1 @@\n-a\n+b');
  });
});

describe('formatQuestion', () => {
  it('numbers questions and notes multi-select', () => {
    const text = formatQuestion(
      { question: 'Pick', header: '', options: [{ label: 'A', description: '' }], multiSelect: true },
      2,
      3,
    );
    expect(text).toBe('Q2/3\n\nPick\n\n  1. A\n  2. Other (custom text)\n\n(multi-select: e.g. 1,3)');
  });

  it('starts with the question when there is no header or prefix', () => {
    const text = formatQuestion({ question: 'Go?', header: '', options: [], multiSelect: false }, 1, 1);
    expect(text).toBe('\nGo?\n\n  1. Other (custom text)');
  });
});

describe('toolResultSummary', () => {
  it('uses the raw tool_result text when no structured result exists', () => {
    const entry = entrySchema.parse({
      type: 'user',
      message: { content: [{ type: 'tool_result', content: 'compiled 4 files\n' }] },
    });
    expect(toolResultSummary(entry)).toBe('Tool: compiled 4 files');
  });

  it('falls back to the tool_result text for error strings and unknown shapes', () => {
    const error = entrySchema.parse({
      type: 'user',
      message: { content: [{ type: 'tool_result', content: 'Error: file not found' }] },
      toolUseResult: 'Error: file not found',
    });
    expect(toolResultSummary(error)).toBe('Tool: Error: file not found');

    const todos = entrySchema.parse({
      type: 'user',
      message: { content: [{ type: 'tool_result', content: 'Todos have been modified successfully' }] },
      toolUseResult: { oldTodos: [], newTodos: [{ content: 'ship it', status: 'pending' }] },
    });
    expect(toolResultSummary(todos)).toBe('Tool: Todos have been modified successfully');
  });

  it('prefers the structured result when it is recognised', () => {
    const entry = entrySchema.parse({
      type: 'user',
      message: { content: [{ type: 'tool_result', content: 'raw' }] },
      toolUseResult: { stdout: 'built\n', stderr: '' },
    });
    expect(toolResultSummary(entry)).toBe('Bash: built');
  });
});

describe('TurnAssembler', () => {
  it('reports opened and updated turns', () => {
    const assembler = new TurnAssembler(DEFAULT_FILTERS);

    const first = assembler.consume(user('one'), 1);
    expect(first).toMatchObject({ kind: 'opened', closed: null, turn: { number: 1 } });

    expect(assembler.consume(assistant('reply'), 2).kind).toBe('updated');

    const second = assembler.consume(user('two'), 3);
    expect(second).toMatchObject({ kind: 'opened', turn: { number: 2 }, closed: { number: 1 } });
    expect(assembler.current?.turn).toEqual({ parts: [{ type: 'user', content: 'two' }], originLine: 3 });
  });

  it('continues numbering after turns emitted elsewhere', () => {
    const assembler = new TurnAssembler(DEFAULT_FILTERS, 5);
    expect(assembler.consume(user('late'), 40)).toMatchObject({ turn: { number: 6 } });
  });

  it('ignores filtered categories', () => {
    const assembler = new TurnAssembler({ ...DEFAULT_FILTERS, assistant: false });
    assembler.consume(user('q'), 1);
    expect(assembler.consume(assistant('hidden'), 2)).toEqual({ kind: 'none' });
  });

  it('adds a summary part for error results when tool results are shown', () => {
    const assembler = new TurnAssembler({ ...DEFAULT_FILTERS, tool_result: true });
    assembler.consume(user('run it'), 1);
    const result = info(
      {
        type: 'user',
        message: { content: [{ type: 'tool_result', content: 'Error: file not found' }] },
        toolUseResult: 'Error: file not found',
      },
      true,
    );
    expect(assembler.consume(result, 2).kind).toBe('updated');
    expect(assembler.current?.turn.parts).toEqual([
      { type: 'user', content: 'run it' },
      { type: 'tool_result', content: 'Tool: Error: file not found' },
    ]);
  });

  it('ignores tool results outside a turn', () => {
    const assembler = new TurnAssembler(DEFAULT_FILTERS);
    const result = info(
      {
        type: 'user',
        message: { content: [{ type: 'tool_result', content: '' }] },
        toolUseResult: { structuredPatch: [{ oldStart: 1, oldLines: 0, newStart: 1, newLines: 1, lines: ['+x'] }] },
      },
      true,
    );
    expect(assembler.consume(result, 1)).toEqual({ kind: 'none' });
  });
});
