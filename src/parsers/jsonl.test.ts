import { describe, expect, it } from 'vitest';
import { JsonlParser, filtersFromScan, parseLineInfo, turnContent } from './jsonl.js';
import { DEFAULT_FILTERS } from '../types.js';

function line(object: Record<string, unknown>): string {
  return JSON.stringify(object);
}

const PATCH_RESULT = {
  filePath: '/repo/src/app.ts',
  structuredPatch: [{ oldStart: 1, oldLines: 1, newStart: 1, newLines: 1, lines: ['-a', '+b'] }],
};

const USER_FIX = line({ type: 'user', message: { role: 'user', content: 'Fix the bug' } });
const ASSISTANT_LOOK = line({
  type: 'assistant',
  message: {
    content: [
      { type: 'text', text: 'Looking at it.' },
      { type: 'tool_use', name: 'Edit', input: {} },
    ],
  },
});
const EDIT_RESULT = line({
  type: 'user',
  message: { content: [{ type: 'tool_result', content: 'ok' }] },
  toolUseResult: PATCH_RESULT,
});
const BASH_RESULT = line({
  type: 'user',
  message: { content: [{ type: 'tool_result', content: 'x' }] },
  toolUseResult: { stdout: '3 files changed\nmore', stderr: '' },
});

const TRANSCRIPT = [
  USER_FIX,
  ASSISTANT_LOOK,
  EDIT_RESULT,
  line({ type: 'system', content: 'compacted' }),
  'not json',
  line({ type: 'user', message: { content: [{ type: 'text', text: 'Thanks' }] } }),
  line({ type: 'assistant', message: { content: 'Done.' } }),
].join('\n');

const EXPECTED_DIFF_PART = '--- app.ts ---\n@@ -1,1 +1,1 @@\n-a\n+b';

describe('JsonlParser.parse', () => {
  const parser = new JsonlParser();

  it('groups each user message with what follows into a turn', () => {
    const blocks = parser.parse(TRANSCRIPT);
    expect(blocks.map((b) => b.name)).toEqual(['block-1', 'block-2']);
    expect(blocks.map((b) => b.originLine)).toEqual([1, 6]);
  });

  it('flattens a turn into text with a diff banner', () => {
    const [first, second] = new JsonlParser().parse(TRANSCRIPT);
    expect(first?.content).toBe(`Fix the bug\n\nLooking at it.\n\n${EXPECTED_DIFF_PART}`);
    expect(second?.content).toBe('Thanks\n\nDone.');
  });

  it('keeps the parts a chat block was built from', () => {
    const [first] = parser.parse(TRANSCRIPT);
    expect(first?.sourceKind).toBe('chat');
    expect(first?.parts?.map((p) => p.type)).toEqual(['user', 'assistant', 'diff']);
    expect(first?.parts?.[2]?.meta).toBe('/repo/src/app.ts');
  });

  it('drops assistant replies that precede any user message', () => {
    expect(parser.parse(line({ type: 'assistant', message: { content: 'orphan' } }))).toEqual([]);
  });

  it('produces no turns when user messages are filtered out', () => {
    const noUsers = new JsonlParser({ ...DEFAULT_FILTERS, user: false });
    expect(noUsers.parse(TRANSCRIPT)).toEqual([]);
  });

  it('leaves out diffs when the diff filter is off', () => {
    const [first] = new JsonlParser({ ...DEFAULT_FILTERS, diff: false }).parse(TRANSCRIPT);
    expect(first?.content).toBe('Fix the bug\n\nLooking at it.');
  });

  it('adds tool summaries when enabled', () => {
    const withTools = new JsonlParser({ ...DEFAULT_FILTERS, tool_result: true });
    const [block] = withTools.parse([USER_FIX, BASH_RESULT, EDIT_RESULT].join('\n'));
    expect(block?.content).toBe(`Fix the bug\n\nBash: 3 files changed\n\n${EXPECTED_DIFF_PART}\n\nTool: ok`);
  });

  it('skips tool-call markup in assistant text', () => {
    const markup = line({
      type: 'assistant',
      message: { content: [{ type: 'text', text: '<function_calls><invoke name="x">' }, { type: 'text', text: 'Visible' }] },
    });
    const [block] = parser.parse([USER_FIX, markup].join('\n'));
    expect(block?.content).toBe('Fix the bug\n\nVisible');
  });

  it('renders AskUserQuestion calls as question parts', () => {
    const ask = line({
      type: 'assistant',
      message: {
        content: [
          {
            type: 'tool_use',
            name: 'AskUserQuestion',
            input: {
              questions: [
                {
                  question: 'Which DB?',
                  header: 'Storage',
                  options: [{ label: 'Postgres', description: 'relational' }, { label: 'Redis' }],
                  multiSelect: false,
                },
              ],
            },
          },
        ],
      },
    });
    const [block] = parser.parse([USER_FIX, ask].join('\n'));
    expect(block?.content).toBe(
      'Fix the bug\n\n[?] Storage\n\nWhich DB?\n\n  1. Postgres - relational\n  2. Redis\n  3. Other (custom text)',
    );
  });

  it('does not let an empty user message close the open turn', () => {
    const empty = line({ type: 'user', message: { content: [] } });
    const blocks = parser.parse([USER_FIX, empty, line({ type: 'assistant', message: { content: 'Still here.' } })].join('\n'));
    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.content).toBe('Fix the bug\n\nStill here.');
  });
});

describe('JsonlParser.scanContentTypes', () => {
  it('counts every category present, ignoring filters', () => {
    const scan = new JsonlParser({ user: false, assistant: false, diff: false, tool_result: false }).scanContentTypes(
      TRANSCRIPT,
    );
    expect(scan).toEqual([
      { name: 'user', count: 2, enabled: true },
      { name: 'assistant', count: 2, enabled: true },
      { name: 'diff', count: 1, enabled: true },
      { name: 'tool_result', count: 1, enabled: false },
      { name: 'system', count: 1, enabled: false },
    ]);
  });

  it('does not count user entries without message content', () => {
    const scan = new JsonlParser().scanContentTypes(
      [
        line({ type: 'user' }),
        line({ type: 'user', message: { content: 42 } }),
        line({ type: 'user', message: { content: [] } }),
        line({ type: 'user', message: { content: 'real question' } }),
      ].join('\n'),
    );
    expect(scan).toEqual([{ name: 'user', count: 1, enabled: true }]);
  });

  it('files unknown entry types under other', () => {
    const scan = new JsonlParser().scanContentTypes(line({ type: 'summary', summary: 's' }));
    expect(scan).toEqual([{ name: 'other', count: 1, enabled: false }]);
  });
});

describe('filtersFromScan', () => {
  it('turns a scan into filters, leaving absent categories off', () => {
    expect(
      filtersFromScan([
        { name: 'user', count: 3, enabled: true },
        { name: 'tool_result', count: 1, enabled: true },
        { name: 'system', count: 2, enabled: true },
      ]),
    ).toEqual({ user: true, assistant: false, diff: false, tool_result: true });
  });
});

describe('JsonlParser.parseSingleLine', () => {
  const parser = new JsonlParser();

  it('turns an edit result into a diff block', () => {
    const block = parser.parseSingleLine(EDIT_RESULT, 3);
    expect(block).toMatchObject({ name: 'diff: app.ts', contentType: 'diff', sourceKind: 'chat', pageCount: 1 });
    expect(block?.pageMeta).toEqual(['/repo/src/app.ts']);
  });

  it('turns a user message into a one-part chat block', () => {
    const block = parser.parseSingleLine(USER_FIX, 7);
    expect(block).toMatchObject({ name: 'block-7', content: 'Fix the bug', originLine: 0 });
  });

  it('returns null for anything else', () => {
    expect(parser.parseSingleLine(line({ type: 'system' }), 1)).toBeNull();
    expect(parser.parseSingleLine('{broken', 1)).toBeNull();
    expect(parser.parseSingleLine(BASH_RESULT, 1)).toBeNull();
  });
});

describe('parseLineInfo', () => {
  it('rejects blank, malformed and untyped lines', () => {
    expect(parseLineInfo('   ')).toBeNull();
    expect(parseLineInfo('{"a":')).toBeNull();
    expect(parseLineInfo('{"message": {}}')).toBeNull();
  });

  it('flags tool results', () => {
    expect(parseLineInfo(EDIT_RESULT)?.isToolResult).toBe(true);
    expect(parseLineInfo(USER_FIX)?.isToolResult).toBe(false);
  });
});

describe('turnContent', () => {
  it('separates parts with a blank line', () => {
    expect(
      turnContent([
        { type: 'user', content: 'hi' },
        { type: 'tool_result', content: 'Read: a.ts' },
      ]),
    ).toBe('hi\n\nRead: a.ts');
  });
});
