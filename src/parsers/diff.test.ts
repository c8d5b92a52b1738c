import { describe, expect, it } from 'vitest';
import { DiffParser } from './diff.js';

const DIFF = '--- a/src/app.ts\n+++ b/src/app.ts\n@@ -1,2 +1,2 @@\n-a\n+b\n c\n@@ -9 +9 @@\n-x\n+y\n';

describe('DiffParser', () => {
  const parser = new DiffParser();

  it('makes one block with a page per hunk', () => {
    const blocks = parser.parse(DIFF);
    expect(blocks).toHaveLength(1);
    expect(blocks[0]?.pages).toEqual([
      { kind: 'hunk', diff: DIFF, hunkIndex: 0 },
      { kind: 'hunk', diff: DIFF, hunkIndex: 1 },
    ]);
  });

  it('names the block after the target file', () => {
    const [block] = parser.parse(DIFF);
    expect(block).toMatchObject({ name: 'src/app.ts', contentType: 'diff', originLine: 1 });
    expect(block?.pageContentTypes).toEqual(['diff', 'diff']);
  });

  it('keeps content that is not a diff as a single plain block', () => {
    const [block] = parser.parse('hello world');
    expect(block).toMatchObject({ name: 'diff', contentType: 'plain', pageCount: 1 });
    expect(block?.pages[0]).toEqual({ kind: 'lines', text: 'hello world' });
  });

  it('detects .diff and .patch files', () => {
    expect(parser.detect('change.diff')).toBe(true);
    expect(parser.detect('fix.PATCH')).toBe(true);
    expect(parser.detect('fix.md')).toBe(false);
  });
});
