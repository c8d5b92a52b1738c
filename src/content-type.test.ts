import { describe, expect, it } from 'vitest';
import { classify, isDiff } from './content-type.js';

describe('classify', () => {
  it('recognises a unified diff', () => {
    const diff = '--- a/x.ts\n+++ b/x.ts\n@@ -1 +1 @@\n-old\n+new';
    expect(classify(diff)).toBe('diff');
  });

  it('does not take a bullet list for a diff', () => {
    expect(isDiff('- one\n- two\n+ three')).toBe(false);
    expect(classify('- one\n- two')).toBe('plain');
  });

  it('needs a change line before calling it a diff', () => {
    expect(isDiff('--- a/x\n+++ b/x\n@@ -1 +1 @@\n same')).toBe(false);
  });

  it('recognises a pipe table with a separator row', () => {
    expect(classify('| a | b |\n|---|---|\n| 1 | 2 |')).toBe('table');
  });

  it('wants three pipe rows for a table', () => {
    expect(classify('| a | b |\n|---|---|')).toBe('plain');
  });

  it('recognises a directory tree', () => {
    expect(classify('src\n├── a.ts\n└── b.ts')).toBe('tree');
  });

  it('recognises JSON objects and arrays by their brackets', () => {
    expect(classify('{"a": 1}')).toBe('json');
    expect(classify('  [1, 2]\n')).toBe('json');
  });

  it('recognises YAML when most lines are keys or list items', () => {
    expect(classify('name: folio\nversion: 1\nitems:\n  - a')).toBe('yaml');
  });

  it('falls back to plain prose', () => {
    expect(classify('Just a sentence.\nAnd another one.\nAnd a third.')).toBe('plain');
  });

  it('prefers diff over the other shapes', () => {
    const diff = '--- a/t.md\n+++ b/t.md\n@@ -1,2 +1,2 @@\n-| a |\n+| b |\n | c |';
    expect(classify(diff)).toBe('diff');
  });
});
