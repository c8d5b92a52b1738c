import { describe, expect, it } from 'vitest';
import { TxtParser, stripStyleTags } from './txt.js';

const LOG = [
  'preamble',
  'shell',
  '[white:#303030] ls -la',
  'file1',
  'file2',
  '$ git status (12:04:55)',
  'On branch main',
  '',
].join('\n');

describe('TxtParser', () => {
  const parser = new TxtParser();

  it('starts a block at every shell marker', () => {
    expect(parser.parse(LOG).map((b) => b.name)).toEqual(['Output', 'ls -la', 'git status']);
  });

  it('records where each block starts', () => {
    expect(parser.parse(LOG).map((b) => b.originLine)).toEqual([1, 3, 6]);
  });

  it('keeps the command line as the first line of its block', () => {
    const [, ls] = parser.parse(LOG);
    expect(ls?.content).toBe('[white:#303030] ls -la\nfile1\nfile2');
    expect(ls?.sourceKind).toBe('shell');
  });

  it('puts marker-free text in a single Output block', () => {
    const blocks = parser.parse('hello\nworld');
    expect(blocks.map((b) => b.name)).toEqual(['Output']);
    expect(blocks[0]?.content).toBe('hello\nworld');
  });

  it('truncates long command names', () => {
    const [block] = parser.parse(`$ ${'x'.repeat(50)}`);
    expect(block?.name).toBe(`${'x'.repeat(40)}...`);
  });

  it('returns nothing for blank input', () => {
    expect(parser.parse('')).toEqual([]);
    expect(parser.parse('  \n')).toEqual([]);
  });

  it('pages long output', () => {
    const [block] = new TxtParser(2).parse('a\nb\nc');
    expect(block?.pageCount).toBe(2);
  });

  it('detects text and log files', () => {
    expect(parser.detect('session.txt')).toBe(true);
    expect(parser.detect('build.log')).toBe(true);
    expect(parser.detect('build.md')).toBe(false);
  });
});

describe('stripStyleTags', () => {
  it('removes bracketed markup', () => {
    expect(stripStyleTags('[white:#303030] npm test [reset]')).toBe('npm test');
  });
});
