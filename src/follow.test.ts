import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { appendFileSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { BlockIndex } from './block-index.js';
import { GenericFollower, JsonlFollower, createFollower } from './follow.js';
import { JsonlParser, MarkdownParser } from './parsers/index.js';

function jsonl(...objects: Record<string, unknown>[]): string {
  return objects.map((o) => JSON.stringify(o)).join('\n') + '\n';
}

const user = (text: string) => ({ type: 'user', message: { content: text } });
const assistant = (text: string) => ({ type: 'assistant', message: { content: text } });

describe('JsonlFollower', () => {
  let tmpDir: string;
  let filePath: string;
  const parser = new JsonlParser();

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'folio-follow-'));
    filePath = join(tmpDir, 'session.jsonl');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function follow(content: string, initialContent?: string) {
    writeFileSync(filePath, content);
    const index = new BlockIndex(parser.parse(content));
    const onNewBlock = vi.fn();
    const follower = new JsonlFollower(filePath, parser, index, { onNewBlock, initialContent });
    return { index, follower, onNewBlock };
  }

  it('starts at the end of the file without changing the index', async () => {
    const { index, follower } = follow(jsonl(user('first')));
    expect(await follower.poll()).toBe(false);
    expect(index.names()).toEqual(['block-1']);
  });

  it('patches the open turn when it gains parts', async () => {
    const { index, follower, onNewBlock } = follow(jsonl(user('first')));
    await follower.poll();

    appendFileSync(filePath, jsonl(assistant('reply')));
    expect(await follower.poll()).toBe(true);
    expect(index.size).toBe(1);
    expect(index.byPosition(0)?.content).toBe('first\n\nreply');
    expect(onNewBlock).toHaveBeenCalledWith(0);
  });

  it('appends one block per new user message', async () => {
    const { index, follower, onNewBlock } = follow(jsonl(user('first')));
    await follower.poll();

    appendFileSync(filePath, jsonl(user('second')));
    await follower.poll();
    appendFileSync(filePath, jsonl(user('third')));
    await follower.poll();

    expect(index.names()).toEqual(['block-1', 'block-2', 'block-3']);
    expect(onNewBlock).toHaveBeenNthCalledWith(1, 1);
    expect(onNewBlock).toHaveBeenNthCalledWith(2, 2);
  });

  it('waits for a partial line to complete', async () => {
    const { index, follower } = follow(jsonl(user('first')));
    await follower.poll();

    appendFileSync(filePath, JSON.stringify(user('second')));
    expect(await follower.poll()).toBe(false);
    expect(index.size).toBe(1);

    appendFileSync(filePath, '\n');
    expect(await follower.poll()).toBe(true);
    expect(index.byPosition(1)?.content).toBe('second');
  });

  it('picks up lines written between parsing and the first poll', async () => {
    const content = jsonl(user('first'));
    const { index, follower } = follow(content, content);

    appendFileSync(filePath, jsonl(user('typed while choosing filters')));
    await follower.poll();
    appendFileSync(filePath, jsonl(user('third')));
    await follower.poll();

    expect(index.names()).toEqual(['block-1', 'block-2', 'block-3']);
    expect(index.blocks.map((b) => b.content)).toEqual(['first', 'typed while choosing filters', 'third']);
  });

  it('does not repeat an unterminated last line once its newline arrives', async () => {
    const { index, follower } = follow(JSON.stringify(user('first')));
    expect(index.names()).toEqual(['block-1']);
    await follower.poll();

    appendFileSync(filePath, '\n' + jsonl(user('second')));
    expect(await follower.poll()).toBe(true);
    expect(index.names()).toEqual(['block-1', 'block-2']);
    expect(index.blocks.map((b) => b.content)).toEqual(['first', 'second']);
  });

  it('extends a turn whose unterminated last line was already parsed', async () => {
    const content = jsonl(user('first')) + JSON.stringify(assistant('one'));
    const { index, follower } = follow(content, content);
    expect(index.byPosition(0)?.content).toBe('first\n\none');
    await follower.poll();

    appendFileSync(filePath, '\n' + jsonl(assistant('two')));
    await follower.poll();
    expect(index.size).toBe(1);
    expect(index.byPosition(0)?.content).toBe('first\n\none\n\ntwo');
  });

  it('completes a half-written last line left from before following began', async () => {
    const line = JSON.stringify(user('second'));
    const { index, follower } = follow(jsonl(user('first')) + line.slice(0, 10));
    expect(index.names()).toEqual(['block-1']);
    await follower.poll();

    appendFileSync(filePath, line.slice(10) + '\n');
    expect(await follower.poll()).toBe(true);
    expect(index.names()).toEqual(['block-1', 'block-2']);
    expect(index.byPosition(1)?.content).toBe('second');
  });

  it('keeps extending a turn that was open when following began', async () => {
    const { index, follower } = follow(jsonl(user('first'), assistant('one')));
    await follower.poll();

    appendFileSync(filePath, jsonl(assistant('two')));
    await follower.poll();
    expect(index.byPosition(0)?.content).toBe('first\n\none\n\ntwo');
  });

  it('rereads from the start after truncation', async () => {
    const { index, follower } = follow(jsonl(user('first message'), user('second message')));
    await follower.poll();

    writeFileSync(filePath, jsonl(user('new')));
    expect(await follower.poll()).toBe(true);
    expect(index.names()).toEqual(['block-1', 'block-2', 'block-3']);
    expect(index.byPosition(2)?.content).toBe('new');
  });

  it('survives the file disappearing', async () => {
    const { index, follower } = follow(jsonl(user('first')));
    await follower.poll();

    rmSync(filePath);
    expect(await follower.poll()).toBe(false);
    expect(index.size).toBe(1);
  });

  it('returns from run once stopped', async () => {
    const { follower } = follow(jsonl(user('first')));
    const running = follower.run();
    follower.stop();
    await expect(running).resolves.toBeUndefined();
  });
});

describe('GenericFollower', () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'folio-follow-'));
    filePath = join(tmpDir, 'notes.md');
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  // Push mtime forward so the change is visible even within one clock tick
  function rewrite(content: string, secondsAhead: number) {
    writeFileSync(filePath, content);
    const later = new Date(Date.now() + secondsAhead * 1000);
    utimesSync(filePath, later, later);
  }

  it('reloads the whole file when it changes', async () => {
    const parser = new MarkdownParser();
    writeFileSync(filePath, '# One\n');
    const index = new BlockIndex(parser.parse('# One\n'));
    const onReload = vi.fn();
    const follower = new GenericFollower(filePath, parser, index, { onReload });

    expect(await follower.poll()).toBe(false);
    rewrite('# One\n# Two\n', 5);

    expect(await follower.poll()).toBe(true);
    expect(index.names()).toEqual(['One', 'Two']);
    expect(onReload).toHaveBeenCalledTimes(1);
    expect(await follower.poll()).toBe(false);
  });

  it('reloads a file that changed after it was parsed', async () => {
    const parser = new MarkdownParser();
    writeFileSync(filePath, '# One\n');
    const index = new BlockIndex(parser.parse('# One\n'));
    const follower = new GenericFollower(filePath, parser, index, { initialContent: '# One\n' });

    writeFileSync(filePath, '# One\n# Two\n');
    expect(await follower.poll()).toBe(false);
    expect(await follower.poll()).toBe(true);
    expect(index.names()).toEqual(['One', 'Two']);
    expect(await follower.poll()).toBe(false);
  });

  it('skips the reload when the file still matches what was parsed', async () => {
    const parser = new MarkdownParser();
    writeFileSync(filePath, '# One\n');
    const index = new BlockIndex(parser.parse('# One\n'));
    const onReload = vi.fn();
    const follower = new GenericFollower(filePath, parser, index, { initialContent: '# One\n', onReload });

    await follower.poll();
    expect(await follower.poll()).toBe(false);
    expect(onReload).not.toHaveBeenCalled();
  });

  it('keeps the old blocks when the new content parses to nothing', async () => {
    const parser = new MarkdownParser();
    writeFileSync(filePath, '# One\n');
    const index = new BlockIndex(parser.parse('# One\n'));
    const follower = new GenericFollower(filePath, parser, index);

    await follower.poll();
    rewrite('no headings', 10);
    expect(await follower.poll()).toBe(false);
    expect(index.names()).toEqual(['One']);
  });
});

describe('createFollower', () => {
  it('tails transcripts and reloads everything else', () => {
    const index = new BlockIndex();
    expect(createFollower('a.jsonl', new JsonlParser(), index)).toBeInstanceOf(JsonlFollower);
    expect(createFollower('a.md', new MarkdownParser(), index)).toBeInstanceOf(GenericFollower);
  });
});
