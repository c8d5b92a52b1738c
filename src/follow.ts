// ─── Follow Mode ────────────────────────────────────────────────────────────
//
// Pollers that keep a BlockIndex in step with a file that is still being
// written.  Transcripts are tailed line by line; every other format is
// re-parsed whole when its modification time moves.

import fs from 'node:fs/promises';
import type { Block, Parser } from './types.js';
import type { BlockIndex } from './block-index.js';
import type { TurnAssembler } from './transcript.js';
import { JsonlParser, parseLineInfo, turnToBlock } from './parsers/jsonl.js';
import { logger as rootLogger } from './logger.js';

const logger = rootLogger.child({ module: 'follow' });

const DEFAULT_POLL_MS = 500;
const NEWLINE = 0x0a;

export interface Follower {
  /** One iteration; resolves to whether the index changed. */
  poll(): Promise<boolean>;
  /** Poll until `stop()` is called. */
  run(): Promise<void>;
  stop(): void;
}

export interface JsonlFollowerOptions {
  /** Called with the handle of every appended or patched block */
  onNewBlock?: (handle: number) => void;
  pollMs?: number;
  /**
   * The text the index was parsed from.  Tailing resumes right after it, so
   * lines written in between still reach the index.  Read from disk when
   * omitted.
   */
  initialContent?: string;
}

/**
 * Tails a transcript.  New lines go through the same turn assembler as the
 * batch parser: a user message appends a block, anything that extends the
 * open turn patches that turn's block in place.
 */
export class JsonlFollower implements Follower {
  private byteOffset = 0;
  /** Bytes after the last newline, held until the line completes */
  private pending: Buffer = Buffer.alloc(0);
  /** The unterminated last line was already parsed into the index */
  private lineConsumed = false;
  private lineCount = 0;
  private started = false;
  private stopping = false;
  private assembler: TurnAssembler;
  private openHandle: number | null = null;
  private readonly pollMs: number;

  constructor(
    private readonly filePath: string,
    private readonly parser: JsonlParser,
    private readonly index: BlockIndex,
    private readonly options: JsonlFollowerOptions = {},
  ) {
    this.pollMs = options.pollMs ?? DEFAULT_POLL_MS;
    this.assembler = parser.assembler();
  }

  /**
   * Position after the content the index was built from.  Those lines are
   * replayed through the assembler without touching the index, so the turn
   * still open at the end keeps receiving parts.
   */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    const data =
      this.options.initialContent === undefined
        ? await fs.readFile(this.filePath)
        : Buffer.from(this.options.initialContent, 'utf8');
    const lastNewline = data.lastIndexOf(NEWLINE);
    const complete = lastNewline === -1 ? '' : data.subarray(0, lastNewline + 1).toString('utf8');
    const tail = data.subarray(lastNewline + 1);

    this.assembler = this.parser.assembler();
    this.lineCount = 0;
    this.replay(complete);

    // The batch parse also reads an unterminated last line when it is whole JSON
    const tailInfo = parseLineInfo(tail.toString('utf8'));
    if (tailInfo) {
      this.lineCount++;
      this.assembler.consume(tailInfo, this.lineCount);
      this.lineConsumed = true;
      this.pending = Buffer.alloc(0);
    } else {
      this.lineConsumed = false;
      this.pending = tail;
    }
    this.byteOffset = data.length;

    if (this.assembler.current && this.index.size > 0) this.openHandle = this.index.size - 1;
    logger.info({ path: this.filePath, offset: this.byteOffset, turns: this.index.size }, 'Following transcript');
  }

  async poll(): Promise<boolean> {
    if (!this.started) {
      await this.start();
      return false;
    }

    let chunk: Buffer;
    try {
      chunk = await this.readNewBytes();
    } catch (err) {
      logger.warn({ err, path: this.filePath }, 'Failed to read transcript');
      return false;
    }
    if (chunk.length === 0) return false;

    const data = Buffer.concat([this.pending, chunk]);
    const lastNewline = data.lastIndexOf(NEWLINE);
    if (lastNewline === -1) {
      this.pending = data;
      return false;
    }
    this.pending = data.subarray(lastNewline + 1);

    const lines = data.subarray(0, lastNewline).toString('utf8').split('\n');
    // The rest of a line already in the index: usually just its newline
    if (this.lineConsumed) {
      lines.shift();
      this.lineConsumed = false;
    }

    let changed = false;
    for (const line of lines) {
      this.lineCount++;
      if (this.dispatch(line)) changed = true;
    }
    return changed;
  }

  async run(): Promise<void> {
    await this.start();
    while (!this.stopping) {
      await sleep(this.pollMs);
      if (this.stopping) break;
      await this.poll();
    }
    logger.info({ path: this.filePath }, 'Stopped following');
  }

  stop(): void {
    this.stopping = true;
  }

  private async readNewBytes(): Promise<Buffer> {
    const { size } = await fs.stat(this.filePath);

    if (size < this.byteOffset) {
      logger.info({ path: this.filePath, size, offset: this.byteOffset }, 'Transcript truncated, rewinding');
      this.byteOffset = 0;
      this.pending = Buffer.alloc(0);
      this.lineConsumed = false;
      this.lineCount = 0;
      this.assembler = this.parser.assembler(this.index.size);
      this.openHandle = null;
    }
    if (size === this.byteOffset) return Buffer.alloc(0);

    const handle = await fs.open(this.filePath, 'r');
    try {
      const buffer = Buffer.alloc(size - this.byteOffset);
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, this.byteOffset);
      this.byteOffset += bytesRead;
      return buffer.subarray(0, bytesRead);
    } finally {
      await handle.close();
    }
  }

  private replay(text: string): void {
    if (!text) return;
    for (const line of text.split('\n')) {
      this.lineCount++;
      const info = parseLineInfo(line);
      if (info) this.assembler.consume(info, this.lineCount);
    }
    // The split leaves an empty fragment after the final newline
    if (text.endsWith('\n')) this.lineCount--;
  }

  private dispatch(line: string): boolean {
    const info = parseLineInfo(line);
    if (!info) return false;

    const event = this.assembler.consume(info, this.lineCount);
    switch (event.kind) {
      case 'opened': {
        const handle = this.index.append(turnToBlock(event.turn.turn, event.turn.number));
        this.openHandle = handle;
        this.options.onNewBlock?.(handle);
        return true;
      }
      case 'updated': {
        if (this.openHandle === null) return false;
        this.index.patch(this.openHandle, turnToBlock(event.turn.turn, event.turn.number));
        this.options.onNewBlock?.(this.openHandle);
        return true;
      }
      case 'none':
        return false;
    }
  }
}

export interface GenericFollowerOptions {
  onReload?: (blocks: Block[]) => void;
  pollMs?: number;
  /** The text the index was parsed from; the first poll reloads if the file no longer matches it */
  initialContent?: string;
}

/** Re-parses the whole file whenever its modification time advances. */
export class GenericFollower implements Follower {
  private lastModified = 0;
  private lastContent: string | null = null;
  private started = false;
  private stopping = false;
  private readonly pollMs: number;

  constructor(
    private readonly filePath: string,
    private readonly parser: Parser,
    private readonly index: BlockIndex,
    private readonly options: GenericFollowerOptions = {},
  ) {
    this.pollMs = options.pollMs ?? DEFAULT_POLL_MS;
  }

  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;
    if (this.options.initialContent === undefined) {
      const { mtimeMs } = await fs.stat(this.filePath);
      this.lastModified = mtimeMs;
    } else {
      // Compare against what was parsed rather than trusting the current mtime
      this.lastContent = this.options.initialContent;
    }
    logger.info({ path: this.filePath }, 'Following file');
  }

  async poll(): Promise<boolean> {
    if (!this.started) {
      await this.start();
      return false;
    }

    let content: string;
    try {
      const { mtimeMs } = await fs.stat(this.filePath);
      if (mtimeMs <= this.lastModified) return false;
      this.lastModified = mtimeMs;
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (err) {
      logger.warn({ err, path: this.filePath }, 'Failed to reload file');
      return false;
    }
    if (content === this.lastContent) return false;
    this.lastContent = content;

    const blocks = this.parser.parse(content);
    if (blocks.length === 0) return false;

    this.index.replaceAll(blocks);
    logger.debug({ path: this.filePath, blocks: blocks.length }, 'Reloaded');
    this.options.onReload?.(blocks);
    return true;
  }

  async run(): Promise<void> {
    await this.start();
    while (!this.stopping) {
      await sleep(this.pollMs);
      if (this.stopping) break;
      await this.poll();
    }
    logger.info({ path: this.filePath }, 'Stopped following');
  }

  stop(): void {
    this.stopping = true;
  }
}

/** A follower for `parser`: tailing for transcripts, reloads otherwise. */
export function createFollower(
  filePath: string,
  parser: Parser,
  index: BlockIndex,
  options: { onChange?: () => void; pollMs?: number; initialContent?: string } = {},
): Follower {
  const { onChange, pollMs, initialContent } = options;
  if (parser instanceof JsonlParser) {
    return new JsonlFollower(filePath, parser, index, { pollMs, initialContent, onNewBlock: () => onChange?.() });
  }
  return new GenericFollower(filePath, parser, index, { pollMs, initialContent, onReload: () => onChange?.() });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
