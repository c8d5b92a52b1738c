#!/usr/bin/env tsx
// ─── CLI Entry Point ────────────────────────────────────────────────────────
//
// Usage:
//   folio <file> [options]
//   folio <type> <file>            (type: md, jsonl, diff, json, txt)
//   folio -f <file>                (follow a file that is still growing)
//   cat notes.md | folio
//
// Reads the input, picks a parser, and renders the block viewer.  Transcripts
// first show the content-type selector unless --all is given.

import React from 'react';
import { render } from 'ink';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as tty from 'node:tty';
import { z } from 'zod';

import type { Parser, TranscriptFilters } from './types.js';
import { BlockIndex } from './block-index.js';
import { createFollower } from './follow.js';
import { getConfig } from './config.js';
import { logger as rootLogger } from './logger.js';
import { FolioError, InputError, NoBlocksError, describeError } from './errors.js';
import {
  FILE_TYPES,
  JsonlParser,
  MarkdownParser,
  detectParser,
  detectParserFromContent,
  parserForType,
} from './parsers/index.js';
import { parseArgs } from './cli.js';
import { App } from './app.js';
import { FilterSelector } from './components/filter-selector.js';

const logger = rootLogger.child({ module: 'cli' });

// ─── Usage Text ─────────────────────────────────────────────────────────────

const USAGE = `
\x1b[1m\x1b[36mfolio\x1b[0m · paged terminal reader for documents, diffs and transcripts

\x1b[1mUSAGE\x1b[0m
  folio <file> [options]
  folio <type> <file>       force a format: ${Object.keys(FILE_TYPES).join(', ')}
  folio -f <file>           follow a growing file
  <command> | folio         read from stdin (format sniffed from content)

\x1b[1mOPTIONS\x1b[0m
  -f, --follow          Keep reading as the file grows
  -n, --line-numbers    Show source line numbers
      --all             Skip the transcript filter screen
  -h, --help            Show this help message
  -v, --version         Show version

\x1b[1mENVIRONMENT\x1b[0m
  FOLIO_LOG_LEVEL       pino level (default: warn)
  FOLIO_LOG_FILE        log destination (default: no logging)
  FOLIO_POLL_MS         follow-mode poll interval (default: 500)
  FOLIO_PAGE_LINES      lines per page (default: 50)

\x1b[1mIN-APP CONTROLS\x1b[0m
  → ← / j k     Next / previous block
  n p / Space   Next / previous page
  / :           Jump to a block / command prompt
  s  #  ?  q    Sidebar, line numbers, help, quit
`;

// ─── Input ──────────────────────────────────────────────────────────────────

function readInputFile(filePath: string, allowEmpty: boolean): string {
  const resolved = path.resolve(process.cwd(), filePath);
  let content: string;
  try {
    content = fs.readFileSync(resolved, 'utf-8');
  } catch (err) {
    throw new InputError(filePath, { cause: err });
  }
  if (!allowEmpty && !content.trim()) {
    throw new InputError(filePath, { cause: new Error('file is empty') });
  }
  return content;
}

async function readStdin(): Promise<string> {
  return new Promise((resolve, reject) => {
    let data = '';
    process.stdin.setEncoding('utf-8');
    process.stdin.on('data', (chunk) => {
      data += chunk;
    });
    process.stdin.on('end', () => resolve(data));
    process.stdin.on('error', (err) => reject(new InputError('-', { cause: err })));
  });
}

/**
 * Keyboard input for the UI.  When stdin carries the document, keys come
 * from the controlling terminal instead.
 */
function terminalInput(): tty.ReadStream | undefined {
  if (process.stdin.isTTY) return undefined;
  try {
    return new tty.ReadStream(fs.openSync('/dev/tty', 'r'));
  } catch (err) {
    logger.warn({ err }, 'No controlling terminal for keyboard input');
    return undefined;
  }
}

/** Ink render options; ink's own stdin unless keys come from elsewhere. */
function inkOptions(stdin: tty.ReadStream | undefined) {
  return stdin ? { stdin, exitOnCtrlC: false } : { exitOnCtrlC: false };
}

function readVersion(): string {
  const pkg = z.object({ version: z.string() });
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
    const parsed = pkg.safeParse(raw);
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (err) {
    logger.debug({ err }, 'package.json unreadable');
    return '0.0.0';
  }
}

// ─── Parser Selection ───────────────────────────────────────────────────────

/** Markdown files read as one continuous block paged to the terminal. */
function continuous(parser: MarkdownParser, rows: number): Parser {
  return {
    detect: (filePath) => parser.detect(filePath),
    parse: (content) => parser.parseContinuous(content, rows),
  };
}

/** Show the transcript selector; `null` when the reader quits instead. */
async function selectFilters(
  parser: JsonlParser,
  content: string,
  fileName: string,
  stdin: tty.ReadStream | undefined,
): Promise<TranscriptFilters | null> {
  const counts = parser.scanContentTypes(content);
  if (counts.length === 0) return parser.filters;

  let chosen: TranscriptFilters | null = null;
  const instance = render(
    <FilterSelector
      counts={counts}
      fileName={fileName}
      onConfirm={(filters) => {
        chosen = filters;
        instance.unmount();
      }}
    />,
    inkOptions(stdin),
  );
  await instance.waitUntilExit();
  return chosen;
}

// ─── Main ───────────────────────────────────────────────────────────────────

async function main() {
  const args = parseArgs(process.argv.slice(2));
  for (const option of args.unknown) console.error(`⚠  Unknown option: ${option}`);

  if (args.showVersion) {
    console.log(`folio v${readVersion()}`);
    process.exit(0);
  }

  if (args.showHelp) {
    console.log(USAGE);
    process.exit(0);
  }

  const config = getConfig();
  const parserOptions = { pageSize: config.FOLIO_PAGE_LINES };
  const fromStdin = args.filePath === null || args.filePath === '-';

  if (fromStdin && process.stdin.isTTY) {
    console.log(USAGE);
    console.error(
      '\x1b[31m✗ No input file specified.\x1b[0m\n' + '  Pass a file path or pipe content via stdin.\n',
    );
    process.exit(1);
  }
  if (fromStdin && args.follow) {
    console.error('\x1b[31m✗ Follow mode needs a file path.\x1b[0m');
    process.exit(1);
  }

  // ── Read the input ─────────────────────────────────────────
  const filePath = fromStdin ? null : args.filePath;
  const fileName = filePath ? path.basename(filePath) : 'stdin';
  const content = filePath ? readInputFile(filePath, args.follow) : await readStdin();
  if (!filePath && !content.trim()) throw new InputError('-', { cause: new Error('no input') });

  // ── Pick the parser ────────────────────────────────────────
  let parser: Parser;
  if (args.type) parser = parserForType(args.type, parserOptions);
  else if (filePath) parser = detectParser(filePath, parserOptions);
  else parser = detectParserFromContent(content, parserOptions);

  const stdin = terminalInput();

  if (parser instanceof JsonlParser && !args.all) {
    const filters = await selectFilters(parser, content, fileName, stdin);
    if (!filters) process.exit(0);
    parser = new JsonlParser(filters);
  } else if (parser instanceof MarkdownParser) {
    parser = continuous(parser, process.stdout.rows || 40);
  }

  // ── Build the index ────────────────────────────────────────
  const blocks = parser.parse(content);
  if (blocks.length === 0 && !args.follow) throw new NoBlocksError(fileName);

  const index = new BlockIndex(blocks);
  // Tailing resumes after the parsed content, even if the selector kept the reader a while
  const follower =
    filePath && args.follow
      ? createFollower(filePath, parser, index, { pollMs: config.FOLIO_POLL_MS, initialContent: content })
      : null;

  console.error(
    `\x1b[36m◊ folio\x1b[0m  ${filePath ?? 'stdin'}\n` +
      `  ${blocks.length} blocks${args.follow ? ' · following' : ''}\n`,
  );
  logger.info({ file: filePath ?? 'stdin', blocks: blocks.length, follow: args.follow }, 'Starting viewer');

  // ── Render the TUI ─────────────────────────────────────────
  const { waitUntilExit } = render(
    <App index={index} follower={follower} fileName={fileName} initialShowLineNumbers={args.lineNumbers} />,
    inkOptions(stdin),
  );

  await waitUntilExit();
  stdin?.destroy();
}

// ── Run ──────────────────────────────────────────────────────────────────────

main().catch((err: unknown) => {
  if (err instanceof FolioError) {
    console.error(`\x1b[31m✗ ${describeError(err)}\x1b[0m`);
  } else {
    console.error('\x1b[31m✗ Fatal error:\x1b[0m', err);
  }
  process.exit(1);
});
