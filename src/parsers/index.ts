// ─── Parser Registry ────────────────────────────────────────────────────────

import type { Parser, TranscriptFilters } from '../types.js';
import { DEFAULT_FILTERS } from '../types.js';
import { isDiff } from '../content-type.js';
import { DiffParser } from './diff.js';
import { JsonlParser } from './jsonl.js';
import { MarkdownParser } from './markdown.js';
import { TodoParser } from './todo.js';
import { TxtParser } from './txt.js';

export { DiffParser, JsonlParser, MarkdownParser, TodoParser, TxtParser };

/** Type names accepted by `folio <type> <file>`, with the extension each implies. */
export const FILE_TYPES = {
  md: '.md',
  jsonl: '.jsonl',
  diff: '.diff',
  json: '.json',
  txt: '.txt',
} as const;

export type FileType = keyof typeof FILE_TYPES;

export function isFileType(value: string): value is FileType {
  return Object.hasOwn(FILE_TYPES, value);
}

export interface ParserOptions {
  filters?: Readonly<TranscriptFilters>;
  /** Lines per page for line-paginated formats */
  pageSize?: number;
}

function registry(options: ParserOptions): Parser[] {
  // Order matters: the first parser whose `detect` matches wins
  return [
    new TodoParser(),
    new DiffParser(),
    new MarkdownParser(options.pageSize),
    new JsonlParser(options.filters ?? DEFAULT_FILTERS),
    new TxtParser(options.pageSize),
  ];
}

/** Pick a parser by file extension.  Unknown extensions read as markdown. */
export function detectParser(filePath: string, options: ParserOptions = {}): Parser {
  return registry(options).find((p) => p.detect(filePath)) ?? new MarkdownParser(options.pageSize);
}

/**
 * Pick a parser for content with no file name (piped stdin).  A JSON object
 * on the first non-blank line means a transcript.
 */
export function detectParserFromContent(content: string, options: ParserOptions = {}): Parser {
  const first = content.split('\n').find((line) => line.trim() !== '');
  if (first !== undefined && isJsonObject(first.trim())) {
    return new JsonlParser(options.filters ?? DEFAULT_FILTERS);
  }
  if (isDiff(content)) return new DiffParser();
  return new MarkdownParser(options.pageSize);
}

export function parserForType(type: FileType, options: ParserOptions = {}): Parser {
  return detectParser(`input${FILE_TYPES[type]}`, options);
}

function isJsonObject(text: string): boolean {
  if (!text.startsWith('{')) return false;
  try {
    const value: unknown = JSON.parse(text);
    return typeof value === 'object' && value !== null && !Array.isArray(value);
  } catch {
    return false;
  }
}
