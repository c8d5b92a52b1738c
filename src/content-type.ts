// ─── Content Type Classifier ────────────────────────────────────────────────
//
// Heuristic, shape-only classification of a chunk of text.  Rules are tried
// in priority order and the first match wins; nothing here parses or
// validates the content it looks at.

import type { ContentType } from './types.js';

const TABLE_SEPARATOR = /^\|[\s\-:]+\|/;
const YAML_KEY_VALUE = /^\s*[\w-]+:\s*.+$/;
const YAML_LIST_ITEM = /^\s*-\s+.+$/;
const TREE_CHARS = ['├', '└', '│'];

export function classify(text: string): ContentType {
  if (isDiff(text)) return 'diff';
  if (isTable(text)) return 'table';
  if (isTree(text)) return 'tree';
  if (isJson(text)) return 'json';
  if (isYaml(text)) return 'yaml';
  return 'plain';
}

/**
 * Unified diff: needs a hunk header, a file header AND at least one change
 * line.  Requiring all three keeps markdown bullet lists and fenced code
 * with leading `-`/`+` out.
 */
export function isDiff(text: string): boolean {
  let hasHunkHeader = false;
  let hasFileHeader = false;
  let changes = 0;

  for (const line of text.split('\n')) {
    if (line.startsWith('@@')) hasHunkHeader = true;
    if (line.startsWith('--- ') || line.startsWith('+++ ')) hasFileHeader = true;
    if (line.startsWith('+') && !line.startsWith('+++')) changes++;
    if (line.startsWith('-') && !line.startsWith('---')) changes++;
  }

  return hasHunkHeader && hasFileHeader && changes > 0;
}

function isTable(text: string): boolean {
  let pipeRows = 0;
  let separator = false;

  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line.startsWith('|') && line.endsWith('|')) pipeRows++;
    if (TABLE_SEPARATOR.test(line)) separator = true;
  }

  // header + separator + at least one row
  return pipeRows >= 3 && separator;
}

function isTree(text: string): boolean {
  const lines = text.split('\n');
  const treeLines = lines.filter((line) => TREE_CHARS.some((c) => line.includes(c))).length;
  return lines.length > 2 && treeLines > Math.floor(lines.length / 2);
}

function isJson(text: string): boolean {
  const trimmed = text.trim();
  return (
    (trimmed.startsWith('{') && trimmed.endsWith('}')) ||
    (trimmed.startsWith('[') && trimmed.endsWith(']'))
  );
}

function isYaml(text: string): boolean {
  const lines = text.split('\n');
  const matching = lines.filter(
    (line) => YAML_KEY_VALUE.test(line) || YAML_LIST_ITEM.test(line),
  ).length;
  return lines.length > 2 && matching > Math.floor(lines.length / 2);
}
