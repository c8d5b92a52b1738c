// ─── Unified Diff Hunks ─────────────────────────────────────────────────────
//
// Parses unified-diff text into hunks.  Parsing never fails: text that is
// not a diff simply yields no hunks, and callers check for emptiness.

import type { DiffHunk, DiffLine } from './types.js';

const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;

export function parseHunks(diffText: string): DiffHunk[] {
  const hunks: DiffHunk[] = [];
  let current: DiffHunk | null = null;

  // A trailing newline ends the last line; it does not start another
  for (const line of diffText.replace(/\n$/, '').split('\n')) {
    // File headers
    if (line.startsWith('---') || line.startsWith('+++')) continue;

    if (line.startsWith('@@')) {
      if (current) hunks.push(current);
      current = openHunk(line);
      continue;
    }

    if (current) current.lines.push(classifyLine(line));
  }

  if (current) hunks.push(current);
  return hunks;
}

function openHunk(header: string): DiffHunk {
  const m = HUNK_HEADER.exec(header);
  if (!m) {
    return { header, lines: [], oldStart: 0, oldCount: 0, newStart: 0, newCount: 0 };
  }
  return {
    header,
    lines: [],
    oldStart: toInt(m[1], 0),
    oldCount: toInt(m[2], 1),
    newStart: toInt(m[3], 0),
    newCount: toInt(m[4], 1),
  };
}

function classifyLine(line: string): DiffLine {
  if (line.startsWith('+')) return { type: 'added', content: line.slice(1) };
  if (line.startsWith('-')) return { type: 'removed', content: line.slice(1) };
  if (line.startsWith(' ')) return { type: 'context', content: line.slice(1) };
  // Blank lines and "\ No newline at end of file"
  return { type: 'context', content: line };
}

function toInt(raw: string | undefined, fallback: number): number {
  return raw === undefined ? fallback : parseInt(raw, 10);
}

/**
 * Path of the file a diff targets, from its first `+++ ` header.
 * Strips the `b/` prefix and any tab-separated timestamp.
 */
export function diffTargetFile(diffText: string): string {
  for (const line of diffText.split('\n')) {
    if (!line.startsWith('+++ ')) continue;
    let path = line.slice(4);
    if (path.startsWith('b/')) path = path.slice(2);
    const tab = path.indexOf('\t');
    return tab === -1 ? path : path.slice(0, tab);
  }
  return 'file';
}

export function hunkStats(hunk: DiffHunk): { added: number; removed: number } {
  let added = 0;
  let removed = 0;
  for (const line of hunk.lines) {
    if (line.type === 'added') added++;
    else if (line.type === 'removed') removed++;
  }
  return { added, removed };
}

// ─── Touched definitions ────────────────────────────────────────────────────

const DEFINITION_PATTERNS = [
  /func\s+(?:\([^)]*\)\s*)?([A-Za-z0-9_]+)\s*\(/,
  /(?:def|class)\s+([A-Za-z0-9_]+)/,
  /function\s+([A-Za-z0-9_]+)/,
  /(?:const|let|var)\s+([A-Za-z0-9_]+)\s*=\s*(?:async\s*)?\(/,
];

/**
 * Names of the functions and classes whose definitions appear in a hunk,
 * in first-seen order, e.g. `["parseHunks()", "openHunk()"]`.
 */
export function hunkFunctions(hunk: DiffHunk): string[] {
  const seen = new Set<string>();
  for (const line of hunk.lines) {
    for (const pattern of DEFINITION_PATTERNS) {
      const name = pattern.exec(line.content)?.[1];
      if (name) seen.add(`${name}()`);
    }
  }
  return [...seen];
}
