// ─── Page Splitting ─────────────────────────────────────────────────────────

import type { Page } from './types.js';
import { parseHunks } from './hunks.js';

/**
 * Split lines into pages of `pageSize` lines each, joined by newlines.
 * Always returns at least one page, so callers never handle zero pages.
 */
export function splitPages(lines: readonly string[], pageSize: number): string[] {
  if (pageSize < 1) throw new RangeError(`pageSize must be >= 1, got ${pageSize}`);
  if (lines.length === 0) return [''];

  const pages: string[] = [];
  for (let i = 0; i < lines.length; i += pageSize) {
    pages.push(lines.slice(i, i + pageSize).join('\n'));
  }
  return pages;
}

export function linePages(lines: readonly string[], pageSize: number): Page[] {
  return splitPages(lines, pageSize).map((text): Page => ({ kind: 'lines', text }));
}

/**
 * One page per hunk.  Every page carries the full diff text; the hunk
 * index on the page selects what gets rendered.
 */
export function hunkPages(diffText: string): Page[] {
  const hunks = parseHunks(diffText);
  if (hunks.length === 0) return [{ kind: 'lines', text: diffText }];
  return hunks.map((_, hunkIndex): Page => ({ kind: 'hunk', diff: diffText, hunkIndex }));
}

/** The stored text of a page: its slice, or the whole diff for hunk pages. */
export function pageText(page: Page): string {
  return page.kind === 'lines' ? page.text : page.diff;
}
