// ─── Page Rendering ─────────────────────────────────────────────────────────
//
// A rendered page is a pure function of (block, page index, options).  The
// page's content type picks the renderer; chat blocks render from their
// parts instead of their flattened text.

import path from 'node:path';
import type { Block, RenderOptions, TurnPart } from '../types.js';
import { pageContentType, pageLabel } from '../blocks.js';
import { renderDiffPart } from '../transcript.js';
import type { RenderedLine } from './types.js';
import { renderDiffText, renderHunk } from './diff.js';
import { highlightLines, renderMarkdown } from './markdown.js';
import { expandTabs } from './text.js';

export type { LineStyle, RenderedLine } from './types.js';

export interface PageHeader {
  title: string;
  /** `[page/total]` */
  indicator: string;
}

export function renderPage(block: Block, pageIndex: number, options: RenderOptions): RenderedLine[] {
  const index = Math.min(Math.max(0, pageIndex), block.pageCount - 1);
  const page = block.pages[index];
  if (!page) return [];

  if (page.kind === 'hunk') return renderHunk(page.diff, page.hunkIndex, options.showLineNumbers);
  if (block.sourceKind === 'chat' && block.parts) return renderParts(block.parts, options.width);

  const startLine = options.showLineNumbers ? pageStartLine(block, index) : 0;
  const text = page.text;

  switch (pageContentType(block, index)) {
    case 'diff':
      return number(renderDiffText(text), startLine);
    case 'json':
    case 'yaml': {
      const language = pageContentType(block, index);
      const lines = highlightLines(text, language);
      return number(
        lines
          ? lines.map((l): RenderedLine => ({ text: l, style: 'code', highlighted: true }))
          : plainLines(text, 'code'),
        startLine,
      );
    }
    case 'code':
    case 'tree':
      return number(plainLines(text, 'code'), startLine);
    default:
      // Only markdown reflows; shell output and todo lists keep their lines
      if (block.sourceKind !== 'markdown') return number(plainLines(text, 'prose'), startLine);
      return renderMarkdown(text, { width: options.width, startLine });
  }
}

export function pageHeader(block: Block, pageIndex: number): PageHeader {
  const indicator = `[${pageIndex + 1}/${block.pageCount}]`;
  const label = pageLabel(block, pageIndex);

  let title = block.name;
  if (label) {
    title = block.pageContentTypes?.[pageIndex] === 'diff' ? path.basename(label) || block.name : label;
  } else if (block.sourceKind === 'chat') {
    const turn = /^block-(\d+)$/.exec(block.name);
    if (turn) title = `chat ${turn[1]}`;
  } else if (block.sourceKind === 'shell') {
    title = `shell: ${block.name}`;
  }
  return { title, indicator };
}

/**
 * File line of the first content line of a block, or 0 when the content is
 * not a slice of the file.  Heading-cut markdown blocks start the line after
 * their heading; every other block starts on `originLine`.
 */
export function contentStartLine(block: Block): number {
  if (block.originLine <= 0 || block.sourceKind === 'chat') return 0;
  if (block.sourceKind === 'markdown' && !block.pageMeta) return block.originLine + 1;
  return block.originLine;
}

/** File line of the first line on a `lines` page, or 0. */
export function pageStartLine(block: Block, pageIndex: number): number {
  const start = contentStartLine(block);
  if (start === 0) return 0;

  let offset = 0;
  for (let i = 0; i < pageIndex; i++) {
    const page = block.pages[i];
    if (page?.kind === 'lines') offset += page.text.split('\n').length;
  }
  return start + offset;
}

/** Width of a gutter that fits every number on the page, plus a separator. */
export function gutterWidth(lines: readonly RenderedLine[]): number {
  let max = 0;
  for (const line of lines) if (line.lineNumber !== undefined && line.lineNumber > max) max = line.lineNumber;
  return max === 0 ? 0 : Math.max(3, String(max).length) + 2;
}

// ─── Chat Parts ─────────────────────────────────────────────────────────────

function renderParts(parts: readonly TurnPart[], width: number): RenderedLine[] {
  const out: RenderedLine[] = [];

  parts.forEach((part, i) => {
    if (i > 0) out.push({ text: '', style: 'blank' });
    switch (part.type) {
      case 'user':
        out.push(...plainLines(part.content, 'user'));
        break;
      case 'assistant':
        out.push(...renderMarkdown(part.content, { width, startLine: 0 }));
        break;
      case 'diff':
        // The `--- name ---` banner styles as a file header
        out.push(...renderDiffText(renderDiffPart(part.content, part.meta ?? '')));
        break;
      case 'tool_result':
        out.push(...plainLines(part.content, 'tool'));
        break;
      case 'question':
        out.push(...plainLines(`[?] ${part.content}`, 'question'));
        break;
    }
  });
  return out;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

function plainLines(text: string, style: RenderedLine['style']): RenderedLine[] {
  return text
    .replace(/\n+$/, '')
    .split('\n')
    .map((line): RenderedLine => ({ text: expandTabs(line), style }));
}

/** Number raw lines consecutively from `start`; 0 leaves them unnumbered. */
function number(lines: RenderedLine[], start: number): RenderedLine[] {
  if (start === 0) return lines;
  return lines.map((line, i) => ({ ...line, lineNumber: start + i }));
}
