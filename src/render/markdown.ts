// ─── Markdown → Rendered Lines ──────────────────────────────────────────────
//
// Walks `marked.lexer()` tokens and lays each one out as terminal rows:
// headings keep their `#` prefix, paragraphs are word-wrapped, code is
// boxed and syntax highlighted, lists and tables are drawn in ASCII.
//
// Each token's `raw` text advances a source line counter, so rendered rows
// can be numbered against the lines they came from.

import { marked, type Token, type Tokens } from 'marked';
import { highlight, supportsLanguage } from 'cli-highlight';
import type { RenderedLine } from './types.js';
import { expandTabs, stripInline, wordWrap } from './text.js';

export interface MarkdownRenderOptions {
  width: number;
  /** Source line of the first line of `text`; 0 disables numbering */
  startLine: number;
}

const BLANK: RenderedLine = { text: '', style: 'blank' };

export function renderMarkdown(text: string, options: MarkdownRenderOptions): RenderedLine[] {
  const out: RenderedLine[] = [];
  let line = options.startLine;

  for (const token of marked.lexer(text)) {
    const rendered = renderToken(token, options.width);
    if (rendered.length > 0) {
      const span = lineSpan(token.raw);
      rendered.forEach((r, k) => {
        out.push(options.startLine > 0 ? { ...r, lineNumber: line + Math.min(k, span - 1) } : r);
      });
      out.push(BLANK);
    }
    line += countNewlines(token.raw);
  }

  while (out.length > 0 && out[out.length - 1]?.style === 'blank') out.pop();
  return out;
}

/** Syntax-highlight `code`, or `null` when the language is unknown. */
export function highlightLines(code: string, language: string | undefined): string[] | null {
  if (!language || !supportsLanguage(language)) return null;
  try {
    return highlight(code, { language, ignoreIllegals: true }).split('\n');
  } catch {
    return null;
  }
}

function renderToken(token: Token, width: number): RenderedLine[] {
  switch (token.type) {
    case 'heading': {
      const t = token as Tokens.Heading;
      return [{ text: '#'.repeat(t.depth) + ' ' + stripInline(t.text), style: 'heading', depth: t.depth }];
    }
    case 'paragraph': {
      const t = token as Tokens.Paragraph;
      return wordWrap(stripInline(t.text), Math.max(10, width)).map((text): RenderedLine => ({ text, style: 'prose' }));
    }
    case 'code': {
      const t = token as Tokens.Code;
      return renderCode(t.text, t.lang || undefined, width);
    }
    case 'list': {
      const t = token as Tokens.List;
      return renderAsciiList(t).map((text): RenderedLine => ({ text, style: 'list' }));
    }
    case 'blockquote': {
      const t = token as Tokens.Blockquote;
      return t.text
        .replace(/\n+$/, '')
        .split('\n')
        .map((l): RenderedLine => ({ text: '  │ ' + l, style: 'blockquote' }));
    }
    case 'hr':
      return [{ text: '─'.repeat(Math.max(1, Math.min(width, 62))), style: 'hr' }];
    case 'table':
      return renderAsciiTable(token as Tokens.Table);
    case 'space':
    case 'def':
      return [];
    default:
      if ('text' in token && typeof token.text === 'string' && token.text.trim()) {
        return token.text
          .replace(/\n+$/, '')
          .split('\n')
          .map((text: string): RenderedLine => ({ text, style: 'prose' }));
      }
      return [];
  }
}

function renderCode(code: string, language: string | undefined, width: number): RenderedLine[] {
  const langLabel = language ? ` ${language} ` : ' ';
  const borderWidth = Math.max(10, Math.min(width - 4, 70));
  const topBorder = `┌─${langLabel}${'─'.repeat(Math.max(0, borderWidth - langLabel.length - 3))}┐`;
  const bottomBorder = `└${'─'.repeat(Math.max(0, borderWidth - 1))}┘`;

  const highlighted = highlightLines(code, language);
  const body: RenderedLine[] = highlighted
    ? highlighted.map((text): RenderedLine => ({ text, style: 'code', highlighted: true }))
    : code.split('\n').map((text): RenderedLine => ({ text: expandTabs(text), style: 'code' }));

  return [{ text: topBorder, style: 'code-border' }, ...body, { text: bottomBorder, style: 'code-border' }];
}

// ─── ASCII List Renderer ─────────────────────────────────────────────────────
//
// Ordered lists use "1." style; unordered use "•".  Nested sub-lists are
// indented two spaces per level.

function renderAsciiList(t: Tokens.List): string[] {
  const lines: string[] = [];

  const renderItem = (item: Tokens.ListItem, index: number, list: Tokens.List, depth: number) => {
    const indent = '  '.repeat(depth);
    const start = typeof list.start === 'number' ? list.start : 1;
    const bullet = item.task ? (item.checked ? '[x]' : '[ ]') : list.ordered ? `${start + index}.` : '•';
    const text = extractListItemText(item);
    if (text) lines.push(`${indent}${bullet} ${text}`);

    for (const sub of item.tokens) {
      if (sub.type === 'list') {
        const subList = sub as Tokens.List;
        subList.items.forEach((subItem, i) => renderItem(subItem, i, subList, depth + 1));
      }
    }
  };

  t.items.forEach((item, i) => renderItem(item, i, t, 0));
  return lines;
}

function extractListItemText(item: Tokens.ListItem): string {
  let text = '';
  for (const token of item.tokens) {
    if (token.type === 'text') text += (token as Tokens.Text).text;
    else if (token.type === 'paragraph') text += (token as Tokens.Paragraph).text;
  }
  return stripInline(text);
}

// ─── ASCII Table Renderer ────────────────────────────────────────────────────
//
//   " Col1       │ Col2      "   ← header
//   "────────────┼───────────"   ← separator
//   " val1       │ val2      "   ← data rows

function renderAsciiTable(t: Tokens.Table): RenderedLine[] {
  const headers = t.header.map((cell) => stripInline(cell.text));
  const rows = t.rows.map((row) => row.map((cell) => stripInline(cell.text)));

  const colWidths = headers.map((h, i) => {
    let max = h.length;
    for (const row of rows) {
      const cell = row[i] ?? '';
      if (cell.length > max) max = cell.length;
    }
    return max;
  });

  const renderRow = (cells: string[]): string =>
    ' ' + colWidths.map((w, i) => (cells[i] ?? '').padEnd(w)).join(' │ ') + ' ';

  return [
    { text: renderRow(headers), style: 'table-header' },
    { text: colWidths.map((w) => '─'.repeat(w + 2)).join('┼'), style: 'table-separator' },
    ...rows.map((row): RenderedLine => ({ text: renderRow(row), style: 'table' })),
  ];
}

// ─── Source line accounting ─────────────────────────────────────────────────

function countNewlines(raw: string): number {
  let n = 0;
  for (const ch of raw) if (ch === '\n') n++;
  return n;
}

/** Number of source lines a token covers, ignoring trailing newlines. */
function lineSpan(raw: string): number {
  return raw.replace(/\n+$/, '').split('\n').length;
}
