// ─── Markdown → Blocks ──────────────────────────────────────────────────────
//
// Two modes over the same line-oriented view of a document:
//
//   parse()            one block per `#`/`##` heading, for block navigation
//   parseContinuous()  one block whose pages fit the terminal, each page
//                      labelled with the h1/h2 breadcrumb active at its top
//
// Only top-level and second-level headings cut or label anything; `###`
// and deeper are body text.

import type { Block, Parser } from '../types.js';
import {
  LINES_PER_PAGE,
  MIN_CONTINUOUS_PAGE,
  MAX_CONTINUOUS_PAGE,
  CONTINUOUS_RESERVED_ROWS,
} from '../types.js';
import { createBlock } from '../blocks.js';
import { classify } from '../content-type.js';
import { hunkPages, linePages } from '../pages.js';

type Heading = { level: 1 | 2; text: string };

function headingOf(line: string): Heading | null {
  // "## x" never starts with "# ", and "### x" never starts with "## "
  if (line.startsWith('# ')) return { level: 1, text: line.slice(2).trim() };
  if (line.startsWith('## ')) return { level: 2, text: line.slice(3).trim() };
  return null;
}

export class MarkdownParser implements Parser {
  constructor(private readonly pageSize: number = LINES_PER_PAGE) {}

  detect(filePath: string): boolean {
    const lower = filePath.toLowerCase();
    return lower.endsWith('.md') || lower.endsWith('.markdown');
  }

  /**
   * Cut at every h1/h2.  Text before the first heading is not part of any
   * block, so a document without headings yields no blocks.
   */
  parse(content: string): Block[] {
    const blocks: Block[] = [];
    let open: { name: string; line: number; body: string[] } | null = null;

    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';
      const heading = headingOf(line);
      if (heading) {
        if (open) blocks.push(this.sectionBlock(open.name, open.body, open.line));
        open = { name: heading.text, line: i + 1, body: [] };
      } else if (open) {
        open.body.push(line);
      }
    }

    if (open) blocks.push(this.sectionBlock(open.name, open.body, open.line));
    return blocks;
  }

  /**
   * The whole document as one block, paged to fit `terminalHeight` rows.
   */
  parseContinuous(content: string, terminalHeight: number): Block[] {
    const pageSize = Math.min(
      MAX_CONTINUOUS_PAGE,
      Math.max(MIN_CONTINUOUS_PAGE, terminalHeight - CONTINUOUS_RESERVED_ROWS),
    );

    const lines = trimTrailingBlank(content.split('\n'));
    if (lines.length === 0) {
      return [createBlock({ name: 'Document', content: '', sourceKind: 'markdown' })];
    }

    // Active (h1, h2) at every line; a new h1 clears h2.
    const trail: Array<{ h1: string; h2: string }> = [];
    let h1 = '';
    let h2 = '';
    for (const line of lines) {
      const heading = headingOf(line);
      if (heading?.level === 1) {
        h1 = heading.text;
        h2 = '';
      } else if (heading?.level === 2) {
        h2 = heading.text;
      }
      trail.push({ h1, h2 });
    }

    const pages = linePages(lines, pageSize);
    const breadcrumbs = pages.map((_, i) => breadcrumb(trail[i * pageSize]));

    return [
      createBlock({
        name: breadcrumbs[0] ?? 'Document',
        content,
        pages,
        contentType: 'plain',
        pageMeta: breadcrumbs,
        sourceKind: 'markdown',
        originLine: 1,
      }),
    ];
  }

  private sectionBlock(name: string, body: string[], line: number): Block {
    const lines = trimTrailingBlank(body);
    const content = lines.join('\n');
    const contentType = classify(content);

    return createBlock({
      name,
      content,
      pages: contentType === 'diff' ? hunkPages(content) : linePages(lines, this.pageSize),
      contentType,
      sourceKind: 'markdown',
      originLine: line,
    });
  }
}

function breadcrumb(state: { h1: string; h2: string } | undefined): string {
  if (!state) return 'Document';
  if (state.h1 && state.h2) return `${state.h1} > ${state.h2}`;
  return state.h1 || state.h2 || 'Document';
}

function trimTrailingBlank(lines: string[]): string[] {
  let end = lines.length;
  while (end > 0 && lines[end - 1] === '') end--;
  return lines.slice(0, end);
}
