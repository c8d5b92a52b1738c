// ─── Unified Diff → Block ───────────────────────────────────────────────────
//
// A diff file is always exactly one block with one page per hunk.  Content
// that does not classify as a diff, or a diff whose hunks cannot be found,
// still comes back as a single block.

import type { Block, Parser } from '../types.js';
import { createBlock } from '../blocks.js';
import { classify } from '../content-type.js';
import { diffTargetFile, parseHunks } from '../hunks.js';
import { hunkPages } from '../pages.js';

export class DiffParser implements Parser {
  detect(filePath: string): boolean {
    const lower = filePath.toLowerCase();
    return lower.endsWith('.diff') || lower.endsWith('.patch');
  }

  parse(content: string): Block[] {
    if (classify(content) !== 'diff') {
      return [createBlock({ name: 'diff', content, pages: [{ kind: 'lines', text: content }] })];
    }

    const hunks = parseHunks(content);
    if (hunks.length === 0) {
      return [
        createBlock({
          name: 'diff',
          content,
          pages: [{ kind: 'lines', text: content }],
          contentType: 'diff',
          pageContentTypes: ['diff'],
        }),
      ];
    }

    const pages = hunkPages(content);
    return [
      createBlock({
        name: diffTargetFile(content) || 'diff',
        content,
        pages,
        contentType: 'diff',
        pageContentTypes: pages.map(() => 'diff' as const),
        sourceKind: 'other',
        originLine: 1,
      }),
    ];
  }
}
