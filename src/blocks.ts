// ─── Block Construction ─────────────────────────────────────────────────────

import type { Block, ContentType, Page, SourceKind, TurnPart } from './types.js';

export interface BlockInit {
  name: string;
  content: string;
  pages?: readonly Page[];
  contentType?: ContentType;
  pageContentTypes?: readonly ContentType[];
  pageMeta?: readonly string[];
  sourceKind?: SourceKind;
  originLine?: number;
  parts?: readonly TurnPart[];
}

/**
 * The single way blocks are built.  Guarantees at least one page, derives
 * `pageCount`, and drops per-page arrays whose length disagrees with the
 * page list.
 */
export function createBlock(init: BlockInit): Block {
  const pages: readonly Page[] =
    init.pages && init.pages.length > 0 ? init.pages : [{ kind: 'lines', text: '' }];

  const block: Block = {
    name: init.name,
    content: init.content,
    pages,
    pageCount: pages.length,
    contentType: init.contentType ?? 'plain',
    sourceKind: init.sourceKind ?? 'other',
    originLine: init.originLine ?? 0,
    ...(init.pageContentTypes?.length === pages.length && {
      pageContentTypes: init.pageContentTypes,
    }),
    ...(init.pageMeta?.length === pages.length && { pageMeta: init.pageMeta }),
    ...(init.parts && { parts: init.parts }),
  };
  return block;
}

/** Effective content type of one page. */
export function pageContentType(block: Block, pageIndex: number): ContentType {
  return block.pageContentTypes?.[pageIndex] ?? block.contentType;
}

/** Per-page label, or `''` when the block carries none. */
export function pageLabel(block: Block, pageIndex: number): string {
  return block.pageMeta?.[pageIndex] ?? '';
}

/** Cut a display name to `max` characters plus an ellipsis. */
export function truncateName(name: string, max: number): string {
  return name.length > max ? name.slice(0, max) + '...' : name;
}
