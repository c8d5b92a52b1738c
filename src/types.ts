// ─── Core Block Model ───────────────────────────────────────────────────────

/**
 * Heuristic classification of a chunk of text.  Drives which renderer a
 * page goes through.
 */
export type ContentType = 'plain' | 'diff' | 'table' | 'code' | 'tree' | 'json' | 'yaml';

/**
 * Which format family produced a block.  Presentation only: renderers use
 * it for headers and styling, parsers never branch on it.
 */
export type SourceKind = 'markdown' | 'chat' | 'shell' | 'other';

/**
 * One unit of on-screen display.
 *
 * A `hunk` page carries the whole diff text and names the hunk it shows,
 * because rendering a hunk needs the surrounding diff (file headers, line
 * anchors), not an isolated slice.
 */
export type Page =
  | { kind: 'lines'; text: string }
  | { kind: 'hunk'; diff: string; hunkIndex: number };

/**
 * A named, self-contained navigable unit of content.
 * Construct through `createBlock` so `pageCount` always matches `pages`.
 */
export interface Block {
  /** Display identifier; not unique, lookups resolve to the first match */
  readonly name: string;
  /** Full un-paginated text */
  readonly content: string;
  /** Never empty: an empty block has a single empty page */
  readonly pages: readonly Page[];
  readonly pageCount: number;
  /** Type for pages without an entry in `pageContentTypes` */
  readonly contentType: ContentType;
  /** Per-page override, same length as `pages` when present */
  readonly pageContentTypes?: readonly ContentType[];
  /** Per-page label (diff filename, markdown breadcrumb), same length as `pages` */
  readonly pageMeta?: readonly string[];
  readonly sourceKind: SourceKind;
  /** 1-based source line the block started on; 0 when unknown */
  readonly originLine: number;
  /** Chat blocks keep the parts their content was built from */
  readonly parts?: readonly TurnPart[];
}

// ─── Diffs ──────────────────────────────────────────────────────────────────

export type DiffLineType = 'context' | 'added' | 'removed';

export interface DiffLine {
  type: DiffLineType;
  /** Line text with the `+`/`-`/` ` prefix removed */
  content: string;
}

/**
 * One `@@ ... @@` region of a unified diff.
 */
export interface DiffHunk {
  /** The raw `@@` line */
  header: string;
  lines: DiffLine[];
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
}

// ─── Transcripts ────────────────────────────────────────────────────────────

export type TurnPartType = 'user' | 'diff' | 'assistant' | 'tool_result' | 'question';

export interface TurnPart {
  type: TurnPartType;
  content: string;
  /** For diffs: the edited file's path */
  meta?: string;
}

/**
 * One user message plus everything that followed it up to the next user
 * message, in transcript order.
 */
export interface ConversationTurn {
  parts: TurnPart[];
  originLine: number;
}

/** Transcript categories a reader can switch on or off. */
export type FilterCategory = 'user' | 'assistant' | 'diff' | 'tool_result';

export type TranscriptFilters = Record<FilterCategory, boolean>;

export const DEFAULT_FILTERS: Readonly<TranscriptFilters> = {
  user: true,
  assistant: true,
  diff: true,
  tool_result: false,
};

// ─── Parsers ────────────────────────────────────────────────────────────────

/**
 * The capability every format parser implements.
 */
export interface Parser {
  /** Whether this parser handles files at `filePath` (by extension) */
  detect(filePath: string): boolean;
  /** Turn raw file content into blocks.  Never throws. */
  parse(content: string): Block[];
}

// ─── Rendering ──────────────────────────────────────────────────────────────

/**
 * Everything a renderer needs besides the block itself.  Passed explicitly
 * so a rendered page is a pure function of its inputs.
 */
export interface RenderOptions {
  /** Available width in columns */
  width: number;
  /** Show source line numbers in a gutter */
  showLineNumbers: boolean;
}

// ─── Keybinding Types ───────────────────────────────────────────────────────

export interface KeyBinding {
  key: string;
  description: string;
  category: 'navigation' | 'paging' | 'view';
}

export const KEY_BINDINGS: KeyBinding[] = [
  // Navigation
  { key: '→ / j',       description: 'Next block',                       category: 'navigation' },
  { key: '← / k',       description: 'Previous block',                   category: 'navigation' },
  { key: 'g / G',       description: 'First / last block',               category: 'navigation' },
  { key: '/',           description: 'Jump to block by name',            category: 'navigation' },
  { key: ':',           description: 'Command prompt (next, list, i <name>…)', category: 'navigation' },
  { key: 'b',           description: 'Back to previous position',        category: 'navigation' },

  // Paging
  { key: 'n / Space',   description: 'Next page (Space: then next block)', category: 'paging' },
  { key: 'p',           description: 'Previous page',                    category: 'paging' },
  { key: '↓ / ↑',       description: 'Scroll down / up',                 category: 'paging' },
  { key: 'd / u',       description: 'Scroll half a screen',             category: 'paging' },

  // View
  { key: 's',           description: 'Toggle block list',                category: 'view' },
  { key: '#',           description: 'Toggle line numbers',              category: 'view' },
  { key: '?',           description: 'Toggle help overlay',              category: 'view' },
  { key: 'q / Ctrl+C',  description: 'Quit',                             category: 'view' },
];

// ─── Constants ──────────────────────────────────────────────────────────────

/** Fixed page size for line-paginated blocks */
export const LINES_PER_PAGE = 50;

/** Continuous markdown pages fit the terminal within these bounds */
export const MIN_CONTINUOUS_PAGE = 10;
export const MAX_CONTINUOUS_PAGE = 50;
/** Rows reserved for header and status bar in continuous mode */
export const CONTINUOUS_RESERVED_ROWS = 4;

/** Display names longer than this are cut and suffixed with "..." */
export const MAX_COMMAND_NAME = 40;

/** Minimum sidebar width when visible */
export const SIDEBAR_MIN_WIDTH = 24;
/** Maximum sidebar width (fraction of terminal) */
export const SIDEBAR_MAX_FRACTION = 0.3;
