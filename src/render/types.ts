// ─── Rendered Line Types ────────────────────────────────────────────────────

export type LineStyle =
  | 'heading'
  | 'prose'
  | 'code'
  | 'code-border'
  | 'list'
  | 'blockquote'
  | 'hr'
  | 'blank'
  | 'table-header'
  | 'table-separator'
  | 'table'
  | 'diff-file'
  | 'hunk-header'
  | 'added'
  | 'removed'
  | 'context'
  | 'meta'
  | 'user'
  | 'assistant'
  | 'tool'
  | 'question';

/**
 * One terminal row of a rendered page.  Styling is left to the view; a
 * line only says what it is.
 */
export interface RenderedLine {
  text: string;
  style: LineStyle;
  /** Source line number for the gutter, when known and requested */
  lineNumber?: number;
  /** Heading depth, for `heading` lines */
  depth?: number;
  /** true when text already contains ANSI escape codes from cli-highlight */
  highlighted?: boolean;
}
