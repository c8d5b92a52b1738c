// ─── Shell Logs / Plain Text → Blocks ───────────────────────────────────────
//
// Two block-start markers are recognised:
//
//   shell                       current format: a bare "shell" line, the
//   [white:#303030] ls -la      command on the next line (style tags removed)
//
//   $ ls -la (12:04:55)         legacy format: "$ " + command + timestamp
//
// Anything before the first marker lands in an "Output" block, so
// non-blank input always produces at least one block.

import type { Block, Parser } from '../types.js';
import { LINES_PER_PAGE, MAX_COMMAND_NAME } from '../types.js';
import { createBlock, truncateName } from '../blocks.js';
import { linePages } from '../pages.js';

const STYLE_TAG = /\[[^\]]*\]/g;

/** Remove `[color:bg]`-style markup and surrounding whitespace. */
export function stripStyleTags(line: string): string {
  return line.replace(STYLE_TAG, '').trim();
}

interface OpenBlock {
  name: string;
  /** 1-based line of the first content line */
  line: number;
  lines: string[];
}

export class TxtParser implements Parser {
  constructor(private readonly pageSize: number = LINES_PER_PAGE) {}

  detect(filePath: string): boolean {
    const lower = filePath.toLowerCase();
    return lower.endsWith('.txt') || lower.endsWith('.log');
  }

  parse(content: string): Block[] {
    const lines = content.split('\n');
    const blocks: Block[] = [];
    let open: OpenBlock | null = null;

    const flush = () => {
      if (open && open.lines.length > 0) blocks.push(this.toBlock(open));
    };

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';

      if (line.trim() === 'shell') {
        flush();
        const commandLine = lines[i + 1];
        const name = truncateName(stripStyleTags(commandLine ?? '') || 'shell', MAX_COMMAND_NAME);
        open = { name, line: i + 2, lines: commandLine === undefined ? [] : [commandLine] };
        // The command line is already consumed
        i++;
      } else if (line.startsWith('$ ')) {
        flush();
        let name = line.slice(2);
        const stamp = name.indexOf(' (');
        if (stamp > 0) name = name.slice(0, stamp);
        open = { name: truncateName(name, MAX_COMMAND_NAME), line: i + 1, lines: [line] };
      } else if (open) {
        open.lines.push(line);
      } else if (line.trim() !== '') {
        open = { name: 'Output', line: i + 1, lines: [line] };
      }
    }
    flush();

    if (blocks.length === 0 && content.trim() !== '') {
      blocks.push(this.toBlock({ name: 'Output', line: 1, lines }));
    }
    return blocks;
  }

  private toBlock(open: OpenBlock): Block {
    return createBlock({
      name: open.name,
      content: open.lines.join('\n'),
      pages: linePages(open.lines, this.pageSize),
      contentType: 'plain',
      sourceKind: 'shell',
      originLine: open.line,
    });
  }
}
