// ─── Navigation ─────────────────────────────────────────────────────────────

import type { Block } from './types.js';
import type { BlockIndex } from './block-index.js';

export type Action = 'jump' | 'next' | 'prev' | 'list' | 'help' | 'quit' | 'exit';

export interface Command {
  action: string;
  /** Block query, for `jump` */
  arg: string;
}

export interface CommandResult {
  message: string;
  /** The block moved to, if the cursor moved */
  block: Block | null;
  quit: boolean;
}

const SHORTHAND: Record<string, Action> = {
  j: 'next',
  k: 'prev',
  l: 'list',
  i: 'jump',
  h: 'help',
  q: 'quit',
};

const ACTIONS: ReadonlySet<string> = new Set<Action>(['jump', 'next', 'prev', 'list', 'help', 'quit', 'exit']);

const MAX_HISTORY = 10;
const MAX_SUGGESTIONS = 3;

export const HELP_TEXT = `Commands (single-letter preferred):
  j              - next block
  k              - prev block
  l              - list all blocks
  i <name>       - jump to block (fuzzy match)
  h              - show help
  q              - quit

  next           - go to next block
  prev           - go to previous block
  list           - show all available blocks
  jump <name>    - jump to a block
  help           - show this help
  quit / exit    - exit program`;

/** `null` for blank input.  Unknown words pass through for `execute` to reject. */
export function parseCommand(input: string): Command | null {
  const words = input.trim().split(/\s+/).filter(Boolean);
  const first = words[0];
  if (first === undefined) return null;

  const word = first.toLowerCase();
  const action = SHORTHAND[word] ?? word;
  return { action, arg: action === 'jump' ? words.slice(1).join(' ') : '' };
}

export function formatBlockList(names: readonly string[]): string {
  return names.length === 0 ? 'No blocks found.' : `Available blocks: ${names.join(' | ')}`;
}

export function formatNotFound(query: string, names: readonly string[]): string {
  const q = query.toLowerCase();
  const matches = names.filter((n) => n.toLowerCase().includes(q)).slice(0, MAX_SUGGESTIONS);
  const msg = `Block '${query}' not found.`;
  return matches.length > 0 ? `${msg}\nDid you mean: ${matches.join(', ')}?` : msg;
}

/**
 * Cursor over a `BlockIndex`: a block position, a page within that block
 * and a short history of previous positions.
 */
export class Navigator {
  private pos = 0;
  private pageIndex = 0;
  private history: number[] = [];

  constructor(private readonly index: BlockIndex) {}

  get position(): number {
    return this.pos;
  }

  get page(): number {
    return this.pageIndex;
  }

  get total(): number {
    return this.index.size;
  }

  get current(): Block | null {
    return this.index.byPosition(this.pos);
  }

  execute(command: Command | null): CommandResult {
    if (!command) return reply("Invalid command. Type 'help' for available commands.");
    if (!ACTIONS.has(command.action)) {
      return reply(`Unknown command: ${command.action}. Type 'help' for available commands.`);
    }

    switch (command.action) {
      case 'jump':
        return this.jump(command.arg);
      case 'next':
        return this.pos + 1 >= this.index.size
          ? reply('Already at the last block.')
          : { message: '', block: this.moveTo(this.pos + 1), quit: false };
      case 'prev':
        return this.pos <= 0
          ? reply('Already at the first block.')
          : { message: '', block: this.moveTo(this.pos - 1), quit: false };
      case 'list':
        return reply(formatBlockList(this.index.names()));
      case 'help':
        return reply(HELP_TEXT);
      default:
        return { message: 'Goodbye!', block: null, quit: true };
    }
  }

  /** Move to a position directly (sidebar, first/last keys). */
  goTo(position: number): Block | null {
    if (position === this.pos || !this.index.byPosition(position)) return null;
    return this.moveTo(position);
  }

  nextPage(): boolean {
    const block = this.current;
    if (!block || this.pageIndex + 1 >= block.pageCount) return false;
    this.pageIndex++;
    return true;
  }

  prevPage(): boolean {
    if (this.pageIndex <= 0) return false;
    this.pageIndex--;
    return true;
  }

  /** Return to the most recent position in history. */
  back(): Block | null {
    const previous = this.history.pop();
    if (previous === undefined) return null;
    this.pos = Math.min(previous, Math.max(0, this.index.size - 1));
    this.pageIndex = 0;
    return this.current;
  }

  /** Last page of the last block, where follow mode keeps the reader. */
  jumpToLast(): void {
    if (this.index.size === 0) return;
    this.pos = this.index.size - 1;
    this.pageIndex = Math.max(0, (this.current?.pageCount ?? 1) - 1);
  }

  private jump(query: string): CommandResult {
    if (!query) return reply('Usage: jump <block-name> (jump to a named block)');

    const block = this.index.find(query);
    if (!block) return reply(formatNotFound(query, this.index.names()));

    const target = this.index.positionOf(block.name);
    return { message: '', block: target === -1 ? block : this.moveTo(target), quit: false };
  }

  private moveTo(position: number): Block | null {
    this.history.push(this.pos);
    if (this.history.length > MAX_HISTORY) this.history.shift();
    this.pos = position;
    this.pageIndex = 0;
    return this.current;
  }
}

function reply(message: string): CommandResult {
  return { message, block: null, quit: false };
}
