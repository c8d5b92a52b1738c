// ─── Block Index ────────────────────────────────────────────────────────────
//
// Ordered arena of blocks.  A block's position is its handle: follow mode
// only appends or patches in place, so handles stay valid for the life of
// the index.

import type { Block } from './types.js';

export type ChangeListener = (handle: number) => void;

export class BlockIndex {
  private items: Block[] = [];
  /** Lowercased name → first position carrying it */
  private byName = new Map<string, number>();
  private listeners = new Set<ChangeListener>();

  constructor(blocks: readonly Block[] = []) {
    this.rebuild(blocks);
  }

  get size(): number {
    return this.items.length;
  }

  get blocks(): readonly Block[] {
    return this.items;
  }

  /**
   * Exact name (case-insensitive) first, then the first block whose name
   * contains the query, then the first whose name holds the query's
   * characters in order (`into` finds `Introduction`).
   */
  find(query: string): Block | null {
    const q = query.trim().toLowerCase();
    if (!q) return null;
    const exact = this.byName.get(q);
    if (exact !== undefined) return this.items[exact] ?? null;
    return (
      this.items.find((b) => b.name.toLowerCase().includes(q)) ??
      this.items.find((b) => isSubsequence(q, b.name.toLowerCase())) ??
      null
    );
  }

  next(name: string): Block | null {
    const pos = this.positionOf(name);
    return pos === -1 ? null : this.byPosition(pos + 1);
  }

  prev(name: string): Block | null {
    const pos = this.positionOf(name);
    return pos === -1 ? null : this.byPosition(pos - 1);
  }

  byPosition(position: number): Block | null {
    if (!Number.isInteger(position) || position < 0) return null;
    return this.items[position] ?? null;
  }

  /** Indexed position of `name`, or -1. */
  positionOf(name: string): number {
    return this.byName.get(name.toLowerCase()) ?? -1;
  }

  names(): string[] {
    return this.items.map((b) => b.name);
  }

  // ─── Mutation ───────────────────────────────────────────────────────────

  /** Add a block at the end and return its handle. */
  append(block: Block): number {
    const handle = this.items.length;
    this.items.push(block);
    this.register(block.name, handle);
    this.emit(handle);
    return handle;
  }

  /** Replace the block at `handle` in place. */
  patch(handle: number, block: Block): void {
    if (handle < 0 || handle >= this.items.length) {
      throw new RangeError(`no block at handle ${handle} (size ${this.items.length})`);
    }
    this.items[handle] = block;
    this.register(block.name, handle);
    this.emit(handle);
  }

  /** Swap in a whole new block list. */
  replaceAll(blocks: readonly Block[]): void {
    this.rebuild(blocks);
    this.emit(0);
  }

  /** Returns an unsubscribe function. */
  onChange(listener: ChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private rebuild(blocks: readonly Block[]): void {
    this.items = [...blocks];
    this.byName = new Map();
    this.items.forEach((b, i) => this.register(b.name, i));
  }

  private register(name: string, position: number): void {
    const key = name.toLowerCase();
    if (!this.byName.has(key)) this.byName.set(key, position);
  }

  private emit(handle: number): void {
    for (const listener of this.listeners) listener(handle);
  }
}

function isSubsequence(needle: string, haystack: string): boolean {
  let i = 0;
  for (const ch of haystack) {
    if (ch === needle[i]) i++;
    if (i === needle.length) return true;
  }
  return false;
}
