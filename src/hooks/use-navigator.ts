// ─── Navigation Hook ────────────────────────────────────────────────────────
//
// Bridges the mutable Navigator to React: every control mutates the cursor
// and bumps a version counter so the view re-renders.  Index changes (follow
// mode) re-render too, optionally pinning the cursor to the newest block.

import { useState, useCallback, useMemo, useEffect } from 'react';
import type { Block } from '../types.js';
import type { BlockIndex } from '../block-index.js';
import { Navigator, parseCommand, type CommandResult } from '../navigator.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface NavigatorState {
  /** Current block, or null while the index is empty */
  block: Block | null;
  /** Position of the current block */
  position: number;
  /** Page within the current block (0-based) */
  page: number;
  totalBlocks: number;
  /** Latest command feedback; empty for none */
  message: string;
  /** Bumped on every index change */
  version: number;
}

export interface NavigatorControls {
  /** Run a typed command line (`next`, `i intro`, ...) */
  run: (input: string) => CommandResult;
  jump: (query: string) => CommandResult;
  nextBlock: () => void;
  prevBlock: () => void;
  firstBlock: () => void;
  lastBlock: () => void;
  /** Returns whether the page changed */
  nextPage: () => boolean;
  prevPage: () => boolean;
  back: () => void;
  clearMessage: () => void;
}

// ─── Hook ───────────────────────────────────────────────────────────────────

export function useNavigator(
  index: BlockIndex,
  options: { follow?: boolean } = {},
): [NavigatorState, NavigatorControls] {
  const { follow = false } = options;
  const navigator = useMemo(() => new Navigator(index), [index]);
  const [version, setVersion] = useState(0);
  const [message, setMessage] = useState('');

  const refresh = useCallback(() => setVersion((v) => v + 1), []);

  useEffect(() => {
    if (follow) navigator.jumpToLast();
    return index.onChange(() => {
      if (follow) navigator.jumpToLast();
      refresh();
    });
  }, [index, navigator, follow, refresh]);

  // ── Commands ────────────────────────────────────────────

  const run = useCallback(
    (input: string): CommandResult => {
      const result = navigator.execute(parseCommand(input));
      setMessage(result.message);
      refresh();
      return result;
    },
    [navigator, refresh],
  );

  const jump = useCallback((query: string) => run(`jump ${query}`), [run]);
  const nextBlock = useCallback(() => void run('next'), [run]);
  const prevBlock = useCallback(() => void run('prev'), [run]);

  const firstBlock = useCallback(() => {
    navigator.goTo(0);
    setMessage('');
    refresh();
  }, [navigator, refresh]);

  const lastBlock = useCallback(() => {
    navigator.goTo(index.size - 1);
    setMessage('');
    refresh();
  }, [navigator, index, refresh]);

  // ── Paging ──────────────────────────────────────────────

  const nextPage = useCallback((): boolean => {
    const changed = navigator.nextPage();
    if (changed) refresh();
    return changed;
  }, [navigator, refresh]);

  const prevPage = useCallback((): boolean => {
    const changed = navigator.prevPage();
    if (changed) refresh();
    return changed;
  }, [navigator, refresh]);

  const back = useCallback(() => {
    setMessage(navigator.back() ? '' : 'No earlier position.');
    refresh();
  }, [navigator, refresh]);

  const clearMessage = useCallback(() => setMessage(''), []);

  // ── Return ──────────────────────────────────────────────

  const state: NavigatorState = {
    block: navigator.current,
    position: navigator.position,
    page: navigator.page,
    totalBlocks: navigator.total,
    message,
    version,
  };

  const controls: NavigatorControls = {
    run,
    jump,
    nextBlock,
    prevBlock,
    firstBlock,
    lastBlock,
    nextPage,
    prevPage,
    back,
    clearMessage,
  };

  return [state, controls];
}
