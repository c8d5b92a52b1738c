// ─── Main Application Component ─────────────────────────────────────────────
//
// Layout and keyboard routing for the block viewer: block list on the left,
// the current page on the right, status bar (or prompt) at the bottom.

import React, { useState, useEffect, useMemo } from 'react';
import { Box, Text, useInput, useApp, useStdout } from 'ink';

import { SIDEBAR_MIN_WIDTH, SIDEBAR_MAX_FRACTION } from './types.js';
import type { BlockIndex } from './block-index.js';
import type { Follower } from './follow.js';
import { parseCommand } from './navigator.js';
import { renderPage, pageHeader } from './render/page.js';
import { useNavigator } from './hooks/use-navigator.js';
import { useFollow } from './hooks/use-follow.js';

import { BlockList } from './components/block-list.js';
import { PageViewer } from './components/page-viewer.js';
import { StatusBar } from './components/status-bar.js';
import { HelpOverlay } from './components/help-overlay.js';

// ─── Props ──────────────────────────────────────────────────────────────────

export interface AppProps {
  index: BlockIndex;
  /** Keeps the index in step with the file; null when not following */
  follower?: Follower | null;
  /** Shown on the empty screen */
  fileName: string;
  initialShowLineNumbers?: boolean;
}

type Prompt = { label: 'jump' | ':'; text: string };

// ─── Component ──────────────────────────────────────────────────────────────

export const App: React.FC<AppProps> = ({
  index,
  follower = null,
  fileName,
  initialShowLineNumbers = false,
}) => {
  const { exit } = useApp();
  const { stdout } = useStdout();

  // ── Terminal dimensions ────────────────────────────────────
  const [termWidth, setTermWidth] = useState(stdout.columns || 120);
  const [termHeight, setTermHeight] = useState(stdout.rows || 40);

  useEffect(() => {
    const handleResize = () => {
      setTermWidth(stdout.columns);
      setTermHeight(stdout.rows);
    };
    stdout.on('resize', handleResize);
    return () => {
      stdout.off('resize', handleResize);
    };
  }, [stdout]);

  // ── View state ─────────────────────────────────────────────
  const [showHelp, setShowHelp] = useState(false);
  const [showSidebar, setShowSidebar] = useState(true);
  const [showLineNumbers, setShowLineNumbers] = useState(initialShowLineNumbers);
  const [prompt, setPrompt] = useState<Prompt | null>(null);
  const [scrollOffset, setScrollOffset] = useState(0);

  const [nav, controls] = useNavigator(index, { follow: follower !== null });
  useFollow(follower);

  // New block or page: back to the top
  useEffect(() => {
    setScrollOffset(0);
  }, [nav.position, nav.page]);

  // ── Layout calculations ────────────────────────────────────
  const sidebarWidth = useMemo(() => {
    if (!showSidebar) return 0;
    const maxW = Math.floor(termWidth * SIDEBAR_MAX_FRACTION);
    return Math.max(SIDEBAR_MIN_WIDTH, Math.min(maxW, 40));
  }, [showSidebar, termWidth]);

  const mainWidth = Math.max(20, termWidth - sidebarWidth);
  const mainHeight = Math.max(3, termHeight - 1);
  const viewportHeight = Math.max(1, mainHeight - 2);

  // ── Current page ───────────────────────────────────────────
  const { block, page } = nav;

  const lines = useMemo(
    () => (block ? renderPage(block, page, { width: Math.max(10, mainWidth - 4), showLineNumbers }) : []),
    [block, page, mainWidth, showLineNumbers],
  );

  const header = useMemo(
    () => (block ? pageHeader(block, page) : { title: '', indicator: '[0/0]' }),
    [block, page],
  );

  const maxScroll = Math.max(0, lines.length - viewportHeight);
  const scrollBy = (delta: number) => setScrollOffset((o) => Math.max(0, Math.min(o + delta, maxScroll)));

  // ── Prompt submission ──────────────────────────────────────
  const submit = (current: Prompt) => {
    const text = current.text.trim();
    if (!text) return;

    if (current.label === 'jump') {
      controls.jump(text);
      return;
    }

    const command = parseCommand(text);
    const result = controls.run(text);
    if (result.quit) exit();
    else if (command?.action === 'help') setShowHelp(true);
  };

  // ── Keyboard input handler ─────────────────────────────────
  useInput((input, key) => {
    // ── Prompt captures everything while open ────────────────
    if (prompt) {
      if (key.escape) {
        setPrompt(null);
      } else if (key.return) {
        setPrompt(null);
        submit(prompt);
      } else if (key.backspace || key.delete) {
        setPrompt({ ...prompt, text: prompt.text.slice(0, -1) });
      } else if (input && !key.ctrl && !key.meta) {
        setPrompt({ ...prompt, text: prompt.text + input });
      }
      return;
    }

    // ── Help overlay takes priority ──────────────────────────
    if (showHelp) {
      if (input === '?' || input === 'q' || key.escape) setShowHelp(false);
      return;
    }

    if (input === 'q' || (key.ctrl && input === 'c')) {
      exit();
      return;
    }
    if (input === '?') {
      setShowHelp(true);
      return;
    }

    // ── View toggles ─────────────────────────────────────────
    if (input === 's') {
      setShowSidebar((v) => !v);
      return;
    }
    if (input === '#') {
      setShowLineNumbers((v) => !v);
      return;
    }

    // ── Prompts ──────────────────────────────────────────────
    if (input === '/') {
      setPrompt({ label: 'jump', text: '' });
      return;
    }
    if (input === ':') {
      setPrompt({ label: ':', text: '' });
      return;
    }

    // ── Blocks ───────────────────────────────────────────────
    if (key.rightArrow || input === 'j') {
      controls.nextBlock();
      return;
    }
    if (key.leftArrow || input === 'k') {
      controls.prevBlock();
      return;
    }
    if (input === 'g') {
      controls.firstBlock();
      return;
    }
    if (input === 'G') {
      controls.lastBlock();
      return;
    }
    if (input === 'b') {
      controls.back();
      return;
    }

    // ── Pages ────────────────────────────────────────────────
    if (input === 'n') {
      controls.nextPage();
      return;
    }
    if (input === ' ') {
      if (!controls.nextPage()) controls.nextBlock();
      return;
    }
    if (input === 'p') {
      controls.prevPage();
      return;
    }

    // ── Scrolling ────────────────────────────────────────────
    if (key.downArrow) {
      scrollBy(1);
      return;
    }
    if (key.upArrow) {
      scrollBy(-1);
      return;
    }
    if (key.pageDown || input === 'd') {
      scrollBy(Math.floor(viewportHeight / 2));
      return;
    }
    if (key.pageUp || input === 'u') {
      scrollBy(-Math.floor(viewportHeight / 2));
    }
  });

  // ── Render ─────────────────────────────────────────────────

  if (showHelp) {
    return (
      <Box width={termWidth} height={termHeight} alignItems="center" justifyContent="center">
        <HelpOverlay width={termWidth} height={termHeight} />
      </Box>
    );
  }

  if (!block) {
    return (
      <Box flexDirection="column" width={termWidth} height={termHeight} alignItems="center" justifyContent="center">
        <Text bold color="yellow">{`folio · ${fileName}`}</Text>
        <Text dimColor>{follower ? 'Waiting for content…' : 'Nothing to show.'}</Text>
        <Text dimColor>Press q to quit, ? for help.</Text>
      </Box>
    );
  }

  return (
    <Box flexDirection="column" width={termWidth} height={termHeight}>
      <Box flexDirection="row" height={mainHeight}>
        {sidebarWidth > 0 && (
          <BlockList blocks={index.blocks} position={nav.position} width={sidebarWidth} height={mainHeight} />
        )}
        <PageViewer
          header={header}
          lines={lines}
          scrollOffset={Math.min(scrollOffset, maxScroll)}
          width={mainWidth}
          height={mainHeight}
        />
      </Box>

      <StatusBar
        position={nav.position}
        totalBlocks={nav.totalBlocks}
        pageIndicator={header.indicator}
        message={nav.message}
        prompt={prompt}
        following={follower !== null}
        showLineNumbers={showLineNumbers}
        width={termWidth}
      />
    </Box>
  );
};
