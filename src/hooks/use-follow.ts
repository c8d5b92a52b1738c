// ─── Follow Mode Hook ───────────────────────────────────────────────────────

import { useEffect } from 'react';
import type { Follower } from '../follow.js';
import { logger as rootLogger } from '../logger.js';

const logger = rootLogger.child({ module: 'use-follow' });

/**
 * Run `follower` for as long as the component is mounted.  Changes reach
 * the view through the BlockIndex it updates.
 */
export function useFollow(follower: Follower | null): void {
  useEffect(() => {
    if (!follower) return;
    follower.run().catch((err: unknown) => {
      logger.error({ err }, 'Follow loop failed');
    });
    return () => follower.stop();
  }, [follower]);
}
