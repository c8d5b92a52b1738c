// ─── Environment Configuration ──────────────────────────────────────────────

import { z } from 'zod';
import { LINES_PER_PAGE } from './types.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const schema = z.object({
  FOLIO_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  /** Log destination; logs are discarded when unset, the TUI owns the terminal */
  FOLIO_LOG_FILE: z.string().nonempty().optional(),
  FOLIO_POLL_MS: z.coerce.number().int().min(50).default(500),
  FOLIO_PAGE_LINES: z.coerce.number().int().min(1).default(LINES_PER_PAGE),
});

export type Config = z.infer<typeof schema>;

export type ConfigResult =
  | { ok: true; config: Config }
  | { ok: false; problems: string[] };

/** Validate an environment without side effects. */
export function parseConfig(source: NodeJS.ProcessEnv): ConfigResult {
  const result = schema.safeParse(source);
  if (result.success) return { ok: true, config: result.data };
  return {
    ok: false,
    problems: result.error.issues.map((i) => `  ✖ ${i.path.join('.')}: ${i.message}`),
  };
}

let cached: Config | undefined;

/** Process configuration, validated once.  Invalid settings end the process. */
export function getConfig(): Config {
  if (!cached) {
    const result = parseConfig(process.env);
    if (!result.ok) {
      console.error('Invalid environment variables:\n' + result.problems.join('\n'));
      process.exit(1);
    }
    cached = result.config;
  }
  return cached;
}
