// ─── Errors ─────────────────────────────────────────────────────────────────

/** Base for failures reported to the user before the UI starts. */
export class FolioError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The input file (or stdin) could not be read. */
export class InputError extends FolioError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`cannot read ${path === '-' ? 'stdin' : path}`, options);
  }
}

/** Parsing produced nothing to show. */
export class NoBlocksError extends FolioError {
  constructor(readonly source: string) {
    super(`no blocks found in ${source}`);
  }
}

/** A short description of any thrown value, for user-facing messages. */
export function describeError(err: unknown): string {
  if (err instanceof FolioError && err.cause instanceof Error) {
    return `${err.message}: ${err.cause.message}`;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}
