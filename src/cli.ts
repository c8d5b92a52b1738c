// ─── Argument Parsing ───────────────────────────────────────────────────────
//
// Lightweight hand-rolled parser; the option set is small and fixed.

import { isFileType, type FileType } from './parsers/index.js';

export interface CliArgs {
  /** Input path; null (or `-`) reads stdin */
  filePath: string | null;
  /** Forced format, from `folio <type> <file>` */
  type: FileType | null;
  follow: boolean;
  lineNumbers: boolean;
  /** Skip the transcript filter screen */
  all: boolean;
  showHelp: boolean;
  showVersion: boolean;
  /** Options that were not recognised, in order */
  unknown: string[];
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    filePath: null,
    type: null,
    follow: false,
    lineNumbers: false,
    all: false,
    showHelp: false,
    showVersion: false,
    unknown: [],
  };
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      args.showHelp = true;
    } else if (arg === '--version' || arg === '-v') {
      args.showVersion = true;
    } else if (arg === '-n' || arg === '--line-numbers') {
      args.lineNumbers = true;
    } else if (arg === '--all') {
      args.all = true;
    } else if (arg === '-f' || arg === '--follow') {
      args.follow = true;
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        args.filePath = next;
        i++;
      }
    } else if (arg === '-' || !arg.startsWith('-')) {
      positional.push(arg);
    } else {
      args.unknown.push(arg);
    }
  }

  const [first, second] = positional;
  if (first !== undefined && second !== undefined && isFileType(first)) {
    args.type = first;
    args.filePath ??= second;
  } else if (first !== undefined) {
    args.filePath ??= first;
  }

  return args;
}
