// ─── Tool Result Summaries ──────────────────────────────────────────────────
//
// Condenses a transcript's `toolUseResult` record into one display line,
// e.g. "Bash: 3 files changed" or "Glob: **/*.ts (12 files)".

import { z } from 'zod';

export interface ToolOutput {
  toolName: string;
  /** Command or pattern, when the result records one */
  command: string;
  stdout: string;
  stderr: string;
  filePath: string;
  fileCount: number;
  fileList: string[];
}

const MAX_PREVIEW = 60;
const ANSI_ESCAPE = /\x1b\[[0-9;]*[a-zA-Z]/g;

const resultSchema = z
  .object({
    stdout: z.string().optional().catch(undefined),
    stderr: z.string().optional().catch(undefined),
    file: z
      .object({
        filePath: z.string().catch(''),
        content: z.string().catch(''),
      })
      .optional()
      .catch(undefined),
    filenames: z.array(z.unknown()).optional().catch(undefined),
    numFiles: z.number().optional().catch(undefined),
    filePath: z.string().optional().catch(undefined),
    pattern: z.string().optional().catch(undefined),
    command: z.string().optional().catch(undefined),
  })
  .passthrough();

function emptyOutput(toolName: string): ToolOutput {
  return { toolName, command: '', stdout: '', stderr: '', filePath: '', fileCount: 0, fileList: [] };
}

/**
 * Map a raw `toolUseResult` object onto a `ToolOutput`.  Edits that carry a
 * structured patch and todo updates are shown elsewhere (or not at all),
 * so they map to `null`.
 */
export function toolOutputFromResult(toolUseResult: unknown): ToolOutput | null {
  const parsed = resultSchema.safeParse(toolUseResult);
  if (!parsed.success) return null;
  const result = parsed.data;

  if ('structuredPatch' in result || 'newTodos' in result) return null;

  if (result.stdout !== undefined) {
    return { ...emptyOutput('Bash'), stdout: result.stdout, stderr: result.stderr ?? '' };
  }

  if (result.file) {
    return { ...emptyOutput('Read'), filePath: result.file.filePath, stdout: result.file.content };
  }

  if (result.filenames) {
    const fileList = result.filenames.filter((f): f is string => typeof f === 'string');
    return {
      ...emptyOutput('Glob'),
      command: result.pattern ?? '',
      fileList,
      fileCount: result.numFiles ?? result.filenames.length,
    };
  }

  if (result.filePath !== undefined) {
    return { ...emptyOutput('Edit'), filePath: result.filePath };
  }

  return null;
}

/** Fallback for tool results that carry no `toolUseResult`: their raw text. */
export function toolOutputFromText(content: string): ToolOutput {
  return { ...emptyOutput('Tool'), command: firstLine(stripAnsi(content)) };
}

export function formatToolSummary(output: ToolOutput): string {
  if (!output.toolName) return '';

  switch (output.toolName) {
    case 'Bash': {
      const preview = firstLine(stripAnsi(output.stdout));
      return `Bash: ${preview || '(no output)'}`;
    }
    case 'Read':
      return output.filePath ? `Read: ${output.filePath}` : 'Read:';
    case 'Glob':
    case 'Grep': {
      let line = output.command ? `${output.toolName}: ${output.command}` : `${output.toolName}:`;
      if (output.fileCount > 0) line += ` (${output.fileCount} files)`;
      return line;
    }
    default: {
      const detail = output.command || output.filePath;
      return detail ? `${output.toolName}: ${detail}` : `${output.toolName}:`;
    }
  }
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_ESCAPE, '');
}

function firstLine(text: string): string {
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line) return line.length > MAX_PREVIEW ? line.slice(0, MAX_PREVIEW) + '...' : line;
  }
  return '';
}
