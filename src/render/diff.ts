// ─── Diff → Rendered Lines ──────────────────────────────────────────────────

import type { RenderedLine } from './types.js';
import { hunkFunctions, hunkStats, parseHunks } from '../hunks.js';

/**
 * One hunk of `diffText`: its header with change counts, the definitions it
 * touches, then its lines.  Line numbers follow the new file for added and
 * context lines and the old file for removed lines.
 */
export function renderHunk(diffText: string, hunkIndex: number, numbered: boolean): RenderedLine[] {
  const hunk = parseHunks(diffText)[hunkIndex];
  if (!hunk) return renderDiffText(diffText);

  const { added, removed } = hunkStats(hunk);
  const out: RenderedLine[] = [{ text: `${hunk.header}  +${added} -${removed}`, style: 'hunk-header' }];

  const touched = hunkFunctions(hunk);
  if (touched.length > 0) out.push({ text: `affects: ${touched.join(', ')}`, style: 'meta' });

  let oldLine = hunk.oldStart;
  let newLine = hunk.newStart;
  const at = (n: number) => (numbered ? { lineNumber: n } : {});

  for (const line of hunk.lines) {
    switch (line.type) {
      case 'added':
        out.push({ text: '+ ' + line.content, style: 'added', ...at(newLine++) });
        break;
      case 'removed':
        out.push({ text: '- ' + line.content, style: 'removed', ...at(oldLine++) });
        break;
      default:
        out.push({ text: '  ' + line.content, style: 'context', ...at(newLine++) });
        oldLine++;
    }
  }
  return out;
}

/** Style every line of raw diff text by its prefix. */
export function renderDiffText(text: string): RenderedLine[] {
  return text
    .replace(/\n+$/, '')
    .split('\n')
    .map((line): RenderedLine => {
      if (line.startsWith('+++') || line.startsWith('---')) return { text: line, style: 'diff-file' };
      if (line.startsWith('@@')) return { text: line, style: 'hunk-header' };
      if (line.startsWith('+')) return { text: line, style: 'added' };
      if (line.startsWith('-')) return { text: line, style: 'removed' };
      return { text: line, style: 'context' };
    });
}
