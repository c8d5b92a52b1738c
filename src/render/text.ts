// ─── Text Helpers ───────────────────────────────────────────────────────────

const ANSI_RE = /\x1b\[[0-9;]*m/;

export function wordWrap(text: string, maxWidth: number): string[] {
  if (!text || text.trim().length === 0) return [''];
  if (maxWidth <= 0) return [text];

  const lines: string[] = [];
  let currentLine = '';

  for (const word of text.split(/\s+/)) {
    if (!word) continue;

    if (currentLine.length === 0) {
      currentLine = word;
    } else if (currentLine.length + 1 + word.length <= maxWidth) {
      currentLine += ' ' + word;
    } else {
      lines.push(currentLine);
      currentLine = word;
    }
  }

  if (currentLine.length > 0) lines.push(currentLine);
  return lines.length > 0 ? lines : [''];
}

export function truncate(text: string, maxWidth: number): string {
  if (text.length <= maxWidth) return text;
  if (maxWidth <= 3) return text.slice(0, maxWidth);
  return text.slice(0, maxWidth - 1) + '…';
}

/** Truncate an ANSI-escaped string to `maxWidth` visible characters, preserving escape codes. */
export function truncateAnsi(text: string, maxWidth: number): string {
  if (maxWidth <= 0) return '';
  let visible = 0;
  let i = 0;
  let result = '';
  while (i < text.length) {
    if (text[i] === '\x1b' && text[i + 1] === '[') {
      const end = text.indexOf('m', i + 2);
      if (end !== -1) {
        result += text.slice(i, end + 1);
        i = end + 1;
        continue;
      }
    }
    if (visible >= maxWidth) break;
    result += text.charAt(i);
    visible++;
    i++;
  }
  if (ANSI_RE.test(text)) result += '\x1b[0m';
  return result;
}

export function expandTabs(line: string, tabWidth: number = 4): string {
  return line.replace(/\t/g, ' '.repeat(tabWidth));
}

/** Drop `**bold**`, `*em*` and backtick markers, keeping their text. */
export function stripInline(text: string): string {
  return text
    .replace(/\*\*(.+?)\*\*/g, '$1')
    .replace(/\*(.+?)\*/g, '$1')
    .replace(/`(.+?)`/g, '$1')
    .trim();
}
