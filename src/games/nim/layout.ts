/**
 * Text layout helpers for frame rendering
 *
 * All widths are printable widths: ANSI escape sequences are ignored.
 */

import { ANSI_RESET } from '../../themes';

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1b\[[0-9;?]*[A-Za-z]/g;

/**
 * Wrap text in an SGR style and reset afterwards. An empty style or an
 * empty text is returned as is.
 */
export function paint(style: string, text: string): string {
  return style && text ? `${style}${text}${ANSI_RESET}` : text;
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/**
 * Printable width of the widest line
 */
export function visibleWidth(text: string): number {
  let widest = 0;
  for (const line of text.split('\n')) {
    widest = Math.max(widest, [...stripAnsi(line)].length);
  }
  return widest;
}

/**
 * Left padding that centers content of the given width. Never negative.
 */
export function centerPad(width: number, contentWidth: number): number {
  return Math.max(0, Math.floor((width - contentWidth) / 2));
}

/**
 * Prefix every line with `amount` spaces
 */
export function indent(text: string, amount: number): string {
  const pad = ' '.repeat(Math.max(0, amount));
  return text
    .split('\n')
    .map(line => pad + line)
    .join('\n');
}

/**
 * Indent a block so that its widest line is centered in `width`
 */
export function center(text: string, width: number): string {
  return indent(text, centerPad(width, visibleWidth(text)));
}

/**
 * Greedy word wrap on spaces. Words longer than the limit get a line of
 * their own; a limit below 1 leaves the text on one line.
 */
export function wordWrap(text: string, limit: number): string[] {
  const words = text.split(/\s+/).filter(word => word.length > 0);
  if (limit < 1) return [words.join(' ')];

  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if (line === '') {
      line = word;
    } else if (line.length + 1 + word.length <= limit) {
      line += ' ' + word;
    } else {
      lines.push(line);
      line = word;
    }
  }
  if (line !== '') lines.push(line);
  return lines;
}

export function countNewlines(text: string): number {
  let count = 0;
  for (const ch of text) {
    if (ch === '\n') count++;
  }
  return count;
}
