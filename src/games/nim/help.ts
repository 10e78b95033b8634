/**
 * Key help view, short (one line) or full (two columns)
 */

import { type BindingName, KEY_BINDINGS } from './input';
import { paint } from './layout';
import type { Palette } from '../../themes';

export const SHORT_HELP: readonly BindingName[] = ['help', 'quit'];

export const FULL_HELP: readonly (readonly BindingName[])[] = [
  ['up', 'down', 'left', 'right'],
  ['select', 'submit', 'help', 'quit'],
];

const SHORT_SEPARATOR = ' • ';
const COLUMN_SEPARATOR = '    ';
const ELLIPSIS = '…';

export interface HelpOptions {
  showAll: boolean;
  /** Available width; 0 means unlimited */
  width: number;
}

export function renderShortHelp(width: number, palette: Palette): string {
  let out = '';
  let total = 0;

  for (const [i, name] of SHORT_HELP.entries()) {
    const { key, desc } = KEY_BINDINGS[name].help;
    const sep = i > 0 ? SHORT_SEPARATOR : '';
    const entryWidth = sep.length + key.length + 1 + desc.length;

    if (width > 0 && total + entryWidth > width) {
      const tail = ' ' + ELLIPSIS;
      if (total + tail.length < width) out += paint(palette.dim, tail);
      break;
    }

    total += entryWidth;
    out += paint(palette.dim, sep) + paint(palette.helpKey, key) + ' ' + paint(palette.dim, desc);
  }

  return out;
}

interface Column {
  lines: string[];
  width: number;
}

function buildColumn(names: readonly BindingName[], palette: Palette, padRight: boolean): Column {
  const entries = names.map(name => KEY_BINDINGS[name].help);
  const keyWidth = Math.max(...entries.map(e => e.key.length));
  const descWidth = Math.max(...entries.map(e => e.desc.length));

  const lines = entries.map(({ key, desc }) => {
    const keyPad = ' '.repeat(keyWidth - key.length);
    const descPad = padRight ? ' '.repeat(descWidth - desc.length) : '';
    return paint(palette.helpKey, key) + keyPad + ' ' + paint(palette.dim, desc) + descPad;
  });

  return { lines, width: keyWidth + 1 + descWidth };
}

export function renderFullHelp(width: number, palette: Palette): string {
  const columns: Column[] = [];
  let total = 0;

  for (const [i, names] of FULL_HELP.entries()) {
    const column = buildColumn(names, palette, i < FULL_HELP.length - 1);
    const sepWidth = i > 0 ? COLUMN_SEPARATOR.length : 0;

    if (width > 0 && total + sepWidth + column.width > width) break;
    total += sepWidth + column.width;
    columns.push(column);
  }

  const height = Math.max(0, ...columns.map(c => c.lines.length));
  const rows: string[] = [];
  for (let row = 0; row < height; row++) {
    rows.push(columns.map(c => c.lines[row] ?? ' '.repeat(c.width)).join(COLUMN_SEPARATOR));
  }
  return rows.join('\n');
}

export function renderHelp(options: HelpOptions, palette: Palette): string {
  return options.showAll
    ? renderFullHelp(options.width, palette)
    : renderShortHelp(options.width, palette);
}
