import type { FoldRegion } from '../fold/types.js';
import type { DisplayLine, ListingMessageLine } from './renderer.js';

const DATE_WIDTH = 10;
const FROM_WIDTH = 16;
export const SUMMARY_INDENT = '    ';

function fit(text: string, width: number): string {
  if (text.length <= width) return text.padEnd(width);
  return `${text.slice(0, width - 1)}…`;
}

export function formatMessageLine(
  message: ListingMessageLine,
  opts: { marked: boolean; folded: boolean }
): string {
  const markCol = opts.marked ? '*' : ' ';
  const unreadCol = message.flags.has('unread') ? 'N' : ' ';
  const foldCol = opts.folded ? '▸' : ' ';
  const date = fit(message.date ?? '', DATE_WIDTH);
  const from = fit(message.from ?? '', FROM_WIDTH);
  const indent = '  '.repeat(message.depth);
  return `${markCol}${unreadCol} ${foldCol} ${date} ${from} ${indent}${message.subject}`;
}

export function formatDisplayLine(line: DisplayLine, opts: { marked: boolean; folded: boolean }): string {
  if (line.kind === 'message') return formatMessageLine(line.message, opts);
  return line.text;
}

export function formatSummaryLine(region: FoldRegion): string {
  return `${SUMMARY_INDENT}[${region.summary}]`;
}
