import type { FoldRange, LineSource } from './types.js';

export type MarkQuery = (messageId: string) => boolean;

export interface FoldRangeInput {
  lines: LineSource;
  threadStart: number;
  /** Exclusive end of the thread. */
  threadEnd: number;
  foldUnread: boolean;
  isMarked: MarkQuery;
}

/**
 * Decides which descendant lines of a thread get hidden. The scan stops at
 * the first marked message, at the first unread one unless `foldUnread` is
 * set, and at any line without a message.
 */
export function computeFoldRange(input: FoldRangeInput): FoldRange | null {
  const { lines, threadStart, threadEnd, foldUnread, isMarked } = input;
  if (threadEnd - threadStart <= 1) return null;

  const foldBeg = threadStart + 1;
  let foldEnd = foldBeg;
  let unreadCount = 0;

  while (foldEnd < threadEnd) {
    const message = lines.messageAt(foldEnd);
    if (!message) break;
    // Marked wins over unread when a message is both.
    if (isMarked(message.id)) break;
    if (message.flags.has('unread')) {
      unreadCount += 1;
      if (!foldUnread) break;
    }
    foldEnd += 1;
  }

  return {
    foldBeg,
    foldEnd,
    hiddenCount: foldEnd - foldBeg,
    unreadCount: foldUnread ? unreadCount : 0,
  };
}

export function formatFoldSummary(range: Pick<FoldRange, 'hiddenCount' | 'unreadCount'>): string {
  const noun = range.hiddenCount === 1 ? 'message' : 'messages';
  const unread = range.unreadCount > 0 ? `, ${range.unreadCount} unread` : '';
  return `${range.hiddenCount} hidden ${noun}${unread}`;
}
