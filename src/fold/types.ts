export type ThreadRole = 'root' | 'child' | 'orphanFirstChild' | 'other';

export type MessageFlag = 'unread' | 'flagged' | 'replied' | 'draft' | 'trashed' | 'attach' | (string & {});

export interface Message {
  id: string;
  position: number;
  flags: ReadonlySet<MessageFlag>;
  threadRole: ThreadRole;
}

/**
 * Read accessor over the rendered listing. Lines that carry no message
 * (headers, footers, blank separators) return null.
 */
export interface LineSource {
  readonly length: number;
  messageAt(position: number): Message | null;
}

export type FoldState = 'folded' | 'unfolded';

export interface FoldRange {
  foldBeg: number;
  foldEnd: number;
  hiddenCount: number;
  unreadCount: number;
}

export const FOLD_REGION_KIND = 'thread-fold';
export const FOLDED_ROOT_STYLE = 'folded-root';

/** Style a renderer applies to the root line of a folded thread. */
export type RootStyle = typeof FOLDED_ROOT_STYLE;

export interface FoldRegion extends FoldRange {
  kind: typeof FOLD_REGION_KIND;
  root: number;
  summary: string;
  rootStyle: RootStyle;
}
