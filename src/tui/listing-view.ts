import type { Listing } from '../schema/index.js';
import { ListingSession } from '../listing/session.js';
import type { KeyAction } from './key-bindings.js';
import { buildVisibleRows, findRowForPosition, rowPosition, type VisibleRow } from './layout.js';

export interface ListingViewOptions {
  foldUnread: boolean;
  defaultFolded: boolean;
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(Math.max(n, min), max);
}

/**
 * Screen state of the interactive listing: the session, the rows currently
 * visible, and a cursor kept as a line position so it survives folding.
 */
export class ListingView {
  readonly session: ListingSession;
  rows: VisibleRow[] = [];
  cursor = 0;
  scroll = 0;
  message: string | null = null;

  constructor(listing: Listing, options: ListingViewOptions) {
    this.session = new ListingSession(listing, {
      ...options,
      notify: (message) => {
        this.message = message;
      },
    });
    this.cursor = this.session.listing.length > 2 ? 1 : 0;
    this.recompute();
  }

  get selectedRow(): number {
    return findRowForPosition(this.rows, this.cursor);
  }

  recompute(): void {
    this.rows = buildVisibleRows(this.session.listing.length, this.session.folder.regions.regions());
    const row = this.rows[findRowForPosition(this.rows, this.cursor)];
    this.cursor = row ? rowPosition(row) : 0;
  }

  reload(listing: Listing): void {
    this.session.reload(listing);
    this.cursor = clamp(this.cursor, 0, Math.max(0, this.session.listing.length - 1));
    this.recompute();
  }

  scrollIntoView(listHeight: number): void {
    const row = this.selectedRow;
    if (row < this.scroll) {
      this.scroll = row;
    } else if (row >= this.scroll + listHeight) {
      this.scroll = Math.max(0, row - listHeight + 1);
    }
  }

  /** Applies one key action. Returns false when the view should close. */
  handle(action: KeyAction, listHeight: number): boolean {
    const { folder } = this.session;
    this.message = null;

    switch (action) {
      case 'quit':
        return false;
      case 'up':
        this.moveRows(-1);
        break;
      case 'down':
        this.moveRows(1);
        break;
      case 'pageUp':
        this.moveRows(-listHeight);
        break;
      case 'pageDown':
        this.moveRows(listHeight);
        break;
      case 'top':
        this.moveRows(-this.rows.length);
        break;
      case 'bottom':
        this.moveRows(this.rows.length);
        break;
      case 'nextThread': {
        const next = folder.nextThread(this.cursor);
        if (next === null) this.message = 'No next thread';
        else this.cursor = next;
        break;
      }
      case 'previousThread': {
        const prev = folder.previousThread(this.cursor);
        // The header line counts as a thread start but holds no message.
        if (prev === null || !this.session.listing.messageAt(prev)) this.message = 'No previous thread';
        else this.cursor = prev;
        break;
      }
      case 'threadRoot':
        this.cursor = folder.threadRoot(this.cursor);
        break;
      case 'toggle':
        folder.toggle(this.cursor);
        this.cursor = folder.threadRoot(this.cursor);
        break;
      case 'toggleAndAdvance':
        this.cursor = folder.toggleAndAdvance(this.cursor);
        break;
      case 'fold':
        folder.fold(this.cursor);
        this.cursor = folder.threadRoot(this.cursor);
        break;
      case 'unfold':
        folder.unfold(this.cursor);
        this.cursor = folder.threadRoot(this.cursor);
        break;
      case 'toggleAll':
        folder.toggleAll();
        this.message = folder.session.globalDefault ? 'All threads folded' : 'All threads expanded';
        break;
      case 'foldAll':
        folder.foldAll();
        this.message = 'All threads folded';
        break;
      case 'unfoldAll':
        folder.unfoldAll();
        this.message = 'All threads expanded';
        break;
      case 'applyAll':
        folder.applyAll();
        this.message = 'Folds re-applied';
        break;
      case 'mark':
        this.markAtCursor();
        break;
      case 'toggleUnread':
        this.toggleUnreadAtCursor();
        break;
    }

    this.recompute();
    this.scrollIntoView(listHeight);
    return true;
  }

  private moveRows(delta: number): void {
    if (this.rows.length === 0) return;
    const next = clamp(this.selectedRow + delta, 0, this.rows.length - 1);
    const row = this.rows[next];
    if (row) this.cursor = rowPosition(row);
  }

  private markAtCursor(): void {
    const result = this.session.toggleMark(this.cursor);
    // undefined: refused by the fold guard, which already set the message.
    if (result === undefined) return;
    if (result === null) {
      this.message = 'No message on this line';
      return;
    }
    const id = this.session.listing.messageAt(this.cursor)?.id ?? '';
    this.message = result ? `Marked ${id}` : `Unmarked ${id}`;
  }

  private toggleUnreadAtCursor(): void {
    if (this.session.folder.regions.regionAt(this.cursor)) {
      this.message = 'Unfold the thread first';
      return;
    }
    const message = this.session.listing.messageAt(this.cursor);
    if (!message) {
      this.message = 'No message on this line';
      return;
    }
    if (message.flags.has('unread')) {
      message.flags.delete('unread');
      this.message = `Read ${message.id}`;
    } else {
      message.flags.add('unread');
      this.message = `Unread ${message.id}`;
    }
  }
}
