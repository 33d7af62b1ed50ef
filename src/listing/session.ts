import { FoldSession } from '../fold/session-state.js';
import { ThreadFolder } from '../fold/thread-folder.js';
import type { Listing } from '../schema/index.js';
import { createMarkCommand, MarkSet } from './marks.js';
import { renderListing, type RenderedListing } from './renderer.js';

export interface ListingSessionOptions {
  foldUnread: boolean;
  defaultFolded: boolean;
  notify: (message: string) => void;
  /** Message ids marked before folds are first applied. */
  marked?: string[];
}

/**
 * One listing on screen together with its marks and fold state. Reloading
 * swaps in a new rendering and re-applies folds to it.
 */
export class ListingSession {
  readonly marks = new MarkSet();
  readonly folder: ThreadFolder;
  /** Toggles the mark on a line; refused (undefined) inside a fold. */
  readonly toggleMark: (position: number) => boolean | null | undefined;
  private current: RenderedListing;

  constructor(listing: Listing, options: ListingSessionOptions) {
    for (const id of options.marked ?? []) this.marks.mark(id);
    this.current = renderListing(listing);
    this.folder = new ThreadFolder({
      lines: this.current,
      isMarked: this.marks.isMarked,
      foldUnread: options.foldUnread,
      session: new FoldSession(options.defaultFolded),
    });
    this.toggleMark = this.folder.guardMark(
      createMarkCommand(() => this.current, this.marks),
      options.notify
    );
    this.folder.applyAll();
  }

  get listing(): RenderedListing {
    return this.current;
  }

  reload(listing: Listing): void {
    this.current = renderListing(listing);
    this.folder.setLines(this.current);
  }
}
