import { computeFoldRange, formatFoldSummary, type MarkQuery } from './fold-range.js';
import { guardMarkOperation, type PositionalOperation } from './mark-guard.js';
import { FoldRegionStore } from './region-store.js';
import { MemoryRegionSurface, type RegionSurface } from './region-surface.js';
import {
  findNextThreadStart,
  findPrevThreadStart,
  findThreadEnd,
  findThreadStart,
  threadStarts,
} from './sequence-cursor.js';
import { FoldSession } from './session-state.js';
import type { FoldRegion, LineSource } from './types.js';

export interface ThreadFolderOptions {
  lines: LineSource;
  isMarked: MarkQuery;
  /** Allow unread messages to be hidden. Defaults to false. */
  foldUnread?: boolean;
  session?: FoldSession;
  surface?: RegionSurface;
}

export interface FoldOptions {
  /** Record the choice as an individual override. Defaults to true. */
  persist?: boolean;
}

interface ThreadBounds {
  start: number;
  end: number;
  rootId: string | null;
}

export class ThreadFolder {
  readonly session: FoldSession;
  readonly regions: FoldRegionStore;
  private readonly foldUnread: boolean;
  private lines: LineSource;
  private readonly isMarked: MarkQuery;

  constructor(options: ThreadFolderOptions) {
    this.lines = options.lines;
    this.isMarked = options.isMarked;
    this.foldUnread = options.foldUnread ?? false;
    this.session = options.session ?? new FoldSession();
    this.regions = new FoldRegionStore(options.surface ?? new MemoryRegionSurface());
  }

  get lineCount(): number {
    return this.lines.length;
  }

  // --- Navigation ---

  threadRoot(position: number): number {
    return findThreadStart(this.lines, position);
  }

  nextThread(position: number): number | null {
    return findNextThreadStart(this.lines, position);
  }

  previousThread(position: number): number | null {
    return findPrevThreadStart(this.lines, position);
  }

  // --- Single thread ---

  isFolded(position: number): FoldRegion | null {
    const { start, end } = this.bounds(position);
    return this.regions.isFolded(start, end);
  }

  fold(position: number, options: FoldOptions = {}): void {
    const { start, end, rootId } = this.bounds(position);
    if (this.regions.isFolded(start, end)) return;

    const range = computeFoldRange({
      lines: this.lines,
      threadStart: start,
      threadEnd: end,
      foldUnread: this.foldUnread,
      isMarked: this.isMarked,
    });
    if (range) {
      this.regions.create(start, range, formatFoldSummary(range));
    }
    if ((options.persist ?? true) && rootId !== null) {
      this.session.saveState(rootId, 'folded');
    }
  }

  unfold(position: number, options: FoldOptions = {}): void {
    const { start, end, rootId } = this.bounds(position);
    if (start >= this.lines.length - 1) return;

    const region = this.regions.isFolded(start, end);
    if (!region) return;
    this.regions.remove(region);
    if ((options.persist ?? true) && rootId !== null) {
      this.session.saveState(rootId, 'unfolded');
    }
  }

  toggle(position: number): void {
    if (this.isFolded(position)) {
      this.unfold(position);
    } else {
      this.fold(position);
    }
  }

  /** Toggles the thread at `position` and returns where the cursor should go next. */
  toggleAndAdvance(position: number): number {
    this.toggle(position);
    return this.nextThread(position) ?? this.threadRoot(position);
  }

  // --- Whole listing ---

  foldAll(): void {
    this.session.resetOverrides();
    this.session.globalDefault = true;
    this.foldEveryThread();
  }

  unfoldAll(): void {
    this.session.resetOverrides();
    this.session.globalDefault = false;
    this.regions.removeAll();
  }

  toggleAll(): void {
    if (this.session.globalDefault) {
      this.unfoldAll();
    } else {
      this.foldAll();
    }
  }

  /**
   * Re-applies the global default to every thread, then puts back the
   * threads the user folded or unfolded individually.
   */
  applyAll(): void {
    if (this.session.globalDefault) {
      this.foldEveryThread();
    } else {
      this.regions.removeAll();
    }

    if (this.session.overrides().size === 0) return;
    for (const start of threadStarts(this.lines)) {
      const rootId = this.lines.messageAt(start)?.id;
      if (rootId === undefined) continue;
      const state = this.session.lookupState(rootId);
      if (state === 'folded') this.fold(start, { persist: false });
      if (state === 'unfolded') this.unfold(start, { persist: false });
    }
  }

  /** Switches to a freshly rendered listing and re-applies the fold state to it. */
  setLines(lines: LineSource): void {
    this.regions.removeAll();
    this.lines = lines;
    this.applyAll();
  }

  guardMark<A extends unknown[], R>(
    delegate: PositionalOperation<A, R>,
    notify: (message: string) => void
  ): PositionalOperation<A, R | undefined> {
    return guardMarkOperation(this.regions, delegate, notify);
  }

  private foldEveryThread(): void {
    for (const start of threadStarts(this.lines)) {
      this.fold(start, { persist: false });
    }
  }

  private bounds(position: number): ThreadBounds {
    const start = findThreadStart(this.lines, position);
    return {
      start,
      end: findThreadEnd(this.lines, start),
      rootId: this.lines.messageAt(start)?.id ?? null,
    };
  }
}
