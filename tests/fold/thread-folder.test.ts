import { describe, expect, it } from 'vitest';
import { ThreadFolder } from '../../src/fold/index.js';
import { buildVisibleRows } from '../../src/tui/layout.js';
import { makeLines, markedIn } from '../helpers/lines.js';

// 0 header | 1-4 thread m1 | 5-7 thread m5 | 8 thread m8 (root only) | 9-13 thread m9 (first reply unread) incl. footer
const TOKENS = ['-', 'R', 'c', 'c', 'c', 'R', 'c', 'c', 'R', 'R', 'cu', 'c', 'c', '-'];

function createFolder(options: { foldUnread?: boolean; marked?: string[] } = {}): ThreadFolder {
  return new ThreadFolder({
    lines: makeLines(TOKENS),
    isMarked: markedIn(options.marked ?? []),
    foldUnread: options.foldUnread,
  });
}

function foldedRoots(folder: ThreadFolder): number[] {
  return folder.regions.regions().map((r) => r.root);
}

describe('ThreadFolder.fold', () => {
  it('hides the replies of the thread and records the choice', () => {
    const folder = createFolder();
    folder.fold(3);

    const region = folder.isFolded(1);
    expect(region).toMatchObject({ root: 1, foldBeg: 2, foldEnd: 5, summary: '3 hidden messages' });
    expect(folder.session.lookupState('m1')).toBe('folded');
  });

  it('is idempotent', () => {
    const folder = createFolder();
    folder.fold(1);
    const first = folder.isFolded(1);
    folder.fold(1);
    expect(folder.regions.regions()).toHaveLength(1);
    expect(folder.isFolded(1)).toBe(first);
  });

  it('does not record the choice when persist is off', () => {
    const folder = createFolder();
    folder.fold(5, { persist: false });
    expect(folder.isFolded(5)).not.toBe(null);
    expect(folder.session.lookupState('m5')).toBe(null);
  });

  it('creates no region for a root-only thread', () => {
    const folder = createFolder();
    folder.fold(8);
    expect(folder.isFolded(8)).toBe(null);
    expect(folder.regions.regions()).toEqual([]);
  });

  it('keeps unread replies visible unless unread folding is on', () => {
    const folder = createFolder();
    folder.fold(9);
    expect(folder.isFolded(9)).toBe(null);

    const unreadFolder = createFolder({ foldUnread: true });
    unreadFolder.fold(9);
    expect(unreadFolder.isFolded(9)).toMatchObject({
      foldBeg: 10,
      foldEnd: 13,
      summary: '3 hidden messages, 1 unread',
    });
  });

  it('stops the fold at a marked reply', () => {
    const folder = createFolder({ marked: ['m4'] });
    folder.fold(1);
    expect(folder.isFolded(1)).toMatchObject({ foldBeg: 2, foldEnd: 4, hiddenCount: 2 });
  });
});

describe('ThreadFolder.unfold', () => {
  it('removes the region and records the choice', () => {
    const folder = createFolder();
    folder.fold(1);
    folder.unfold(4);
    expect(folder.isFolded(1)).toBe(null);
    expect(folder.session.lookupState('m1')).toBe('unfolded');
  });

  it('does nothing for a thread that is not folded', () => {
    const folder = createFolder();
    folder.unfold(1);
    folder.unfold(1);
    expect(folder.session.lookupState('m1')).toBe(null);
  });

  it('restores the visible line count', () => {
    const folder = createFolder();
    const before = buildVisibleRows(folder.lineCount, folder.regions.regions()).length;
    expect(before).toBe(14);

    folder.fold(1);
    expect(buildVisibleRows(folder.lineCount, folder.regions.regions())).toHaveLength(12);

    folder.unfold(1);
    expect(buildVisibleRows(folder.lineCount, folder.regions.regions())).toHaveLength(before);
    expect(folder.regions.regions()).toEqual([]);
  });
});

describe('ThreadFolder.toggle', () => {
  it('returns to the original state after two toggles', () => {
    const folder = createFolder();
    folder.toggle(2);
    expect(folder.isFolded(2)).not.toBe(null);
    folder.toggle(2);
    expect(folder.isFolded(2)).toBe(null);

    folder.fold(5);
    folder.toggle(6);
    folder.toggle(6);
    expect(folder.isFolded(5)).not.toBe(null);
  });

  it('advances to the next thread', () => {
    const folder = createFolder();
    expect(folder.toggleAndAdvance(2)).toBe(5);
    expect(folder.isFolded(1)).not.toBe(null);
  });

  it('stays on the last thread when there is no next one', () => {
    const folder = createFolder();
    expect(folder.toggleAndAdvance(11)).toBe(9);
  });
});

describe('ThreadFolder global operations', () => {
  it('foldAll folds every foldable thread and clears overrides', () => {
    const folder = createFolder();
    folder.unfold(1);
    folder.fold(1);
    folder.foldAll();

    expect(foldedRoots(folder)).toEqual([1, 5]);
    expect(folder.session.globalDefault).toBe(true);
    expect(folder.session.overrides().size).toBe(0);
  });

  it('unfoldAll removes every region and clears overrides', () => {
    const folder = createFolder();
    folder.fold(1);
    folder.fold(5);
    folder.unfoldAll();

    expect(folder.regions.regions()).toEqual([]);
    expect(folder.session.globalDefault).toBe(false);
    expect(folder.session.overrides().size).toBe(0);
  });

  it('toggleAll flips the global default', () => {
    const folder = createFolder();
    folder.toggleAll();
    expect(foldedRoots(folder)).toEqual([1, 5]);
    folder.toggleAll();
    expect(folder.regions.regions()).toEqual([]);
  });
});

describe('ThreadFolder.applyAll', () => {
  it('keeps individually unfolded threads open over a folded default', () => {
    const folder = createFolder();
    folder.foldAll();
    folder.session.saveState('m5', 'unfolded');

    folder.applyAll();

    expect(folder.isFolded(5)).toBe(null);
    expect(folder.isFolded(1)).not.toBe(null);
  });

  it('folds individually folded threads over an unfolded default, including the last one', () => {
    const folder = createFolder({ foldUnread: true });
    folder.session.saveState('m9', 'folded');

    folder.applyAll();

    expect(foldedRoots(folder)).toEqual([9]);
  });

  it('uses only the global default after a global toggle', () => {
    const folder = createFolder();
    folder.fold(1);
    folder.unfoldAll();
    folder.applyAll();
    expect(folder.regions.regions()).toEqual([]);

    folder.unfold(5);
    folder.fold(5);
    folder.unfold(5);
    folder.foldAll();
    folder.applyAll();
    expect(foldedRoots(folder)).toEqual([1, 5]);
  });
});

describe('ThreadFolder.setLines', () => {
  it('drops old regions and re-applies overrides by root id', () => {
    const folder = createFolder();
    folder.fold(1);

    // Thread m1 moved below thread m5 in the new listing.
    folder.setLines(makeLines(['-', 'R#m5', 'c', 'c', 'R#m1', 'c', 'c', 'c', '-']));

    expect(foldedRoots(folder)).toEqual([4]);
    expect(folder.isFolded(4)).toMatchObject({ foldBeg: 5, foldEnd: 8 });
  });
});

describe('ThreadFolder navigation', () => {
  it('moves between thread roots', () => {
    const folder = createFolder();
    expect(folder.threadRoot(7)).toBe(5);
    expect(folder.nextThread(7)).toBe(8);
    expect(folder.previousThread(7)).toBe(1);
  });

  it('returns null past the first and last threads', () => {
    const folder = createFolder();
    expect(folder.previousThread(0)).toBe(null);
    expect(folder.nextThread(12)).toBe(null);
  });
});
