import terminalKit from 'terminal-kit';
import { isThreadRoot } from '../fold/sequence-cursor.js';
import { FOLDED_ROOT_STYLE, type RootStyle } from '../fold/types.js';
import { readListingFile } from '../listing/listing-file.js';
import { formatDisplayLine, formatSummaryLine } from '../listing/line-format.js';
import type { Listing } from '../schema/index.js';
import {
  formatAutoReloadLabel,
  hasListingChanged,
  readMtime,
  shouldShowAutoReloadIndicator,
  type AutoReloadIndicator,
} from './auto-reload.js';
import { KEY_HINTS, resolveKeyAction } from './key-bindings.js';
import { getListHeight, HEADER_HEIGHT, type VisibleRow } from './layout.js';
import { ListingView } from './listing-view.js';
import { getStickyThreadLabel } from './sticky-header.js';

type Term = typeof terminalKit.terminal;

const RELOAD_POLL_MS = 1000;

const ROOT_STYLE_PAINTERS: Record<RootStyle, (term: Term, text: string) => void> = {
  [FOLDED_ROOT_STYLE]: (term, text) => {
    term.bold(text);
  },
};

interface TuiOptions {
  listing: Listing;
  listingPath: string;
  foldUnread: boolean;
  defaultFolded: boolean;
  colorsDisabled: boolean;
}

interface TuiState {
  view: ListingView;
  listingPath: string;
  listingMtime: number | null;
  autoReload: AutoReloadIndicator | null;
  colorsDisabled: boolean;
}

function fitWidth(text: string, width: number): string {
  const shown = terminalKit.stringWidth(text) <= width ? text : terminalKit.truncateString(text, width);
  return shown + ' '.repeat(Math.max(0, width - terminalKit.stringWidth(shown)));
}

function rowText(state: TuiState, row: VisibleRow): string {
  if (row.kind === 'summary') return formatSummaryLine(row.region);
  const { listing, marks } = state.view.session;
  const line = listing.lines[row.position];
  if (!line) return '';
  const marked = line.kind === 'message' && marks.isMarked(line.message.id);
  return formatDisplayLine(line, { marked, folded: row.rootStyle !== null });
}

function stickyLabel(state: TuiState): string | null {
  const { listing } = state.view.session;
  const rows = state.view.rows.map((row) => {
    if (row.kind === 'line' && isThreadRoot(listing, row.position)) {
      return { kind: 'root' as const, label: listing.messageAt(row.position)?.subject ?? '' };
    }
    return { kind: 'reply' as const };
  });
  // Only worth showing once the root itself has scrolled away.
  const topRow = rows[state.view.scroll];
  if (!topRow || topRow.kind === 'root') return null;
  return getStickyThreadLabel(rows, state.view.scroll);
}

function render(state: TuiState, term: Term): void {
  const width = term.width;
  const listHeight = getListHeight(term.height);
  const { view } = state;
  const { listing, folder } = view.session;
  const plain = state.colorsDisabled;

  term.hideCursor();
  term.clear();

  const first = listing.lines[0];
  const header = first?.kind === 'header' ? first.text : 'Listing';
  const mode = folder.session.globalDefault ? 'folded' : 'expanded';
  term.moveTo(1, 1);
  (plain ? term : term.bold)(fitWidth(`threadfold – ${header} [${mode}]`, width));

  term.moveTo(1, 2);
  const sticky = stickyLabel(state);
  (plain ? term : term.dim)(fitWidth(sticky ? `↳ ${sticky}` : '', width));

  const selected = view.selectedRow;
  for (let i = 0; i < listHeight; i++) {
    const rowIndex = view.scroll + i;
    const row = view.rows[rowIndex];
    term.moveTo(1, HEADER_HEIGHT + 1 + i);
    term.eraseLineAfter();
    if (!row) continue;

    const text = fitWidth(rowText(state, row), width);
    if (rowIndex === selected) {
      term.inverse(text);
    } else if (plain) {
      term(text);
    } else if (row.kind === 'summary') {
      term.dim(text);
    } else if (row.rootStyle !== null) {
      ROOT_STYLE_PAINTERS[row.rootStyle](term, text);
    } else {
      term(text);
    }
  }

  const footerTop = HEADER_HEIGHT + listHeight + 1;
  term.moveTo(1, footerTop);
  term.eraseLineAfter();
  if (view.message) {
    (plain ? term : term.yellow)(fitWidth(view.message, width));
  } else if (shouldShowAutoReloadIndicator(state.autoReload, Date.now())) {
    (plain ? term : term.green)(fitWidth(formatAutoReloadLabel(state.autoReload.file), width));
  }

  term.moveTo(1, footerTop + 1);
  term.eraseLineAfter();
  (plain ? term : term.dim)(fitWidth(KEY_HINTS, width));
}

function reloadIfChanged(state: TuiState): boolean {
  const mtime = readMtime(state.listingPath);
  if (!hasListingChanged(state.listingMtime, mtime)) return false;
  state.listingMtime = mtime;
  try {
    state.view.reload(readListingFile(state.listingPath));
    state.autoReload = { lastAtMs: Date.now(), file: state.listingPath };
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    state.view.message = `Error: ${msg}`;
  }
  return true;
}

export async function runInteractiveTui(options: TuiOptions): Promise<void> {
  const term: Term = terminalKit.terminal;

  const state: TuiState = {
    view: new ListingView(options.listing, {
      foldUnread: options.foldUnread,
      defaultFolded: options.defaultFolded,
    }),
    listingPath: options.listingPath,
    listingMtime: readMtime(options.listingPath),
    autoReload: null,
    colorsDisabled: options.colorsDisabled,
  };

  let resolveExit: (() => void) | null = null;
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const onKey = (name: string): void => {
    const action = resolveKeyAction(name);
    if (!action) return;
    const keepOpen = state.view.handle(action, getListHeight(term.height));
    if (!keepOpen) {
      resolveExit?.();
      return;
    }
    render(state, term);
  };

  const onResize = (): void => {
    state.view.scrollIntoView(getListHeight(term.height));
    render(state, term);
  };

  const reloadTimer = setInterval(() => {
    if (reloadIfChanged(state)) {
      state.view.scrollIntoView(getListHeight(term.height));
      render(state, term);
    }
  }, RELOAD_POLL_MS);

  term.fullscreen(true);
  term.grabInput(true);
  process.stdout.on('resize', onResize);
  term.on('key', onKey);

  try {
    render(state, term);
    await exitPromise;
  } finally {
    clearInterval(reloadTimer);
    term.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    term.grabInput(false);
    term.fullscreen(false);
    term.hideCursor(false);
    term.styleReset();
    term.clear();
  }
}
