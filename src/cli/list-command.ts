/**
 * threadfold list - Print a listing with its threads folded
 *
 * Folds follow the default view, then per-thread --fold/--unfold overrides.
 */

import { readListingFile } from '../listing/listing-file.js';
import { formatDisplayLine, formatSummaryLine } from '../listing/line-format.js';
import { ListingSession } from '../listing/session.js';
import { buildVisibleRows } from '../tui/layout.js';
import { LIST_FLAGS, parseListingOptions } from './listing-options.js';
import { CliUsageError } from './errors.js';
import { yellowText } from './terminal.js';

export interface ThreadOverrides {
  fold: string[];
  unfold: string[];
}

export function handleListCommand(args: string[]): void {
  const options = parseListingOptions(args, LIST_FLAGS);
  const { repeated } = options.flags;
  const overrides: ThreadOverrides = {
    fold: repeated.get('--fold') ?? [],
    unfold: repeated.get('--unfold') ?? [],
  };
  const marked = repeated.get('--mark') ?? [];

  const session = new ListingSession(readListingFile(options.listingPath), {
    foldUnread: options.foldUnread,
    defaultFolded: options.defaultFolded,
    marked,
    notify: (message) => console.error(yellowText(message)),
  });
  applyThreadOverrides(session, overrides);

  for (const line of renderFoldedListing(session)) {
    console.log(line);
  }
}

export function applyThreadOverrides(session: ListingSession, overrides: ThreadOverrides): void {
  const locate = (id: string): number => {
    const position = session.listing.positionOf(id);
    if (position === null) {
      throw new CliUsageError(`No message with id '${id}' in the listing.`);
    }
    return position;
  };

  for (const id of overrides.fold) session.folder.fold(locate(id));
  for (const id of overrides.unfold) session.folder.unfold(locate(id));
}

export function renderFoldedListing(session: ListingSession): string[] {
  const { listing, folder, marks } = session;
  const rows = buildVisibleRows(listing.length, folder.regions.regions());

  return rows.map((row) => {
    if (row.kind === 'summary') return formatSummaryLine(row.region);
    const line = listing.lines[row.position];
    if (!line) return '';
    const marked = line.kind === 'message' && marks.isMarked(line.message.id);
    return formatDisplayLine(line, { marked, folded: row.rootStyle !== null });
  });
}

export function printListHelp(): void {
  console.log(`Usage: threadfold list [listing.json] [options]

Print the listing with threads folded according to the default view.

Options:
  --folded                   Fold every thread
  --unfolded                 Expand every thread
  --fold-unread              Allow unread messages to be hidden
  --fold <id>                Fold the thread containing message <id> (repeatable)
  --unfold <id>              Expand the thread containing message <id> (repeatable)
  --mark <id>                Mark message <id> before folding (repeatable)
  --config, -c <path>        Path to config file
  -h, --help                 Show help

Examples:
  threadfold list inbox.json --folded
  threadfold list inbox.json --folded --unfold m-12
`);
}
