/**
 * threadfold view - Full-screen interactive listing
 */

import { readListingFile } from '../listing/listing-file.js';
import { runInteractiveTui } from '../tui/interactive.js';
import { parseListingOptions } from './listing-options.js';

export async function handleViewCommand(args: string[]): Promise<void> {
  const options = parseListingOptions(args);
  const listing = readListingFile(options.listingPath);

  await runInteractiveTui({
    listing,
    listingPath: options.listingPath,
    foldUnread: options.foldUnread,
    defaultFolded: options.defaultFolded,
    colorsDisabled: Boolean(options.config.interactive?.colors?.disable),
  });
}

export function printViewHelp(): void {
  console.log(`Usage: threadfold view [listing.json] [options]

Open the listing full-screen. The listing file is watched and re-folded
when it changes on disk.

Keys:
  j/k, ↑/↓        Move
  n / p           Next / previous thread
  r               Go to the thread root
  TAB, f          Fold or unfold the thread
  SPACE           Fold or unfold, then go to the next thread
  z / o           Fold / unfold the thread
  F               Fold or unfold every thread
  Z / O           Fold / unfold every thread
  m               Mark or unmark the message (refused inside a fold)
  u               Toggle unread
  g               Re-apply folds
  q               Quit

Options:
  --folded                   Start with every thread folded
  --unfolded                 Start with every thread expanded
  --fold-unread              Allow unread messages to be hidden
  --config, -c <path>        Path to config file
  -h, --help                 Show help
`);
}
