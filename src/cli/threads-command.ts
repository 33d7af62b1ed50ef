/**
 * threadfold threads - Show where each thread starts and ends
 */

import { findThreadEnd, threadStarts } from '../fold/sequence-cursor.js';
import type { FoldState } from '../fold/types.js';
import { readListingFile } from '../listing/listing-file.js';
import { ListingSession } from '../listing/session.js';
import { parseListingOptions, THREADS_FLAGS } from './listing-options.js';
import { boldText, dimText, yellowText } from './terminal.js';

export interface ThreadSummary {
  start: number;
  end: number;
  rootId: string | null;
  lineCount: number;
  hiddenCount: number;
  folded: boolean;
  override: FoldState | null;
}

export function handleThreadsCommand(args: string[]): void {
  const options = parseListingOptions(args, THREADS_FLAGS);

  const session = new ListingSession(readListingFile(options.listingPath), {
    foldUnread: options.foldUnread,
    defaultFolded: options.defaultFolded,
    notify: (message) => console.error(yellowText(message)),
  });
  const threads = describeThreads(session);

  if (options.flags.switches.has('--json')) {
    console.log(JSON.stringify(threads, null, 2));
    return;
  }

  for (const thread of threads) {
    console.log(formatThreadSummary(thread));
  }
  const folded = threads.filter((t) => t.folded).length;
  console.log(dimText(`${threads.length} threads, ${folded} folded`));
}

export function describeThreads(session: ListingSession): ThreadSummary[] {
  const { listing, folder } = session;
  const out: ThreadSummary[] = [];
  for (const start of threadStarts(listing)) {
    const end = findThreadEnd(listing, start);
    const rootId = listing.messageAt(start)?.id ?? null;
    const region = folder.isFolded(start);
    out.push({
      start,
      end,
      rootId,
      lineCount: end - start,
      hiddenCount: region?.hiddenCount ?? 0,
      folded: region !== null,
      override: rootId === null ? null : folder.session.lookupState(rootId),
    });
  }
  return out;
}

export function formatThreadSummary(thread: ThreadSummary): string {
  const range = `${thread.start}-${thread.end - 1}`.padEnd(9);
  const root = (thread.rootId ?? '-').padEnd(12);
  const state = thread.folded ? boldText(`folded (${thread.hiddenCount} hidden)`) : 'open';
  return `${range} ${root} ${String(thread.lineCount).padStart(3)} lines  ${state}`;
}

export function printThreadsHelp(): void {
  console.log(`Usage: threadfold threads [listing.json] [options]

Print one line per thread: line range, root message id, size and fold state.

Options:
  --folded                   Fold every thread
  --unfolded                 Expand every thread
  --fold-unread              Allow unread messages to be hidden
  --json                     Output as JSON
  --config, -c <path>        Path to config file
  -h, --help                 Show help
`);
}
