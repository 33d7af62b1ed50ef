import type { LineSource, Message, MessageFlag } from '../fold/types.js';
import type { Listing, ListingMessage } from '../schema/index.js';

export interface ListingMessageLine extends Message {
  flags: Set<MessageFlag>;
  subject: string;
  from: string | null;
  date: string | null;
  depth: number;
}

export type DisplayLine =
  | { kind: 'header'; text: string }
  | { kind: 'message'; message: ListingMessageLine }
  | { kind: 'footer'; text: string };

/**
 * The ordered display lines of one listing: a header, one line per message in
 * listing order, and a footer. Header and footer carry no message.
 */
export class RenderedListing implements LineSource {
  constructor(readonly lines: readonly DisplayLine[]) {}

  get length(): number {
    return this.lines.length;
  }

  messageAt(position: number): ListingMessageLine | null {
    const line = this.lines[position];
    return line?.kind === 'message' ? line.message : null;
  }

  positionOf(messageId: string): number | null {
    const index = this.lines.findIndex((l) => l.kind === 'message' && l.message.id === messageId);
    return index === -1 ? null : index;
  }

  messageCount(): number {
    return this.lines.filter((l) => l.kind === 'message').length;
  }
}

function toMessageLine(entry: ListingMessage, position: number): ListingMessageLine {
  return {
    id: entry.id,
    position,
    flags: new Set<MessageFlag>(entry.flags),
    threadRole: entry.threadRole,
    subject: entry.subject,
    from: entry.from ?? null,
    date: entry.date ?? null,
    depth: entry.depth,
  };
}

export function renderListing(listing: Listing): RenderedListing {
  const count = listing.messages.length;
  const lines: DisplayLine[] = [{ kind: 'header', text: listing.query ? `Query: ${listing.query}` : 'All messages' }];
  listing.messages.forEach((entry, i) => {
    lines.push({ kind: 'message', message: toMessageLine(entry, i + 1) });
  });
  lines.push({ kind: 'footer', text: `End of listing (${count} ${count === 1 ? 'message' : 'messages'})` });
  return new RenderedListing(lines);
}
