import type { LineSource } from '../fold/types.js';

/** Messages flagged for a batch operation. */
export class MarkSet {
  private readonly ids = new Set<string>();

  isMarked = (messageId: string): boolean => this.ids.has(messageId);

  mark(messageId: string): void {
    this.ids.add(messageId);
  }

  unmark(messageId: string): void {
    this.ids.delete(messageId);
  }

  get size(): number {
    return this.ids.size;
  }
}

export type MarkCommand = (position: number) => boolean | null;

/**
 * Toggles the mark on the message at a line. Returns the new marked state, or
 * null when the line carries no message.
 */
export function createMarkCommand(lines: () => LineSource, marks: MarkSet): MarkCommand {
  return (position) => {
    const message = lines().messageAt(position);
    if (!message) return null;
    if (marks.isMarked(message.id)) {
      marks.unmark(message.id);
      return false;
    }
    marks.mark(message.id);
    return true;
  };
}
