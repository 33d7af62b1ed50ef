import type { LineSource } from './types.js';

function clampPosition(lines: LineSource, position: number): number {
  if (lines.length === 0) return 0;
  return Math.min(Math.max(0, position), lines.length - 1);
}

export function isThreadRoot(lines: LineSource, position: number): boolean {
  if (position < 0 || position >= lines.length) return false;
  const message = lines.messageAt(position);
  if (!message) return false;
  return message.threadRole === 'root' || message.threadRole === 'orphanFirstChild';
}

/**
 * Walks back from `position` (inclusive) to the nearest root. The first line
 * of the sequence always counts as a thread start.
 */
export function findThreadStart(lines: LineSource, position: number): number {
  let current = clampPosition(lines, position);
  while (current > 0 && !isThreadRoot(lines, current)) {
    current -= 1;
  }
  return current;
}

/**
 * Returns the next root after `position`, or null when the current thread
 * runs to the end of the sequence.
 */
export function findNextThreadStart(lines: LineSource, position: number): number | null {
  for (let current = Math.max(0, position + 1); current < lines.length; current++) {
    if (isThreadRoot(lines, current)) return current;
  }
  return null;
}

export function findPrevThreadStart(lines: LineSource, position: number): number | null {
  const start = findThreadStart(lines, position);
  if (start === 0) return null;
  return findThreadStart(lines, start - 1);
}

export function findThreadEnd(lines: LineSource, position: number): number {
  return findNextThreadStart(lines, position) ?? lines.length;
}

export function* threadStarts(lines: LineSource): Generator<number> {
  if (lines.length === 0) return;
  let start: number | null = 0;
  while (start !== null) {
    yield start;
    start = findNextThreadStart(lines, start);
  }
}
