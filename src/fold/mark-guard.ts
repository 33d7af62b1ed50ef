import type { FoldRegionStore } from './region-store.js';

export const MARK_REFUSED_MESSAGE = 'Cannot mark a message hidden inside a folded thread';

export type PositionalOperation<A extends unknown[], R> = (position: number, ...args: A) => R;

/**
 * Wraps a mark operation so it refuses to act on lines hidden by a fold.
 * Refusals are reported through `notify` and return undefined.
 */
export function guardMarkOperation<A extends unknown[], R>(
  store: FoldRegionStore,
  delegate: PositionalOperation<A, R>,
  notify: (message: string) => void
): PositionalOperation<A, R | undefined> {
  return (position: number, ...args: A): R | undefined => {
    if (store.regionAt(position)) {
      notify(MARK_REFUSED_MESSAGE);
      return undefined;
    }
    return delegate(position, ...args);
  };
}
