export type KeyAction =
  | 'up'
  | 'down'
  | 'pageUp'
  | 'pageDown'
  | 'top'
  | 'bottom'
  | 'nextThread'
  | 'previousThread'
  | 'threadRoot'
  | 'toggle'
  | 'toggleAndAdvance'
  | 'fold'
  | 'unfold'
  | 'toggleAll'
  | 'foldAll'
  | 'unfoldAll'
  | 'mark'
  | 'toggleUnread'
  | 'applyAll'
  | 'quit';

const BINDINGS: Record<string, KeyAction> = {
  UP: 'up',
  k: 'up',
  DOWN: 'down',
  j: 'down',
  PAGE_UP: 'pageUp',
  PAGE_DOWN: 'pageDown',
  HOME: 'top',
  END: 'bottom',
  n: 'nextThread',
  p: 'previousThread',
  r: 'threadRoot',
  TAB: 'toggle',
  f: 'toggle',
  z: 'fold',
  o: 'unfold',
  F: 'toggleAll',
  Z: 'foldAll',
  O: 'unfoldAll',
  m: 'mark',
  u: 'toggleUnread',
  g: 'applyAll',
  q: 'quit',
  CTRL_C: 'quit',
  ESCAPE: 'quit',
};

// terminal-kit reports the space bar as ' ' in most terminals and 'SPACE' in a few.
export function isSpaceKeyName(name: string): boolean {
  return name === ' ' || name === 'SPACE';
}

export function resolveKeyAction(name: string): KeyAction | null {
  if (isSpaceKeyName(name)) return 'toggleAndAdvance';
  return BINDINGS[name] ?? null;
}

export const KEY_HINTS = 'j/k move  n/p thread  TAB fold  SPC fold+next  F all  m mark  u unread  g re-apply  q quit';
