import type { LineSource, Message, MessageFlag, ThreadRole } from '../../src/fold/types.js';

const ROLES: Record<string, ThreadRole> = {
  R: 'root',
  c: 'child',
  o: 'orphanFirstChild',
  x: 'other',
};

/**
 * Builds a line source from short tokens, one per line:
 * `-` no message, `R` root, `c` child, `o` orphan first child, `x` other.
 * A trailing `u` marks the message unread; `#id` overrides the default id
 * (`m<position>`). Example: `['-', 'R#a', 'cu', 'c', '-']`.
 */
export function makeLines(tokens: string[]): LineSource & { messages: (Message | null)[] } {
  const messages = tokens.map((token, position): Message | null => {
    if (token === '-') return null;
    const [head = '', id] = token.split('#');
    const role = ROLES[head.charAt(0)];
    if (!role) throw new Error(`Unknown line token: ${token}`);
    return {
      id: id ?? `m${position}`,
      position,
      flags: new Set<MessageFlag>(head.includes('u') ? ['unread'] : []),
      threadRole: role,
    };
  });

  return {
    messages,
    length: messages.length,
    messageAt: (position) => messages[position] ?? null,
  };
}

export function markedIn(ids: string[]): (id: string) => boolean {
  const set = new Set(ids);
  return (id) => set.has(id);
}
