type StickyRowLike = { kind: 'root'; label: string } | { kind: 'reply' };

/** Subject of the thread the top visible row belongs to. */
export function getStickyThreadLabel(rows: StickyRowLike[], scroll: number): string | null {
  if (rows.length === 0) return null;
  const start = Math.min(Math.max(0, scroll), rows.length - 1);
  for (let i = start; i >= 0; i--) {
    const row = rows[i];
    if (row?.kind === 'root') return row.label;
  }
  return null;
}
