import { describe, expect, it } from 'vitest';
import { getStickyThreadLabel } from '../../src/tui/sticky-header.js';

describe('getStickyThreadLabel', () => {
  it('returns null for empty rows', () => {
    expect(getStickyThreadLabel([], 0)).toBe(null);
  });

  it('returns the nearest thread root at or before scroll', () => {
    const rows = [
      { kind: 'reply' as const },
      { kind: 'root' as const, label: 'Release plan' },
      { kind: 'reply' as const },
      { kind: 'reply' as const },
      { kind: 'root' as const, label: 'Lunch' },
      { kind: 'reply' as const },
    ];

    expect(getStickyThreadLabel(rows, 0)).toBe(null);
    expect(getStickyThreadLabel(rows, 1)).toBe('Release plan');
    expect(getStickyThreadLabel(rows, 3)).toBe('Release plan');
    expect(getStickyThreadLabel(rows, 5)).toBe('Lunch');
  });

  it('clamps scroll out of range', () => {
    const rows = [{ kind: 'root' as const, label: 'Lunch' }, { kind: 'reply' as const }];
    expect(getStickyThreadLabel(rows, -10)).toBe('Lunch');
    expect(getStickyThreadLabel(rows, 999)).toBe('Lunch');
  });
});
