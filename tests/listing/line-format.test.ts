import { describe, expect, it } from 'vitest';
import { formatDisplayLine, formatMessageLine, formatSummaryLine } from '../../src/listing/line-format.js';
import { renderListing } from '../../src/listing/renderer.js';
import { FoldRegionStore } from '../../src/fold/region-store.js';
import { sampleListing } from '../helpers/listing.js';

const rendered = renderListing(sampleListing());

function messageAt(position: number) {
  const message = rendered.messageAt(position);
  if (!message) throw new Error(`no message at ${position}`);
  return message;
}

describe('formatMessageLine', () => {
  it('lays out date, sender and indented subject', () => {
    expect(formatMessageLine(messageAt(1), { marked: false, folded: false })).toBe(
      `     2026-01-05 ${'Ana'.padEnd(16)} Release plan`
    );
  });

  it('shows mark and unread columns and indents replies by depth', () => {
    expect(formatMessageLine(messageAt(3), { marked: true, folded: false })).toBe(
      `*N   2026-01-06 ${'Cy'.padEnd(16)}     Re: Release plan`
    );
  });

  it('flags folded roots', () => {
    expect(formatMessageLine(messageAt(5), { marked: false, folded: true })).toBe(
      `   ▸ 2026-01-07 ${'Dee'.padEnd(16)} Lunch`
    );
  });

  it('truncates long senders', () => {
    const message = { ...messageAt(1), from: 'Bartholomew Longname' };
    expect(formatMessageLine(message, { marked: false, folded: false })).toBe(
      '     2026-01-05 Bartholomew Lon… Release plan'
    );
  });
});

describe('formatDisplayLine', () => {
  it('prints header and footer text as is', () => {
    const opts = { marked: false, folded: false };
    expect(formatDisplayLine({ kind: 'header', text: 'Query: tag:inbox' }, opts)).toBe('Query: tag:inbox');
    expect(formatDisplayLine({ kind: 'footer', text: 'End of listing (0 messages)' }, opts)).toBe(
      'End of listing (0 messages)'
    );
  });
});

describe('formatSummaryLine', () => {
  it('indents the bracketed summary', () => {
    const store = new FoldRegionStore();
    const region = store.create(5, { foldBeg: 6, foldEnd: 8, hiddenCount: 2, unreadCount: 0 }, '2 hidden messages');
    expect(region).not.toBe(null);
    if (region) expect(formatSummaryLine(region)).toBe('    [2 hidden messages]');
  });
});
