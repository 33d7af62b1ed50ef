import type { FoldRegion, RootStyle } from '../fold/types.js';

export type VisibleRow =
  | { kind: 'line'; position: number; rootStyle: RootStyle | null }
  | { kind: 'summary'; region: FoldRegion };

/**
 * Maps the listing to what is actually on screen: each fold region's hidden
 * lines collapse into one summary row right after the thread root.
 */
export function buildVisibleRows(lineCount: number, regions: FoldRegion[]): VisibleRow[] {
  const byStart = new Map<number, FoldRegion>();
  const rootStyles = new Map<number, RootStyle>();
  for (const region of regions) {
    byStart.set(region.foldBeg, region);
    rootStyles.set(region.root, region.rootStyle);
  }

  const rows: VisibleRow[] = [];
  let position = 0;
  while (position < lineCount) {
    const region = byStart.get(position);
    if (region) {
      rows.push({ kind: 'summary', region });
      position = region.foldEnd;
      continue;
    }
    rows.push({ kind: 'line', position, rootStyle: rootStyles.get(position) ?? null });
    position += 1;
  }
  return rows;
}

export function rowPosition(row: VisibleRow): number {
  return row.kind === 'line' ? row.position : row.region.foldBeg;
}

/** Index of the row showing `position`, or of the summary row hiding it. */
export function findRowForPosition(rows: VisibleRow[], position: number): number {
  const index = rows.findIndex((row) =>
    row.kind === 'line' ? row.position === position : row.region.foldBeg <= position && position < row.region.foldEnd
  );
  return index === -1 ? Math.max(0, rows.length - 1) : index;
}

export const HEADER_HEIGHT = 2;
export const BASE_FOOTER_HEIGHT = 2;

export function getListHeight(termHeight: number): number {
  return Math.max(1, termHeight - HEADER_HEIGHT - BASE_FOOTER_HEIGHT);
}
