import { MemoryRegionSurface, type RegionSurface, type SurfaceRegion } from './region-surface.js';
import { FOLD_REGION_KIND, FOLDED_ROOT_STYLE, type FoldRange, type FoldRegion } from './types.js';

export function isFoldRegion(region: SurfaceRegion): region is FoldRegion {
  return region.kind === FOLD_REGION_KIND;
}

export class FoldRegionStore {
  constructor(private readonly surface: RegionSurface = new MemoryRegionSurface()) {}

  /** Returns the fold region attached inside `[threadStart, threadEnd)`, if any. */
  isFolded(threadStart: number, threadEnd: number): FoldRegion | null {
    return this.surface.overlapping(threadStart, threadEnd).find(isFoldRegion) ?? null;
  }

  /**
   * Attaches a fold region for the thread rooted at `root`. Ranges hiding a
   * single line or none are not worth a summary and attach nothing.
   */
  create(root: number, range: FoldRange, summary: string): FoldRegion | null {
    if (range.hiddenCount <= 1) return null;
    const region: FoldRegion = {
      kind: FOLD_REGION_KIND,
      root,
      foldBeg: range.foldBeg,
      foldEnd: range.foldEnd,
      hiddenCount: range.hiddenCount,
      unreadCount: range.unreadCount,
      summary,
      rootStyle: FOLDED_ROOT_STYLE,
    };
    this.surface.attach(region);
    return region;
  }

  remove(region: FoldRegion): void {
    this.surface.detach(region);
  }

  removeAll(): void {
    for (const region of this.regions()) {
      this.surface.detach(region);
    }
  }

  regionAt(position: number): FoldRegion | null {
    return this.surface.overlapping(position, position + 1).find(isFoldRegion) ?? null;
  }

  regions(): FoldRegion[] {
    return this.surface.all().filter(isFoldRegion);
  }
}
