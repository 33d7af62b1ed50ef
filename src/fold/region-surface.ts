/**
 * A rendering surface that can carry annotations over half-open line ranges.
 * The terminal UI and the CLI use the in-memory surface below; any other view
 * (a GUI list, a web renderer) can supply its own.
 */
export interface SurfaceRegion {
  kind: string;
  foldBeg: number;
  foldEnd: number;
}

export interface RegionSurface<R extends SurfaceRegion = SurfaceRegion> {
  attach(region: R): void;
  /** Detaching a region that is not attached does nothing. */
  detach(region: R): void;
  overlapping(beg: number, end: number): R[];
  all(): R[];
}

export class MemoryRegionSurface<R extends SurfaceRegion = SurfaceRegion> implements RegionSurface<R> {
  private regions: R[] = [];

  attach(region: R): void {
    if (this.regions.includes(region)) return;
    this.regions.push(region);
    this.regions.sort((a, b) => a.foldBeg - b.foldBeg);
  }

  detach(region: R): void {
    this.regions = this.regions.filter((r) => r !== region);
  }

  overlapping(beg: number, end: number): R[] {
    return this.regions.filter((r) => r.foldBeg < end && beg < r.foldEnd);
  }

  all(): R[] {
    return [...this.regions];
  }
}
