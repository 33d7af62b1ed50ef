export {
  isThreadRoot,
  findThreadStart,
  findNextThreadStart,
  findPrevThreadStart,
  findThreadEnd,
  threadStarts,
} from './sequence-cursor.js';
export { computeFoldRange, formatFoldSummary } from './fold-range.js';
export { FoldRegionStore, isFoldRegion } from './region-store.js';
export { MemoryRegionSurface } from './region-surface.js';
export { FoldSession } from './session-state.js';
export { guardMarkOperation, MARK_REFUSED_MESSAGE } from './mark-guard.js';
export { ThreadFolder } from './thread-folder.js';
export type { MarkQuery, FoldRangeInput } from './fold-range.js';
export type { RegionSurface, SurfaceRegion } from './region-surface.js';
export type { PositionalOperation } from './mark-guard.js';
export type { ThreadFolderOptions, FoldOptions } from './thread-folder.js';
export type {
  ThreadRole,
  MessageFlag,
  Message,
  LineSource,
  FoldState,
  FoldRange,
  FoldRegion,
  RootStyle,
} from './types.js';
export { FOLD_REGION_KIND, FOLDED_ROOT_STYLE } from './types.js';
