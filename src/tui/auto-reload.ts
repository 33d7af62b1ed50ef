import fs from 'node:fs';
import path from 'node:path';

export interface AutoReloadIndicator {
  lastAtMs: number;
  file: string;
}

export function formatAutoReloadLabel(file: string): string {
  const name = path.basename(file);
  return name ? `Auto-reloaded (${name})` : 'Auto-reloaded';
}

export function shouldShowAutoReloadIndicator(
  indicator: AutoReloadIndicator | null,
  nowMs: number,
  ttlMs = 4000
): indicator is AutoReloadIndicator {
  if (!indicator) return false;
  return nowMs - indicator.lastAtMs <= ttlMs;
}

export function readMtime(filePath: string): number | null {
  try {
    return fs.statSync(filePath).mtimeMs;
  } catch {
    return null;
  }
}

/** A listing changed on disk when it exists and its mtime moved since the last read. */
export function hasListingChanged(lastMtime: number | null, currentMtime: number | null): boolean {
  if (currentMtime === null) return false;
  return lastMtime !== currentMtime;
}
