import type { Dirent } from 'fs';
import { readdir, rm, stat } from 'fs/promises';
import path from 'path';

type CleanupOptions = {
  dir: string;
  maxAgeMs: number;
  now?: number;
};

/**
 * Deletes regular files in `dir` whose mtime is older than `maxAgeMs`.
 * Returns the names of the removed files. A missing directory means there is nothing to clean.
 */
export async function cleanupExpiredArtifacts({ dir, maxAgeMs, now = Date.now() }: CleanupOptions): Promise<string[]> {
  const cutoff = now - maxAgeMs;

  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return [];
    }
    throw err;
  }

  const removed: string[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;

    const filePath = path.join(dir, entry.name);
    try {
      const info = await stat(filePath);
      if (info.mtimeMs < cutoff) {
        await rm(filePath, { force: true });
        removed.push(entry.name);
      }
    } catch (error) {
      // A run may delete its own input between readdir and stat.
      console.error(`[Cleanup] Failed to inspect or remove ${filePath}:`, error);
    }
  }

  if (removed.length > 0) {
    console.log(`[Cleanup] Removed ${removed.length} expired artifact(s) from ${dir} older than ${new Date(cutoff).toISOString()}`);
  }
  return removed;
}
