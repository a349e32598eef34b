/**
 * Warden Change Discovery
 * Lists files modified within a recent window, relative to the project root
 */

import { promises as fs, type Dirent, type Stats } from 'fs';
import { join, relative } from 'path';
import { describeError, isErrno } from '../storage/records.js';

const IGNORED_DIRS = new Set(['.git', 'node_modules', 'dist', 'build', '.venv', '__pycache__', 'coverage']);

export interface RecentFilesOptions {
  window_ms: number;
  max_files: number;
  now?: () => Date;
}

export async function findRecentFiles(root: string, options: RecentFilesOptions): Promise<string[]> {
  const cutoff = (options.now?.() ?? new Date()).getTime() - options.window_ms;
  const found: string[] = [];
  const pending: string[] = [root];

  while (pending.length > 0 && found.length < options.max_files) {
    const dir = pending.shift();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      console.error(`[WARDEN] Cannot read ${dir}:`, describeError(error));
      continue;
    }

    for (const entry of entries.sort((a, b) => a.name.localeCompare(b.name))) {
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        if (!IGNORED_DIRS.has(entry.name)) pending.push(full);
        continue;
      }
      if (!entry.isFile()) continue;

      let stat: Stats;
      try {
        stat = await fs.stat(full);
      } catch (error) {
        // Removed between readdir and stat
        if (!isErrno(error, 'ENOENT')) {
          console.error(`[WARDEN] Cannot stat ${full}:`, describeError(error));
        }
        continue;
      }
      if (stat.mtimeMs >= cutoff) {
        found.push(relative(root, full).replace(/\\/g, '/'));
        if (found.length >= options.max_files) break;
      }
    }
  }

  return found;
}
