import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, mkdirSync, promises, rmSync, utimesSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { findRecentFiles } from './changed-files.js';

describe('findRecentFiles', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'warden-changes-'));
    mkdirSync(join(root, 'src'));
    mkdirSync(join(root, 'node_modules'));
    writeFileSync(join(root, 'src', 'a.ts'), 'export {};\n');
    writeFileSync(join(root, 'b.md'), '# b\n');
    writeFileSync(join(root, 'node_modules', 'dep.js'), '');
    writeFileSync(join(root, 'old.txt'), 'old\n');

    const twoHoursAgo = new Date(Date.now() - 2 * 60 * 60 * 1000);
    utimesSync(join(root, 'old.txt'), twoHoursAgo, twoHoursAgo);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(root, { recursive: true, force: true });
  });

  it('lists recently modified files breadth-first with posix paths', async () => {
    const files = await findRecentFiles(root, { window_ms: 60 * 60 * 1000, max_files: 50 });
    expect(files).toEqual(['b.md', 'src/a.ts']);
  });

  it('stops at max_files', async () => {
    const files = await findRecentFiles(root, { window_ms: 60 * 60 * 1000, max_files: 1 });
    expect(files).toEqual(['b.md']);
  });

  it('widens with the window', async () => {
    const files = await findRecentFiles(root, { window_ms: 3 * 60 * 60 * 1000, max_files: 50 });
    expect(files).toEqual(['b.md', 'old.txt', 'src/a.ts']);
  });

  it('returns nothing for a missing root', async () => {
    const files = await findRecentFiles(join(root, 'absent'), { window_ms: 1_000, max_files: 5 });
    expect(files).toEqual([]);
  });

  it('skips a file that disappears before it is examined', async () => {
    vi.spyOn(promises, 'stat').mockRejectedValueOnce(
      Object.assign(new Error('ENOENT: no such file or directory'), { code: 'ENOENT' }),
    );

    const files = await findRecentFiles(root, { window_ms: 60 * 60 * 1000, max_files: 50 });

    expect(files).toEqual(['src/a.ts']);
  });
});
