/**
 * Warden Backup Store
 * Timestamped, self-describing snapshots of a file set with restore and retention
 *
 * Layout: <backups_dir>/<backup_id>/files/<relative path> plus metadata.json.
 * metadata.json is written last (temp file + rename), so a snapshot without it
 * is still in progress or failed and is never listed, restored or pruned.
 */

import { promises as fs, constants as fsConstants } from 'fs';
import { dirname, isAbsolute, join, relative, resolve, sep } from 'path';
import type {
  BackupCreateResult,
  BackupMetadata,
  BackupRestoreResult,
  RecordScan,
} from '../types/index.js';
import {
  BackupMetadataSchema,
  MAX_ID_ATTEMPTS,
  describeError,
  isErrno,
  newestFirst,
  timestampId,
  withSequence,
} from './records.js';

const METADATA_FILE = 'metadata.json';
const PAYLOAD_DIR = 'files';
const BACKUP_ID_PATTERN = /^\d{8}-\d{6}-\d{3}(-\d+)?$/;

export interface BackupManagerOptions {
  backupsDir: string;
  rootDir: string;
  now?: () => Date;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export class BackupManager {
  private readonly backupsDir: string;
  private readonly rootDir: string;
  private readonly now: () => Date;

  constructor(options: BackupManagerOptions) {
    this.backupsDir = resolve(options.backupsDir);
    this.rootDir = resolve(options.rootDir);
    this.now = options.now ?? (() => new Date());
  }

  /** A literal command that reverses the snapshot without this library. */
  restoreCommand(backupId: string, rootDir: string): string {
    return `cp -R ${shellQuote(join(this.backupsDir, backupId, PAYLOAD_DIR) + sep + '.')} ${shellQuote(rootDir)}`;
  }

  async create(files: readonly string[], reason: string = 'manual'): Promise<BackupCreateResult> {
    if (files.length === 0) {
      return { success: false, error: 'No files to back up' };
    }

    const relativePaths: string[] = [];
    for (const file of files) {
      const absolute = resolve(this.rootDir, file);
      const rel = relative(this.rootDir, absolute);
      if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
        return { success: false, error: `File is outside ${this.rootDir}: ${file}` };
      }
      if (!relativePaths.includes(rel)) relativePaths.push(rel);
    }

    for (const rel of relativePaths) {
      const source = join(this.rootDir, rel);
      try {
        await fs.access(source, fsConstants.R_OK);
        const stat = await fs.stat(source);
        if (!stat.isFile()) {
          return { success: false, error: `Not a regular file: ${rel}` };
        }
      } catch (error) {
        return { success: false, error: `Cannot read ${rel}: ${describeError(error)}` };
      }
    }

    try {
      await fs.mkdir(this.backupsDir, { recursive: true });
    } catch (error) {
      return { success: false, error: `Cannot create ${this.backupsDir}: ${describeError(error)}` };
    }
    const created = this.now();
    const claimed = await this.claimDirectory(timestampId(created));
    if (!claimed.success) return claimed;

    const { backupId, dir } = claimed;
    try {
      for (const rel of relativePaths) {
        const dest = join(dir, PAYLOAD_DIR, rel);
        await fs.mkdir(dirname(dest), { recursive: true });
        await fs.copyFile(join(this.rootDir, rel), dest);
      }

      const metadata: BackupMetadata = {
        backup_id: backupId,
        timestamp: created.toISOString(),
        root_dir: this.rootDir,
        files_backed_up: relativePaths.map(rel => rel.split(sep).join('/')),
        reason,
        restore_command: this.restoreCommand(backupId, this.rootDir),
      };

      const tmpPath = join(dir, `${METADATA_FILE}.tmp`);
      await fs.writeFile(tmpPath, JSON.stringify(metadata, null, 2), 'utf-8');
      await fs.rename(tmpPath, join(dir, METADATA_FILE));

      return { success: true, metadata };
    } catch (error) {
      await fs.rm(dir, { recursive: true, force: true });
      return { success: false, error: `Backup ${backupId} failed: ${describeError(error)}` };
    }
  }

  async restore(backupId: string, targetDir?: string): Promise<BackupRestoreResult> {
    if (!BACKUP_ID_PATTERN.test(backupId)) {
      return { success: false, error: `Invalid backup id: ${backupId}` };
    }

    const dir = join(this.backupsDir, backupId);
    const loaded = await this.readMetadata(backupId);
    if (loaded.kind === 'missing') {
      return { success: false, error: `Backup ${backupId} not found or incomplete (no metadata)` };
    }
    if (loaded.kind === 'corrupt') {
      return { success: false, error: `Backup ${backupId} has unreadable metadata: ${loaded.reason}` };
    }

    const { metadata } = loaded;
    for (const file of metadata.files_backed_up) {
      try {
        await fs.access(join(dir, PAYLOAD_DIR, file), fsConstants.R_OK);
      } catch {
        return { success: false, error: `Backup ${backupId} is incomplete: missing ${file}` };
      }
    }

    const target = resolve(targetDir ?? metadata.root_dir);
    try {
      for (const file of metadata.files_backed_up) {
        const dest = join(target, file);
        await fs.mkdir(dirname(dest), { recursive: true });
        await fs.copyFile(join(dir, PAYLOAD_DIR, file), dest);
      }
    } catch (error) {
      return { success: false, error: `Restore of ${backupId} failed: ${describeError(error)}` };
    }

    return { success: true, backup_id: backupId, target_dir: target, restored: [...metadata.files_backed_up] };
  }

  /** Committed snapshots newest first, plus the ids that were skipped. */
  async scan(): Promise<RecordScan<BackupMetadata>> {
    const scan: RecordScan<BackupMetadata> = { entries: [], corrupt: [], incomplete: [] };

    let names: string[];
    try {
      const dirents = await fs.readdir(this.backupsDir, { withFileTypes: true });
      names = dirents.filter(d => d.isDirectory()).map(d => d.name);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return scan;
      throw error;
    }

    for (const name of names) {
      const loaded = await this.readMetadata(name);
      if (loaded.kind === 'ok') scan.entries.push(loaded.metadata);
      else if (loaded.kind === 'corrupt') scan.corrupt.push(name);
      else scan.incomplete.push(name);
    }

    scan.entries.sort(newestFirst<BackupMetadata>(m => m.backup_id));
    return scan;
  }

  async list(limit?: number): Promise<BackupMetadata[]> {
    const scan = await this.scan();
    for (const id of scan.corrupt) {
      console.error(`[WARDEN] Skipping backup with unreadable metadata: ${id}`);
    }
    return limit === undefined ? scan.entries : scan.entries.slice(0, Math.max(0, limit));
  }

  async latest(): Promise<BackupMetadata | null> {
    const [newest] = await this.list(1);
    return newest ?? null;
  }

  /** Delete all but the `keep` newest committed snapshots. Returns removed ids. */
  async prune(keep: number): Promise<string[]> {
    const { entries } = await this.scan();
    const stale = entries.slice(Math.max(0, Math.trunc(keep)));
    for (const metadata of stale) {
      await fs.rm(join(this.backupsDir, metadata.backup_id), { recursive: true, force: true });
    }
    return stale.map(m => m.backup_id);
  }

  private async claimDirectory(
    base: string,
  ): Promise<{ success: true; backupId: string; dir: string } | { success: false; error: string }> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const backupId = withSequence(base, attempt);
      const dir = join(this.backupsDir, backupId);
      try {
        await fs.mkdir(dir);
        return { success: true, backupId, dir };
      } catch (error) {
        if (!isErrno(error, 'EEXIST')) {
          return { success: false, error: `Cannot create ${dir}: ${describeError(error)}` };
        }
      }
    }
    return { success: false, error: `Backup id collision: ${base} exhausted ${MAX_ID_ATTEMPTS} attempts` };
  }

  /** Reads `<name>/metadata.json`; a record that names a different snapshot is corrupt. */
  private async readMetadata(
    name: string,
  ): Promise<{ kind: 'ok'; metadata: BackupMetadata } | { kind: 'missing' } | { kind: 'corrupt'; reason: string }> {
    let raw: string;
    try {
      raw = await fs.readFile(join(this.backupsDir, name, METADATA_FILE), 'utf-8');
    } catch (error) {
      if (isErrno(error, 'ENOENT') || isErrno(error, 'ENOTDIR')) return { kind: 'missing' };
      return { kind: 'corrupt', reason: describeError(error) };
    }

    try {
      const parsed = BackupMetadataSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) return { kind: 'corrupt', reason: parsed.error.message };
      if (parsed.data.backup_id !== name || !BACKUP_ID_PATTERN.test(name)) {
        return { kind: 'corrupt', reason: `backup_id ${JSON.stringify(parsed.data.backup_id)} does not match directory ${name}` };
      }
      return { kind: 'ok', metadata: parsed.data };
    } catch (error) {
      return { kind: 'corrupt', reason: describeError(error) };
    }
  }
}
