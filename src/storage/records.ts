/**
 * Warden Records
 * Identifiers and read-back schemas for persisted backups and handoffs
 */

import { isAbsolute } from 'path';
import { z } from 'zod';

/** A relative path that cannot leave the directory it is joined to. */
const ContainedPathSchema = z
  .string()
  .min(1)
  .refine(path => !isAbsolute(path) && !path.split(/[\\/]/).includes('..'), {
    message: 'path must be relative and stay inside the backup root',
  });

export const BackupMetadataSchema = z.object({
  backup_id: z.string(),
  timestamp: z.string(),
  root_dir: z.string(),
  files_backed_up: z.array(ContainedPathSchema),
  reason: z.string(),
  restore_command: z.string(),
});

export const StoredHandoffSchema = z.object({
  id: z.string(),
  from_session: z.string(),
  to_session: z.string(),
  completed_tasks: z.array(z.string()),
  next_steps: z.array(z.string()),
  artifacts: z.array(z.string()),
  timestamp: z.string(),
  context_snapshot: z.record(z.unknown()),
  notes: z.string(),
});

/** `YYYYMMDD-HHMMSS-mmm` in UTC. */
export function timestampId(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}-${iso.slice(20, 23)}`;
}

export function withSequence(base: string, attempt: number): string {
  return attempt === 0 ? base : `${base}-${attempt}`;
}

/** Newest first: timestamp descending, then id descending with numeric suffixes compared as numbers. */
export function newestFirst<T extends { timestamp: string }>(idOf: (entry: T) => string) {
  return (a: T, b: T): number => {
    const byTime = Date.parse(b.timestamp) - Date.parse(a.timestamp);
    if (byTime !== 0 && !Number.isNaN(byTime)) return byTime;
    return idOf(b).localeCompare(idOf(a), undefined, { numeric: true });
  };
}

export function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const MAX_ID_ATTEMPTS = 100;
