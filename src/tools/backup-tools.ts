/**
 * Warden Backup Tools
 * backup_create, backup_list, backup_restore, backup_prune
 */

import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { parseInput, type ToolHandler, type WardenServices } from './shared.js';

// ─── Tool Definitions ────────────────────────────────────────────

export const backupTools: Tool[] = [
  {
    name: 'warden_backup_create',
    description: 'Snapshot files (relative to the project directory) into a new timestamped backup. Returns metadata including a literal restore command.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        files: { type: 'array', items: { type: 'string' }, description: 'Files to back up' },
        reason: { type: 'string', description: 'Why the backup is taken (e.g. "pre-compact", "manual")' },
      },
      required: ['files'],
    },
  },
  {
    name: 'warden_backup_list',
    description: 'List committed backups, newest first.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: { type: 'number', description: 'Maximum number of backups to return (default: 20)' },
      },
    },
  },
  {
    name: 'warden_backup_restore',
    description: 'Copy a backup\'s files back into place. Restores the latest backup when no id is given.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        backup_id: { type: 'string', description: 'Backup to restore (format: YYYYMMDD-HHMMSS-mmm)' },
        target_dir: { type: 'string', description: 'Directory to restore into (default: the directory the backup was taken from)' },
      },
    },
  },
  {
    name: 'warden_backup_prune',
    description: 'Delete all but the most recent backups.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        keep: { type: 'number', description: 'Number of backups to keep (default from config)' },
      },
    },
  },
];

const CreateInput = z.object({
  files: z.array(z.string()).min(1),
  reason: z.string().default('manual'),
});

const ListInput = z.object({
  limit: z.number().int().positive().default(20),
});

const RestoreInput = z.object({
  backup_id: z.string().optional(),
  target_dir: z.string().optional(),
});

const PruneInput = z.object({
  keep: z.number().int().nonnegative().optional(),
});

// ─── Handler Factory ─────────────────────────────────────────────

export function createBackupHandlers(services: WardenServices): Record<string, ToolHandler> {
  const { backups, config } = services;

  return {
    warden_backup_create: async (raw) => {
      const input = parseInput(CreateInput, raw);
      const result = await backups.create(input.files, input.reason);
      if (result.success) {
        console.error(`[WARDEN] Backup ${result.metadata.backup_id} created (${result.metadata.files_backed_up.length} files)`);
      } else {
        console.error(`[WARDEN] Backup failed: ${result.error}`);
      }
      return result;
    },

    warden_backup_list: async (raw) => {
      const input = parseInput(ListInput, raw);
      const list = await backups.list(input.limit);
      return { success: true, count: list.length, backups: list };
    },

    warden_backup_restore: async (raw) => {
      const input = parseInput(RestoreInput, raw);

      let backupId = input.backup_id;
      if (!backupId) {
        const latest = await backups.latest();
        if (!latest) {
          return { success: false, error: 'No backups found' };
        }
        backupId = latest.backup_id;
      }

      const result = await backups.restore(backupId, input.target_dir);
      if (result.success) {
        console.error(`[WARDEN] Restored ${result.restored.length} file(s) from ${result.backup_id}`);
      }
      return result;
    },

    warden_backup_prune: async (raw) => {
      const input = parseInput(PruneInput, raw);
      const removed = await backups.prune(input.keep ?? config.retention.backups_keep);
      return { success: true, removed_count: removed.length, removed };
    },
  };
}
