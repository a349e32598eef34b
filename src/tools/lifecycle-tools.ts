/**
 * Warden Lifecycle Tools
 * pre_compact: handoff + context backup + retention, before context is compacted
 */

import { promises as fs, constants as fsConstants } from 'fs';
import { isAbsolute, join, relative } from 'path';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { isErrno } from '../storage/records.js';
import { HandoffInput } from './handoff-tools.js';
import { parseInput, type ToolHandler, type WardenServices } from './shared.js';

// ─── Tool Definitions ────────────────────────────────────────────

export const lifecycleTools: Tool[] = [
  {
    name: 'warden_pre_compact',
    description: 'Call before context compaction. Writes a handoff, backs up the configured context files, and prunes old handoffs and backups.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        session_id: { type: 'string', description: 'Identifier of the session being compacted' },
        completed_tasks: { oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }] },
        next_steps: { oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }] },
        artifacts: { type: 'array', items: { type: 'string' } },
        context: { type: 'object' },
        notes: { type: 'string' },
      },
    },
  },
];

const PreCompactInput = HandoffInput.omit({ to_session: true });

// ─── Handler Factory ─────────────────────────────────────────────

export function createLifecycleHandlers(services: WardenServices): Record<string, ToolHandler> {
  const { config, backups, handoffs, now } = services;

  async function existingContextFiles(): Promise<string[]> {
    const existing: string[] = [];
    for (const file of config.context_files) {
      const path = isAbsolute(file) ? file : join(config.project_dir, file);
      if (relative(config.project_dir, path).startsWith('..')) {
        console.error(`[WARDEN] Context file outside project, not backed up: ${file}`);
        continue;
      }
      try {
        await fs.access(path, fsConstants.R_OK);
        existing.push(file);
      } catch (error) {
        if (!isErrno(error, 'ENOENT')) {
          console.error(`[WARDEN] Context file not readable, not backed up: ${file}`);
        }
      }
    }
    return existing;
  }

  return {
    warden_pre_compact: async (raw) => {
      const input = parseInput(PreCompactInput, raw);

      const saved = await handoffs.create({
        ...input,
        notes: input.notes ?? `Pre-compact snapshot - ${now().toISOString()}`,
      });

      const files = await existingContextFiles();
      const backup = files.length > 0 ? await backups.create(files, 'pre-compact') : null;
      if (backup && !backup.success) {
        console.error(`[WARDEN] Pre-compact backup failed: ${backup.error}`);
      }

      const removedBackups = await backups.prune(config.retention.backups_keep);
      const removedHandoffs = await handoffs.prune(config.retention.handoffs_keep);

      return {
        success: backup === null || backup.success,
        handoff_id: saved.handoff.id,
        handoff_path: saved.markdown_path,
        backup: backup !== null && backup.success ? backup.metadata : null,
        backup_error: backup !== null && !backup.success ? backup.error : null,
        removed_backups: removedBackups,
        removed_handoffs: removedHandoffs,
      };
    },
  };
}
