/**
 * Warden Tool Plumbing
 * Handler types, input parsing and the services every tool factory receives
 */

import { z } from 'zod';
import type { BackupManager } from '../storage/backup-store.js';
import type { WardenDatabase } from '../storage/database.js';
import type { HandoffWriter } from '../storage/handoff-store.js';
import type { WardenConfig } from '../types/index.js';

export type ToolHandler = (input: Record<string, unknown>) => Promise<unknown>;

export interface WardenServices {
  config: WardenConfig;
  db: WardenDatabase;
  backups: BackupManager;
  handoffs: HandoffWriter;
  now: () => Date;
}

export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: Record<string, unknown>): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ');
    throw new Error(`Invalid input: ${issues}`);
  }
  return parsed.data;
}

export const TaskListInput = z.union([z.string(), z.array(z.string())]);
