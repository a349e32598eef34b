/**
 * Warden Handoff Tools
 * handoff_create, handoff_list, handoff_load, handoff_prune
 */

import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { generateHandoffMarkdown } from '../handoff/markdown.js';
import { TaskListInput, parseInput, type ToolHandler, type WardenServices } from './shared.js';

// ─── Tool Definitions ────────────────────────────────────────────

const taskListSchema = {
  oneOf: [{ type: 'string' }, { type: 'array', items: { type: 'string' } }],
};

export const handoffTools: Tool[] = [
  {
    name: 'warden_handoff_create',
    description: 'Write a session handoff (markdown + JSON) for the next session. Task fields accept a list or free text; free text is split on numbered items, bullets, lines or semicolons.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        session_id: { type: 'string', description: 'Identifier of the session handing off (default: "current")' },
        to_session: { type: 'string', description: 'Receiving session (default: "next")' },
        completed_tasks: { ...taskListSchema, description: 'Tasks completed this session' },
        next_steps: { ...taskListSchema, description: 'What the next session should do' },
        artifacts: { type: 'array', items: { type: 'string' }, description: 'Files created or modified' },
        context: { type: 'object', description: 'Extra key/value context to preserve verbatim' },
        notes: { type: 'string', description: 'Free-text notes' },
      },
    },
  },
  {
    name: 'warden_handoff_list',
    description: 'List recent handoffs, newest first.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        limit: { type: 'number', description: 'Maximum number of handoffs (default: 10)' },
      },
    },
  },
  {
    name: 'warden_handoff_load',
    description: 'Load a handoff by id, or the most recent one. Call at session start to resume context.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        handoff_id: { type: 'string', description: 'Handoff id. If omitted, loads the latest.' },
      },
    },
  },
  {
    name: 'warden_handoff_prune',
    description: 'Delete all but the most recent handoffs.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        keep: { type: 'number', description: 'Number of handoffs to keep (default from config)' },
      },
    },
  },
];

export const HandoffInput = z.object({
  session_id: z.string().optional(),
  to_session: z.string().optional(),
  completed_tasks: TaskListInput.optional(),
  next_steps: TaskListInput.optional(),
  artifacts: z.array(z.string()).optional(),
  context: z.record(z.unknown()).optional(),
  notes: z.string().optional(),
});

const ListInput = z.object({
  limit: z.number().int().positive().default(10),
});

const LoadInput = z.object({
  handoff_id: z.string().optional(),
});

const PruneInput = z.object({
  keep: z.number().int().nonnegative().optional(),
});

// ─── Handler Factory ─────────────────────────────────────────────

export function createHandoffHandlers(services: WardenServices): Record<string, ToolHandler> {
  const { handoffs, config, now } = services;

  return {
    warden_handoff_create: async (raw) => {
      const input = parseInput(HandoffInput, raw);
      const saved = await handoffs.create(input);
      console.error(`[WARDEN] Handoff saved: ${saved.handoff.id}`);
      return {
        success: true,
        handoff_id: saved.handoff.id,
        handoff_path: saved.markdown_path,
        json_path: saved.json_path,
        completed_tasks: saved.handoff.completed_tasks.length,
        next_steps: saved.handoff.next_steps.length,
        artifacts: saved.handoff.artifacts.length,
      };
    },

    warden_handoff_list: async (raw) => {
      const input = parseInput(ListInput, raw);
      const list = await handoffs.list(input.limit);
      return {
        success: true,
        count: list.length,
        handoffs: list.map(h => ({
          id: h.id,
          from_session: h.from_session,
          timestamp: h.timestamp,
          completed_tasks: h.completed_tasks.length,
          next_steps: h.next_steps.length,
        })),
      };
    },

    warden_handoff_load: async (raw) => {
      const input = parseInput(LoadInput, raw);
      const handoff = input.handoff_id ? await handoffs.load(input.handoff_id) : await handoffs.latest();

      if (!handoff) {
        return {
          success: false,
          message: input.handoff_id ? `Handoff "${input.handoff_id}" not found` : 'No handoffs found. Starting fresh.',
        };
      }

      const ageMs = now().getTime() - new Date(handoff.timestamp).getTime();
      const mdPath = handoffs.markdownPath(handoff.id);
      const markdown = existsSync(mdPath) ? readFileSync(mdPath, 'utf-8') : generateHandoffMarkdown(handoff);

      return {
        success: true,
        age_hours: Math.round(ageMs / 3600000 * 10) / 10,
        handoff,
        handoff_markdown: markdown,
      };
    },

    warden_handoff_prune: async (raw) => {
      const input = parseInput(PruneInput, raw);
      const removed = await handoffs.prune(input.keep ?? config.retention.handoffs_keep);
      return { success: true, removed_count: removed.length, removed };
    },
  };
}
