/**
 * Warden Config
 * Configuration loading, defaults and validation
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { z } from 'zod';
import { DEFAULT_THRESHOLDS, SEVERITY_ORDER } from '../gates/alerts.js';
import type { Gate, WardenConfig } from '../types/index.js';

export class ConfigError extends Error {
  constructor(message: string, readonly configPath: string) {
    super(`${message} (${configPath})`);
    this.name = 'ConfigError';
  }
}

const GateSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  command: z.string().min(1),
  required: z.boolean().default(true),
  critical: z.boolean().default(false),
  timeout_ms: z.number().int().positive().default(60_000),
  file_patterns: z.array(z.string()).default([]),
});

const RateSchema = z.number().min(0).max(1);
const ThresholdSchema = z.object({ failure_rate: RateSchema, timeout_rate: RateSchema });

const ThresholdTableSchema = z
  .object({
    CRITICAL: ThresholdSchema.optional(),
    HIGH: ThresholdSchema.optional(),
    MEDIUM: ThresholdSchema.optional(),
    LOW: ThresholdSchema.optional(),
    INFO: ThresholdSchema.optional(),
  })
  .superRefine((table, ctx) => {
    // Thresholds must not increase as severity decreases
    let previous: { severity: string; failure_rate: number; timeout_rate: number } | null = null;
    for (const severity of SEVERITY_ORDER) {
      const current = table[severity];
      if (!current) continue;
      if (previous && (current.failure_rate > previous.failure_rate || current.timeout_rate > previous.timeout_rate)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [severity],
          message: `${severity} thresholds exceed ${previous.severity} thresholds`,
        });
      }
      previous = { severity, ...current };
    }
  });

const FileConfigSchema = z.object({
  backups_dir: z.string().optional(),
  handoffs_dir: z.string().optional(),
  db_path: z.string().optional(),
  gates: z
    .array(GateSchema)
    .superRefine((gates, ctx) => {
      const seen = new Set<string>();
      gates.forEach((gate, index) => {
        if (seen.has(gate.name)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'name'], message: `Duplicate gate name: ${gate.name}` });
        }
        seen.add(gate.name);
      });
    })
    .optional(),
  thresholds: ThresholdTableSchema.optional(),
  orchestrator: z
    .object({
      mode: z.enum(['parallel', 'sequential']).default('parallel'),
      fail_fast: z.boolean().default(true),
      global_timeout_ms: z.number().int().positive().default(120_000),
      max_concurrency: z.number().int().positive().default(4),
    })
    .optional(),
  retention: z
    .object({
      backups_keep: z.number().int().nonnegative().default(10),
      handoffs_keep: z.number().int().nonnegative().default(30),
      runs_keep: z.number().int().nonnegative().default(200),
    })
    .optional(),
  context_files: z.array(z.string()).optional(),
  context_max_bytes: z.number().int().positive().optional(),
  recent_files_window_ms: z.number().int().positive().optional(),
});

export const DEFAULT_GATES: Gate[] = [
  {
    name: 'typecheck',
    description: 'TypeScript type check',
    command: 'npx --no-install tsc --noEmit',
    required: true,
    critical: true,
    timeout_ms: 120_000,
    file_patterns: ['*.ts', '*.tsx'],
  },
  {
    name: 'tests',
    description: 'Project test suite',
    command: 'npm test --silent',
    required: true,
    critical: false,
    timeout_ms: 300_000,
    file_patterns: [],
  },
  {
    name: 'format-check',
    description: 'Formatting check',
    command: 'npx --no-install prettier --check .',
    required: false,
    critical: false,
    timeout_ms: 60_000,
    file_patterns: ['*.ts', '*.tsx', '*.js', '*.jsx', '*.md'],
  },
];

export function defaultDataDir(): string {
  return process.env.WARDEN_DATA_DIR || join(homedir(), '.session-warden');
}

export function buildDefaults(dataDir: string): WardenConfig {
  return {
    data_dir: dataDir,
    backups_dir: join(dataDir, 'backups'),
    handoffs_dir: join(dataDir, 'handoffs'),
    db_path: join(dataDir, 'state.db'),
    project_dir: resolve(process.env.WARDEN_PROJECT_DIR || process.cwd()),
    gates: DEFAULT_GATES,
    thresholds: DEFAULT_THRESHOLDS,
    orchestrator: { mode: 'parallel', fail_fast: true, global_timeout_ms: 120_000, max_concurrency: 4 },
    retention: { backups_keep: 10, handoffs_keep: 30, runs_keep: 200 },
    context_files: ['CLAUDE.md', '.context/identity.md', '.context/projects.md', '.context/preferences.md', '.context/rules.md'],
    context_max_bytes: 16 * 1024,
    recent_files_window_ms: 60 * 60 * 1000,
  };
}

/** The part of the config that belongs in config.json; paths and project dir are derived. */
function persistable(config: WardenConfig): Record<string, unknown> {
  return {
    gates: config.gates,
    thresholds: config.thresholds,
    orchestrator: config.orchestrator,
    retention: config.retention,
    context_files: config.context_files,
    context_max_bytes: config.context_max_bytes,
    recent_files_window_ms: config.recent_files_window_ms,
  };
}

export function loadConfig(dataDir: string = defaultDataDir()): WardenConfig {
  const defaults = buildDefaults(dataDir);
  const configPath = join(dataDir, 'config.json');

  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }

  let config: WardenConfig;
  if (!existsSync(configPath)) {
    writeFileSync(configPath, JSON.stringify(persistable(defaults), null, 2), 'utf-8');
    config = defaults;
  } else {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(configPath, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Unparsable config: ${error instanceof Error ? error.message : String(error)}`, configPath);
    }

    const parsed = FileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
      throw new ConfigError(`Invalid config: ${issues}`, configPath);
    }

    const file = parsed.data;
    config = {
      ...defaults,
      backups_dir: file.backups_dir ?? defaults.backups_dir,
      handoffs_dir: file.handoffs_dir ?? defaults.handoffs_dir,
      db_path: file.db_path ?? defaults.db_path,
      gates: file.gates ?? defaults.gates,
      thresholds: file.thresholds ?? defaults.thresholds,
      orchestrator: file.orchestrator ?? defaults.orchestrator,
      retention: file.retention ?? defaults.retention,
      context_files: file.context_files ?? defaults.context_files,
      context_max_bytes: file.context_max_bytes ?? defaults.context_max_bytes,
      recent_files_window_ms: file.recent_files_window_ms ?? defaults.recent_files_window_ms,
    };
  }

  for (const dir of [config.backups_dir, config.handoffs_dir]) {
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  return config;
}
