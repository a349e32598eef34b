/**
 * Warden Handoff Store
 * Session handoffs persisted as a markdown + JSON pair sharing one id
 *
 * The markdown file claims the id (exclusive create); the JSON twin is
 * written last via temp + rename and marks the handoff as committed.
 */

import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { isAbsolute, join, resolve } from 'path';
import { generateHandoffMarkdown } from '../handoff/markdown.js';
import { toTaskList } from '../handoff/extract-tasks.js';
import type { RecordScan, SavedHandoff, SessionData, StoredHandoff } from '../types/index.js';
import {
  MAX_ID_ATTEMPTS,
  StoredHandoffSchema,
  describeError,
  isErrno,
  newestFirst,
  timestampId,
  withSequence,
} from './records.js';

const HANDOFF_ID_PATTERN = /^handoff-[A-Za-z0-9_-]+$/;
const DEFAULT_CONTEXT_MAX_BYTES = 16 * 1024;

export interface HandoffWriterOptions {
  handoffsDir: string;
  /** Files captured verbatim into `context_snapshot`, keyed by the path given here. */
  contextFiles?: readonly string[];
  contextRoot?: string;
  contextMaxBytes?: number;
  now?: () => Date;
}

function sessionSuffix(fromSession: string): string {
  if (fromSession === 'current') return 'now';
  const cleaned = fromSession.replace(/[^A-Za-z0-9_-]+/g, '-').replace(/^-+|-+$/g, '').slice(0, 40);
  return cleaned || 'now';
}

export class HandoffWriter {
  private readonly handoffsDir: string;
  private readonly contextFiles: readonly string[];
  private readonly contextRoot: string;
  private readonly contextMaxBytes: number;
  private readonly now: () => Date;

  constructor(options: HandoffWriterOptions) {
    this.handoffsDir = resolve(options.handoffsDir);
    this.contextFiles = options.contextFiles ?? [];
    this.contextRoot = resolve(options.contextRoot ?? process.cwd());
    this.contextMaxBytes = options.contextMaxBytes ?? DEFAULT_CONTEXT_MAX_BYTES;
    this.now = options.now ?? (() => new Date());
  }

  async create(session: SessionData): Promise<SavedHandoff> {
    const created = this.now();
    const fromSession = session.session_id?.trim() || 'current';
    const captured = await this.captureContext();

    await fs.mkdir(this.handoffsDir, { recursive: true });
    const base = `handoff-${timestampId(created)}-${sessionSuffix(fromSession)}`;

    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = withSequence(base, attempt);
      const handoff: StoredHandoff = {
        id,
        from_session: fromSession,
        to_session: session.to_session?.trim() || 'next',
        completed_tasks: toTaskList(session.completed_tasks),
        next_steps: toTaskList(session.next_steps),
        artifacts: [...(session.artifacts ?? [])],
        timestamp: created.toISOString(),
        context_snapshot: { ...(session.context ?? {}), ...captured },
        notes: session.notes ?? '',
      };

      const markdownPath = join(this.handoffsDir, `${id}.md`);
      try {
        await fs.writeFile(markdownPath, generateHandoffMarkdown(handoff), { encoding: 'utf-8', flag: 'wx' });
      } catch (error) {
        if (isErrno(error, 'EEXIST')) continue;
        throw error;
      }

      const jsonPath = join(this.handoffsDir, `${id}.json`);
      const tmpPath = `${jsonPath}.tmp`;
      try {
        await fs.writeFile(tmpPath, JSON.stringify(handoff, null, 2), 'utf-8');
        await fs.rename(tmpPath, jsonPath);
      } catch (error) {
        await fs.rm(markdownPath, { force: true });
        await fs.rm(tmpPath, { force: true });
        throw error;
      }

      return { handoff, markdown_path: markdownPath, json_path: jsonPath };
    }

    throw new Error(`Handoff id collision: ${base} exhausted ${MAX_ID_ATTEMPTS} attempts`);
  }

  async scan(): Promise<RecordScan<StoredHandoff>> {
    const scan: RecordScan<StoredHandoff> = { entries: [], corrupt: [], incomplete: [] };

    let names: string[];
    try {
      names = await fs.readdir(this.handoffsDir);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return scan;
      throw error;
    }

    const committed = new Set(names.filter(n => n.endsWith('.json')).map(n => n.slice(0, -'.json'.length)));
    for (const name of names) {
      if (name.endsWith('.md') && !committed.has(name.slice(0, -'.md'.length))) {
        scan.incomplete.push(name.slice(0, -'.md'.length));
      }
    }

    for (const id of committed) {
      const loaded = await this.readRecord(id);
      if (loaded.kind === 'ok') scan.entries.push(loaded.handoff);
      else if (loaded.kind === 'corrupt') scan.corrupt.push(id);
    }

    scan.entries.sort(newestFirst<StoredHandoff>(h => h.id));
    return scan;
  }

  async list(limit: number = 10): Promise<StoredHandoff[]> {
    const scan = await this.scan();
    for (const id of scan.corrupt) {
      console.error(`[WARDEN] Skipping unreadable handoff: ${id}`);
    }
    return scan.entries.slice(0, Math.max(0, limit));
  }

  async load(id: string): Promise<StoredHandoff | null> {
    if (!HANDOFF_ID_PATTERN.test(id)) return null;
    const loaded = await this.readRecord(id);
    if (loaded.kind === 'corrupt') {
      console.error(`[WARDEN] Unreadable handoff ${id}: ${loaded.reason}`);
      return null;
    }
    return loaded.kind === 'ok' ? loaded.handoff : null;
  }

  async latest(): Promise<StoredHandoff | null> {
    const [newest] = await this.list(1);
    return newest ?? null;
  }

  markdownPath(id: string): string {
    return join(this.handoffsDir, `${id}.md`);
  }

  /** Delete all but the `keep` newest committed handoffs (both files). Returns removed ids. */
  async prune(keep: number): Promise<string[]> {
    const { entries } = await this.scan();
    const stale = entries.slice(Math.max(0, Math.trunc(keep)));
    for (const handoff of stale) {
      // JSON first: once it is gone the pair is no longer listed
      await fs.rm(join(this.handoffsDir, `${handoff.id}.json`), { force: true });
      await fs.rm(join(this.handoffsDir, `${handoff.id}.md`), { force: true });
    }
    return stale.map(h => h.id);
  }

  private async captureContext(): Promise<Record<string, string>> {
    const snapshot: Record<string, string> = {};
    for (const file of this.contextFiles) {
      const path = isAbsolute(file) ? file : join(this.contextRoot, file);
      let handle: FileHandle | undefined;
      try {
        handle = await fs.open(path, 'r');
        const buffer = Buffer.alloc(this.contextMaxBytes);
        const { bytesRead } = await handle.read(buffer, 0, this.contextMaxBytes, 0);
        snapshot[file] = buffer.subarray(0, bytesRead).toString('utf-8');
      } catch (error) {
        if (!isErrno(error, 'ENOENT')) {
          console.error(`[WARDEN] Cannot capture context file ${file}:`, describeError(error));
        }
      } finally {
        await handle?.close();
      }
    }
    return snapshot;
  }

  /** Reads `<id>.json`; a record whose body names another id is corrupt. */
  private async readRecord(
    id: string,
  ): Promise<{ kind: 'ok'; handoff: StoredHandoff } | { kind: 'missing' } | { kind: 'corrupt'; reason: string }> {
    let raw: string;
    try {
      raw = await fs.readFile(join(this.handoffsDir, `${id}.json`), 'utf-8');
    } catch (error) {
      if (isErrno(error, 'ENOENT')) return { kind: 'missing' };
      return { kind: 'corrupt', reason: describeError(error) };
    }

    try {
      const parsed = StoredHandoffSchema.safeParse(JSON.parse(raw));
      if (!parsed.success) return { kind: 'corrupt', reason: parsed.error.message };
      if (parsed.data.id !== id || !HANDOFF_ID_PATTERN.test(id)) {
        return { kind: 'corrupt', reason: `id ${JSON.stringify(parsed.data.id)} does not match file ${id}.json` };
      }
      return { kind: 'ok', handoff: parsed.data };
    } catch (error) {
      return { kind: 'corrupt', reason: describeError(error) };
    }
  }
}
