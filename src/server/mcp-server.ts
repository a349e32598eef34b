/**
 * Warden MCP Server
 * Quality gates, handoffs and backups across the session lifecycle
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';

import { BackupManager } from '../storage/backup-store.js';
import { WardenDatabase } from '../storage/database.js';
import { HandoffWriter } from '../storage/handoff-store.js';
import { loadConfig } from '../storage/config.js';
import type { WardenConfig } from '../types/index.js';

import type { ToolHandler, WardenServices } from '../tools/shared.js';
import { gateTools, createGateHandlers } from '../tools/gate-tools.js';
import { backupTools, createBackupHandlers } from '../tools/backup-tools.js';
import { handoffTools, createHandoffHandlers } from '../tools/handoff-tools.js';
import { lifecycleTools, createLifecycleHandlers } from '../tools/lifecycle-tools.js';

export const SERVER_VERSION = '1.0.0';

export function createServices(config: WardenConfig): WardenServices {
  const now = (): Date => new Date();
  return {
    config,
    db: new WardenDatabase(config.db_path),
    backups: new BackupManager({ backupsDir: config.backups_dir, rootDir: config.project_dir, now }),
    handoffs: new HandoffWriter({
      handoffsDir: config.handoffs_dir,
      contextFiles: config.context_files,
      contextRoot: config.project_dir,
      contextMaxBytes: config.context_max_bytes,
      now,
    }),
    now,
  };
}

export class WardenMCPServer {
  private server: Server;
  private services: WardenServices;
  private tools: Map<string, Tool>;
  private handlers: Map<string, ToolHandler>;

  constructor(services: WardenServices = createServices(loadConfig())) {
    this.services = services;
    this.tools = new Map();
    this.handlers = new Map();

    this.server = new Server(
      { name: 'session-warden', version: SERVER_VERSION },
      { capabilities: { tools: {} } }
    );

    this.registerAllTools();
    this.setupRequestHandlers();
    this.setupErrorHandling();
  }

  private register(tools: Tool[], handlers: Record<string, ToolHandler>): void {
    for (const tool of tools) {
      const handler = handlers[tool.name];
      if (!handler) {
        throw new Error(`No handler for tool ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
      this.handlers.set(tool.name, handler);
    }
  }

  private registerAllTools(): void {
    this.register(gateTools, createGateHandlers(this.services));
    this.register(backupTools, createBackupHandlers(this.services));
    this.register(handoffTools, createHandoffHandlers(this.services));
    this.register(lifecycleTools, createLifecycleHandlers(this.services));

    console.error(`[WARDEN] Registered ${this.tools.size} tools:`);
    for (const name of this.tools.keys()) {
      console.error(`  - ${name}`);
    }
  }

  listTools(): Tool[] {
    return Array.from(this.tools.values());
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<{ content: Array<{ type: 'text'; text: string }>; isError?: boolean }> {
    const handler = this.handlers.get(name);

    if (!handler) {
      return {
        content: [{ type: 'text' as const, text: JSON.stringify({ error: `Unknown tool: ${name}` }) }],
        isError: true,
      };
    }

    try {
      const result = await handler(args);
      return {
        content: [{ type: 'text' as const, text: JSON.stringify(result, null, 2) }],
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[WARDEN] Error in ${name}:`, message);
      return {
        content: [{ type: 'text' as const, text: JSON.stringify({ error: message }) }],
        isError: true,
      };
    }
  }

  private setupRequestHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: this.listTools(),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      return this.callTool(name, args ?? {});
    });
  }

  private setupErrorHandling(): void {
    this.server.onerror = (error) => {
      console.error('[WARDEN] Server error:', error);
    };
  }

  close(): void {
    this.services.db.close();
  }

  async run(): Promise<void> {
    const shutdown = (): void => {
      console.error('[WARDEN] Shutting down...');
      this.close();
      process.exit(0);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    console.error(`[WARDEN] MCP server running (${this.tools.size} tools, SQLite run history)`);
  }
}
