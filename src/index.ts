#!/usr/bin/env node
/**
 * session-warden - Entry Point
 * Version: 1.0.0
 *
 * Quality gates before a session ends, handoffs and backups before it compacts.
 */

import { WardenMCPServer } from './server/mcp-server.js';

async function main(): Promise<void> {
  const server = new WardenMCPServer();
  await server.run();
}

main().catch((error) => {
  console.error('[WARDEN] Fatal:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
