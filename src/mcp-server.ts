#!/usr/bin/env node

/**
 * MCP server that supervises the demo web app.
 *
 * Keeps the app's child process and the headless browser pointed at it
 * in-process, so server output and console messages accumulate between tool
 * calls and can be read back by the client.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { join } from 'path';
import dotenv from 'dotenv';
import { PROJECT_ROOT, loadSettings } from './config.js';
import { createAppContext } from './context.js';
import { createHarnessServer } from './server.js';

dotenv.config({ path: join(PROJECT_ROOT, '.env') });

const ctx = createAppContext(loadSettings());
const server = createHarnessServer(ctx);

// ---------- Start ----------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`[mcp] Ready; app base URL ${ctx.settings.baseUrl}`);
}

main().catch((err) => {
  console.error('MCP server failed to start:', err);
  process.exit(1);
});

// Cleanup on exit
async function shutdown() {
  try {
    await ctx.supervisor.stop();
  } catch (err) {
    console.error('[mcp] Cleanup failed:', err);
  }
  process.exit(0);
}

process.on('SIGINT', () => void shutdown());
process.on('SIGTERM', () => void shutdown());
