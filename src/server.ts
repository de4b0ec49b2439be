import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { describeError } from './browser-utils.js';
import type { AppContext } from './context.js';
import {
  clickElement,
  getAppStatus,
  getConsoleLogs,
  getServerLogs,
  navigateTo,
  startApp,
  stopApp,
} from './tools.js';

export const SERVER_NAME = 'webapp-harness';
export const SERVER_VERSION = '0.1.0';

// ---------- Helper ----------

function text(message: string) {
  return { content: [{ type: 'text' as const, text: message }] };
}

/**
 * Runs a handler and always answers with text; nothing thrown reaches the
 * transport.
 */
async function safeTool(name: string, fn: () => string | Promise<string>) {
  try {
    return text(await fn());
  } catch (err) {
    console.error(`[mcp] ${name} failed:`, err);
    return text(`Unexpected error: ${describeError(err)}`);
  }
}

// ---------- MCP Server ----------

export function createHarnessServer(ctx: AppContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  server.registerTool(
    'start_app',
    {
      description:
        'Start the web application as a subprocess and open a headless browser on it to capture console output. Does nothing if the app is already running.',
      inputSchema: {},
    },
    async () => safeTool('start_app', () => startApp(ctx)),
  );

  server.registerTool(
    'stop_app',
    {
      description: 'Stop the web application and close the headless browser.',
      inputSchema: {},
    },
    async () => safeTool('stop_app', () => stopApp(ctx)),
  );

  server.registerTool(
    'get_console_logs',
    {
      description:
        'Get the 20 most recent browser console messages and uncaught page errors, oldest first.',
      inputSchema: {},
    },
    async () => safeTool('get_console_logs', () => getConsoleLogs(ctx)),
  );

  server.registerTool(
    'navigate_to',
    {
      description:
        'Navigate the headless browser to a path in the application and wait for the network to settle.',
      inputSchema: {
        path: z.string().default('/').describe('Path relative to the app, e.g. "/" or "/aroute"'),
      },
    },
    async ({ path }) => safeTool('navigate_to', () => navigateTo(ctx, path)),
  );

  server.registerTool(
    'get_server_logs',
    {
      description:
        'Get the application server output (stdout and stderr) written since the last call, up to the 50 most recent lines.',
      inputSchema: {},
    },
    async () => safeTool('get_server_logs', () => getServerLogs(ctx)),
  );

  server.registerTool(
    'get_app_status',
    {
      description: 'Report whether the application is running, its PID and whether browser capture is active.',
      inputSchema: {},
    },
    async () => safeTool('get_app_status', () => getAppStatus(ctx)),
  );

  server.registerTool(
    'click_element',
    {
      description: 'Click the first element matching a CSS selector on the current page.',
      inputSchema: {
        selector: z.string().describe('CSS selector of the element to click'),
      },
    },
    async ({ selector }) => safeTool('click_element', () => clickElement(ctx, selector)),
  );

  return server;
}
