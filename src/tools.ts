/**
 * Tool handlers. Each one takes the shared context and returns the single
 * line of text sent back to the client; failures are reported in that text.
 */

import type { StartResult } from './app-supervisor.js';
import { describeError } from './browser-utils.js';
import { CONSOLE_LOGS_SHOWN, SERVER_LOGS_RETURNED } from './config.js';
import type { AppContext } from './context.js';
import { formatConsoleEntry } from './log-sink.js';

const NOT_RUNNING = 'App is not running. Start the app first.';
const NO_BROWSER = 'Browser is not initialized. Restart the app.';

function describeStart(result: StartResult, baseUrl: string): string {
  switch (result.kind) {
    case 'already-running':
      return 'App is already running.';
    case 'started':
      return result.browserCapture
        ? `App started successfully. Server is running on ${baseUrl} with browser console capture enabled.`
        : `App started successfully. Server is running on ${baseUrl} (browser console capture failed to initialize).`;
    case 'cancelled':
      return 'App was stopped before startup finished.';
    case 'exited': {
      if (result.error) {
        return `Failed to start app: ${result.error.message}`;
      }
      const reason = result.signal ? `signal ${result.signal}` : `exit code ${result.exitCode ?? 'unknown'}`;
      return `App exited during startup (${reason}). Check get_server_logs() for details.`;
    }
  }
}

export async function startApp(ctx: AppContext): Promise<string> {
  return describeStart(await ctx.supervisor.start(), ctx.settings.baseUrl);
}

export async function stopApp(ctx: AppContext): Promise<string> {
  const result = await ctx.supervisor.stop();
  return result.kind === 'stopped' ? 'App stopped successfully.' : 'App is not running.';
}

export function getAppStatus(ctx: AppContext): string {
  const status = ctx.supervisor.status();
  if (!status.running) {
    return 'App is not running';
  }
  const capture = status.browserCapture ? 'Browser console capture enabled' : 'Browser not initialized';
  return `App is running (PID: ${status.pid ?? 'unknown'}). ${capture}`;
}

export function getConsoleLogs(ctx: AppContext): string {
  if (!ctx.supervisor.isRunning) {
    return 'App is not running. Start the app first to capture console logs.';
  }
  const entries = ctx.consoleLogs.recent(CONSOLE_LOGS_SHOWN);
  if (entries.length === 0) {
    return 'No browser console logs captured yet. Use navigate_to() to visit pages and generate logs.';
  }
  return entries.map(formatConsoleEntry).join('\n');
}

/**
 * Returns whatever the app has written since the last call. Lines still in
 * flight in the relay turn up in a later call.
 */
export function getServerLogs(ctx: AppContext): string {
  const lines = ctx.serverLogs.drain();
  if (lines.length === 0) {
    return ctx.supervisor.isRunning
      ? 'No new server logs. Server is running.'
      : 'No server logs. Server is not running.';
  }
  return lines.slice(-SERVER_LOGS_RETURNED).join('\n');
}

export async function navigateTo(ctx: AppContext, path = '/'): Promise<string> {
  if (!ctx.supervisor.isRunning) return NOT_RUNNING;
  if (!ctx.browser.isActive) return NO_BROWSER;

  try {
    const url = await ctx.browser.navigate(path);
    return `Navigated to ${url}`;
  } catch (err) {
    return `Failed to navigate: ${describeError(err)}`;
  }
}

export async function clickElement(ctx: AppContext, selector: string): Promise<string> {
  if (!ctx.supervisor.isRunning) return NOT_RUNNING;
  if (!ctx.browser.isActive) return NO_BROWSER;

  try {
    await ctx.browser.click(selector);
    return `Clicked element: ${selector}`;
  } catch (err) {
    return `Failed to click element '${selector}': ${describeError(err)}`;
  }
}
