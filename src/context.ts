import { AppSupervisor, type ProcessSpawner } from './app-supervisor.js';
import { createPlaywrightDriver, type BrowserDriver } from './browser-driver.js';
import { BrowserSessionManager } from './browser-session.js';
import type { HarnessSettings } from './config.js';
import { ConsoleLogBuffer, ServerLogQueue } from './log-sink.js';

/**
 * Everything the tool handlers share: settings, both log containers, the
 * browser session and the process supervisor. One per control process.
 */
export interface AppContext {
  readonly settings: HarnessSettings;
  readonly serverLogs: ServerLogQueue;
  readonly consoleLogs: ConsoleLogBuffer;
  readonly browser: BrowserSessionManager;
  readonly supervisor: AppSupervisor;
}

export interface ContextOverrides {
  driver?: BrowserDriver;
  spawnProcess?: ProcessSpawner;
  now?: () => Date;
}

export function createAppContext(settings: HarnessSettings, overrides: ContextOverrides = {}): AppContext {
  const serverLogs = new ServerLogQueue(settings.serverLogQueueLimit);
  const consoleLogs = new ConsoleLogBuffer(settings.consoleLogCapacity);

  const driver = overrides.driver ?? createPlaywrightDriver({ chromePath: settings.chromePath });
  const browser = new BrowserSessionManager(driver, consoleLogs, {
    baseUrl: settings.baseUrl,
    navigateTimeoutMs: settings.navigateTimeoutMs,
    navigateSettleMs: settings.navigateSettleMs,
    clickTimeoutMs: settings.clickTimeoutMs,
    clickSettleMs: settings.clickSettleMs,
    now: overrides.now,
  });

  const supervisor = new AppSupervisor(
    { app: settings.app, startupGraceMs: settings.startupGraceMs },
    { browser, serverLogs, spawnProcess: overrides.spawnProcess },
  );

  return { settings, serverLogs, consoleLogs, browser, supervisor };
}
