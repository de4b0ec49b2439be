import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { AppCommand } from './app-supervisor.js';
import { createAppContext } from './context.js';
import { FakeChild, FakeDriver, FakeSpawner, gate, testSettings } from './testing/fakes.js';
import {
  clickElement,
  getAppStatus,
  getConsoleLogs,
  getServerLogs,
  navigateTo,
  startApp,
  stopApp,
} from './tools.js';

function setup(options: { startupGraceMs?: number; spawn?: (app: AppCommand) => FakeChild } = {}) {
  const spawner = new FakeSpawner();
  const driver = new FakeDriver();
  const ctx = createAppContext(testSettings({ startupGraceMs: options.startupGraceMs ?? 0 }), {
    driver,
    spawnProcess: options.spawn ?? spawner.spawn,
    now: () => new Date(2026, 4, 6, 7, 8, 9),
  });
  return { ctx, spawner, driver };
}

describe('tools', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('start_app / stop_app / get_app_status', () => {
    it('starts once and reports already running on the second call', async () => {
      const { ctx, spawner } = setup();

      expect(await startApp(ctx)).toBe(
        'App started successfully. Server is running on http://localhost:5001 with browser console capture enabled.',
      );
      expect(await startApp(ctx)).toBe('App is already running.');
      expect(spawner.children).toHaveLength(1);
      expect(getAppStatus(ctx)).toBe('App is running (PID: 1000). Browser console capture enabled');
    });

    it('mentions a failed browser launch', async () => {
      const { ctx, driver } = setup();
      driver.launchError = new Error('Executable does not exist');

      expect(await startApp(ctx)).toBe(
        'App started successfully. Server is running on http://localhost:5001 (browser console capture failed to initialize).',
      );
      expect(getAppStatus(ctx)).toBe('App is running (PID: 1000). Browser not initialized');
      expect(await navigateTo(ctx, '/')).toBe('Browser is not initialized. Restart the app.');
      expect(await clickElement(ctx, '#broken-button')).toBe('Browser is not initialized. Restart the app.');
    });

    it('reports a child that exits during startup', async () => {
      const spawner = new FakeSpawner();
      const { ctx } = setup({
        startupGraceMs: 20,
        spawn: (app) => {
          const child = spawner.spawn(app);
          queueMicrotask(() => child.exit(1));
          return child;
        },
      });

      expect(await startApp(ctx)).toBe(
        'App exited during startup (exit code 1). Check get_server_logs() for details.',
      );
      expect(getAppStatus(ctx)).toBe('App is not running');
    });

    it('reports a command that cannot be spawned', async () => {
      const { ctx } = setup({
        startupGraceMs: 20,
        spawn: () => {
          const child = new FakeChild(undefined);
          queueMicrotask(() => child.emit('error', new Error('spawn python ENOENT')));
          return child;
        },
      });

      expect(await startApp(ctx)).toBe('Failed to start app: spawn python ENOENT');
    });

    it('stops the app and releases the browser', async () => {
      const { ctx, driver } = setup();
      await startApp(ctx);

      expect(await stopApp(ctx)).toBe('App stopped successfully.');
      expect(getAppStatus(ctx)).toBe('App is not running');
      expect(driver.current?.closed).toBe(true);
    });

    it('does not show the previous run\'s console logs after a restart without a browser', async () => {
      const { ctx, driver } = setup();
      await startApp(ctx);
      driver.current?.page.emitConsole('log', 'from first run');
      await stopApp(ctx);

      driver.launchError = new Error('Executable does not exist');
      expect(await startApp(ctx)).toBe(
        'App started successfully. Server is running on http://localhost:5001 (browser console capture failed to initialize).',
      );
      expect(getConsoleLogs(ctx)).toBe(
        'No browser console logs captured yet. Use navigate_to() to visit pages and generate logs.',
      );
    });

    it('releases the browser when stopped while it is still launching', async () => {
      const { ctx, driver } = setup();
      const launch = gate();
      driver.launchGate = launch.promise;

      const starting = startApp(ctx);
      await vi.waitFor(() => expect(driver.launches).toBe(1));
      expect(await stopApp(ctx)).toBe('App stopped successfully.');
      launch.open();

      expect(await starting).toBe('App was stopped before startup finished.');
      expect(ctx.browser.isActive).toBe(false);
      expect(getAppStatus(ctx)).toBe('App is not running');
    });

    // Deliberate change: stop with no live process no longer claims success.
    it('reports not running when there is nothing to stop', async () => {
      const { ctx } = setup();

      expect(await stopApp(ctx)).toBe('App is not running.');
      expect(getAppStatus(ctx)).toBe('App is not running');
    });
  });

  describe('get_console_logs', () => {
    it('reports that the app is not running before any start', () => {
      const { ctx } = setup();
      expect(getConsoleLogs(ctx)).toBe('App is not running. Start the app first to capture console logs.');
    });

    it('reports when nothing has been captured yet', async () => {
      const { ctx } = setup();
      await startApp(ctx);
      expect(getConsoleLogs(ctx)).toBe(
        'No browser console logs captured yet. Use navigate_to() to visit pages and generate logs.',
      );
    });

    it('shows the 20 most recent entries, newest last', async () => {
      const { ctx, driver } = setup();
      await startApp(ctx);
      await navigateTo(ctx, '/');

      const page = driver.current?.page;
      for (let i = 1; i <= 25; i++) page?.emitConsole('log', `msg ${i}`);
      page?.emitPageError('boom');

      const lines = getConsoleLogs(ctx).split('\n');
      expect(lines).toHaveLength(20);
      expect(lines[0]).toBe('[2026-05-06 07:08:09] [LOG] msg 7 - http://localhost:5001/');
      expect(lines[19]).toBe('[2026-05-06 07:08:09] [ERROR] Page Error: boom - http://localhost:5001/');
    });

    it('never reflects entries older than the newest 100', async () => {
      const { ctx, driver } = setup();
      await startApp(ctx);
      for (let i = 1; i <= 130; i++) driver.current?.page.emitConsole('info', `event ${i}`);

      expect(ctx.consoleLogs.size).toBe(100);
      expect(ctx.consoleLogs.recent(100)[0].message).toBe('event 31');
    });
  });

  describe('get_server_logs', () => {
    it('returns the last 50 drained lines and never repeats them', async () => {
      const { ctx, spawner } = setup();
      await startApp(ctx);

      for (let i = 1; i <= 60; i++) spawner.last?.stdout.write(`line ${i}\n`);
      await vi.waitFor(() => expect(ctx.serverLogs.size).toBe(60));

      const expected = Array.from({ length: 50 }, (_, i) => `line ${i + 11}`).join('\n');
      expect(getServerLogs(ctx)).toBe(expected);
      expect(getServerLogs(ctx)).toBe('No new server logs. Server is running.');
    });

    it('explains an empty queue when the app is not running', () => {
      const { ctx } = setup();
      expect(getServerLogs(ctx)).toBe('No server logs. Server is not running.');
    });

    it('still returns lines written before the app stopped', async () => {
      const { ctx, spawner } = setup();
      await startApp(ctx);
      spawner.last?.stderr.write('Traceback: boom\n');
      await vi.waitFor(() => expect(ctx.serverLogs.size).toBe(1));
      await stopApp(ctx);

      expect(getServerLogs(ctx)).toBe('Traceback: boom');
      expect(getServerLogs(ctx)).toBe('No server logs. Server is not running.');
    });
  });

  describe('navigate_to', () => {
    it('refuses when the app is not running', async () => {
      const { ctx } = setup();
      expect(await navigateTo(ctx)).toBe('App is not running. Start the app first.');
    });

    it('navigates to the root by default', async () => {
      const { ctx } = setup();
      await startApp(ctx);
      expect(await navigateTo(ctx)).toBe('Navigated to http://localhost:5001/');
    });

    it('reports an error status without affecting the app', async () => {
      const { ctx, driver } = setup();
      await startApp(ctx);
      const page = driver.current?.page;
      if (page) page.response = { status: 404, statusText: 'Not Found' };

      expect(await navigateTo(ctx, '/missing')).toBe(
        'Failed to navigate: HTTP 404 Not Found at http://localhost:5001/missing',
      );
      expect(getAppStatus(ctx)).toBe('App is running (PID: 1000). Browser console capture enabled');
    });

    it('refuses a path that points at another host', async () => {
      const { ctx, driver } = setup();
      await startApp(ctx);

      expect(await navigateTo(ctx, '//example.com/x')).toBe(
        "Failed to navigate: Path '//example.com/x' leaves the app at http://localhost:5001",
      );
      expect(driver.current?.page.url()).toBe('about:blank');
    });

    it('reports a load failure', async () => {
      const { ctx, driver } = setup();
      await startApp(ctx);
      const page = driver.current?.page;
      if (page) page.gotoError = new Error('net::ERR_CONNECTION_REFUSED at http://localhost:5001/');

      expect(await navigateTo(ctx, '/')).toBe(
        'Failed to navigate: net::ERR_CONNECTION_REFUSED at http://localhost:5001/',
      );
    });
  });

  describe('click_element', () => {
    it('refuses when the app is not running', async () => {
      const { ctx } = setup();
      expect(await clickElement(ctx, '#broken-button')).toBe('App is not running. Start the app first.');
    });

    it('clicks a matching element', async () => {
      const { ctx, driver } = setup();
      await startApp(ctx);

      expect(await clickElement(ctx, '#broken-button')).toBe('Clicked element: #broken-button');
      expect(driver.current?.page.clicked).toEqual(['#broken-button']);
    });

    it('names the selector when nothing matches', async () => {
      const { ctx } = setup();
      await startApp(ctx);

      expect(await clickElement(ctx, '#does-not-exist')).toBe(
        "Failed to click element '#does-not-exist': Timeout 1000ms exceeded waiting for locator('#does-not-exist')",
      );
      expect(getAppStatus(ctx)).toBe('App is running (PID: 1000). Browser console capture enabled');
    });
  });
});
