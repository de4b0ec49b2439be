/**
 * The slice of browser automation the harness needs, and its Playwright
 * implementation.
 *
 * The session manager only talks to these interfaces, which keeps Playwright's
 * overloaded event API out of the rest of the code and lets tests substitute
 * an in-process page.
 */

import { chromium } from 'playwright-core';
import { findLocalChrome } from './browser-utils.js';

export interface ConsoleEvent {
  type: string;
  text: string;
  args: string[];
}

export interface NavigationResult {
  status: number;
  statusText: string;
}

export interface DriverPage {
  url(): string;
  onConsole(listener: (event: ConsoleEvent) => void): void;
  onPageError(listener: (error: Error) => void): void;
  /** Resolves with the main response, or null when there was none (e.g. same-document navigation). */
  goto(url: string, timeoutMs: number): Promise<NavigationResult | null>;
  click(selector: string, timeoutMs: number): Promise<void>;
}

export interface DriverSession {
  readonly page: DriverPage;
  close(): Promise<void>;
}

export interface BrowserDriver {
  launch(): Promise<DriverSession>;
}

export interface PlaywrightDriverOptions {
  /** Explicit Chrome/Chromium executable; auto-detected when omitted. */
  chromePath?: string;
}

export function createPlaywrightDriver(options: PlaywrightDriverOptions = {}): BrowserDriver {
  return {
    async launch() {
      const executablePath = findLocalChrome(options.chromePath);
      console.error(`[browser] Launching headless Chromium (${executablePath ?? 'playwright default'})`);

      const browser = await chromium.launch({ headless: true, executablePath });
      const page = await browser.newPage().catch(async (err: unknown) => {
        await browser.close();
        throw err;
      });

      return {
        page: {
          url: () => page.url(),
          onConsole(listener) {
            page.on('console', (msg) => {
              listener({
                type: msg.type(),
                text: msg.text(),
                args: msg.args().map((arg) => arg.toString()),
              });
            });
          },
          onPageError(listener) {
            page.on('pageerror', listener);
          },
          async goto(url, timeoutMs) {
            const response = await page.goto(url, { waitUntil: 'networkidle', timeout: timeoutMs });
            return response ? { status: response.status(), statusText: response.statusText() } : null;
          },
          async click(selector, timeoutMs) {
            await page.click(selector, { timeout: timeoutMs });
          },
        },
        async close() {
          await browser.close();
        },
      };
    },
  };
}
