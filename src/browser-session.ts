import type { BrowserDriver, ConsoleEvent, DriverSession } from './browser-driver.js';
import { describeError, resolveAppUrl } from './browser-utils.js';
import { formatTimestamp, type ConsoleLogBuffer, type ConsoleLogEntry } from './log-sink.js';

export interface BrowserSessionOptions {
  baseUrl: string;
  navigateTimeoutMs: number;
  navigateSettleMs: number;
  clickTimeoutMs: number;
  clickSettleMs: number;
  now?: () => Date;
}

const delay = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Owns the single headless browser and page pointed at the supervised app,
 * and feeds the page's console output into the console log buffer.
 */
export class BrowserSessionManager {
  private session: DriverSession | null = null;
  /** Bumped by every teardown so a launch that outlives it can be discarded. */
  private generation = 0;
  private readonly now: () => Date;

  constructor(
    private readonly driver: BrowserDriver,
    private readonly consoleLogs: ConsoleLogBuffer,
    private readonly options: BrowserSessionOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get isActive(): boolean {
    return this.session !== null;
  }

  /**
   * Replaces any existing session with a fresh browser and page, and clears
   * the console buffer. Returns false if the browser could not be launched,
   * or if a teardown ran while it was launching.
   */
  async setup(): Promise<boolean> {
    await this.teardown();
    this.consoleLogs.clear();
    const generation = this.generation;

    let session: DriverSession;
    try {
      session = await this.driver.launch();
    } catch (err) {
      console.error(`[browser] Console capture disabled: ${describeError(err)}`);
      return false;
    }

    if (generation !== this.generation) {
      console.error('[browser] Session torn down during launch; closing it');
      await this.closeSession(session);
      return false;
    }

    const { page } = session;

    page.onConsole((event: ConsoleEvent) => {
      this.record(session, {
        level: event.type,
        message: event.text,
        timestamp: formatTimestamp(this.now()),
        url: page.url(),
        args: event.args,
      });
    });

    page.onPageError((error: Error) => {
      this.record(session, {
        level: 'error',
        message: `Page Error: ${error.message}`,
        timestamp: formatTimestamp(this.now()),
        url: page.url(),
        args: [],
      });
    });

    this.session = session;
    return true;
  }

  /**
   * Closes the browser if one is open. Safe to call at any time.
   */
  async teardown(): Promise<void> {
    this.generation++;
    const session = this.session;
    if (!session) return;
    this.session = null;
    await this.closeSession(session);
  }

  private async closeSession(session: DriverSession): Promise<void> {
    try {
      await session.close();
    } catch (err) {
      console.error(`[browser] Failed to close browser: ${describeError(err)}`);
    }
  }

  /**
   * Loads `path` relative to the app and waits for the network to go idle.
   * Throws if the load fails or the server answers with an error status.
   */
  async navigate(path: string): Promise<string> {
    const page = this.requirePage();
    const url = resolveAppUrl(this.options.baseUrl, path);

    const response = await page.goto(url, this.options.navigateTimeoutMs);
    if (response && response.status >= 400) {
      throw new Error(`HTTP ${response.status} ${response.statusText} at ${url}`);
    }

    await delay(this.options.navigateSettleMs);
    return url;
  }

  async click(selector: string): Promise<void> {
    const page = this.requirePage();
    await page.click(selector, this.options.clickTimeoutMs);
    await delay(this.options.clickSettleMs);
  }

  private requirePage() {
    if (!this.session) {
      throw new Error('Browser is not initialized');
    }
    return this.session.page;
  }

  private record(source: DriverSession, entry: ConsoleLogEntry): void {
    // Late events from a closed session.
    if (this.session !== source) return;
    this.consoleLogs.record(entry);
  }
}
