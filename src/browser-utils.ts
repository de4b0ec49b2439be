import { existsSync } from 'fs';
import { platform } from 'os';

/**
 * Candidate Chrome/Chromium executables per platform, most likely first.
 */
function chromeCandidates(systemPlatform: NodeJS.Platform, env: NodeJS.ProcessEnv): string[] {
  if (systemPlatform === 'darwin') {
    return [
      '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome',
      '/Applications/Chromium.app/Contents/MacOS/Chromium',
      `${env.HOME}/Applications/Google Chrome.app/Contents/MacOS/Google Chrome`,
      `${env.HOME}/Applications/Chromium.app/Contents/MacOS/Chromium`,
    ];
  }
  if (systemPlatform === 'win32') {
    return [
      'C:\\Program Files\\Google\\Chrome\\Application\\chrome.exe',
      'C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe',
      `${env.LOCALAPPDATA}\\Google\\Chrome\\Application\\chrome.exe`,
      'C:\\Program Files\\Chromium\\Application\\chrome.exe',
    ];
  }
  return [
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/snap/bin/chromium',
    '/opt/google/chrome/chrome',
  ];
}

/**
 * Finds a local Chrome installation for playwright-core to launch.
 *
 * An explicit `preferred` path wins when it exists. Returns undefined when
 * nothing is found, in which case Playwright falls back to its own browser
 * cache.
 */
export function findLocalChrome(
  preferred?: string,
  exists: (path: string) => boolean = existsSync,
  systemPlatform: NodeJS.Platform = platform(),
): string | undefined {
  if (preferred && exists(preferred)) {
    return preferred;
  }
  return chromeCandidates(systemPlatform, process.env).find((p) => exists(p));
}

/**
 * Resolves an app-relative path such as `/aroute` against the app's base URL.
 * Throws if the result would leave the app's origin.
 */
export function resolveAppUrl(baseUrl: string, path: string): string {
  const base = new URL(baseUrl);
  const url = new URL(path, base);
  if (url.origin !== base.origin) {
    throw new Error(`Path '${path}' leaves the app at ${base.origin}`);
  }
  return url.toString();
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
