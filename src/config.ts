import { basename, dirname, extname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { AppCommand } from './app-supervisor.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// src/config.ts -> project root, or dist/src/config.js -> project root
export const PROJECT_ROOT =
  basename(dirname(__dirname)) === 'dist' ? resolve(__dirname, '..', '..') : resolve(__dirname, '..');

/** Number of console entries `get_console_logs` shows. */
export const CONSOLE_LOGS_SHOWN = 20;
/** Maximum number of lines one `get_server_logs` call returns. */
export const SERVER_LOGS_RETURNED = 50;

const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  APP_HOST: z.string().min(1).default('localhost'),
  APP_PORT: z.coerce.number().int().min(1).max(65535).default(5001),
  APP_COMMAND: z.string().min(1).optional(),
  APP_ARGS: z.string().optional(),
  CHROME_PATH: z.string().min(1).optional(),
  STARTUP_GRACE_MS: millis(2000),
  NAVIGATE_TIMEOUT_MS: millis(30_000),
  NAVIGATE_SETTLE_MS: millis(1000),
  CLICK_TIMEOUT_MS: millis(10_000),
  CLICK_SETTLE_MS: millis(500),
  CONSOLE_LOG_CAPACITY: z.coerce.number().int().positive().default(100),
  SERVER_LOG_QUEUE_LIMIT: z.coerce.number().int().nonnegative().default(0),
});

export interface HarnessSettings {
  baseUrl: string;
  app: AppCommand;
  chromePath?: string;
  startupGraceMs: number;
  navigateTimeoutMs: number;
  navigateSettleMs: number;
  clickTimeoutMs: number;
  clickSettleMs: number;
  consoleLogCapacity: number;
  serverLogQueueLimit: number;
}

/**
 * The bundled demo app, run through tsx when the harness itself runs from
 * TypeScript sources.
 */
function demoAppArgs(): string[] {
  const ext = extname(__filename);
  const entry = join(__dirname, `demo-app${ext}`);
  return ext === '.ts' ? ['--import', 'tsx', entry] : [entry];
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): HarnessSettings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const vars = parsed.data;

  const command = vars.APP_COMMAND ?? process.execPath;
  const args = vars.APP_COMMAND
    ? (vars.APP_ARGS ?? '').split(/\s+/).filter(Boolean)
    : demoAppArgs();

  return {
    baseUrl: `http://${vars.APP_HOST}:${vars.APP_PORT}`,
    app: {
      command,
      args,
      cwd: PROJECT_ROOT,
      env: { ...env, APP_HOST: vars.APP_HOST, APP_PORT: String(vars.APP_PORT) },
    },
    chromePath: vars.CHROME_PATH,
    startupGraceMs: vars.STARTUP_GRACE_MS,
    navigateTimeoutMs: vars.NAVIGATE_TIMEOUT_MS,
    navigateSettleMs: vars.NAVIGATE_SETTLE_MS,
    clickTimeoutMs: vars.CLICK_TIMEOUT_MS,
    clickSettleMs: vars.CLICK_SETTLE_MS,
    consoleLogCapacity: vars.CONSOLE_LOG_CAPACITY,
    serverLogQueueLimit: vars.SERVER_LOG_QUEUE_LIMIT,
  };
}
