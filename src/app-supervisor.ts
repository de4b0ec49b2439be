import { spawn } from 'child_process';
import type { Readable } from 'stream';
import type { BrowserSessionManager } from './browser-session.js';
import { describeError } from './browser-utils.js';
import type { ServerLogQueue } from './log-sink.js';
import { relayOutput } from './output-relay.js';

/**
 * What the supervisor needs from a child process. `ChildProcess` satisfies it.
 */
export interface SupervisedProcess {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

export interface AppCommand {
  command: string;
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
}

export type ProcessSpawner = (app: AppCommand) => SupervisedProcess;

export const spawnApp: ProcessSpawner = ({ command, args, cwd, env }) =>
  spawn(command, args, { cwd, env, stdio: ['ignore', 'pipe', 'pipe'] });

/**
 * Tracks one spawned child until it exits.
 */
export class ProcessHandle {
  readonly pid: number | undefined;
  exitCode: number | null = null;
  signal: NodeJS.Signals | null = null;
  spawnError: Error | null = null;
  /** Settles once the child has exited or failed to spawn. */
  readonly done: Promise<void>;
  private finished = false;

  constructor(readonly child: SupervisedProcess) {
    this.pid = child.pid;
    this.done = new Promise<void>((resolve) => {
      child.on('exit', (code, signal) => {
        this.exitCode = code;
        this.signal = signal;
        this.finished = true;
        resolve();
      });
      child.on('error', (err) => {
        console.error(`[supervisor] App process error: ${err.message}`);
        // A child that never got a pid will never emit 'exit'.
        if (this.pid === undefined) {
          this.spawnError = err;
          this.finished = true;
          resolve();
        }
      });
    });
  }

  get running(): boolean {
    return !this.finished;
  }
}

export type StartResult =
  | { kind: 'already-running'; pid: number | undefined }
  | { kind: 'started'; pid: number | undefined; browserCapture: boolean }
  | { kind: 'cancelled'; pid: number | undefined }
  | { kind: 'exited'; exitCode: number | null; signal: NodeJS.Signals | null; error: Error | null };

export type StopResult = { kind: 'stopped'; pid: number | undefined } | { kind: 'not-running' };

export interface AppStatus {
  running: boolean;
  pid?: number;
  browserCapture: boolean;
}

export interface SupervisorOptions {
  app: AppCommand;
  startupGraceMs: number;
}

export interface SupervisorDeps {
  browser: BrowserSessionManager;
  serverLogs: ServerLogQueue;
  spawnProcess?: ProcessSpawner;
}

const delay = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Starts and stops the supervised web app, keeping the output relay and the
 * browser session in step with the child process.
 */
export class AppSupervisor {
  private handle: ProcessHandle | null = null;
  private readonly browser: BrowserSessionManager;
  private readonly serverLogs: ServerLogQueue;
  private readonly spawnProcess: ProcessSpawner;

  constructor(
    private readonly options: SupervisorOptions,
    deps: SupervisorDeps,
  ) {
    this.browser = deps.browser;
    this.serverLogs = deps.serverLogs;
    this.spawnProcess = deps.spawnProcess ?? spawnApp;
  }

  get isRunning(): boolean {
    return this.handle?.running ?? false;
  }

  async start(): Promise<StartResult> {
    if (this.handle?.running) {
      return { kind: 'already-running', pid: this.handle.pid };
    }

    // A previous child may have exited on its own and left its browser open.
    await this.browser.teardown();

    const { command, args } = this.options.app;
    console.error(`[supervisor] Starting ${[command, ...args].join(' ')}`);

    const handle = new ProcessHandle(this.spawnProcess(this.options.app));
    this.handle = handle;

    relayOutput(handle.child, this.serverLogs).catch((err: unknown) => {
      console.error(`[relay] Output relay failed: ${describeError(err)}`);
    });

    await delay(this.options.startupGraceMs);

    if (this.handle !== handle) {
      return { kind: 'cancelled', pid: handle.pid };
    }
    if (!handle.running) {
      console.error('[supervisor] App exited during startup');
      return {
        kind: 'exited',
        exitCode: handle.exitCode,
        signal: handle.signal,
        error: handle.spawnError,
      };
    }

    const browserCapture = await this.browser.setup();
    // stop() ran while the browser was launching.
    if (this.handle !== handle) {
      return { kind: 'cancelled', pid: handle.pid };
    }

    console.error(`[supervisor] App running (PID ${handle.pid ?? 'unknown'})`);
    return { kind: 'started', pid: handle.pid, browserCapture };
  }

  /**
   * Terminates the app if it is running and always releases the browser.
   * Reports `stopped` only when a live process was actually terminated.
   */
  async stop(): Promise<StopResult> {
    const handle = this.handle;
    this.handle = null;

    let result: StopResult = { kind: 'not-running' };
    if (handle?.running) {
      console.error(`[supervisor] Stopping app (PID ${handle.pid ?? 'unknown'})`);
      handle.child.kill('SIGTERM');
      await handle.done;
      result = { kind: 'stopped', pid: handle.pid };
    }

    await this.browser.teardown();
    return result;
  }

  status(): AppStatus {
    if (!this.handle?.running) {
      return { running: false, browserCapture: this.browser.isActive };
    }
    return { running: true, pid: this.handle.pid, browserCapture: this.browser.isActive };
  }
}
