/**
 * In-memory log containers shared by the supervisor, the output relay and the
 * browser session.
 *
 * Server output is a queue that is drained on read; browser console output is
 * a ring buffer that is read without being consumed.
 */

export interface ConsoleLogEntry {
  level: string;
  message: string;
  /** Capture time, local, `YYYY-MM-DD HH:MM:SS`. */
  timestamp: string;
  /** Page URL at capture time. */
  url: string;
  args: string[];
}

/**
 * Queue of raw lines written by the supervised process.
 *
 * `limit` of 0 leaves the queue unbounded; otherwise the oldest lines are
 * dropped once it is exceeded.
 */
export class ServerLogQueue {
  private lines: string[] = [];

  constructor(private readonly limit = 0) {}

  push(line: string): void {
    this.lines.push(line);
    if (this.limit > 0 && this.lines.length > this.limit) {
      this.lines.splice(0, this.lines.length - this.limit);
    }
  }

  /**
   * Removes and returns everything queued so far. Lines pushed after this
   * call show up in the next drain.
   */
  drain(): string[] {
    const drained = this.lines;
    this.lines = [];
    return drained;
  }

  get size(): number {
    return this.lines.length;
  }
}

/**
 * Fixed-capacity FIFO of browser console entries.
 */
export class ConsoleLogBuffer {
  private entries: ConsoleLogEntry[] = [];

  constructor(readonly capacity = 100) {}

  record(entry: ConsoleLogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  /** The newest `count` entries, oldest first. */
  recent(count: number): ConsoleLogEntry[] {
    if (count <= 0) return [];
    return this.entries.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }

  get size(): number {
    return this.entries.length;
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatConsoleEntry(entry: ConsoleLogEntry): string {
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message} - ${entry.url}`;
}
