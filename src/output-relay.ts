import { createInterface } from 'readline';
import type { Readable } from 'stream';
import { describeError } from './browser-utils.js';
import type { ServerLogQueue } from './log-sink.js';

export interface OutputStreams {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
}

async function relayStream(
  name: 'stdout' | 'stderr',
  stream: Readable,
  queue: ServerLogQueue,
): Promise<void> {
  const lines = createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      queue.push(line.trimEnd());
    }
  } catch (err) {
    console.error(`[relay] ${name} closed with error: ${describeError(err)}`);
  } finally {
    lines.close();
  }
}

/**
 * Copies every line the process writes to stdout and stderr into `queue`.
 * Both streams are read concurrently, so ordering is only kept within a
 * stream. Resolves once both streams have closed.
 */
export async function relayOutput(streams: OutputStreams, queue: ServerLogQueue): Promise<void> {
  const pending: Promise<void>[] = [];
  if (streams.stdout) pending.push(relayStream('stdout', streams.stdout, queue));
  if (streams.stderr) pending.push(relayStream('stderr', streams.stderr, queue));
  await Promise.all(pending);
}
