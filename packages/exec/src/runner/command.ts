import { createWriteStream, type WriteStream } from 'fs';
import { finished } from 'stream/promises';
import { execa } from 'execa';
import { ensureDir, ProcessError } from '@evaluator/shared';

const DEFAULT_MAX_LOG_BYTES = 10 * 1024 * 1024;
const TAIL_BYTES = 64 * 1024;

export const LOG_TRUNCATED_MARKER = '\n[Output truncated due to limit]\n';

export interface CommandOptions {
  cwd?: string;
  /** When set, stdout and stderr are streamed to this file as they are produced. */
  logFile?: string;
  /** Bytes written to `logFile` before the rest is dropped */
  maxLogBytes?: number;
  env?: Record<string, string>;
}

export interface CommandResult {
  command: string;
  exitCode: number;
  /** Last 64 KiB of stdout */
  stdout: string;
  /** Last 64 KiB of stdout and stderr, interleaved as produced */
  output: string;
  durationMs: number;
}

/**
 * Holds the tail of a stream in memory and copies the stream to a log
 * file until `maxLogBytes` have been written.
 */
class OutputSink {
  private chunks: Buffer[] = [];
  private size = 0;
  private logged = 0;
  private truncated = false;
  private writeError?: Error;

  constructor(
    private readonly log: WriteStream | undefined,
    private readonly maxLogBytes: number,
  ) {
    log?.on('error', (error) => {
      this.writeError = error;
    });
  }

  write(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.chunks.length > 1 && this.size - this.chunks[0].length >= TAIL_BYTES) {
      this.size -= this.chunks[0].length;
      this.chunks.shift();
    }

    if (!this.log || this.truncated) {
      return;
    }
    const room = this.maxLogBytes - this.logged;
    if (chunk.length <= room) {
      this.log.write(chunk);
      this.logged += chunk.length;
      return;
    }
    this.log.write(chunk.subarray(0, Math.max(0, room)));
    this.log.write(LOG_TRUNCATED_MARKER);
    this.logged = this.maxLogBytes;
    this.truncated = true;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }

  async close(): Promise<void> {
    if (!this.log) {
      return;
    }
    if (!this.writeError) {
      this.log.end();
      await finished(this.log);
    }
    if (this.writeError) {
      throw this.writeError;
    }
  }
}

/**
 * Runs a command to completion and reports its exit code.
 * A non-zero exit is a result, not an exception. A process that cannot
 * start, or that is killed by a signal, raises ProcessError.
 */
export async function runCommand(
  bin: string,
  args: string[],
  options: CommandOptions = {},
): Promise<CommandResult> {
  const command = [bin, ...args].join(' ');
  const start = Date.now();

  let log: WriteStream | undefined;
  if (options.logFile) {
    await ensureDir(options.logFile);
    log = createWriteStream(options.logFile);
  }
  const output = new OutputSink(log, options.maxLogBytes ?? DEFAULT_MAX_LOG_BYTES);
  const stdout = new OutputSink(undefined, 0);

  const subprocess = execa(bin, args, {
    cwd: options.cwd,
    env: options.env,
    buffer: false,
    reject: false,
    stdin: 'ignore',
  });
  subprocess.stdout?.on('data', (chunk: Buffer) => {
    stdout.write(chunk);
    output.write(chunk);
  });
  subprocess.stderr?.on('data', (chunk: Buffer) => {
    output.write(chunk);
  });

  const result = await subprocess;
  await output.close();
  const text = output.text();

  if (result.exitCode === undefined) {
    const message = result.signal
      ? `Process terminated by ${result.signal}: ${command}`
      : `Failed to start process: ${command}`;
    throw new ProcessError(message, {
      cause: result.cause,
      details: text ? outputTail(text) : undefined,
    });
  }

  return {
    command,
    exitCode: result.exitCode,
    stdout: stdout.text(),
    output: text,
    durationMs: Date.now() - start,
  };
}

/** Last lines of a command's output, for error messages. */
export function outputTail(output: string, maxLines = 20): string {
  const lines = output.trimEnd().split('\n');
  return lines.slice(-maxLines).join('\n');
}
