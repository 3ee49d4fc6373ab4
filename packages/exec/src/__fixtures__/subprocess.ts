import { Readable } from 'stream';
import { finished } from 'stream/promises';

export interface FakeRun {
  exitCode?: number;
  /** Combined output; whatever is not `stdout` arrives on stderr */
  all?: string;
  stdout?: string;
  signal?: string;
  cause?: unknown;
}

const streamOf = (text: string) => Readable.from(text ? [Buffer.from(text)] : []);

/** Stands in for an execa subprocess: an awaitable result with stdout and stderr streams. */
export function fakeSubprocess(run: FakeRun) {
  const stdoutText = run.stdout ?? '';
  const all = run.all ?? stdoutText;
  const stdout = streamOf(stdoutText);
  const stderr = streamOf(all === stdoutText ? '' : all);
  const result = Promise.all([finished(stdout), finished(stderr)]).then(() => ({
    exitCode: run.exitCode,
    signal: run.signal,
    cause: run.cause,
  }));
  return Object.assign(result, { stdout, stderr });
}
