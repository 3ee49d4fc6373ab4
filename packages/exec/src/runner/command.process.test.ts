import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { dir, type DirectoryResult } from 'tmp-promise';
import { ProcessError } from '@evaluator/shared';
import { runCommand } from './command';

describe('runCommand with real processes', () => {
  let tmp: DirectoryResult;

  beforeEach(async () => {
    tmp = await dir({ unsafeCleanup: true });
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('reports a process killed by a signal as terminated, not as failing to start', async () => {
    const logFile = path.join(tmp.path, 'compose-up.log');

    const error = await runCommand('sh', ['-c', 'echo started; kill -9 $$'], { logFile }).catch(
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(ProcessError);
    expect((error as ProcessError).message).toBe(
      'Process terminated by SIGKILL: sh -c echo started; kill -9 $$',
    );
    expect(await fs.readFile(logFile, 'utf8')).toBe('started\n');
  });

  it('keeps stdout apart from the combined output', async () => {
    const result = await runCommand('sh', ['-c', 'echo out; echo err >&2; exit 2']);

    expect(result.exitCode).toBe(2);
    expect(result.stdout).toBe('out\n');
    expect(result.output).toContain('out\n');
    expect(result.output).toContain('err\n');
  });
});
