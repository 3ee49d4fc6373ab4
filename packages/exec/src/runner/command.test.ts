import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { dir, type DirectoryResult } from 'tmp-promise';
import { execa } from 'execa';
import { ProcessError } from '@evaluator/shared';
import { fakeSubprocess } from '../__fixtures__/subprocess';
import { LOG_TRUNCATED_MARKER, outputTail, runCommand } from './command';

vi.mock('execa', () => ({ execa: vi.fn() }));

const execaMock = execa as unknown as Mock;

describe('runCommand', () => {
  let tmp: DirectoryResult;

  beforeEach(async () => {
    execaMock.mockReset();
    tmp = await dir({ unsafeCleanup: true });
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  it('returns the exit code and combined output', async () => {
    execaMock.mockImplementation(() => fakeSubprocess({ exitCode: 0, stdout: 'pulled\n' }));

    const result = await runCommand('docker', ['compose', 'pull'], { cwd: tmp.path });

    expect(result).toEqual(
      expect.objectContaining({
        command: 'docker compose pull',
        exitCode: 0,
        stdout: 'pulled\n',
        output: 'pulled\n',
      }),
    );
    expect(execaMock).toHaveBeenCalledWith(
      'docker',
      ['compose', 'pull'],
      expect.objectContaining({ cwd: tmp.path, buffer: false, reject: false }),
    );
  });

  it('treats a non-zero exit as a result', async () => {
    execaMock.mockImplementation(() => fakeSubprocess({ exitCode: 3, all: 'boom' }));

    const result = await runCommand('docker', ['compose', 'up']);

    expect(result.exitCode).toBe(3);
    expect(result.stdout).toBe('');
    expect(result.output).toBe('boom');
  });

  it('streams the output to the log file', async () => {
    execaMock.mockImplementation(() => fakeSubprocess({ exitCode: 0, all: 'line 1\nline 2\n' }));
    const logFile = path.join(tmp.path, 'logs', 'compose-up.log');

    await runCommand('docker', ['compose', 'up'], { logFile });

    expect(await fs.readFile(logFile, 'utf8')).toBe('line 1\nline 2\n');
  });

  it('stops writing the log file at the limit', async () => {
    execaMock.mockImplementation(() => fakeSubprocess({ exitCode: 0, stdout: 'abcdefgh' }));
    const logFile = path.join(tmp.path, 'compose-up.log');

    const result = await runCommand('docker', ['compose', 'up'], { logFile, maxLogBytes: 4 });

    expect(await fs.readFile(logFile, 'utf8')).toBe(`abcd${LOG_TRUNCATED_MARKER}`);
    expect(result.output).toBe('abcdefgh');
  });

  it('raises ProcessError when the process cannot start', async () => {
    const cause = new Error('spawn docker ENOENT');
    execaMock.mockImplementation(() => fakeSubprocess({ exitCode: undefined, cause }));

    const promise = runCommand('docker', ['compose', 'up']);

    await expect(promise).rejects.toThrow(ProcessError);
    await expect(promise).rejects.toThrow('Failed to start process: docker compose up');
  });

  it('names the signal that terminated the process', async () => {
    execaMock.mockImplementation(() =>
      fakeSubprocess({ exitCode: undefined, signal: 'SIGKILL', all: 'starting evaluator\n' }),
    );

    const error = await runCommand('docker', ['compose', 'up']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessError);
    expect((error as ProcessError).message).toBe('Process terminated by SIGKILL: docker compose up');
    expect((error as ProcessError).details).toBe('starting evaluator');
  });
});

describe('outputTail', () => {
  it('keeps the last lines only', () => {
    expect(outputTail('a\nb\nc\nd\n', 2)).toBe('c\nd');
  });

  it('returns short output unchanged', () => {
    expect(outputTail('only line')).toBe('only line');
  });
});
