import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { promises as fs } from 'fs';
import path from 'path';
import { dir, type DirectoryResult } from 'tmp-promise';
import { execa } from 'execa';
import { fakeSubprocess } from '../__fixtures__/subprocess';
import { ProcessError, RunnerError, type Logger } from '@evaluator/shared';
import { ComposeRunner } from './compose-runner';
import type { EvaluationWorkspace } from '../sandbox/workspace';

vi.mock('execa', () => ({ execa: vi.fn() }));

const execaMock = execa as unknown as Mock;

describe('ComposeRunner', () => {
  let tmp: DirectoryResult;
  let workspace: EvaluationWorkspace;

  const mockLogger = {
    log: vi.fn(),
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => mockLogger,
  } as unknown as Logger;

  beforeEach(async () => {
    execaMock.mockReset();
    tmp = await dir({ unsafeCleanup: true });
    workspace = {
      root: tmp.path,
      dirs: {
        'solution-output': path.join(tmp.path, 'solution-output'),
        results: path.join(tmp.path, 'results'),
        description: path.join(tmp.path, 'description'),
        'evaluation-output': path.join(tmp.path, 'evaluation-output'),
      },
      manifestPath: path.join(tmp.path, 'docker-compose.yaml'),
      dockerfilePath: path.join(tmp.path, 'Dockerfile'),
      logsDir: path.join(tmp.path, 'logs'),
    };
  });

  afterEach(async () => {
    await tmp.cleanup();
  });

  const runner = () => new ComposeRunner({ composeCommand: ['docker', 'compose'], logger: mockLogger });

  it('pulls and then runs the pipeline in the foreground', async () => {
    execaMock.mockImplementation(() => fakeSubprocess({ exitCode: 0, all: '', stdout: '' }));

    await runner().run(workspace, { pull: true });

    expect(execaMock).toHaveBeenCalledTimes(2);
    expect(execaMock).toHaveBeenNthCalledWith(
      1,
      'docker',
      ['compose', '-f', workspace.manifestPath, 'pull'],
      expect.objectContaining({ cwd: workspace.root }),
    );
    expect(execaMock).toHaveBeenNthCalledWith(
      2,
      'docker',
      ['compose', '-f', workspace.manifestPath, 'up'],
      expect.objectContaining({ cwd: workspace.root }),
    );
  });

  it('skips the pull when disabled', async () => {
    execaMock.mockImplementation(() => fakeSubprocess({ exitCode: 0, all: '', stdout: '' }));

    await runner().run(workspace, { pull: false });

    expect(execaMock).toHaveBeenCalledTimes(1);
    expect(execaMock.mock.calls[0][1]).toEqual(['compose', '-f', workspace.manifestPath, 'up']);
  });

  it('supports a standalone compose binary', async () => {
    execaMock.mockImplementation(() => fakeSubprocess({ exitCode: 0, all: '', stdout: '' }));

    await new ComposeRunner({ composeCommand: ['docker-compose'], logger: mockLogger }).run(
      workspace,
      { pull: false },
    );

    expect(execaMock).toHaveBeenCalledWith(
      'docker-compose',
      ['-f', workspace.manifestPath, 'up'],
      expect.anything(),
    );
  });

  it('aborts before up when the pull fails', async () => {
    execaMock.mockImplementationOnce(() => fakeSubprocess({ exitCode: 1, all: 'manifest unknown', stdout: '' }));

    const error = await runner()
      .run(workspace, { pull: true })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RunnerError);
    const runnerError = error as RunnerError;
    expect(runnerError.step).toBe('pull');
    expect(runnerError.exitCode).toBe(1);
    expect(runnerError.message).toBe('Could not run docker compose pull. (exit code 1)');
    expect(runnerError.details).toBe('manifest unknown');
    expect(execaMock).toHaveBeenCalledTimes(1);
  });

  it('fails the job when up exits non-zero and keeps the output log', async () => {
    execaMock.mockImplementationOnce(() => fakeSubprocess({ exitCode: 2, all: 'evaluator crashed\n', stdout: '' }));

    const error = await runner()
      .run(workspace, { pull: false })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RunnerError);
    expect((error as RunnerError).step).toBe('up');
    expect((error as RunnerError).details).toBe('evaluator crashed');
    expect(await fs.readFile(path.join(workspace.logsDir, 'compose-up.log'), 'utf8')).toBe(
      'evaluator crashed\n',
    );
  });

  it('wraps a process that cannot start', async () => {
    execaMock.mockImplementationOnce(() => fakeSubprocess({ exitCode: undefined, all: '', stdout: '' }));

    const error = await runner()
      .run(workspace, { pull: false })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RunnerError);
    expect((error as RunnerError).message).toBe('Could not run docker compose.');
    expect((error as RunnerError).cause).toBeInstanceOf(ProcessError);
  });

  it('rejects an empty compose command', () => {
    expect(() => new ComposeRunner({ composeCommand: [], logger: mockLogger })).toThrow(
      RunnerError,
    );
  });
});
