import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  UsageError,
  ConnectionError,
  RequestFailedError,
  ProtocolError,
  RunnerError,
  ExtractionError,
  PublishError,
  ProcessError,
  describeError,
  toError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('RunnerError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('PublishError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('error subclasses', () => {
  it.each([
    [new ConfigError('x'), 'ConfigError'],
    [new UsageError('x'), 'UsageError'],
    [new ConnectionError('x'), 'ConnectionError'],
    [new RequestFailedError('x'), 'RequestFailedError'],
    [new ProtocolError('x'), 'ProtocolError'],
    [new ExtractionError('x'), 'ExtractionError'],
    [new PublishError('x'), 'PublishError'],
    [new ProcessError('x'), 'ProcessError'],
  ])('%s carries its code and name', (error, code) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe(code);
    expect(error.name).toBe(code);
  });

  it('keeps the HTTP status on connection errors', () => {
    const error = new ConnectionError('Server unavailable', { status: 503 });
    expect(error.status).toBe(503);
  });

  it('records the failing step and exit code on runner errors', () => {
    const error = new RunnerError('pull', 'Could not pull images', { exitCode: 18 });
    expect(error.code).toBe('RunnerError');
    expect(error.step).toBe('pull');
    expect(error.exitCode).toBe(18);
  });

  it('records the exit code on process errors', () => {
    const error = new ProcessError('Process failed', { exitCode: 127 });
    expect(error.exitCode).toBe(127);
  });
});

describe('toError', () => {
  it('returns errors unchanged', () => {
    const error = new Error('boom');
    expect(toError(error)).toBe(error);
  });

  it('wraps non-error values', () => {
    expect(toError('boom').message).toBe('boom');
    expect(toError(42).message).toBe('42');
  });
});

describe('describeError', () => {
  it('includes the stack of the error', () => {
    const error = new Error('top level');
    expect(describeError(error)).toContain('Error: top level');
  });

  it('follows the cause chain and renders details', () => {
    const root = new Error('socket hang up');
    const error = new RunnerError('up', 'Could not run docker compose.', {
      cause: root,
      details: 'exit code 2',
    });

    const text = describeError(error);
    expect(text).toContain('RunnerError: Could not run docker compose.');
    expect(text).toContain('exit code 2');
    expect(text).toContain('Caused by: Error: socket hang up');
  });

  it('renders structured details as JSON', () => {
    const error = new PublishError('push failed', { details: { tag: 'me/jobs:1' } });
    expect(describeError(error)).toContain('"tag": "me/jobs:1"');
  });
});
