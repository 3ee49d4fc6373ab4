import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { challengeResult } from '@evaluator/shared';
import { OutputRenderer } from './renderer';

// eslint-disable-next-line no-control-regex
const stripAnsi = (text: string) => text.replace(/\x1b\[[0-9;]*m/g, '');

describe('OutputRenderer', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;

  const lines = () => logSpy.mock.calls.map((c) => stripAnsi(String(c[0])));

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('renders JSON output when json mode is enabled', () => {
    const renderer = new OutputRenderer(true);
    renderer.render({
      outcomes: [
        { kind: 'nothing', reason: 'queue empty' },
        {
          kind: 'report-failed',
          jobId: '17',
          result: challengeResult('failed', 'wrong answer'),
          error: new Error('socket hang up'),
        },
      ],
    });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const parsed = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(parsed).toEqual({
      outcomes: [
        { kind: 'nothing', reason: 'queue empty' },
        {
          kind: 'report-failed',
          jobId: '17',
          result: { status: 'failed', message: 'wrong answer', scores: {} },
          error: 'socket hang up',
        },
      ],
    });
  });

  it('renders a reported job with its first message line and sorted scores', () => {
    const renderer = new OutputRenderer(false);
    renderer.render({
      outcomes: [
        {
          kind: 'reported',
          jobId: '16',
          result: challengeResult('success', 'All tests passed\nsecond line', {
            runtime: 1.5,
            accuracy: 0.9,
          }),
        },
      ],
    });

    expect(lines()).toEqual([
      '✅ Job 16: success',
      '  Message: All tests passed',
      '  Scores:',
      '    - accuracy: 0.9',
      '    - runtime: 1.5',
    ]);
  });

  it('renders a failed evaluation without scores', () => {
    const renderer = new OutputRenderer(false);
    renderer.render({
      outcomes: [{ kind: 'reported', jobId: '3', result: challengeResult('error', '') }],
    });

    expect(lines()).toEqual(['❌ Job 3: error']);
  });

  it('renders a report failure with its error', () => {
    const renderer = new OutputRenderer(false);
    renderer.render({
      outcomes: [
        {
          kind: 'report-failed',
          jobId: '5',
          result: challengeResult('success', 'ok'),
          error: new Error('Challenge server error: 502 Bad Gateway'),
        },
      ],
    });

    expect(lines()).toEqual([
      '❌ Job 5: evaluated as success, but the report failed.',
      '  Error: Challenge server error: 502 Bad Gateway',
    ]);
  });

  it('renders the reason when no job was evaluated', () => {
    const renderer = new OutputRenderer(false);
    renderer.render({
      outcomes: [
        { kind: 'nothing', reason: 'No submissions available to evaluate.' },
        { kind: 'nothing', reason: '' },
      ],
    });

    expect(lines()).toEqual([
      'No job evaluated: No submissions available to evaluate.',
      'No job evaluated.',
    ]);
  });

  it('logs only in human mode', () => {
    new OutputRenderer(true).log('hidden');
    new OutputRenderer(false).log('shown');

    expect(lines()).toEqual(['shown']);
  });
});
