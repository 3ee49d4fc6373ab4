import { describe, it, expect } from 'vitest';
import { challengeResult, errorResult, toJobStats } from './job';

describe('challenge results', () => {
  it('freezes results once produced', () => {
    const result = challengeResult('success', 'all good', { score: 1 });
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.scores)).toBe(true);
  });

  it('synthesized error results carry an empty scores mapping', () => {
    const result = errorResult('Uncaught exception');
    expect(result).toEqual({ status: 'error', message: 'Uncaught exception', scores: {} });
  });

  it('copies the scores so the caller cannot mutate the result', () => {
    const scores = { a: 1 };
    const result = challengeResult('failed', '', scores);
    scores.a = 2;
    expect(result.scores).toEqual({ a: 1 });
  });
});

describe('toJobStats', () => {
  it('omits the artifacts key when nothing was published', () => {
    const stats = toJobStats(errorResult('boom'));
    expect(stats).toEqual({ msg: 'boom', scores: {} });
    expect('artifacts' in stats).toBe(false);
  });

  it('adds artifacts when an image was published', () => {
    const stats = toJobStats(challengeResult('success', '', { distance: 3.5 }), {
      image: 'registry-user/jobs:42@sha256:abc',
      size: 0,
    });
    expect(stats).toEqual({
      msg: '',
      scores: { distance: 3.5 },
      artifacts: { image: 'registry-user/jobs:42@sha256:abc', size: 0 },
    });
  });
});
