import { describe, it, expect } from 'vitest';
import { Backoff } from './backoff';

describe('Backoff', () => {
  it('starts at the base interval', () => {
    const backoff = new Backoff({ intervalMs: 5000 });

    expect(backoff.multiplier).toBe(1);
    expect(backoff.delayMs).toBe(5000);
  });

  it('grows by 1.5 on each failure', () => {
    const backoff = new Backoff({ intervalMs: 5000 });

    expect(backoff.fail()).toBe(1.5);
    expect(backoff.fail()).toBe(2.25);
    expect(backoff.delayMs).toBe(11250);
  });

  it('never exceeds the cap and never decreases while failing', () => {
    const backoff = new Backoff({ intervalMs: 1000 });
    const seen: number[] = [];

    for (let i = 0; i < 12; i++) {
      seen.push(backoff.fail());
    }

    expect(seen.at(-1)).toBe(10);
    expect(Math.max(...seen)).toBe(10);
    for (let i = 1; i < seen.length; i++) {
      expect(seen[i]).toBeGreaterThanOrEqual(seen[i - 1]);
    }
    expect(backoff.delayMs).toBe(10000);
  });

  it('resets to 1', () => {
    const backoff = new Backoff({ intervalMs: 1000, factor: 2, maxMultiplier: 4 });
    backoff.fail();
    backoff.fail();
    backoff.fail();
    expect(backoff.multiplier).toBe(4);

    backoff.reset();

    expect(backoff.multiplier).toBe(1);
    expect(backoff.delayMs).toBe(1000);
  });
});
