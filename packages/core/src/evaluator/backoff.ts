export interface BackoffOptions {
  /** Sleep between passes when nothing is failing */
  intervalMs: number;
  factor?: number;
  maxMultiplier?: number;
}

/**
 * Multiplier applied to the poll interval. Grows on transient failures,
 * never past `maxMultiplier`, and drops back to 1 on any clean pass.
 */
export class Backoff {
  private readonly intervalMs: number;
  private readonly factor: number;
  private readonly maxMultiplier: number;
  private current = 1;

  constructor(options: BackoffOptions) {
    this.intervalMs = options.intervalMs;
    this.factor = options.factor ?? 1.5;
    this.maxMultiplier = options.maxMultiplier ?? 10;
  }

  get multiplier(): number {
    return this.current;
  }

  get delayMs(): number {
    return Math.round(this.intervalMs * this.current);
  }

  reset(): void {
    this.current = 1;
  }

  fail(): number {
    this.current = Math.min(this.current * this.factor, this.maxMultiplier);
    return this.current;
  }
}
