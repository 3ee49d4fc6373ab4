import { setTimeout as delay } from 'timers/promises';
import { AppError, ConnectionError, eventBase, toError, type Logger } from '@evaluator/shared';
import type { Backoff } from './backoff';
import type { JobPass, PassOutcome } from './job-pass';

export const NOTHING_AVAILABLE_MESSAGE = 'No submissions available to evaluate.';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

/** Resolves early, without throwing, when the signal fires. */
export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return;
  }
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) {
      return;
    }
    throw error;
  }
}

export interface PollLoopOptions {
  pass: Pick<JobPass, 'run'>;
  backoff: Backoff;
  logger: Logger;
  runId: string;
  sleep?: Sleep;
}

export interface ContinuousOptions {
  /** The only way to end a continuous run */
  signal: AbortSignal;
}

export class PollLoop {
  private readonly pass: Pick<JobPass, 'run'>;
  private readonly backoff: Backoff;
  private readonly logger: Logger;
  private readonly runId: string;
  private readonly sleep: Sleep;

  constructor(options: PollLoopOptions) {
    this.pass = options.pass;
    this.backoff = options.backoff;
    this.logger = options.logger;
    this.runId = options.runId;
    this.sleep = options.sleep ?? abortableSleep;
  }

  /**
   * One pass per id, or a single pass for any pending job when `jobIds` is
   * empty. Errors from a pass propagate.
   */
  async runOnce(jobIds: readonly string[]): Promise<PassOutcome[]> {
    const requests: (string | undefined)[] = jobIds.length > 0 ? [...jobIds] : [undefined];
    const outcomes: PassOutcome[] = [];

    for (const jobId of requests) {
      const outcome = await this.pass.run(jobId);
      if (outcome.kind === 'nothing') {
        this.logger.info(NOTHING_AVAILABLE_MESSAGE);
      }
      outcomes.push(outcome);
    }
    return outcomes;
  }

  async runContinuous(options: ContinuousOptions): Promise<void> {
    const { signal } = options;

    while (!signal.aborted) {
      await this.runGuarded();
      if (signal.aborted) {
        break;
      }

      if (this.backoff.multiplier > 1) {
        await this.logger.log({
          ...eventBase(this.runId),
          type: 'BackoffScheduled',
          payload: { multiplier: this.backoff.multiplier, delayMs: this.backoff.delayMs },
        });
      }
      await this.sleep(this.backoff.delayMs, signal);
    }
  }

  /** Runs one pass and folds its outcome into the backoff. Never throws. */
  private async runGuarded(): Promise<void> {
    try {
      const outcome = await this.pass.run();
      switch (outcome.kind) {
        case 'nothing':
          this.logger.debug(`${NOTHING_AVAILABLE_MESSAGE} ${outcome.reason}`.trim());
          this.backoff.reset();
          break;
        case 'reported':
          this.backoff.reset();
          break;
        case 'report-failed':
          this.backoff.fail();
          break;
      }
    } catch (error) {
      const err = toError(error);
      const message =
        err instanceof ConnectionError ? 'Could not reach the challenge server' : 'Uncaught exception';
      this.logger.error(err, message);
      await this.logger.log({
        ...eventBase(this.runId),
        type: 'PassFailed',
        payload: {
          errorCode: err instanceof AppError ? err.code : 'UnknownError',
          message: err.message,
        },
      });
      this.backoff.fail();
    }
  }
}
