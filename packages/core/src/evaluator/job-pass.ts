import {
  describeError,
  errorResult,
  eventBase,
  fail,
  ok,
  toError,
  toJobStats,
  type AcquireOutcome,
  type ArtifactMetadata,
  type ChallengeResult,
  type JobDescriptor,
  type Logger,
  type MachineIdentity,
  type StageResult,
} from '@evaluator/shared';
import type { ComposeRunner, EvaluationWorkspace, SandboxBuild, WorkspaceBuilder } from '@evaluator/exec';
import type { AcquireRequest, ReportRequest } from '../server/client';
import type { ResultExtractor } from '../results/extractor';
import type { ArtifactPublisher } from '../publish/publisher';
import { readToken } from '../config/credentials';
import { resolveIdentity } from '../config/identity';

export const RESULTS_READ_FAILURE = 'Could not read the challenge results:';
export const UNCAUGHT_FAILURE = 'Uncaught exception:';

export type PassOutcome =
  | { kind: 'nothing'; reason: string }
  | { kind: 'reported'; jobId: string; result: ChallengeResult }
  | { kind: 'report-failed'; jobId: string; result: ChallengeResult; error: Error };

/** The two calls of the job coordination API a pass makes. */
export interface JobServer {
  acquire(request: AcquireRequest): Promise<AcquireOutcome>;
  report(request: ReportRequest): Promise<void>;
}

export interface JobPassOptions {
  server: JobServer;
  workspaces: Pick<WorkspaceBuilder, 'build'>;
  runner: Pick<ComposeRunner, 'run'>;
  extractor: Pick<ResultExtractor, 'extract' | 'hasResults'>;
  /** Absent when no registry identity is configured */
  publisher?: Pick<ArtifactPublisher, 'publish'>;
  logger: Logger;
  runId: string;
  evaluatorVersion: string;
  /** Directory holding the credentials file */
  shellConfigDir: string;
  pull: boolean;
  readToken?: (rootDir: string) => Promise<string>;
  identity?: () => MachineIdentity;
}

interface Evaluation {
  result: ChallengeResult;
  artifacts?: ArtifactMetadata;
}

interface RunOutcome {
  result: ChallengeResult;
  /** False when the compose pipeline failed; nothing is published then */
  completed: boolean;
}

async function stage<T>(fn: () => Promise<T>): Promise<StageResult<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    return fail(toError(error));
  }
}

function evaluationContainer(job: JobDescriptor): string | null {
  const container = job.challengeParameters.container;
  return typeof container === 'string' ? container : null;
}

/**
 * One acquire, evaluate, report cycle. Every acquired job is reported
 * exactly once, whatever fails in between.
 */
export class JobPass {
  private readonly options: JobPassOptions;
  private readonly readToken: (rootDir: string) => Promise<string>;
  private readonly identity: () => MachineIdentity;

  constructor(options: JobPassOptions) {
    this.options = options;
    this.readToken = options.readToken ?? readToken;
    this.identity = options.identity ?? resolveIdentity;
  }

  async run(jobId?: string): Promise<PassOutcome> {
    const { server, logger, runId, evaluatorVersion } = this.options;

    const token = await this.readToken(this.options.shellConfigDir);
    const identity = this.identity();

    const outcome = await server.acquire({ token, jobId, evaluatorVersion, ...identity });
    if (outcome.kind === 'none') {
      await logger.log({
        ...eventBase(runId),
        type: 'NothingAvailable',
        payload: { requestedJobId: jobId, reason: outcome.reason },
      });
      return { kind: 'nothing', reason: outcome.reason };
    }

    const { job } = outcome;
    const jobLogger = logger.child({ jobId: job.jobId });
    await jobLogger.trace(
      {
        ...eventBase(runId),
        type: 'JobAcquired',
        payload: { jobId: job.jobId, challengeName: job.challengeName, ...identity },
      },
      `Evaluating job ${job.jobId}`,
    );

    const { result, artifacts } = await this.evaluate(job, jobLogger);

    try {
      await server.report({
        token,
        jobId: job.jobId,
        status: result.status,
        stats: toJobStats(result, artifacts),
        evaluationContainer: evaluationContainer(job),
        evaluatorVersion,
        ...identity,
      });
    } catch (error) {
      const err = toError(error);
      jobLogger.error(err, `Could not report job ${job.jobId}`);
      await jobLogger.log({
        ...eventBase(runId),
        type: 'JobReported',
        payload: { jobId: job.jobId, status: result.status, success: false, error: err.message },
      });
      return { kind: 'report-failed', jobId: job.jobId, result, error: err };
    }

    await jobLogger.trace(
      {
        ...eventBase(runId),
        type: 'JobReported',
        payload: { jobId: job.jobId, status: result.status, success: true },
      },
      `Reported job ${job.jobId}: ${result.status}`,
    );
    return { kind: 'reported', jobId: job.jobId, result };
  }

  private async evaluate(job: JobDescriptor, logger: Logger): Promise<Evaluation> {
    try {
      const sandbox = await stage(() => this.options.workspaces.build(job));
      if (!sandbox.ok) {
        logger.error(sandbox.error, 'Could not prepare the evaluation');
        return { result: errorResult(describeError(sandbox.error)) };
      }

      const { result, completed } = await this.runAndExtract(sandbox.value, logger);
      if (!completed) {
        return { result };
      }
      const artifacts = await this.publish(sandbox.value.workspace, job.jobId, logger);
      return { result, artifacts };
    } catch (error) {
      const err = toError(error);
      logger.error(err, 'Uncaught exception during evaluation');
      return { result: errorResult(`${UNCAUGHT_FAILURE}\n${describeError(err)}`) };
    }
  }

  private async runAndExtract(sandbox: SandboxBuild, logger: Logger): Promise<RunOutcome> {
    const { workspace, job } = sandbox;
    const { runId, pull } = this.options;

    await logger.log({
      ...eventBase(runId),
      type: 'WorkspaceCreated',
      payload: { jobId: job.jobId, root: workspace.root },
    });

    const startedAt = Date.now();
    const run = await stage(() => this.options.runner.run(workspace, { pull }));

    let result: ChallengeResult;
    if (!run.ok) {
      logger.error(run.error, 'Evaluation failed');
      result = await this.runnerFailure(workspace, run.error);
    } else {
      const extracted = await stage(() => this.options.extractor.extract(workspace));
      if (extracted.ok) {
        result = extracted.value;
      } else {
        logger.error(extracted.error, 'Could not read the challenge results');
        result = errorResult(`${RESULTS_READ_FAILURE}\n${describeError(extracted.error)}`);
      }
    }

    await logger.trace(
      {
        ...eventBase(runId),
        type: 'EvaluationFinished',
        payload: { jobId: job.jobId, status: result.status, durationMs: Date.now() - startedAt },
      },
      `Evaluation finished with status ${result.status}`,
    );
    return { result, completed: run.ok };
  }

  /**
   * The results file is only read after a failed run when the evaluator
   * got as far as writing it.
   */
  private async runnerFailure(
    workspace: EvaluationWorkspace,
    error: Error,
  ): Promise<ChallengeResult> {
    const detail = describeError(error);
    if (!(await this.options.extractor.hasResults(workspace))) {
      return errorResult(detail);
    }

    const partial = await stage(() => this.options.extractor.extract(workspace));
    if (!partial.ok) {
      return errorResult(detail);
    }
    const message = partial.value.message
      ? `${detail}\n\nChallenge results: ${partial.value.message}`
      : detail;
    return errorResult(message, partial.value.scores);
  }

  private async publish(
    workspace: EvaluationWorkspace,
    jobId: string,
    logger: Logger,
  ): Promise<ArtifactMetadata | undefined> {
    const { publisher, runId } = this.options;
    if (!publisher) {
      return undefined;
    }

    const published = await stage(() => publisher.publish(workspace, jobId));
    if (!published.ok) {
      logger.error(published.error, 'Artifact not published; reporting without it');
      return undefined;
    }

    await logger.trace(
      {
        ...eventBase(runId),
        type: 'ArtifactPublished',
        payload: { jobId, artifacts: published.value },
      },
      `Published ${published.value.image}`,
    );
    return published.value;
  }
}
