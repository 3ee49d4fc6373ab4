/**
 * The one evaluation protocol this evaluator knows how to run.
 */
export const SUPPORTED_PROTOCOL = 'p1';

/**
 * A unit of work handed out by the challenge server.
 * Fields are kept as received; structural checks happen when the workspace is built.
 */
export interface JobDescriptor {
  readonly jobId: string;
  readonly challengeName?: string;
  /** Submission parameters; `hash` is the solution image reference. */
  readonly parameters: Readonly<Record<string, unknown>>;
  /** Challenge parameters; `protocol` and `container` (the evaluator image). */
  readonly challengeParameters: Readonly<Record<string, unknown>>;
}

/**
 * A job whose payload passed structural validation.
 */
export interface ValidatedJob {
  readonly jobId: string;
  readonly challengeName: string;
  readonly solutionImage: string;
  readonly evaluatorImage: string;
  readonly protocol: typeof SUPPORTED_PROTOCOL;
}

export type AcquireOutcome =
  | { kind: 'acquired'; job: JobDescriptor }
  | { kind: 'none'; reason: string };

export const CHALLENGE_STATUSES = ['success', 'failed', 'error'] as const;

/**
 * `failed`: the evaluation ran and declared the solution unsuccessful.
 * `error`: the evaluation infrastructure itself broke.
 */
export type ChallengeStatus = (typeof CHALLENGE_STATUSES)[number];

export interface ChallengeResult {
  readonly status: ChallengeStatus;
  readonly message: string;
  readonly scores: Readonly<Record<string, number>>;
}

export interface ArtifactMetadata {
  /** `<registry>/jobs:<jobId>@<imageId>` */
  image: string;
  /** Image size in bytes */
  size: number;
}

/**
 * The `stats` payload of a job report.
 * `artifacts` is present only when an image was actually published.
 */
export interface JobStats {
  msg: string;
  scores: Record<string, number>;
  artifacts?: ArtifactMetadata;
}

export interface MachineIdentity {
  machineId: string;
  processId: string;
}

export function challengeResult(
  status: ChallengeStatus,
  message: string,
  scores: Record<string, number> = {},
): ChallengeResult {
  return Object.freeze({ status, message, scores: Object.freeze({ ...scores }) });
}

export function errorResult(message: string, scores: Record<string, number> = {}): ChallengeResult {
  return challengeResult('error', message, scores);
}

export function toJobStats(result: ChallengeResult, artifacts?: ArtifactMetadata): JobStats {
  const stats: JobStats = { msg: result.message, scores: { ...result.scores } };
  if (artifacts) {
    stats.artifacts = artifacts;
  }
  return stats;
}
