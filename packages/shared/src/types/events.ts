import type { ArtifactMetadata, ChallengeStatus } from './job';

/**
 * Base interface for all evaluator events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the evaluator session (one per process start) */
  runId: string;
  /** Event type discriminator */
  type: string;
}

export const EVENT_SCHEMA_VERSION = 1;

/** Common fields of an event emitted now. */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    runId,
    timestamp: new Date().toISOString(),
  };
}

/** Emitted once when the evaluator starts polling. */
export interface EvaluatorStarted extends BaseEvent {
  type: 'EvaluatorStarted';
  payload: {
    evaluatorVersion: string;
    mode: 'once' | 'continuous';
    pull: boolean;
    /** Registry identity used for artifacts, absent when publishing is skipped */
    registry?: string;
  };
}

export interface JobAcquired extends BaseEvent {
  type: 'JobAcquired';
  payload: {
    jobId: string;
    challengeName?: string;
    machineId: string;
    processId: string;
  };
}

/** The server had nothing to hand out. */
export interface NothingAvailable extends BaseEvent {
  type: 'NothingAvailable';
  payload: {
    requestedJobId?: string;
    reason: string;
  };
}

export interface WorkspaceCreated extends BaseEvent {
  type: 'WorkspaceCreated';
  payload: {
    jobId: string;
    root: string;
  };
}

export interface EvaluationFinished extends BaseEvent {
  type: 'EvaluationFinished';
  payload: {
    jobId: string;
    status: ChallengeStatus;
    durationMs: number;
  };
}

export interface ArtifactPublished extends BaseEvent {
  type: 'ArtifactPublished';
  payload: {
    jobId: string;
    artifacts: ArtifactMetadata;
  };
}

export interface JobReported extends BaseEvent {
  type: 'JobReported';
  payload: {
    jobId: string;
    status: ChallengeStatus;
    success: boolean;
    error?: string;
  };
}

/** A pass ended with an exception the loop suppressed. */
export interface PassFailed extends BaseEvent {
  type: 'PassFailed';
  payload: {
    errorCode: string;
    message: string;
  };
}

export interface BackoffScheduled extends BaseEvent {
  type: 'BackoffScheduled';
  payload: {
    multiplier: number;
    delayMs: number;
  };
}

export type EvaluatorEvent =
  | EvaluatorStarted
  | JobAcquired
  | NothingAvailable
  | WorkspaceCreated
  | EvaluationFinished
  | ArtifactPublished
  | JobReported
  | PassFailed
  | BackoffScheduled;

export type EvaluatorEventType = EvaluatorEvent['type'];
