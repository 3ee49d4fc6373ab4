import { z } from 'zod';
import {
  ConnectionError,
  RequestFailedError,
  type AcquireOutcome,
  type ChallengeStatus,
  type JobStats,
  type Logger,
} from '@evaluator/shared';

export const TAKE_SUBMISSION_ENDPOINT = 'take-submission';
export const TOKEN_HEADER = 'X-Messaging-Token';

const EnvelopeSchema = z.union([
  z.object({ ok: z.literal(true), result: z.unknown() }),
  z.object({ ok: z.literal(false), msg: z.string().default('') }),
]);

const NoJobSchema = z.object({ msg: z.string().optional() }).passthrough();

function jobIdString(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

// Any job id the server sends is kept so the job gets reported; the rest
// is checked when the workspace is built.
const JobPayloadSchema = z
  .object({
    job_id: z.unknown().transform(jobIdString),
    challenge_name: z.string().optional().catch(undefined),
    parameters: z.record(z.unknown()).catch({}),
    challenge_parameters: z.record(z.unknown()).catch({}),
  })
  .passthrough();

type Envelope = z.infer<typeof EnvelopeSchema>;

/** `undefined` when the body is not JSON or not an envelope. */
function parseEnvelope(text: string): Envelope | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  const envelope = EnvelopeSchema.safeParse(parsed);
  return envelope.success ? envelope.data : undefined;
}

export interface ChallengeServerClientOptions {
  /** Base URL, e.g. `https://challenges.example.com/api` */
  baseUrl: string;
  timeoutMs?: number;
  logger?: Logger;
}

export interface AcquireRequest {
  token: string;
  /** Ask for this submission instead of any pending one */
  jobId?: string;
  machineId: string;
  processId: string;
  evaluatorVersion: string;
}

export interface ReportRequest {
  token: string;
  jobId: string;
  status: ChallengeStatus;
  stats: JobStats;
  machineId: string;
  processId: string;
  /** Evaluator image of the job, when the payload named one */
  evaluationContainer: string | null;
  evaluatorVersion: string;
}

/**
 * HTTP client of the challenge server's job coordination API.
 */
export class ChallengeServerClient {
  private readonly endpoint: URL;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: ChallengeServerClientOptions) {
    const base = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.endpoint = new URL(TAKE_SUBMISSION_ENDPOINT, base);
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger;
  }

  async acquire(request: AcquireRequest): Promise<AcquireOutcome> {
    const url = new URL(this.endpoint);
    if (request.jobId !== undefined) {
      url.searchParams.set('submission_id', request.jobId);
    }
    url.searchParams.set('machine_id', request.machineId);
    url.searchParams.set('process_id', request.processId);
    url.searchParams.set('evaluator_version', request.evaluatorVersion);

    const result = await this.makeRequest(url, 'GET', request.token);

    const job =
      typeof result === 'object' && result !== null && 'job_id' in result
        ? JobPayloadSchema.safeParse(result)
        : undefined;
    if (!job?.success) {
      const none = NoJobSchema.safeParse(result);
      const reason = none.success ? (none.data.msg ?? '') : '';
      return { kind: 'none', reason };
    }

    return {
      kind: 'acquired',
      job: {
        jobId: job.data.job_id,
        challengeName: job.data.challenge_name,
        parameters: job.data.parameters,
        challengeParameters: job.data.challenge_parameters,
      },
    };
  }

  async report(request: ReportRequest): Promise<void> {
    await this.makeRequest(this.endpoint, 'POST', request.token, {
      job_id: request.jobId,
      stats: request.stats,
      result: request.status,
      machine_id: request.machineId,
      process_id: request.processId,
      evaluation_container: request.evaluationContainer,
      evaluator_version: request.evaluatorVersion,
    });
  }

  private async makeRequest(
    url: URL,
    method: 'GET' | 'POST',
    token: string,
    body?: Record<string, unknown>,
  ): Promise<unknown> {
    const headers: Record<string, string> = { [TOKEN_HEADER]: token };
    if (body) {
      headers['Content-Type'] = 'application/json';
    }

    this.logger?.debug(`${method} ${url.toString()}`);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(`Could not reach the challenge server: ${reason}`, {
        cause: error,
        details: { url: url.toString(), method },
      });
    }

    if (response.status >= 500) {
      throw new ConnectionError(
        `Challenge server error: ${response.status} ${response.statusText}`,
        { status: response.status, details: text },
      );
    }

    const envelope = parseEnvelope(text);
    const rejected = `${response.status} ${response.statusText}`;
    if (!envelope) {
      if (!response.ok) {
        throw new RequestFailedError(`Challenge server rejected the request: ${rejected}`, {
          status: response.status,
          details: text,
        });
      }
      throw new ConnectionError('Challenge server sent an unexpected response', {
        status: response.status,
        details: text,
      });
    }
    if (!envelope.ok) {
      throw new RequestFailedError(
        `Challenge server rejected the request: ${envelope.msg || rejected}`,
        { status: response.status },
      );
    }
    if (!response.ok) {
      throw new RequestFailedError(`Challenge server rejected the request: ${rejected}`, {
        status: response.status,
        details: text,
      });
    }

    return envelope.result;
  }
}
