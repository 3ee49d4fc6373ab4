import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { dir } from 'tmp-promise';
import {
  ProtocolError,
  replaceSymlink,
  SUPPORTED_PROTOCOL,
  type JobDescriptor,
  type Logger,
  type ValidatedJob,
} from '@evaluator/shared';
import {
  buildComposeManifest,
  formatArtifactDockerfile,
  formatComposeManifest,
  WORKSPACE_DIRS,
  type ComposeManifest,
  type UserIdentity,
  type WorkspaceDirs,
} from './manifest';

export const MANIFEST_FILENAME = 'docker-compose.yaml';
export const DOCKERFILE_FILENAME = 'Dockerfile';
export const LOGS_DIRNAME = 'logs';
export const WORKSPACE_PREFIX = 'evaluator-job-';

/**
 * Filesystem sandbox of one job. Owned by a single job pass and never reused.
 */
export interface EvaluationWorkspace {
  root: string;
  dirs: WorkspaceDirs;
  manifestPath: string;
  dockerfilePath: string;
  logsDir: string;
}

export interface SandboxBuild {
  workspace: EvaluationWorkspace;
  manifest: ComposeManifest;
  job: ValidatedJob;
}

export interface WorkspaceBuilderOptions {
  /** Parent of the job workspaces; the OS temp dir when unset */
  baseDir?: string;
  /** Debug link replaced on every build to point at the newest workspace */
  lastLink?: string | false;
  /** Source of the username/uid passed to the containers */
  userInfo?: () => UserIdentity;
  logger?: Logger;
}

function currentUser(): UserIdentity {
  const info = os.userInfo();
  return { username: info.username, uid: info.uid };
}

function requireString(
  record: Readonly<Record<string, unknown>>,
  key: string,
  where: string,
): string {
  const value = record[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ProtocolError(`Job payload is missing ${where}.${key}`);
  }
  return value;
}

/**
 * Checks the structural contract of a job payload.
 * Only protocol "p1" is understood; anything else is not retried.
 */
export function validateJob(job: JobDescriptor): ValidatedJob {
  const protocol = job.challengeParameters.protocol;
  if (protocol !== SUPPORTED_PROTOCOL) {
    throw new ProtocolError(
      `Unsupported evaluation protocol "${String(protocol)}" (this evaluator runs "${SUPPORTED_PROTOCOL}")`,
      { details: { jobId: job.jobId } },
    );
  }

  return {
    jobId: job.jobId,
    challengeName: job.challengeName ?? '',
    solutionImage: requireString(job.parameters, 'hash', 'parameters'),
    evaluatorImage: requireString(job.challengeParameters, 'container', 'challenge_parameters'),
    protocol: SUPPORTED_PROTOCOL,
  };
}

export class WorkspaceBuilder {
  private readonly baseDir?: string;
  private readonly lastLink: string | false;
  private readonly userInfo: () => UserIdentity;
  private readonly logger?: Logger;

  constructor(options: WorkspaceBuilderOptions = {}) {
    this.baseDir = options.baseDir ? path.resolve(options.baseDir) : undefined;
    this.lastLink = options.lastLink ?? false;
    this.userInfo = options.userInfo ?? currentUser;
    this.logger = options.logger;
  }

  /**
   * Creates a fresh workspace for the job and writes its compose manifest
   * and artifact Dockerfile. Each step must succeed before the next runs.
   */
  async build(job: JobDescriptor): Promise<SandboxBuild> {
    const root = await this.createRoot();

    if (this.lastLink) {
      await replaceSymlink(root, path.resolve(this.lastLink));
    }

    const dirs = await this.createDirs(root);
    const validated = validateJob(job);
    const user = this.userInfo();
    const manifest = buildComposeManifest(validated, dirs, user);

    const workspace: EvaluationWorkspace = {
      root,
      dirs,
      manifestPath: path.join(root, MANIFEST_FILENAME),
      dockerfilePath: path.join(root, DOCKERFILE_FILENAME),
      logsDir: path.join(root, LOGS_DIRNAME),
    };

    await fs.writeFile(workspace.manifestPath, formatComposeManifest(manifest), {
      encoding: 'utf8',
      flag: 'wx',
    });
    await fs.writeFile(workspace.dockerfilePath, formatArtifactDockerfile(validated.jobId), {
      encoding: 'utf8',
      flag: 'wx',
    });

    this.logger?.debug(`Workspace for job ${validated.jobId} ready at ${root}`);
    return { workspace, manifest, job: validated };
  }

  private async createRoot(): Promise<string> {
    if (this.baseDir) {
      await fs.mkdir(this.baseDir, { recursive: true });
    }
    const result = await dir({ tmpdir: this.baseDir, prefix: WORKSPACE_PREFIX, keep: true });
    return result.path;
  }

  private async createDirs(root: string): Promise<WorkspaceDirs> {
    const dirs: WorkspaceDirs = {
      'solution-output': path.join(root, 'solution-output'),
      results: path.join(root, 'results'),
      description: path.join(root, 'description'),
      'evaluation-output': path.join(root, 'evaluation-output'),
    };
    // No `recursive`: an existing directory means the root was reused.
    for (const name of WORKSPACE_DIRS) {
      await fs.mkdir(dirs[name]);
    }
    return dirs;
  }
}
