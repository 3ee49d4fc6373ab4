import yaml from 'js-yaml';
import type { ValidatedJob } from '@evaluator/shared';

/**
 * Directories shared by the solution and evaluator containers. Each one is
 * mounted at `/<name>` inside both containers.
 */
export const WORKSPACE_DIRS = [
  'solution-output',
  'results',
  'description',
  'evaluation-output',
] as const;

export type WorkspaceDirName = (typeof WORKSPACE_DIRS)[number];

export type WorkspaceDirs = Record<WorkspaceDirName, string>;

export interface UserIdentity {
  username: string;
  uid: number;
}

export interface ServiceSpec {
  image: string;
  /** Lets the containers chown what they write to the invoking user */
  environment: {
    username: string;
    uid: string;
  };
  volumes: string[];
}

export interface ComposeManifest {
  version: '3';
  services: {
    solution: ServiceSpec;
    evaluator: ServiceSpec;
  };
}

function serviceSpec(image: string, dirs: WorkspaceDirs, user: UserIdentity): ServiceSpec {
  return {
    image,
    environment: {
      username: user.username,
      uid: String(user.uid),
    },
    volumes: WORKSPACE_DIRS.map((name) => `${dirs[name]}:/${name}`),
  };
}

export function buildComposeManifest(
  job: ValidatedJob,
  dirs: WorkspaceDirs,
  user: UserIdentity,
): ComposeManifest {
  return {
    version: '3',
    services: {
      solution: serviceSpec(job.solutionImage, dirs, user),
      evaluator: serviceSpec(job.evaluatorImage, dirs, user),
    },
  };
}

export function formatComposeManifest(manifest: ComposeManifest): string {
  return yaml.dump(manifest, { noRefs: true, lineWidth: -1 });
}

/**
 * Image-build descriptor for the artifact: an empty image holding the whole
 * workspace under `/jobs/<jobId>`.
 */
export function formatArtifactDockerfile(jobId: string): string {
  return `FROM scratch\nCOPY . /jobs/${jobId}\n`;
}
