import { describe, it, expect } from 'vitest';
import yaml from 'js-yaml';
import type { ValidatedJob } from '@evaluator/shared';
import {
  buildComposeManifest,
  formatArtifactDockerfile,
  formatComposeManifest,
  type WorkspaceDirs,
} from './manifest';

const job: ValidatedJob = {
  jobId: '17',
  challengeName: 'sorting',
  solutionImage: 'registry.test/solutions:abc',
  evaluatorImage: 'registry.test/evaluators:v2',
  protocol: 'p1',
};

const dirs: WorkspaceDirs = {
  'solution-output': '/w/solution-output',
  results: '/w/results',
  description: '/w/description',
  'evaluation-output': '/w/evaluation-output',
};

const expectedVolumes = [
  '/w/solution-output:/solution-output',
  '/w/results:/results',
  '/w/description:/description',
  '/w/evaluation-output:/evaluation-output',
];

describe('buildComposeManifest', () => {
  it('declares the solution and evaluator services with shared mounts', () => {
    const manifest = buildComposeManifest(job, dirs, { username: 'alice', uid: 1000 });

    expect(manifest).toEqual({
      version: '3',
      services: {
        solution: {
          image: 'registry.test/solutions:abc',
          environment: { username: 'alice', uid: '1000' },
          volumes: expectedVolumes,
        },
        evaluator: {
          image: 'registry.test/evaluators:v2',
          environment: { username: 'alice', uid: '1000' },
          volumes: expectedVolumes,
        },
      },
    });
  });

  it('serializes to YAML that reads back to the same manifest', () => {
    const manifest = buildComposeManifest(job, dirs, { username: 'alice', uid: 1000 });

    const text = formatComposeManifest(manifest);

    expect(text.startsWith("version: '3'\n")).toBe(true);
    expect(yaml.load(text)).toEqual(manifest);
  });
});

describe('formatArtifactDockerfile', () => {
  it('copies the workspace into an empty image', () => {
    expect(formatArtifactDockerfile('17')).toBe('FROM scratch\nCOPY . /jobs/17\n');
  });
});
