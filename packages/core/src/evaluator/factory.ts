import { expandHome, toError, type Config, type Logger } from '@evaluator/shared';
import { ComposeRunner, WorkspaceBuilder } from '@evaluator/exec';
import { readRegistryIdentity } from '../config/credentials';
import { ChallengeServerClient } from '../server/client';
import { ResultExtractor } from '../results/extractor';
import { ArtifactPublisher } from '../publish/publisher';
import { Backoff } from './backoff';
import { JobPass } from './job-pass';
import { PollLoop } from './poll-loop';

export interface EvaluatorOptions {
  config: Config;
  logger: Logger;
  runId: string;
  evaluatorVersion: string;
  /** Overrides `runner.pull` */
  pull?: boolean;
}

export interface Evaluator {
  loop: PollLoop;
  /** Registry artifacts go to; undefined when publishing is skipped */
  registry?: string;
  pull: boolean;
}

/** A credentials file that cannot be read only disables publishing; each pass reports it again. */
async function resolveRegistry(config: Config, logger: Logger): Promise<string | undefined> {
  let registry: string | undefined;
  try {
    registry = await readRegistryIdentity(config.shellConfigDir, config.publish.registry);
  } catch (error) {
    logger.warn(`Skipping push because the registry identity could not be read: ${toError(error).message}`);
    return undefined;
  }
  if (!registry) {
    logger.debug('Skipping push because no registry identity is configured.');
  }
  return registry;
}

export async function createEvaluator(options: EvaluatorOptions): Promise<Evaluator> {
  const { config, logger, runId, evaluatorVersion } = options;
  const pull = options.pull ?? config.runner.pull;

  const registry = await resolveRegistry(config, logger);

  const pass = new JobPass({
    server: new ChallengeServerClient({
      baseUrl: config.server.url,
      timeoutMs: config.server.timeoutMs,
      logger,
    }),
    workspaces: new WorkspaceBuilder({
      baseDir: config.workspace.baseDir ? expandHome(config.workspace.baseDir) : undefined,
      lastLink: config.workspace.lastLink,
      logger,
    }),
    runner: new ComposeRunner({ composeCommand: config.runner.composeCommand, logger }),
    extractor: new ResultExtractor(),
    publisher: registry ? new ArtifactPublisher({ registry, logger }) : undefined,
    logger,
    runId,
    evaluatorVersion,
    shellConfigDir: config.shellConfigDir,
    pull,
  });

  const loop = new PollLoop({
    pass,
    backoff: new Backoff({
      intervalMs: config.poll.intervalMs,
      factor: config.poll.backoffFactor,
      maxMultiplier: config.poll.maxMultiplier,
    }),
    logger,
    runId,
  });

  return { loop, registry, pull };
}
