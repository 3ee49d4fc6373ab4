import path from 'path';
import { PublishError, type ArtifactMetadata, type Logger } from '@evaluator/shared';
import { DockerImageCli, type EvaluationWorkspace } from '@evaluator/exec';

export interface ArtifactPublisherOptions {
  /** Registry namespace, e.g. a Docker Hub username */
  registry: string;
  docker?: DockerImageCli;
  logger?: Logger;
}

export function artifactTag(registry: string, jobId: string): string {
  return `${registry}/jobs:${jobId}`;
}

/**
 * Builds the finished workspace into an image and pushes it.
 */
export class ArtifactPublisher {
  readonly registry: string;
  private readonly docker: DockerImageCli;
  private readonly logger?: Logger;

  constructor(options: ArtifactPublisherOptions) {
    this.registry = options.registry;
    this.docker = options.docker ?? new DockerImageCli();
    this.logger = options.logger;
  }

  async publish(workspace: EvaluationWorkspace, jobId: string): Promise<ArtifactMetadata> {
    const tag = artifactTag(this.registry, jobId);
    try {
      await this.docker.build(workspace.root, tag, path.join(workspace.logsDir, 'docker-build.log'));
      const image = await this.docker.inspect(tag);

      this.logger?.info(`Pushing image ${tag}`);
      await this.docker.push(tag, path.join(workspace.logsDir, 'docker-push.log'));

      return { image: `${tag}@${image.id}`, size: image.size };
    } catch (error) {
      throw new PublishError(`Could not publish artifact ${tag}`, { cause: error });
    }
  }
}
