import { z } from 'zod';
import { ProcessError } from '@evaluator/shared';
import { outputTail, runCommand, type CommandResult } from './command';

const ImageInspectSchema = z
  .array(
    z
      .object({
        Id: z.string().min(1),
        Size: z.number().nonnegative(),
      })
      .passthrough(),
  )
  .min(1);

export interface ImageInfo {
  /** Content-addressed image id, e.g. `sha256:...` */
  id: string;
  size: number;
}

/**
 * Thin wrapper over the `docker` CLI image commands.
 */
export class DockerImageCli {
  constructor(private readonly bin: string = 'docker') {}

  async build(contextDir: string, tag: string, logFile?: string): Promise<void> {
    await this.check(['build', '-t', tag, contextDir], { cwd: contextDir, logFile });
  }

  async inspect(tag: string): Promise<ImageInfo> {
    const result = await this.check(['image', 'inspect', tag]);

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch (error) {
      throw new ProcessError(`Could not parse docker image inspect output for ${tag}`, {
        cause: error,
        details: outputTail(result.stdout),
      });
    }

    const images = ImageInspectSchema.safeParse(parsed);
    if (!images.success) {
      throw new ProcessError(`Unexpected docker image inspect output for ${tag}`, {
        details: images.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n'),
      });
    }

    const [image] = images.data;
    return { id: image.Id, size: image.Size };
  }

  async push(tag: string, logFile?: string): Promise<void> {
    await this.check(['push', tag], { logFile });
  }

  private async check(
    args: string[],
    options: { cwd?: string; logFile?: string } = {},
  ): Promise<CommandResult> {
    const result = await runCommand(this.bin, args, options);
    if (result.exitCode !== 0) {
      throw new ProcessError(`${result.command} exited with code ${result.exitCode}`, {
        exitCode: result.exitCode,
        details: outputTail(result.output),
      });
    }
    return result;
  }
}
