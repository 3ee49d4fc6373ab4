import path from 'path';
import { RunnerError, type Logger, type RunnerStep } from '@evaluator/shared';
import type { EvaluationWorkspace } from '../sandbox/workspace';
import { outputTail, runCommand, type CommandResult } from './command';

export interface ComposeRunnerOptions {
  /** Compose CLI invocation, e.g. `['docker', 'compose']` or `['docker-compose']` */
  composeCommand: string[];
  logger: Logger;
}

export interface ComposeRunOptions {
  pull: boolean;
}

/**
 * Drives the two-container pipeline of a workspace through the compose CLI.
 */
export class ComposeRunner {
  private readonly bin: string;
  private readonly baseArgs: string[];
  private readonly logger: Logger;

  constructor(options: ComposeRunnerOptions) {
    const [bin, ...rest] = options.composeCommand;
    if (!bin) {
      throw new RunnerError('up', 'Compose command must not be empty');
    }
    this.bin = bin;
    this.baseArgs = rest;
    this.logger = options.logger;
  }

  /**
   * Pulls the images when asked, then runs both services in the foreground
   * until they have exited. A failed pull aborts before `up`.
   */
  async run(workspace: EvaluationWorkspace, options: ComposeRunOptions): Promise<void> {
    if (options.pull) {
      await this.step(workspace, 'pull', 'Could not run docker compose pull.');
    }
    await this.step(workspace, 'up', 'Could not run docker compose.');
  }

  private async step(
    workspace: EvaluationWorkspace,
    step: RunnerStep,
    failureMessage: string,
  ): Promise<CommandResult> {
    const args = [...this.baseArgs, '-f', workspace.manifestPath, step];
    const logFile = path.join(workspace.logsDir, `compose-${step}.log`);

    this.logger.debug(`Running ${[this.bin, ...args].join(' ')}`);

    let result: CommandResult;
    try {
      result = await runCommand(this.bin, args, { cwd: workspace.root, logFile });
    } catch (error) {
      throw new RunnerError(step, failureMessage, { cause: error });
    }

    if (result.exitCode !== 0) {
      throw new RunnerError(step, `${failureMessage} (exit code ${result.exitCode})`, {
        exitCode: result.exitCode,
        details: outputTail(result.output),
      });
    }

    this.logger.debug(`${result.command} finished in ${result.durationMs}ms`);
    return result;
  }
}
