import { Command } from 'commander';
import { AppError, ConfigError, UsageError } from '@evaluator/shared';
import { version } from '../package.json';
import { registerRunCommand } from './commands/run';
import { registerTokenCommand } from './commands/token';
import { registerDoctorCommand } from './commands/doctor';
import type { GlobalOptions } from './options';

export const name = '@evaluator/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('evaluator')
    .description('Evaluates challenge submissions handed out by a challenge server')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging');

  registerRunCommand(program);
  registerTokenCommand(program);
  registerDoctorCommand(program);

  return program;
}

/**
 * Prints a command failure and returns the exit code for it.
 */
export function reportError(e: unknown, opts: GlobalOptions): number {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      console.log(
        JSON.stringify({
          error: {
            code: 'UnknownError',
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
  } else {
    // Human-readable output
    console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (opts.verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  return e instanceof ConfigError || e instanceof UsageError ? 2 : 1;
}
