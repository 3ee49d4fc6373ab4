import { Command } from 'commander';
import which from 'which';
import chalk from 'chalk';
import type { Config } from '@evaluator/shared';
import { ConfigLoader, credentialsPath, readRegistryIdentity, readToken } from '@evaluator/core';
import { runCommand } from '@evaluator/exec';
import type { GlobalOptions } from '../options';

export const CHECKS = {
  OK: chalk.green('✔'),
  WARN: chalk.yellow('!'),
  FAIL: chalk.red('✖'),
};

export type CheckResult = [string, string];

export async function checkExecutable(name: string): Promise<CheckResult> {
  try {
    const path = await which(name);
    return [CHECKS.OK, `${name} found at: ${path}`];
  } catch {
    return [CHECKS.FAIL, `${name} not found in PATH.`];
  }
}

export async function checkCompose(composeCommand: string[]): Promise<CheckResult> {
  const [bin, ...args] = composeCommand;
  const display = composeCommand.join(' ');
  if (!bin) {
    return [CHECKS.FAIL, 'runner.composeCommand is empty.'];
  }
  try {
    const result = await runCommand(bin, [...args, 'version']);
    if (result.exitCode !== 0) {
      return [CHECKS.FAIL, `\`${display} version\` exited with code ${result.exitCode}.`];
    }
    return [CHECKS.OK, `${display}: ${result.stdout.trim().split('\n')[0]}`];
  } catch {
    return [CHECKS.FAIL, `Could not find ${display}. Please install it.`];
  }
}

export async function checkToken(config: Config): Promise<CheckResult> {
  try {
    await readToken(config.shellConfigDir);
    return [CHECKS.OK, `Token found in ${credentialsPath(config.shellConfigDir)}`];
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return [CHECKS.FAIL, message];
  }
}

export async function checkRegistry(config: Config): Promise<CheckResult> {
  try {
    const registry = await readRegistryIdentity(config.shellConfigDir, config.publish.registry);
    if (!registry) {
      return [CHECKS.WARN, 'No registry identity configured. Artifacts will not be published.'];
    }
    return [CHECKS.OK, `Artifacts will be pushed to ${registry}/jobs`];
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return [CHECKS.FAIL, `Could not read the registry identity: ${message}`];
  }
}

export const registerDoctorCommand = (program: Command) => {
  const command = new Command('doctor');

  command.description('Run checks to diagnose issues with the environment.').action(async () => {
    console.log(chalk.bold('Evaluator Environment Checkup'));

    const results: CheckResult[] = [];

    console.log('---------------------------------');
    results.push(await checkExecutable('docker'));

    try {
      const globalOpts = program.opts<GlobalOptions>();
      const config = ConfigLoader.load({ configPath: globalOpts.config });

      results.push(await checkCompose(config.runner.composeCommand));
      results.push(await checkToken(config));
      results.push(await checkRegistry(config));
      results.push([CHECKS.OK, `Challenge server: ${config.server.url}`]);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      results.push([CHECKS.FAIL, `Failed to load configuration: ${message}`]);
    }

    results.forEach(([status, message]) => {
      console.log(`${status} ${message}`);
    });

    console.log('---------------------------------');

    const hasFailures = results.some(([status]) => status === CHECKS.FAIL);
    if (hasFailures) {
      console.log(
        chalk.red.bold('Doctor checks failed.') +
          ' Please resolve the issues marked with ' +
          CHECKS.FAIL,
      );
      process.exitCode = 1;
    } else {
      console.log(chalk.green.bold('All checks passed. Your environment looks good!'));
    }
  });

  program.addCommand(command);
};
