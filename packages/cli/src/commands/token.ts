import { Command } from 'commander';
import { ConfigLoader, saveToken } from '@evaluator/core';
import { UsageError } from '@evaluator/shared';
import type { GlobalOptions } from '../options';

export function registerTokenCommand(program: Command) {
  const tokenCommand = program.command('token').description('Manage the challenge server token');

  tokenCommand
    .command('set')
    .argument('<token>', 'Token issued by the challenge server')
    .description('Store the token in the credentials file')
    .action(async (token: string) => {
      const globalOpts = program.opts<GlobalOptions>();
      const trimmed = token.trim();
      if (trimmed.length === 0) {
        throw new UsageError('The token must not be empty.');
      }

      const config = ConfigLoader.load({ configPath: globalOpts.config });
      const filePath = await saveToken(config.shellConfigDir, trimmed);

      if (globalOpts.json) {
        console.log(JSON.stringify({ saved: true, path: filePath }));
      } else {
        console.log(`Token saved to ${filePath}`);
      }
    });
}
