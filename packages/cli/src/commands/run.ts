import { Command } from 'commander';
import { ConfigLoader, createEvaluator } from '@evaluator/core';
import {
  ConsoleLogger,
  eventBase,
  expandHome,
  JsonlLogger,
  type Config,
  type Logger,
} from '@evaluator/shared';
import { version } from '../../package.json';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../options';

interface RunOptions {
  continuous?: boolean;
  pull: boolean;
}

function createLogger(config: Config, verbose: boolean): Logger {
  const level = verbose ? 'debug' : config.logging.level;
  if (config.logging.eventsFile) {
    return new JsonlLogger(expandHome(config.logging.eventsFile), {}, level);
  }
  return new ConsoleLogger({ level });
}

/** Aborts on the first SIGINT/SIGTERM; returns a function removing the handlers. */
function abortOnSignals(controller: AbortController, logger: Logger): () => void {
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping after the current pass.`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

export function registerRunCommand(program: Command) {
  program
    .command('run', { isDefault: true })
    .argument('[jobIds...]', 'Evaluate these submissions instead of any pending one')
    .description('Take pending submissions from the challenge server and evaluate them')
    .option('--continuous', 'Keep polling for new submissions until interrupted')
    .option('--no-pull', 'Do not pull the container images before running')
    .action(async (jobIds: string[], options: RunOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        flags: {
          runner: { pull: options.pull === false ? false : undefined },
        },
      });

      const logger = createLogger(config, !!globalOpts.verbose);
      const runId = Date.now().toString();
      const evaluatorVersion = config.evaluatorVersion ?? version;
      const mode = options.continuous ? 'continuous' : 'once';

      const evaluator = await createEvaluator({ config, logger, runId, evaluatorVersion });

      await logger.trace(
        {
          ...eventBase(runId),
          type: 'EvaluatorStarted',
          payload: {
            evaluatorVersion,
            mode,
            pull: evaluator.pull,
            registry: evaluator.registry,
          },
        },
        `evaluator ${evaluatorVersion}`,
      );

      if (options.continuous) {
        if (jobIds.length > 0) {
          renderer.log(`Ignoring job ids in continuous mode: ${jobIds.join(', ')}`);
        }
        const controller = new AbortController();
        const removeHandlers = abortOnSignals(controller, logger);
        try {
          await evaluator.loop.runContinuous({ signal: controller.signal });
        } finally {
          removeHandlers();
        }
        return;
      }

      const outcomes = await evaluator.loop.runOnce(jobIds);
      renderer.render({ outcomes });
      if (outcomes.some((outcome) => outcome.kind === 'report-failed')) {
        process.exitCode = 1;
      }
    });
}
