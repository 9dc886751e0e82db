#!/usr/bin/env node
/* eslint-env node */
import process from 'node:process';
import meow from 'meow';
import chalk from 'chalk';
import { createLogger, formatError, isAcqparError, loadEnv, type Logger, type LogLevel } from '@acqpar/core';
import { runValidate } from './commands/validate.js';
import { runDescribe } from './commands/describe.js';
import { runOrder } from './commands/order.js';
import { runEvaluate } from './commands/evaluate.js';
import { readCliConfig } from './lib/cli-config.js';
import {
  displayDescribeResult,
  displayEvaluateResult,
  displayOrderResult,
  displayValidateResult,
} from './lib/display.js';

const cli = meow(
  `\nUsage\n  $ acqpar <command> <definition-file> [options]\n\nCommands\n  validate <file>     Load a definition file and check its relations\n  describe <file>     List parameters by section\n  order <file>        Show the recompute order for changed parameters (requires --changed)\n  evaluate <file>     Seed values, apply --set edits and print displayed values\n\nOptions\n  --changed           Changed parameter names, comma separated or repeated\n  --acqus             JCAMP-DX acquisition parameter file to seed raw values from\n  --vdlist            Variable delay list exposed as VD[0], VD[1], ...\n  --set               KEY=VALUE edit, may be repeated\n  --errors-only       Only report validation errors\n  --config            Engine config YAML (default: $ACQPAR_CONFIG or ./acqpar.config.yaml)\n  --log-level         info or debug\n\nExamples\n  $ acqpar validate acqu.par\n  $ acqpar describe acqu.par\n  $ acqpar order acqu.par --changed=SW,SFO1\n  $ acqpar evaluate acqu.par --acqus=acqus --vdlist=vdlist --set=SWH=8000\n`,
  {
    importMeta: import.meta,
    flags: {
      changed: { type: 'string', isMultiple: true, default: [] },
      acqus: { type: 'string' },
      vdlist: { type: 'string' },
      set: { type: 'string', isMultiple: true, default: [] },
      errorsOnly: { type: 'boolean' },
      config: { type: 'string' },
      logLevel: { type: 'string' },
    },
  },
);

async function main(): Promise<void> {
  const [command, definitionPath] = cli.input;
  const flags = cli.flags;

  if (command === undefined) {
    cli.showHelp();
    return;
  }
  if (!['validate', 'describe', 'order', 'evaluate'].includes(command)) {
    console.error(`Error: unknown command "${command}".`);
    cli.showHelp(1);
    return;
  }
  if (!definitionPath) {
    console.error(`Error: a definition file path is required for ${command}.`);
    console.error(`Usage: acqpar ${command} <definition-file>`);
    process.exitCode = 1;
    return;
  }

  const logger: Logger = createLogger({ level: resolveLogLevel(flags.logLevel) });
  loadEnv({ logger });
  const { config, source, path: configPath } = await readCliConfig({ configPath: flags.config });
  logger.debug('cli.config.resolved', { source, path: configPath });

  switch (command) {
    case 'validate': {
      const result = await runValidate({ definitionPath, config, errorsOnly: flags.errorsOnly, logger });
      displayValidateResult(result, logger);
      if (!result.valid) {
        process.exitCode = 1;
      }
      return;
    }
    case 'describe': {
      displayDescribeResult(await runDescribe({ definitionPath, config, logger }), logger);
      return;
    }
    case 'order': {
      if (flags.changed.length === 0) {
        console.error('Error: --changed is required for order.');
        console.error('Usage: acqpar order <definition-file> --changed=SW[,SFO1]');
        process.exitCode = 1;
        return;
      }
      displayOrderResult(await runOrder({ definitionPath, changed: flags.changed, config, logger }), logger);
      return;
    }
    case 'evaluate': {
      const result = await runEvaluate({
        definitionPath,
        acqusPath: flags.acqus,
        vdlistPath: flags.vdlist,
        assignments: flags.set,
        config,
        logger,
      });
      displayEvaluateResult(result, logger);
      return;
    }
    default: {
      cli.showHelp();
    }
  }
}

main().catch((error: unknown) => {
  if (isAcqparError(error)) {
    console.error(chalk.red(formatError(error)));
  } else {
    console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  }
  process.exitCode = 1;
});

function resolveLogLevel(levelFlag: string | undefined): LogLevel {
  if (levelFlag === undefined || levelFlag === 'info') {
    return 'info';
  }
  if (levelFlag === 'debug') {
    return 'debug';
  }
  throw new Error('Invalid log level. Use "info" or "debug".');
}
