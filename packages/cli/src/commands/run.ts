/**
 * Run Command
 * Run one shell command on every host in a range
 */

import chalk from 'chalk';
import { AggregateFanOutError, logger } from '@shellfleet/core';
import type { ExecutionResult } from '@shellfleet/core';
import { withContext } from '../utils/context.js';
import type { GlobalOptions } from '../utils/context.js';
import { resolveRange } from '../utils/range.js';
import type { RangeOptions } from '../utils/range.js';
import { createRunReporter } from '../utils/reporter.js';

interface RunOptions extends GlobalOptions, RangeOptions {
  output?: boolean;
}

function printOutputs(results: ExecutionResult<string>[]): void {
  for (const result of [...results].sort((a, b) => a.index - b.index)) {
    if (result.output) {
      console.log(chalk.bold.cyan(`\n${result.host}`));
      process.stdout.write(result.output);
    }
  }
}

/**
 * Run command handler
 */
export async function runCommand(command: string, options: RunOptions): Promise<void> {
  try {
    await withContext(options, async (context) => {
      const { from, to } = resolveRange(options, context.topology.count);
      logger.info('Running command on hosts', { command, from, to });

      process.stdout.write(chalk.gray(`${context.topology.name}:`));
      const outcome = await context.executor.execute(
        from,
        to,
        (host) => context.pool.withSession(context.target(host), (session) => session.run(command)),
        createRunReporter<string>((text) => process.stdout.write(text))
      );
      process.stdout.write('\n');

      if (options.output) {
        printOutputs(outcome.results);
      }
    });
  } catch (error) {
    if (error instanceof AggregateFanOutError) {
      console.log(chalk.red(`\n\n❌ ${error.message}\n`));
    } else {
      console.log(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}\n`));
      logger.error('Run command failed', error);
    }
    process.exit(1);
  }
}
