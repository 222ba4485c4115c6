/**
 * Status Command
 * Report whether a process is running on every host in a range
 */

import chalk from 'chalk';
import { logger, shellQuote } from '@shellfleet/core';
import { withContext } from '../utils/context.js';
import type { GlobalOptions } from '../utils/context.js';
import { resolveRange } from '../utils/range.js';
import type { RangeOptions } from '../utils/range.js';
import { formatProcessStatus } from '../utils/reporter.js';

interface StatusOptions extends GlobalOptions, RangeOptions {}

/**
 * Status command handler
 */
export async function statusCommand(processName: string, options: StatusOptions): Promise<void> {
  try {
    await withContext(options, async (context) => {
      const { from, to } = resolveRange(options, context.topology.count);
      const results = await context.executor.gather(from, to, (host) =>
        context.pool.withSession(context.target(host), (session) => session.run(`pidof ${shellQuote(processName)}`))
      );

      console.log(chalk.bold.cyan(`\n📊 ${processName} on ${context.topology.name}\n`));
      for (const result of results) {
        const line = formatProcessStatus(context.topology.name, processName, result);
        console.log(result.output !== undefined ? chalk.green(line) : chalk.yellow(line));
      }
      console.log();
    });
  } catch (error) {
    logger.error('Failed to get status', error);
    console.log(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}\n`));
    process.exit(1);
  }
}
