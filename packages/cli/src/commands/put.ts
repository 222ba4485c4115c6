/**
 * Put Command
 * Upload one local file to every host in a range
 */

import ora from 'ora';
import chalk from 'chalk';
import { AggregateFanOutError, logger } from '@shellfleet/core';
import { withContext } from '../utils/context.js';
import type { GlobalOptions } from '../utils/context.js';
import { resolveRange } from '../utils/range.js';
import type { RangeOptions } from '../utils/range.js';
import { AggregateProgress, formatPercent } from '../utils/reporter.js';

interface PutOptions extends GlobalOptions, RangeOptions {}

/**
 * Put command handler
 */
export async function putCommand(localPath: string, remotePath: string, options: PutOptions): Promise<void> {
  const spinner = ora(`Uploading ${localPath}...`);

  try {
    await withContext(options, async (context) => {
      const { from, to } = resolveRange(options, context.topology.count);
      const progress = new AggregateProgress(to - from + 1);
      spinner.start();

      await context.executor.execute(
        from,
        to,
        (host, index) =>
          context.transfers.put(context.target(host), localPath, remotePath, (fraction) => {
            spinner.text = `Uploading ${localPath} to ${to - from + 1} host(s)... ${formatPercent(progress.update(index, fraction))}`;
          }),
        {
          onError: (result) => logger.warn('Upload failed', { host: result.host, error: result.error.message }),
        }
      );

      spinner.succeed(`Uploaded ${localPath} to ${remotePath} on ${to - from + 1} host(s)`);
    });
  } catch (error) {
    if (error instanceof AggregateFanOutError) {
      spinner.fail(error.message);
      for (const failure of error.failures) {
        console.log(chalk.red(`  ${failure.host}: ${failure.error.message}`));
      }
    } else {
      spinner.fail('Upload failed');
      console.log(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}\n`));
    }
    process.exit(1);
  }
}
