/**
 * Get Command
 * Download one file from a single host
 */

import ora from 'ora';
import chalk from 'chalk';
import { logger } from '@shellfleet/core';
import { withContext } from '../utils/context.js';
import type { GlobalOptions } from '../utils/context.js';
import { formatPercent } from '../utils/reporter.js';

interface GetOptions extends GlobalOptions {
  index?: number;
}

/**
 * Get command handler
 */
export async function getCommand(remotePath: string, localPath: string, options: GetOptions): Promise<void> {
  const spinner = ora(`Downloading ${remotePath}...`);

  try {
    await withContext(options, async (context) => {
      const target = context.topology.target(options.index ?? 1);
      spinner.start();

      const descriptor = await context.transfers.get(target, remotePath, localPath, (fraction) => {
        spinner.text = `Downloading ${remotePath} from ${target.host}... ${formatPercent(fraction)}`;
      });

      spinner.succeed(`Downloaded ${descriptor.sizeBytes} bytes to ${localPath}`);
    });
  } catch (error) {
    spinner.fail('Download failed');
    logger.error('Download failed', error);
    console.log(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}\n`));
    process.exit(1);
  }
}
