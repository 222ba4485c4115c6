/**
 * Config Command
 * Show and edit the configuration file
 */

import chalk from 'chalk';
import { ConfigManager, logger } from '@shellfleet/core';
import type { GlobalOptions } from '../utils/context.js';

interface ConfigOptions extends GlobalOptions {
  show?: boolean;
  get?: string;
  set?: string;
  reset?: boolean;
}

/**
 * Config command handler
 */
export async function configCommand(options: ConfigOptions): Promise<void> {
  try {
    const configManager = new ConfigManager(options.config);

    // Show configuration
    if (options.show) {
      const config = await configManager.load();
      console.log(chalk.bold.cyan(`\n⚙️  Configuration: ${configManager.getConfigPath()}\n`));
      console.log(JSON.stringify(config, null, 2));
      console.log();
      return;
    }

    // Get a specific value
    if (options.get) {
      await configManager.load();
      const value = configManager.getNestedValue(options.get);
      if (value === undefined) {
        console.log(chalk.red(`\n❌ Unknown configuration key: ${options.get}\n`));
        process.exit(1);
      }
      console.log(chalk.cyan(`\n${options.get}:`), value, '\n');
      return;
    }

    // Set a specific value
    if (options.set) {
      const [key, ...valueParts] = options.set.split('=');
      const value = valueParts.join('=');

      if (!key || !value) {
        console.log(chalk.red('\n❌ Invalid format. Use: --set key=value\n'));
        process.exit(1);
      }

      await configManager.load();
      configManager.setNestedValue(key, value);
      const validation = configManager.validate();
      if (!validation.valid) {
        console.log(chalk.red(`\n❌ ${validation.errors.join('\n❌ ')}\n`));
        process.exit(1);
      }
      await configManager.save();

      console.log(chalk.green(`\n✅ Configuration updated: ${key} = ${String(configManager.getNestedValue(key))}\n`));
      return;
    }

    // Reset configuration
    if (options.reset) {
      configManager.reset();
      await configManager.save();
      console.log(chalk.green('\n✅ Configuration reset to defaults\n'));
      return;
    }

    console.log(chalk.yellow('\n⚠️  Nothing to do. Use --show, --get, --set or --reset.\n'));
  } catch (error) {
    logger.error('Config command failed', error);
    console.log(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}\n`));
    process.exit(1);
  }
}
