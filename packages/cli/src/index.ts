#!/usr/bin/env node

/**
 * shellfleet CLI
 * Main entry point
 */

import { Command } from 'commander';
import { logger } from '@shellfleet/core';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import { putCommand } from './commands/put.js';
import { getCommand } from './commands/get.js';
import { execCommand } from './commands/exec.js';
import { configCommand } from './commands/config.js';
import { parseIndex } from './utils/range.js';

const program = new Command();

/**
 * CLI Version and description
 */
program
  .name('shellfleet')
  .description('Run commands and copy files across a numbered fleet of hosts over pooled SSH connections')
  .version('1.0.0')
  .option('-c, --config <path>', 'Use a specific configuration file')
  .option('--permissive', 'Accept any host key (skips known_hosts verification)')
  .option('-v, --verbose', 'Log debug output');

/**
 * Run command - Fan a shell command out over a host range
 */
program
  .command('run <command>')
  .description('Run a shell command on every host in a range')
  .option('--from <index>', 'First host index (default: 1)', parseIndex)
  .option('--to <index>', 'Last host index (default: cluster host count)', parseIndex)
  .option('-o, --output', 'Print each host output after the batch completes')
  .action(async (command: string, _options: unknown, cmd: Command) => {
    await runCommand(command, cmd.optsWithGlobals());
  })
  .addHelpText(
    'after',
    `
Examples:
  $ shellfleet run 'uptime'
  $ shellfleet run 'sudo systemctl restart app' --from 2 --to 5

Prints each host index as it finishes and each failure as "<host>: <error>".
Exits non-zero once every host has finished if any of them failed.
  `
  );

/**
 * Status command - Check a process on every host
 */
program
  .command('status <process>')
  .description('Show whether a process is running on every host in a range')
  .option('--from <index>', 'First host index (default: 1)', parseIndex)
  .option('--to <index>', 'Last host index (default: cluster host count)', parseIndex)
  .action(async (processName: string, _options: unknown, cmd: Command) => {
    await statusCommand(processName, cmd.optsWithGlobals());
  });

/**
 * Put command - Upload a file to every host
 */
program
  .command('put <local> <remote>')
  .description('Upload a local file to every host in a range')
  .option('--from <index>', 'First host index (default: 1)', parseIndex)
  .option('--to <index>', 'Last host index (default: cluster host count)', parseIndex)
  .action(async (localPath: string, remotePath: string, _options: unknown, cmd: Command) => {
    await putCommand(localPath, remotePath, cmd.optsWithGlobals());
  });

/**
 * Get command - Download a file from one host
 */
program
  .command('get <remote> <local>')
  .description('Download a file from one host')
  .option('-i, --index <index>', 'Host index (default: 1)', parseIndex)
  .action(async (remotePath: string, localPath: string, _options: unknown, cmd: Command) => {
    await getCommand(remotePath, localPath, cmd.optsWithGlobals());
  });

/**
 * Exec command - Run a command on one host and stream its output
 */
program
  .command('exec <command>')
  .description('Run a command on one host, streaming its output')
  .option('-i, --index <index>', 'Host index (default: 1)', parseIndex)
  .option('--on-interrupt <command>', 'Command to run on the same host when interrupted')
  .action(async (command: string, _options: unknown, cmd: Command) => {
    await execCommand(command, cmd.optsWithGlobals());
  })
  .addHelpText(
    'after',
    `
Examples:
  $ shellfleet exec 'tail -f /var/log/app.log' --index 3
  $ shellfleet exec './load-test.sh' --on-interrupt 'pkill -KILL -f load-test.sh'

On SIGINT, SIGTERM or SIGQUIT the --on-interrupt command runs through a second
session on the same connection. A remote command killed with SIGKILL counts as stopped.
  `
  );

/**
 * Config command - Manage configuration
 */
program
  .command('config')
  .description('Manage configuration')
  .option('--show', 'Show current configuration')
  .option('--get <key>', 'Get a configuration value')
  .option('--set <key=value>', 'Set a configuration value')
  .option('--reset', 'Reset configuration to defaults')
  .action(async (_options: unknown, cmd: Command) => {
    await configCommand(cmd.optsWithGlobals());
  });

/**
 * Parse and execute commands
 */
async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    logger.error('CLI error', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});

export { program };
