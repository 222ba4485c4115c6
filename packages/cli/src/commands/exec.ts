/**
 * Exec Command
 * Run one command on a single host, streaming its output. An interrupt runs a
 * cleanup command on the same host through a second session.
 */

import chalk from 'chalk';
import { isSigKill, logger } from '@shellfleet/core';
import type { RemoteSession, Target } from '@shellfleet/core';
import { withContext } from '../utils/context.js';
import type { CliContext, GlobalOptions } from '../utils/context.js';

interface ExecOptions extends GlobalOptions {
  index?: number;
  onInterrupt?: string;
}

const INTERRUPT_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGQUIT'];

/**
 * Run the interrupt command, or close the main session when there is none
 */
async function interrupt(
  context: CliContext,
  target: Target,
  session: RemoteSession,
  onInterrupt: string | undefined
): Promise<void> {
  if (!onInterrupt) {
    session.close();
    return;
  }
  const output = await context.pool.withSession(target, (cleanup) => cleanup.run(onInterrupt));
  process.stderr.write(output);
}

/**
 * Exec command handler
 */
export async function execCommand(command: string, options: ExecOptions): Promise<void> {
  try {
    const stopped = await withContext(options, async (context) => {
      const target = context.topology.target(options.index ?? 1);
      const session = await context.pool.getSession(target);
      const remote = await session.start(command);
      remote.stdout.pipe(process.stdout, { end: false });
      remote.stderr.pipe(process.stderr, { end: false });

      const state: { interrupted: Promise<void> | null } = { interrupted: null };
      const onSignal = (signal: NodeJS.Signals): void => {
        if (state.interrupted) {
          return;
        }
        logger.warn('Interrupted, stopping remote command', { signal, host: target.host });
        state.interrupted = interrupt(context, target, session, options.onInterrupt).catch((error: unknown) => {
          logger.error('Interrupt command failed', error);
        });
      };
      INTERRUPT_SIGNALS.forEach((signal) => process.on(signal, onSignal));

      try {
        await remote.wait();
        return false;
      } catch (error) {
        if (isSigKill(error) || state.interrupted) {
          return true;
        }
        throw error;
      } finally {
        INTERRUPT_SIGNALS.forEach((signal) => process.off(signal, onSignal));
        await state.interrupted;
        session.close();
      }
    });

    if (stopped) {
      console.log(chalk.yellow('\n⚠️  Remote command stopped\n'));
    }
  } catch (error) {
    logger.error('Exec command failed', error);
    console.log(chalk.red(`\n❌ ${error instanceof Error ? error.message : String(error)}\n`));
    process.exit(1);
  }
}
