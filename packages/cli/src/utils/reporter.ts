/**
 * Terminal reporting for fan-out commands
 */

import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';
import { RemoteCommandError } from '@shellfleet/core';
import type { ExecutionResult, FanOutReporter } from '@shellfleet/core';

/**
 * Prints ` <index>` for every host that finished and `<host>: <error>` on a
 * line of its own for every host that failed
 */
export function createRunReporter<T>(write: (text: string) => void, colors: ChalkInstance = chalk): FanOutReporter<T> {
  return {
    onSuccess: (result) => write(colors.green(` ${result.index}`)),
    onError: (result) => write(colors.red(`\n${result.host}: ${result.error.message}`)),
  };
}

/**
 * One line of `status` output. pidof exits 1 when nothing matches.
 */
export function formatProcessStatus(cluster: string, processName: string, result: ExecutionResult<string>): string {
  const prefix = `${cluster} ${result.index}:`;
  if (result.error) {
    if (result.error instanceof RemoteCommandError && result.error.exitCode === 1) {
      return `${prefix} ${processName} not running`;
    }
    return `${prefix} ${result.error.message}`;
  }
  return `${prefix} ${processName} running ${(result.output ?? '').trim()}`;
}

/**
 * Combined progress of several concurrent transfers of the same size
 */
export class AggregateProgress {
  private readonly fractions = new Map<number, number>();
  private readonly units: number;

  constructor(units: number) {
    this.units = units;
  }

  /**
   * Record one unit's fraction and return the overall fraction
   */
  public update(unit: number, fraction: number): number {
    this.fractions.set(unit, Math.min(1, Math.max(0, fraction)));
    return this.overall;
  }

  public get overall(): number {
    if (this.units === 0) {
      return 1;
    }
    let sum = 0;
    for (const fraction of this.fractions.values()) {
      sum += fraction;
    }
    return sum / this.units;
  }
}

export function formatPercent(fraction: number): string {
  return `${Math.floor(fraction * 100)}%`;
}
