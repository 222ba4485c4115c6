/**
 * Host range options
 */

import { InvalidArgumentError } from 'commander';

export interface HostRange {
  from: number;
  to: number;
}

export interface RangeOptions {
  from?: number;
  to?: number;
}

/**
 * Option parser for 1-based host indexes
 */
export function parseIndex(value: string): number {
  const index = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(index) || index < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return index;
}

/**
 * Range selected by `--from/--to`, defaulting to the whole cluster
 */
export function resolveRange(options: RangeOptions, count: number): HostRange {
  const from = options.from ?? 1;
  const to = options.to ?? count;
  if (from > to) {
    throw new RangeError(`Empty host range ${from}..${to}`);
  }
  return { from, to };
}
