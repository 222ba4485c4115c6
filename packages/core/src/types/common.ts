/**
 * Common types used across the core package
 */

/**
 * A remote endpoint, identified by login user and host name
 */
export interface Target {
  user: string;
  host: string;
}

/**
 * Pool lookup key for a target (`user@host`)
 */
export function targetKey(target: Target): string {
  return `${target.user}@${target.host}`;
}

/**
 * Progress callback, invoked with the completed fraction in [0, 1]
 */
export type ProgressCallback = (fraction: number) => void;
