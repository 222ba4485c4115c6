/**
 * Exec Module Types
 */

/**
 * Resolves a 1-based host index to a host name
 */
export type HostResolver = (index: number) => string;

/**
 * Per-host operation run by the executor. A rejection is that unit's error.
 */
export type HostOperation<T> = (host: string, index: number) => Promise<T>;

/**
 * One unit of a fan-out batch
 */
export interface ExecutionUnit {
  index: number;
  host: string;
}

/**
 * Outcome of one fan-out unit: `output` on success, `error` on failure
 */
export interface ExecutionResult<T> extends ExecutionUnit {
  output?: T;
  error?: Error;
}

/**
 * Receives unit outcomes in completion order
 */
export interface FanOutReporter<T> {
  onSuccess?(result: ExecutionResult<T>): void;
  onError?(result: ExecutionResult<T> & { error: Error }): void;
}

/**
 * Outcome of a batch where every unit succeeded
 */
export interface FanOutOutcome<T> {
  /** Results in completion order */
  results: ExecutionResult<T>[];
  /** Indexes acknowledged, in completion order */
  succeeded: number[];
}
