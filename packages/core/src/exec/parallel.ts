/**
 * Parallel Executor
 * Scatters a per-host operation across an index range and gathers every result
 */

import { AggregateFanOutError, toError } from "../errors/index.js";
import type { FailedUnit } from "../errors/index.js";
import { CompletionChannel } from "../utils/channel.js";
import { createScopedLogger } from "../utils/logger.js";
import type { ExecutionResult, FanOutOutcome, FanOutReporter, HostOperation, HostResolver } from "./types.js";

const logger = createScopedLogger("fanout");

const loggingReporter: FanOutReporter<unknown> = {
  onSuccess: (result) => logger.debug("Host completed", { index: result.index, host: result.host }),
  onError: (result) => logger.warn("Host failed", { index: result.index, host: result.host, error: result.error.message }),
};

/**
 * Runs one operation per host index concurrently. Failures never cancel the
 * other units: the batch always drains before deciding its outcome.
 */
export class ParallelExecutor {
  private readonly resolveHost: HostResolver;

  constructor(resolveHost: HostResolver) {
    this.resolveHost = resolveHost;
  }

  /**
   * Run `op` for every index in `[from, to]`. Results are reported as they
   * arrive; once all units have finished, any failure rejects the whole batch
   * with an AggregateFanOutError.
   */
  public async execute<T>(
    from: number,
    to: number,
    op: HostOperation<T>,
    reporter: FanOutReporter<T> = loggingReporter
  ): Promise<FanOutOutcome<T>> {
    const indexes = this.indexRange(from, to);
    const completions = new CompletionChannel<ExecutionResult<T>>(indexes.length);

    const units = indexes.map((index) => this.runUnit(index, op).then((result) => completions.send(result)));
    const allDone = Promise.allSettled(units).then(() => completions.close());

    const results: ExecutionResult<T>[] = [];
    const succeeded: number[] = [];
    const failures: FailedUnit[] = [];

    for await (const result of completions) {
      results.push(result);
      if (result.error) {
        failures.push({ index: result.index, host: result.host, error: result.error });
        reporter.onError?.({ ...result, error: result.error });
      } else {
        succeeded.push(result.index);
        reporter.onSuccess?.(result);
      }
    }
    await allDone;

    if (failures.length > 0) {
      throw new AggregateFanOutError(failures, indexes.length);
    }
    return { results, succeeded };
  }

  /**
   * Run `op` for every index in `[from, to]` and return all results ordered by
   * index, failed ones included. Never rejects for a unit failure.
   */
  public async gather<T>(from: number, to: number, op: HostOperation<T>): Promise<ExecutionResult<T>[]> {
    const indexes = this.indexRange(from, to);
    return Promise.all(indexes.map((index) => this.runUnit(index, op)));
  }

  private indexRange(from: number, to: number): number[] {
    if (!Number.isInteger(from) || !Number.isInteger(to)) {
      throw new RangeError(`Host range must be integers, got ${from}..${to}`);
    }
    if (from > to) {
      throw new RangeError(`Empty host range ${from}..${to}`);
    }
    return Array.from({ length: to - from + 1 }, (_, offset) => from + offset);
  }

  private async runUnit<T>(index: number, op: HostOperation<T>): Promise<ExecutionResult<T>> {
    let host: string;
    try {
      host = this.resolveHost(index);
    } catch (error) {
      return { index, host: String(index), error: toError(error) };
    }

    try {
      const output = await op(host, index);
      return { index, host, output };
    } catch (error) {
      return { index, host, error: toError(error) };
    }
  }
}
