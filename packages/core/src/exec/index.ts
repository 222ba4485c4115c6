/**
 * Exec Module - Concurrent fan-out over a host range
 */

export { ParallelExecutor } from "./parallel.js";
export type {
  HostResolver,
  HostOperation,
  ExecutionUnit,
  ExecutionResult,
  FanOutReporter,
  FanOutOutcome,
} from "./types.js";
