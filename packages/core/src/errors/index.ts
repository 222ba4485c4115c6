/**
 * Error Module
 * Typed failures raised by the pool, executor and transfer engine
 */

import type { Target } from "../types/common.js";
import { targetKey } from "../types/common.js";

/**
 * Reasons a connection attempt can fail
 */
export type ConnectFailureReason =
  | "agent-missing"
  | "agent-unavailable"
  | "dial"
  | "handshake"
  | "timeout"
  | "host-key-unknown"
  | "host-key-mismatch"
  | "host-key-revoked"
  | "trust-store";

/**
 * Base class for every error raised by shellfleet
 */
export class ShellFleetError extends Error {
  public readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The agent, the network dial, the handshake or the host identity check failed
 */
export class ConnectError extends ShellFleetError {
  public readonly target: Target;
  public readonly reason: ConnectFailureReason;

  constructor(target: Target, reason: ConnectFailureReason, message: string, options?: { cause?: unknown }) {
    super("CONNECT_FAILED", `${targetKey(target)}: ${message}`, options);
    this.target = target;
    this.reason = reason;
  }
}

/**
 * A session channel could not be opened on a cached connection
 */
export class SessionError extends ShellFleetError {
  public readonly target: Target;

  constructor(target: Target, message: string, options?: { cause?: unknown }) {
    super("SESSION_FAILED", `${targetKey(target)}: ${message}`, options);
    this.target = target;
  }
}

/**
 * A remote command exited non-zero, was killed by a signal, or never reported an exit status
 */
export class RemoteCommandError extends ShellFleetError {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly signal: string | null;
  public output: string;

  constructor(command: string, exitCode: number | null, signal: string | null, output = "") {
    super("REMOTE_COMMAND_FAILED", RemoteCommandError.describe(exitCode, signal));
    this.command = command;
    this.exitCode = exitCode;
    this.signal = signal;
    this.output = output;
  }

  /**
   * True when the remote process was terminated with SIGKILL
   */
  public isKillSignal(): boolean {
    return this.signal === "KILL";
  }

  private static describe(exitCode: number | null, signal: string | null): string {
    if (signal) {
      return `Process exited with signal ${signal}`;
    }
    if (exitCode === null) {
      return "Process exited without exit status or exit signal";
    }
    return `Process exited with status ${exitCode}`;
  }
}

/**
 * Malformed control line, short read, remote diagnostic or permission failure during a copy
 */
export class TransferProtocolError extends ShellFleetError {
  /** The literal control line or remote diagnostic that caused the failure */
  public readonly line: string;

  constructor(line: string, message?: string, options?: { cause?: unknown }) {
    super("TRANSFER_PROTOCOL", message ?? line, options);
    this.line = line;
  }
}

/**
 * A local file could not be opened, created or read during a transfer
 */
export class TransferIOError extends ShellFleetError {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("TRANSFER_IO", `${path}: ${message}`, options);
    this.path = path;
  }
}

/**
 * Outcome of one fan-out unit, as carried by an aggregate failure
 */
export interface FailedUnit {
  index: number;
  host: string;
  error: Error;
}

/**
 * One or more units of a fan-out batch failed
 */
export class AggregateFanOutError extends ShellFleetError {
  public readonly failures: FailedUnit[];

  constructor(failures: FailedUnit[], total: number) {
    super("FAN_OUT_FAILED", `${failures.length} of ${total} hosts failed`);
    this.failures = failures;
  }
}

/**
 * Whether an error is a remote command terminated with SIGKILL
 */
export function isSigKill(error: unknown): boolean {
  return error instanceof RemoteCommandError && error.isKillSignal();
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
