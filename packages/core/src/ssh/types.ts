/**
 * SSH Module Types
 */

import type { Readable, Writable } from "node:stream";
import type { Target } from "../types/common.js";
import type { HostIdentityVerifier } from "./host-verifier.js";

/**
 * How a remote command ended. `signal` is the signal name without the SIG
 * prefix (e.g. "KILL"); both fields are null when the server reported neither.
 */
export interface ExitStatus {
  code: number | null;
  signal: string | null;
}

/**
 * Byte streams of one remote command running on a session channel
 */
export interface CommandChannel {
  /** Remote command's standard input */
  readonly stdin: Writable;
  /** Remote command's standard output */
  readonly stdout: Readable;
  readonly stderr: Readable;
  /** Settles once the channel has closed; never rejects */
  readonly exit: Promise<ExitStatus>;
  close(): void;
}

/**
 * A live authenticated connection able to multiplex command channels
 */
export interface Transport {
  openChannel(command: string): Promise<CommandChannel>;
  isConnected(): boolean;
  dispose(): void;
}

/**
 * Dials and authenticates a new transport to a target
 */
export type TransportFactory = (target: Target) => Promise<Transport>;

/**
 * Options for dialing an SSH transport
 */
export interface SSHConnectOptions {
  port: number;
  connectTimeoutMs: number;
  /** Name of the environment variable holding the agent socket path */
  agentSocketEnv: string;
  verifier: HostIdentityVerifier;
  env?: NodeJS.ProcessEnv;
}
