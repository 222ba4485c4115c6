/**
 * Configuration Module Types
 */

import os from "node:os";
import path from "node:path";
import { LogLevel } from "../utils/logger.js";

/**
 * How presented host keys are checked
 */
export enum HostVerificationMode {
  /** Validate against the known_hosts trust store */
  STRICT = "strict",
  /** Accept any host key */
  PERMISSIVE = "permissive",
}

/**
 * What the pool does when a cached connection has died
 */
export enum ReconnectPolicy {
  /** Fail the session request with a SessionError */
  NEVER = "never",
  /** Drop the dead connection and dial again */
  ON_NEXT_USE = "on-next-use",
}

/**
 * SSH transport configuration
 */
export interface SSHSettings {
  user: string;
  port: number;
  connectTimeoutMs: number;
  /** Name of the environment variable holding the agent socket path */
  agentSocketEnv: string;
  hostVerification: HostVerificationMode;
  knownHostsPath: string;
  reconnect: ReconnectPolicy;
}

/**
 * Cluster topology configuration
 */
export interface ClusterSettings {
  name: string;
  count: number;
  /**
   * Host name template. `{name}` is the cluster name, `{index}` the 1-based
   * host index, `{index:04}` the index zero-padded to four digits.
   */
  hostTemplate: string;
}

/**
 * Logging configuration
 */
export interface LoggingSettings {
  level: LogLevel;
  logToFile: boolean;
}

/**
 * Complete configuration
 */
export interface ShellFleetConfig {
  ssh: SSHSettings;
  cluster: ClusterSettings;
  logging: LoggingSettings;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: ShellFleetConfig = {
  ssh: {
    user: process.env.USER ?? process.env.LOGNAME ?? "root",
    port: 22,
    connectTimeoutMs: 30000,
    agentSocketEnv: "SSH_AUTH_SOCK",
    hostVerification: HostVerificationMode.STRICT,
    knownHostsPath: path.join(os.homedir(), ".ssh", "known_hosts"),
    reconnect: ReconnectPolicy.NEVER,
  },
  cluster: {
    name: "default",
    count: 1,
    hostTemplate: "node-{name}-{index:04}",
  },
  logging: {
    level: LogLevel.INFO,
    logToFile: false,
  },
};
