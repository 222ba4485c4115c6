/**
 * @shellfleet/core
 *
 * Pooled SSH connections, concurrent fan-out over numbered hosts and
 * remote-copy file transfers
 */

// Export common types
export type { Target, ProgressCallback } from "./types/common.js";
export { targetKey } from "./types/common.js";

// Export errors
export {
  ShellFleetError,
  ConnectError,
  SessionError,
  RemoteCommandError,
  TransferProtocolError,
  TransferIOError,
  AggregateFanOutError,
  isSigKill,
  toError,
} from "./errors/index.js";
export type { ConnectFailureReason, FailedUnit } from "./errors/index.js";

// Export SSH module
export {
  ConnectionPool,
  RemoteSession,
  RemoteProcess,
  SSHTransport,
  connectAgent,
  HostIdentityVerifier,
  KnownHosts,
  knownHostsAddress,
  keyTypeOf,
  fingerprint,
} from "./ssh/index.js";
export type {
  ConnectionPoolOptions,
  ChannelOpener,
  AgentHandle,
  HostKeyCheck,
  HostKeyRejection,
  KnownHostsVerdict,
  CommandChannel,
  ExitStatus,
  Transport,
  TransportFactory,
  SSHConnectOptions,
  ExecChannel,
  SSHClient,
  SSHConnection,
} from "./ssh/index.js";

// Export Exec module
export { ParallelExecutor } from "./exec/index.js";
export type {
  HostResolver,
  HostOperation,
  ExecutionUnit,
  ExecutionResult,
  FanOutReporter,
  FanOutOutcome,
} from "./exec/index.js";

// Export Transfer module
export {
  FileTransferEngine,
  uploadCommand,
  downloadCommand,
  ProgressWriter,
  StreamReader,
  formatMode,
  formatControlLine,
  parseControlLine,
} from "./transfer/index.js";
export type { TransferDescriptor, UploadRequest, DownloadRequest, ControlRecord } from "./transfer/index.js";

// Export Cluster module
export { ClusterTopology, renderHostTemplate } from "./cluster/index.js";

// Export Config module
export { ConfigManager, HostVerificationMode, ReconnectPolicy, DEFAULT_CONFIG } from "./config/index.js";
export type { ShellFleetConfig, SSHSettings, ClusterSettings, LoggingSettings } from "./config/index.js";

// Export Utils module
export { logger, initLogger, getLogger, createScopedLogger, LogLevel, LOG_LEVEL_ENV, Mutex, CompletionChannel, shellQuote } from "./utils/index.js";
export type { Logger, LoggerConfig, Release } from "./utils/index.js";
