/**
 * SSH Module - Pooled connections, sessions and host identity checks
 */

export { ConnectionPool } from "./pool.js";
export type { ConnectionPoolOptions } from "./pool.js";
export { RemoteSession, RemoteProcess } from "./session.js";
export type { ChannelOpener } from "./session.js";
export { SSHTransport } from "./transport.js";
export type { ExecChannel, SSHClient, SSHConnection } from "./transport.js";
export { connectAgent } from "./agent.js";
export type { AgentHandle } from "./agent.js";
export { HostIdentityVerifier } from "./host-verifier.js";
export type { HostKeyCheck, HostKeyRejection } from "./host-verifier.js";
export { KnownHosts, knownHostsAddress, keyTypeOf, fingerprint } from "./known-hosts.js";
export type { KnownHostsVerdict } from "./known-hosts.js";
export type { CommandChannel, ExitStatus, Transport, TransportFactory, SSHConnectOptions } from "./types.js";
