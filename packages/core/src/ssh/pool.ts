/**
 * Connection Pool
 * One persistent authenticated connection per (user, host), opened lazily and reused
 */

import { ConnectError, SessionError, toError } from "../errors/index.js";
import { ReconnectPolicy } from "../config/types.js";
import type { SSHSettings } from "../config/types.js";
import type { Target } from "../types/common.js";
import { targetKey } from "../types/common.js";
import { Mutex } from "../utils/mutex.js";
import { createScopedLogger } from "../utils/logger.js";
import { HostIdentityVerifier } from "./host-verifier.js";
import { RemoteSession } from "./session.js";
import { SSHTransport } from "./transport.js";
import type { CommandChannel, Transport, TransportFactory } from "./types.js";

const logger = createScopedLogger("pool");

/**
 * Pool entry for one target. `lock` serializes connecting and channel opens.
 */
interface PoolEntry {
  readonly target: Target;
  readonly lock: Mutex;
  transport: Transport | null;
}

export interface ConnectionPoolOptions {
  connect: TransportFactory;
  reconnect?: ReconnectPolicy;
}

/**
 * Connection pool keyed by `user@host`
 */
export class ConnectionPool {
  private readonly entries = new Map<string, PoolEntry>();
  private readonly connect: TransportFactory;
  private readonly reconnect: ReconnectPolicy;
  private closed = false;

  constructor(options: ConnectionPoolOptions) {
    this.connect = options.connect;
    this.reconnect = options.reconnect ?? ReconnectPolicy.NEVER;
  }

  /**
   * Pool dialing real SSH transports with agent authentication
   */
  public static fromConfig(settings: SSHSettings, verifier = HostIdentityVerifier.fromConfig(settings)): ConnectionPool {
    return new ConnectionPool({
      reconnect: settings.reconnect,
      connect: (target) =>
        SSHTransport.connect(target, {
          port: settings.port,
          connectTimeoutMs: settings.connectTimeoutMs,
          agentSocketEnv: settings.agentSocketEnv,
          verifier,
        }),
    });
  }

  /**
   * Number of targets with a pool entry
   */
  public get size(): number {
    return this.entries.size;
  }

  /**
   * Whether a live connection is cached for `target`
   */
  public isConnected(target: Target): boolean {
    return this.entries.get(targetKey(target))?.transport?.isConnected() ?? false;
  }

  /**
   * Get a session on the target's pooled connection, connecting first if needed.
   * Calls for the same target are serialized; a failed connect leaves the entry
   * empty so the next call dials again.
   */
  public async getSession(target: Target): Promise<RemoteSession> {
    if (this.closed) {
      throw new SessionError(target, "connection pool is closed");
    }

    const entry = this.entryFor(target);
    return entry.lock.runExclusive(async () => {
      const transport = await this.ensureTransport(entry);
      return new RemoteSession(target, (command) => this.openChannel(entry, transport, command));
    });
  }

  /**
   * Run `fn` with a fresh session, closing it afterwards
   */
  public async withSession<T>(target: Target, fn: (session: RemoteSession) => Promise<T>): Promise<T> {
    const session = await this.getSession(target);
    try {
      return await fn(session);
    } finally {
      session.close();
    }
  }

  /**
   * Close and forget the target's connection
   */
  public async evict(target: Target): Promise<void> {
    const key = targetKey(target);
    const entry = this.entries.get(key);
    if (!entry) {
      return;
    }
    this.entries.delete(key);
    await entry.lock.runExclusive(async () => {
      entry.transport?.dispose();
      entry.transport = null;
    });
    logger.debug("Evicted pooled connection", { target: key });
  }

  /**
   * Close every pooled connection; later session requests fail
   */
  public async close(): Promise<void> {
    this.closed = true;
    const entries = [...this.entries.values()];
    this.entries.clear();
    await Promise.all(
      entries.map((entry) =>
        entry.lock.runExclusive(async () => {
          entry.transport?.dispose();
          entry.transport = null;
        })
      )
    );
    logger.debug("Connection pool closed", { connections: entries.length });
  }

  private entryFor(target: Target): PoolEntry {
    const key = targetKey(target);
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { target: { ...target }, lock: new Mutex(), transport: null };
      this.entries.set(key, entry);
    }
    return entry;
  }

  /**
   * Return the cached transport or dial a new one. Caller holds the entry lock.
   */
  private async ensureTransport(entry: PoolEntry): Promise<Transport> {
    const key = targetKey(entry.target);

    if (entry.transport) {
      if (entry.transport.isConnected()) {
        logger.debug("Reusing pooled connection", { target: key });
        return entry.transport;
      }
      if (this.reconnect === ReconnectPolicy.NEVER) {
        throw new SessionError(entry.target, "pooled connection is no longer connected");
      }
      logger.warn("Pooled connection lost, reconnecting", { target: key });
      entry.transport.dispose();
      entry.transport = null;
    }

    try {
      entry.transport = await this.connect(entry.target);
    } catch (error) {
      if (error instanceof ConnectError) {
        throw error;
      }
      throw new ConnectError(entry.target, "handshake", toError(error).message, { cause: error });
    }
    return entry.transport;
  }

  private async openChannel(entry: PoolEntry, transport: Transport, command: string): Promise<CommandChannel> {
    return entry.lock.runExclusive(async () => {
      try {
        return await transport.openChannel(command);
      } catch (error) {
        if (error instanceof SessionError) {
          throw error;
        }
        throw new SessionError(entry.target, `failed to open session: ${toError(error).message}`, {
          cause: error,
        });
      }
    });
  }
}
