/**
 * SSH Transport
 * One authenticated SSH connection that opens a channel per command
 */

import { NodeSSH } from "node-ssh";
import type { Duplex, Readable } from "node:stream";
import { ConnectError, SessionError, toError } from "../errors/index.js";
import type { ConnectFailureReason } from "../errors/index.js";
import type { Target } from "../types/common.js";
import { targetKey } from "../types/common.js";
import { createScopedLogger } from "../utils/logger.js";
import { connectAgent } from "./agent.js";
import type { HostKeyCheck } from "./host-verifier.js";
import type { CommandChannel, ExitStatus, SSHConnectOptions, Transport } from "./types.js";

const logger = createScopedLogger("ssh");

type HostKeyRejected = Extract<HostKeyCheck, { accepted: false }>;

const REJECTION_REASONS: Record<HostKeyRejected["reason"], ConnectFailureReason> = {
  unknown: "host-key-unknown",
  mismatch: "host-key-mismatch",
  revoked: "host-key-revoked",
};

/**
 * Map a failed connect to a ConnectError, preferring a recorded host key rejection
 */
function toConnectError(target: Target, error: unknown, rejection: HostKeyRejected | undefined): ConnectError {
  if (error instanceof ConnectError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);

  if (rejection) {
    return new ConnectError(
      target,
      REJECTION_REASONS[rejection.reason],
      `host key ${rejection.reason} (${rejection.keyType} ${rejection.fingerprint})`,
      { cause: error }
    );
  }

  let reason: ConnectFailureReason = "handshake";
  if (typeof error === "object" && error !== null && "level" in error) {
    if (error.level === "client-timeout") {
      reason = "timeout";
    } else if (error.level === "client-socket" || error.level === "client-dns") {
      reason = "dial";
    }
  }
  return new ConnectError(target, reason, message, { cause: error });
}

/**
 * The parts of an ssh2 exec channel the transport reads
 */
export interface ExecChannel extends Duplex {
  readonly stderr: Readable;
  close(): void;
}

/**
 * The parts of an ssh2 client the transport drives
 */
export interface SSHClient {
  exec(command: string, callback: (error: Error | undefined, channel: ExecChannel) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

/**
 * An authenticated connection; node-ssh clears `connection` once the client closes
 */
export interface SSHConnection {
  readonly connection: SSHClient | null;
  isConnected(): boolean;
  dispose(): void;
}

/**
 * ssh2 reports exit signals as "SIGKILL"; ExitStatus carries "KILL"
 */
function signalName(signal: unknown): string | null {
  if (typeof signal !== "string" || signal === "") {
    return null;
  }
  return signal.startsWith("SIG") ? signal.slice(3) : signal;
}

/**
 * Adapt an ssh2 exec channel to the CommandChannel streams
 */
function toCommandChannel(channel: ExecChannel): CommandChannel {
  const exit = new Promise<ExitStatus>((resolve) => {
    let status: ExitStatus = { code: null, signal: null };
    channel.on("exit", (code: unknown, signal?: unknown) => {
      status = {
        code: typeof code === "number" ? code : null,
        signal: signalName(signal),
      };
    });
    channel.on("close", () => resolve(status));
  });

  return {
    stdin: channel,
    stdout: channel,
    stderr: channel.stderr,
    exit,
    close: () => {
      channel.close();
    },
  };
}

/**
 * SSH transport over node-ssh
 */
export class SSHTransport implements Transport {
  private readonly target: Target;
  private readonly ssh: SSHConnection;

  private constructor(target: Target, ssh: SSHConnection) {
    this.target = target;
    this.ssh = ssh;
  }

  /**
   * Wrap an established connection. Errors after the handshake are logged;
   * the connection then closes and the pool sees it as no longer connected.
   */
  public static fromConnection(target: Target, ssh: SSHConnection): SSHTransport {
    ssh.connection?.on("error", (error) => {
      logger.warn("SSH connection error", { target: targetKey(target), error: error.message });
    });
    return new SSHTransport(target, ssh);
  }

  /**
   * Dial and authenticate with agent identities. Every failure is a ConnectError.
   */
  public static async connect(target: Target, options: SSHConnectOptions): Promise<SSHTransport> {
    const agent = await connectAgent(target, options.agentSocketEnv, options.env);

    try {
      await options.verifier.prepare();
    } catch (error) {
      throw new ConnectError(target, "trust-store", `known hosts: ${toError(error).message}`, { cause: error });
    }

    logger.info("Connecting to SSH server", {
      target: targetKey(target),
      port: options.port,
      identities: agent.identities,
    });

    const verdict: { rejection?: HostKeyRejected } = {};
    const ssh = new NodeSSH();

    try {
      await ssh.connect({
        host: target.host,
        port: options.port,
        username: target.user,
        agent: agent.agent,
        readyTimeout: options.connectTimeoutMs,
        hostVerifier: (key: Buffer): boolean => {
          const check = options.verifier.check(target.host, options.port, key);
          if (!check.accepted) {
            verdict.rejection = check;
          }
          return check.accepted;
        },
      });
    } catch (error) {
      ssh.dispose();
      const connectError = toConnectError(target, error, verdict.rejection);
      logger.error("SSH connection failed", { target: targetKey(target), reason: connectError.reason });
      throw connectError;
    }

    logger.info("SSH connection established", { target: targetKey(target) });
    return SSHTransport.fromConnection(target, ssh);
  }

  /**
   * Open a session channel running `command`
   */
  public openChannel(command: string): Promise<CommandChannel> {
    const client = this.ssh.connection;
    if (!client || !this.ssh.isConnected()) {
      return Promise.reject(new SessionError(this.target, "SSH connection is not established"));
    }

    return new Promise((resolve, reject) => {
      client.exec(command, (error, channel) => {
        if (error) {
          reject(new SessionError(this.target, `failed to open session: ${error.message}`, { cause: error }));
          return;
        }
        resolve(toCommandChannel(channel));
      });
    });
  }

  public isConnected(): boolean {
    return this.ssh.isConnected();
  }

  public dispose(): void {
    this.ssh.dispose();
    logger.debug("SSH connection closed", { target: targetKey(this.target) });
  }
}
