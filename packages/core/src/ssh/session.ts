/**
 * Remote Session
 * Single-use handle for running one command on a pooled connection
 */

import type { Readable, Writable } from "node:stream";
import { RemoteCommandError, SessionError } from "../errors/index.js";
import type { Target } from "../types/common.js";
import { targetKey } from "../types/common.js";
import { createScopedLogger } from "../utils/logger.js";
import type { CommandChannel, ExitStatus } from "./types.js";

const logger = createScopedLogger("session");

/**
 * Opens the channel for a session's command on its pooled connection
 */
export type ChannelOpener = (command: string) => Promise<CommandChannel>;

const STDERR_TAIL_BYTES = 64 * 1024;

/**
 * A command started on a session, with its standard streams
 */
export class RemoteProcess {
  public readonly command: string;
  private readonly channel: CommandChannel;
  private stderrTail = "";

  constructor(command: string, channel: CommandChannel) {
    this.command = command;
    this.channel = channel;

    // Keep stderr flowing so a chatty command cannot stall the channel
    channel.stderr.on("data", (chunk: Buffer | string) => {
      this.stderrTail = (this.stderrTail + chunk.toString()).slice(-STDERR_TAIL_BYTES);
    });
  }

  public get stdin(): Writable {
    return this.channel.stdin;
  }

  public get stdout(): Readable {
    return this.channel.stdout;
  }

  public get stderr(): Readable {
    return this.channel.stderr;
  }

  /**
   * Last bytes written to stderr
   */
  public get errorOutput(): string {
    return this.stderrTail;
  }

  /**
   * Wait for the command to finish. Rejects with RemoteCommandError on a
   * non-zero exit, a signal, or a missing exit status.
   */
  public async wait(): Promise<ExitStatus> {
    const status = await this.channel.exit;
    if (status.signal !== null || status.code !== 0) {
      throw new RemoteCommandError(this.command, status.code, status.signal, this.stderrTail);
    }
    return status;
  }

  /**
   * Stop feeding the command and discard its output so it can finish
   */
  public abort(): void {
    this.channel.stdin.end();
    this.channel.stdout.resume();
  }
}

/**
 * Session bound to one pooled connection; runs at most one command
 */
export class RemoteSession {
  public readonly target: Target;
  private readonly open: ChannelOpener;
  private channel: CommandChannel | null = null;
  private used = false;
  private closed = false;

  constructor(target: Target, open: ChannelOpener) {
    this.target = target;
    this.open = open;
  }

  /**
   * Open the session channel and start `command` on it
   */
  public async start(command: string): Promise<RemoteProcess> {
    if (this.closed) {
      throw new SessionError(this.target, "session is closed");
    }
    if (this.used) {
      throw new SessionError(this.target, "session already ran a command");
    }
    this.used = true;

    logger.debug("Starting remote command", { target: targetKey(this.target), command });
    this.channel = await this.open(command);
    return new RemoteProcess(command, this.channel);
  }

  /**
   * Run `command` to completion and return its combined stdout and stderr
   */
  public async run(command: string): Promise<string> {
    const remote = await this.start(command);
    const chunks: Buffer[] = [];
    const collect = (chunk: Buffer | string): void => {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    };
    remote.stdout.on("data", collect);
    remote.stderr.on("data", collect);

    try {
      await remote.wait();
      return Buffer.concat(chunks).toString("utf-8");
    } catch (error) {
      if (error instanceof RemoteCommandError) {
        error.output = Buffer.concat(chunks).toString("utf-8");
      }
      throw error;
    }
  }

  /**
   * Release the session channel. Safe to call more than once.
   */
  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.channel?.close();
  }
}
