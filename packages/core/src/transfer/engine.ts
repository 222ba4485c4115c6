/**
 * File Transfer Engine
 * Upload and download single files with the remote-copy protocol over a session's streams
 */

import fs from "node:fs";
import fsp from "node:fs/promises";
import type { FileHandle } from "node:fs/promises";
import path from "node:path";
import { once } from "node:events";
import { finished, pipeline } from "node:stream/promises";
import type { Writable } from "node:stream";
import { TransferIOError, TransferProtocolError, toError } from "../errors/index.js";
import type { ConnectionPool } from "../ssh/pool.js";
import type { RemoteProcess, RemoteSession } from "../ssh/session.js";
import type { ProgressCallback, Target } from "../types/common.js";
import { targetKey } from "../types/common.js";
import { createScopedLogger } from "../utils/logger.js";
import { shellQuote } from "../utils/shell.js";
import { ProgressWriter } from "./progress.js";
import { ACK, formatControlLine, parseControlLine, readAck, readControlLine } from "./scp-protocol.js";
import { StreamReader } from "./stream-reader.js";
import type { DownloadRequest, TransferDescriptor, UploadRequest } from "./types.js";

const logger = createScopedLogger("transfer");

const PERMISSION_BITS = 0o777;
const NUL = Buffer.from([ACK]);

function write(stream: Writable, data: string | Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, (error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Remote command receiving an upload
 */
export function uploadCommand(remotePath: string): string {
  const dest = shellQuote(remotePath);
  return `rm -f ${dest}; scp -t ${dest}`;
}

/**
 * Remote command sending a download
 */
export function downloadCommand(remotePath: string): string {
  return `scp -qrf ${shellQuote(remotePath)}`;
}

export class FileTransferEngine {
  private readonly pool?: ConnectionPool;

  /**
   * @param pool Needed only by `put` and `get`, which manage their own sessions
   */
  constructor(pool?: ConnectionPool) {
    this.pool = pool;
  }

  /**
   * Copy a local file to `remotePath` over `session`
   */
  public async upload(session: RemoteSession, request: UploadRequest): Promise<TransferDescriptor> {
    const { localPath, remotePath, onProgress } = request;

    let file: FileHandle;
    try {
      file = await fsp.open(localPath, "r");
    } catch (error) {
      throw new TransferIOError(localPath, toError(error).message, { cause: error });
    }

    try {
      const stats = await file.stat();
      if (!stats.isFile()) {
        throw new TransferIOError(localPath, "not a regular file");
      }

      const descriptor: TransferDescriptor = {
        localPath,
        remotePath,
        mode: stats.mode & PERMISSION_BITS,
        sizeBytes: stats.size,
        onProgress,
      };

      logger.info("Uploading file", { target: targetKey(session.target), localPath, remotePath, bytes: stats.size });
      const remote = await session.start(uploadCommand(remotePath));
      await this.rendezvous(remote, this.sendFile(remote, file, descriptor));
      logger.info("Upload completed", { target: targetKey(session.target), remotePath });
      return descriptor;
    } finally {
      await file.close();
    }
  }

  /**
   * Copy `remotePath` to a local file over `session`
   */
  public async download(session: RemoteSession, request: DownloadRequest): Promise<TransferDescriptor> {
    logger.info("Downloading file", {
      target: targetKey(session.target),
      remotePath: request.remotePath,
      localPath: request.localPath,
    });
    const remote = await session.start(downloadCommand(request.remotePath));
    const descriptor = await this.rendezvous(remote, this.receiveFile(remote, request));
    logger.info("Download completed", { target: targetKey(session.target), localPath: request.localPath });
    return descriptor;
  }

  /**
   * Upload to a target on a session of its own
   */
  public async put(
    target: Target,
    localPath: string,
    remotePath: string,
    onProgress?: ProgressCallback
  ): Promise<TransferDescriptor> {
    return this.requirePool().withSession(target, (session) =>
      this.upload(session, { localPath, remotePath, onProgress })
    );
  }

  /**
   * Download from a target on a session of its own
   */
  public async get(
    target: Target,
    remotePath: string,
    localPath: string,
    onProgress?: ProgressCallback
  ): Promise<TransferDescriptor> {
    return this.requirePool().withSession(target, (session) =>
      this.download(session, { remotePath, localPath, onProgress })
    );
  }

  private requirePool(): ConnectionPool {
    if (!this.pool) {
      throw new Error("FileTransferEngine was created without a connection pool");
    }
    return this.pool;
  }

  /**
   * Wait for both the protocol task and the remote command. A protocol failure
   * aborts the command and takes precedence; the command's own failure is kept
   * as its cause.
   */
  private async rendezvous<T>(remote: RemoteProcess, background: Promise<T>): Promise<T> {
    const protocol = background.catch((error: unknown) => {
      remote.abort();
      throw error;
    });

    const [protocolResult, commandResult] = await Promise.allSettled([protocol, remote.wait()]);

    if (protocolResult.status === "rejected") {
      const error = toError(protocolResult.reason);
      if (commandResult.status === "rejected" && error.cause === undefined) {
        error.cause = commandResult.reason;
      }
      throw error;
    }
    if (commandResult.status === "rejected") {
      throw toError(commandResult.reason);
    }
    return protocolResult.value;
  }

  private async sendFile(remote: RemoteProcess, file: FileHandle, descriptor: TransferDescriptor): Promise<void> {
    const reader = new StreamReader(remote.stdout);
    try {
      await this.sendRecord(remote, reader, file, descriptor);
    } finally {
      reader.drain();
    }
  }

  private async sendRecord(
    remote: RemoteProcess,
    reader: StreamReader,
    file: FileHandle,
    descriptor: TransferDescriptor
  ): Promise<void> {
    const { sizeBytes, onProgress } = descriptor;

    await readAck(reader);
    await write(
      remote.stdin,
      formatControlLine({ mode: descriptor.mode, size: sizeBytes, name: path.basename(descriptor.localPath) })
    );
    await readAck(reader);

    const progress = new ProgressWriter(remote.stdin, sizeBytes, onProgress);
    if (sizeBytes > 0) {
      const source = file.createReadStream({ start: 0, end: sizeBytes - 1, autoClose: false });
      try {
        await pipeline(source, progress);
      } catch (error) {
        throw new TransferIOError(descriptor.localPath, `read failed: ${toError(error).message}`, { cause: error });
      }
    }
    if (progress.transferred !== sizeBytes) {
      throw new TransferProtocolError(
        "",
        `Short write: declared ${sizeBytes} bytes, sent ${progress.transferred} (${descriptor.localPath} changed during upload)`
      );
    }
    if (sizeBytes === 0) {
      onProgress?.(1);
    }

    await write(remote.stdin, NUL);
    await readAck(reader);
    remote.stdin.end();
  }

  private async receiveFile(remote: RemoteProcess, request: DownloadRequest): Promise<TransferDescriptor> {
    const reader = new StreamReader(remote.stdout);
    try {
      return await this.receiveRecord(remote, reader, request);
    } finally {
      reader.drain();
    }
  }

  private async receiveRecord(
    remote: RemoteProcess,
    reader: StreamReader,
    request: DownloadRequest
  ): Promise<TransferDescriptor> {
    const { localPath, remotePath, onProgress } = request;

    await write(remote.stdin, NUL);
    const line = await readControlLine(reader);
    const record = parseControlLine(line);
    const descriptor: TransferDescriptor = {
      localPath,
      remotePath,
      mode: record.mode & PERMISSION_BITS,
      sizeBytes: record.size,
      onProgress,
    };

    const sink = fs.createWriteStream(localPath);
    try {
      await once(sink, "open");
    } catch (error) {
      throw new TransferIOError(localPath, toError(error).message, { cause: error });
    }

    try {
      try {
        await fsp.chmod(localPath, descriptor.mode);
      } catch (error) {
        throw new TransferProtocolError(line, `Cannot set mode on ${localPath}: ${toError(error).message}`, {
          cause: error,
        });
      }

      await write(remote.stdin, NUL);

      const progress = new ProgressWriter(sink, record.size, onProgress);
      await reader.copyTo(progress, record.size);
      sink.end();
      await finished(sink);
      if (record.size === 0) {
        onProgress?.(1);
      }

      await readAck(reader);
      await write(remote.stdin, NUL);
      remote.stdin.end();
      return descriptor;
    } catch (error) {
      sink.destroy();
      throw error;
    }
  }
}
