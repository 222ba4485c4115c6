/**
 * Stream reader
 * Pull-style reads (bytes, lines, exact-length copies) over a Readable
 */

import type { Readable, Writable } from "node:stream";
import { TransferProtocolError } from "../errors/index.js";

const NEWLINE = 0x0a;

function writeChunk(sink: Writable, chunk: Buffer): Promise<void> {
  return new Promise((resolve, reject) => {
    sink.write(chunk, (error) => (error ? reject(error) : resolve()));
  });
}

export class StreamReader {
  private readonly stream: Readable;
  private buffered: Buffer = Buffer.alloc(0);
  private ended = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;
  private readonly onReadable = (): void => this.notify();
  private readonly onEnd = (): void => {
    this.ended = true;
    this.notify();
  };
  private readonly onError = (error: Error): void => {
    this.failure = error;
    this.notify();
  };

  constructor(stream: Readable) {
    this.stream = stream;
    stream.on("readable", this.onReadable);
    stream.on("end", this.onEnd);
    stream.on("error", this.onError);
  }

  /**
   * Next byte without consuming it
   */
  public async peekByte(): Promise<number> {
    await this.require(1);
    return this.buffered[0];
  }

  public async readByte(): Promise<number> {
    await this.require(1);
    const byte = this.buffered[0];
    this.buffered = this.buffered.subarray(1);
    return byte;
  }

  /**
   * Read up to and excluding the next newline
   */
  public async readLine(): Promise<string> {
    let newline = this.buffered.indexOf(NEWLINE);
    while (newline === -1) {
      if (!(await this.fill())) {
        throw new TransferProtocolError(this.buffered.toString("utf-8"), "Unexpected end of stream while reading a line");
      }
      newline = this.buffered.indexOf(NEWLINE);
    }
    const line = this.buffered.subarray(0, newline).toString("utf-8");
    this.buffered = this.buffered.subarray(newline + 1);
    return line;
  }

  /**
   * Copy exactly `size` bytes into `sink`, waiting for each write to be accepted.
   * The sink is not ended.
   */
  public async copyTo(sink: Writable, size: number): Promise<number> {
    let remaining = size;
    while (remaining > 0) {
      if (this.buffered.length === 0 && !(await this.fill())) {
        throw new TransferProtocolError("", `Short read: expected ${size} bytes, got ${size - remaining}`);
      }
      const chunk = this.buffered.subarray(0, Math.min(remaining, this.buffered.length));
      this.buffered = this.buffered.subarray(chunk.length);
      remaining -= chunk.length;
      await writeChunk(sink, chunk);
    }
    return size;
  }

  /**
   * Stop reading and let the rest of the stream flow away
   */
  public drain(): void {
    this.stream.off("readable", this.onReadable);
    this.stream.off("end", this.onEnd);
    this.stream.off("error", this.onError);
    this.stream.resume();
  }

  private async require(count: number): Promise<void> {
    while (this.buffered.length < count) {
      if (!(await this.fill())) {
        throw new TransferProtocolError("", "Unexpected end of stream");
      }
    }
  }

  /**
   * Append the next chunk to the buffer; false at end of stream
   */
  private async fill(): Promise<boolean> {
    for (;;) {
      if (this.failure) {
        throw this.failure;
      }
      const chunk: unknown = this.stream.read();
      if (chunk !== null) {
        const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
        this.buffered = this.buffered.length === 0 ? bytes : Buffer.concat([this.buffered, bytes]);
        return true;
      }
      if (this.ended) {
        return false;
      }
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}
