/**
 * Progress-observing writer
 */

import { Writable } from "node:stream";
import type { ProgressCallback } from "../types/common.js";

/**
 * Forwards chunks to `target` without ending it, reporting `written / total`
 * after each chunk the target accepted.
 */
export class ProgressWriter extends Writable {
  private readonly target: Writable;
  private readonly total: number;
  private readonly onProgress?: ProgressCallback;
  private written = 0;

  constructor(target: Writable, total: number, onProgress?: ProgressCallback) {
    super();
    this.target = target;
    this.total = total;
    this.onProgress = onProgress;
  }

  /**
   * Bytes accepted by the target so far
   */
  public get transferred(): number {
    return this.written;
  }

  public _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.target.write(chunk, (error) => {
      if (error) {
        callback(error);
        return;
      }
      this.written += chunk.length;
      this.onProgress?.(this.written / this.total);
      callback();
    });
  }
}
