/**
 * Transfer Module Types
 */

import type { ProgressCallback } from "../types/common.js";

/**
 * One directed transfer. `mode` and `size` are fixed before any payload byte is sent.
 */
export interface TransferDescriptor {
  localPath: string;
  remotePath: string;
  /** Permission bits */
  mode: number;
  sizeBytes: number;
  onProgress?: ProgressCallback;
}

/**
 * Upload request; mode and size come from the local file
 */
export interface UploadRequest {
  localPath: string;
  remotePath: string;
  onProgress?: ProgressCallback;
}

/**
 * Download request; mode and size come from the remote control line
 */
export interface DownloadRequest {
  remotePath: string;
  localPath: string;
  onProgress?: ProgressCallback;
}

/**
 * Metadata carried by a control line
 */
export interface ControlRecord {
  mode: number;
  size: number;
  name: string;
}
