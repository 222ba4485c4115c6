/**
 * Transfer Module - Single-file upload and download over session streams
 */

export { FileTransferEngine, uploadCommand, downloadCommand } from "./engine.js";
export { ProgressWriter } from "./progress.js";
export { StreamReader } from "./stream-reader.js";
export {
  ACK,
  WARNING,
  FATAL,
  formatMode,
  formatControlLine,
  parseControlLine,
  readAck,
  readControlLine,
} from "./scp-protocol.js";
export type { TransferDescriptor, UploadRequest, DownloadRequest, ControlRecord } from "./types.js";
