/**
 * Remote-copy wire protocol
 *
 * A file is sent as one control line `C<mode> <size> <name>\n`, exactly
 * `size` payload bytes and a NUL byte. The receiving side answers every step
 * with a status byte: 0 for ok, 1 (warning) or 2 (fatal) followed by a
 * diagnostic line.
 */

import { TransferProtocolError } from "../errors/index.js";
import type { StreamReader } from "./stream-reader.js";
import type { ControlRecord } from "./types.js";

export const ACK = 0x00;
export const WARNING = 0x01;
export const FATAL = 0x02;

const CONTROL_LINE = /^C([0-7]{3,4}) (\d+) (.+)$/;

/**
 * Permission bits as four-digit octal, e.g. 0644
 */
export function formatMode(mode: number): string {
  return (mode & 0o7777).toString(8).padStart(4, "0");
}

export function formatControlLine(record: ControlRecord): string {
  return `C${formatMode(record.mode)} ${record.size} ${record.name}\n`;
}

/**
 * Parse a control line without its trailing newline
 * @throws TransferProtocolError carrying the raw line when it does not have the three fields
 */
export function parseControlLine(line: string): ControlRecord {
  const match = CONTROL_LINE.exec(line);
  if (!match) {
    throw new TransferProtocolError(line, `Malformed control line: ${line}`);
  }

  const size = Number(match[2]);
  if (!Number.isSafeInteger(size)) {
    throw new TransferProtocolError(line, `Control line size out of range: ${line}`);
  }

  return { mode: parseInt(match[1], 8), size, name: match[3] };
}

/**
 * Read the receiver's status byte; a warning or fatal status becomes a TransferProtocolError
 */
export async function readAck(reader: StreamReader): Promise<void> {
  const status = await reader.readByte();
  if (status === ACK) {
    return;
  }
  if (status === WARNING || status === FATAL) {
    const diagnostic = await reader.readLine();
    throw new TransferProtocolError(diagnostic, `Remote ${status === FATAL ? "error" : "warning"}: ${diagnostic}`);
  }
  throw new TransferProtocolError(String.fromCharCode(status), `Unexpected status byte 0x${status.toString(16)}`);
}

/**
 * Read the sender's next record line; a leading warning or fatal status is a remote error
 */
export async function readControlLine(reader: StreamReader): Promise<string> {
  const first = await reader.peekByte();
  if (first === WARNING || first === FATAL) {
    await reader.readByte();
    const diagnostic = await reader.readLine();
    throw new TransferProtocolError(diagnostic, `Remote ${first === FATAL ? "error" : "warning"}: ${diagnostic}`);
  }
  return reader.readLine();
}
