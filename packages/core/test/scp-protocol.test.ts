import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { TransferProtocolError } from "../src/errors/index.js";
import {
  formatControlLine,
  formatMode,
  parseControlLine,
  readAck,
  readControlLine,
} from "../src/transfer/scp-protocol.js";
import { StreamReader } from "../src/transfer/stream-reader.js";

function readerOf(...chunks: Array<string | Buffer>): StreamReader {
  const stream = new PassThrough();
  for (const chunk of chunks) {
    stream.write(chunk);
  }
  stream.end();
  return new StreamReader(stream);
}

describe("control lines", () => {
  it("formats the mode as four octal digits", () => {
    expect(formatMode(0o644)).toBe("0644");
    expect(formatMode(0o100755)).toBe("0755");
    expect(formatControlLine({ mode: 0o644, size: 10000, name: "data.bin" })).toBe("C0644 10000 data.bin\n");
  });

  it("parses mode, size and a name containing spaces", () => {
    expect(parseControlLine("C0600 42 my notes.txt")).toEqual({ mode: 0o600, size: 42, name: "my notes.txt" });
    expect(parseControlLine("C755 0 run.sh")).toEqual({ mode: 0o755, size: 0, name: "run.sh" });
  });

  it("carries the literal line of a malformed record", () => {
    for (const line of ["D0755 0 dir", "C0644 10000", "C0648 1 bad-mode", "T1700000000 0 1700000000 0"]) {
      const error = (() => {
        try {
          parseControlLine(line);
        } catch (caught) {
          return caught;
        }
        return null;
      })();
      expect(error).toBeInstanceOf(TransferProtocolError);
      if (error instanceof TransferProtocolError) {
        expect(error.line).toBe(line);
        expect(error.message).toBe(`Malformed control line: ${line}`);
      }
    }
  });
});

describe("status bytes", () => {
  it("accepts an ack", async () => {
    await expect(readAck(readerOf(Buffer.from([0])))).resolves.toBeUndefined();
  });

  it("turns a fatal status into an error carrying the diagnostic", async () => {
    await expect(readAck(readerOf(Buffer.from([2]), "scp: /data: Permission denied\n"))).rejects.toMatchObject({
      line: "scp: /data: Permission denied",
      message: "Remote error: scp: /data: Permission denied",
    });
  });

  it("rejects an unknown status byte", async () => {
    await expect(readAck(readerOf("X"))).rejects.toThrow("Unexpected status byte 0x58");
  });

  it("reports a diagnostic in place of a control line", async () => {
    await expect(readControlLine(readerOf("\x01scp: /missing: No such file or directory\n"))).rejects.toMatchObject({
      line: "scp: /missing: No such file or directory",
    });
    await expect(readControlLine(readerOf("C0644 3 a.txt\nabc"))).resolves.toBe("C0644 3 a.txt");
  });
});

describe("StreamReader", () => {
  it("reads lines split across chunks", async () => {
    const reader = readerOf("C06", "44 1", "2 x\nrest");
    expect(await reader.readLine()).toBe("C0644 12 x");
    expect(await reader.readByte()).toBe("r".charCodeAt(0));
  });

  it("copies an exact number of bytes and leaves the rest", async () => {
    const reader = readerOf("hello", " world");
    const sink = new PassThrough();
    const copied: Buffer[] = [];
    sink.on("data", (chunk: Buffer) => copied.push(chunk));

    await reader.copyTo(sink, 7);
    expect(Buffer.concat(copied).toString()).toBe("hello w");
    expect(await reader.readLine().catch((error: unknown) => error)).toMatchObject({ line: "orld" });
  });

  it("fails a short read", async () => {
    const reader = readerOf("abc");
    await expect(reader.copyTo(new PassThrough(), 5)).rejects.toThrow("Short read: expected 5 bytes, got 3");
  });
});
