import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { RemoteCommandError, TransferIOError, TransferProtocolError } from "../src/errors/index.js";
import { ConnectionPool } from "../src/ssh/pool.js";
import { FileTransferEngine, downloadCommand, uploadCommand } from "../src/transfer/engine.js";
import type { Target } from "../src/types/common.js";
import { FakeFleet } from "./helpers/fake-remote.js";

const node1: Target = { user: "ops", host: "node-1" };

function pattern(size: number): Buffer {
  return Buffer.from(Array.from({ length: size }, (_, i) => i % 251));
}

function isNonDecreasing(values: number[]): boolean {
  return values.every((value, i) => i === 0 || value >= values[i - 1]);
}

describe("transfer commands", () => {
  it("builds the sink and source command lines", () => {
    expect(uploadCommand("/tmp/data.bin")).toBe("rm -f /tmp/data.bin; scp -t /tmp/data.bin");
    expect(uploadCommand("/tmp/my file")).toBe("rm -f '/tmp/my file'; scp -t '/tmp/my file'");
    expect(downloadCommand("/var/log/app.log")).toBe("scp -qrf /var/log/app.log");
  });
});

describe("FileTransferEngine", () => {
  let dir: string;
  let fleet: FakeFleet;
  let pool: ConnectionPool;
  let engine: FileTransferEngine;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "shellfleet-transfer-"));
    fleet = new FakeFleet();
    pool = new ConnectionPool({ connect: fleet.connect });
    engine = new FileTransferEngine(pool);
  });

  afterEach(async () => {
    await pool.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function localFile(name: string, data: Buffer, mode: number): Promise<string> {
    const file = path.join(dir, name);
    await fs.writeFile(file, data);
    await fs.chmod(file, mode);
    return file;
  }

  describe("upload", () => {
    it("sends the control line, the payload and a terminating NUL", async () => {
      const payload = pattern(10000);
      const local = await localFile("data.bin", payload, 0o644);

      const descriptor = await engine.put(node1, local, "/tmp/data.bin");

      const host = fleet.host("node-1");
      expect(host.commands).toEqual(["rm -f /tmp/data.bin; scp -t /tmp/data.bin"]);
      expect(host.channels[0].written).toEqual(
        Buffer.concat([Buffer.from("C0644 10000 data.bin\n"), payload, Buffer.from([0])])
      );
      expect(host.files.get("/tmp/data.bin")).toEqual({ data: payload, mode: 0o644 });
      expect(descriptor).toEqual({
        localPath: local,
        remotePath: "/tmp/data.bin",
        mode: 0o644,
        sizeBytes: 10000,
        onProgress: undefined,
      });
    });

    it("reports monotonic progress ending at one", async () => {
      const local = await localFile("big.bin", pattern(200000), 0o600);
      const progress: number[] = [];

      await engine.put(node1, local, "/srv/big.bin", (fraction) => progress.push(fraction));

      expect(progress.length).toBeGreaterThan(1);
      expect(isNonDecreasing(progress)).toBe(true);
      expect(progress[progress.length - 1]).toBe(1);
      expect(fleet.host("node-1").files.get("/srv/big.bin")?.data.length).toBe(200000);
    });

    it("reports completion once for an empty file", async () => {
      const local = await localFile("empty.txt", Buffer.alloc(0), 0o640);
      const progress: number[] = [];

      await engine.put(node1, local, "/tmp/empty.txt", (fraction) => progress.push(fraction));

      expect(progress).toEqual([1]);
      expect(fleet.host("node-1").channels[0].written).toEqual(Buffer.from("C0640 0 empty.txt\n\0"));
    });

    it("quotes remote paths with spaces", async () => {
      const local = await localFile("notes.txt", Buffer.from("hi"), 0o644);

      await engine.put(node1, local, "/tmp/my notes.txt");

      expect(fleet.host("node-1").files.get("/tmp/my notes.txt")?.data.toString()).toBe("hi");
    });

    it("fails with the remote diagnostic when the sink refuses the file", async () => {
      const local = await localFile("data.bin", pattern(16), 0o644);
      fleet.host("node-1").sinkFailure = "scp: /readonly/data.bin: Permission denied";

      const error = await engine.put(node1, local, "/readonly/data.bin").catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransferProtocolError);
      if (error instanceof TransferProtocolError) {
        expect(error.message).toBe("Remote error: scp: /readonly/data.bin: Permission denied");
        expect(error.line).toBe("scp: /readonly/data.bin: Permission denied");
        expect(error.cause).toBeInstanceOf(RemoteCommandError);
      }
    });

    it("fails before starting a command when the local file is missing", async () => {
      const missing = path.join(dir, "missing.bin");

      const error = await engine.put(node1, missing, "/tmp/missing.bin").catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransferIOError);
      if (error instanceof TransferIOError) {
        expect(error.path).toBe(missing);
      }
      expect(fleet.host("node-1").commands).toEqual([]);
    });

    it("refuses to upload a directory", async () => {
      await expect(engine.put(node1, dir, "/tmp/dir")).rejects.toThrow(`${dir}: not a regular file`);
    });
  });

  describe("download", () => {
    it("writes the file with the sender's mode", async () => {
      const payload = pattern(5000);
      fleet.host("node-1").files.set("/var/log/app.log", { data: payload, mode: 0o600 });
      const local = path.join(dir, "app.log");

      const descriptor = await engine.get(node1, "/var/log/app.log", local);

      expect(await fs.readFile(local)).toEqual(payload);
      expect((await fs.stat(local)).mode & 0o777).toBe(0o600);
      expect(descriptor.sizeBytes).toBe(5000);
      expect(fleet.host("node-1").commands).toEqual(["scp -qrf /var/log/app.log"]);
    });

    it("round-trips content and mode", async () => {
      const payload = pattern(70000);
      const local = await localFile("tool.sh", payload, 0o750);
      const copy = path.join(dir, "tool-copy.sh");
      const progress: number[] = [];

      await engine.put(node1, local, "/opt/tool.sh");
      await engine.get(node1, "/opt/tool.sh", copy, (fraction) => progress.push(fraction));

      expect(await fs.readFile(copy)).toEqual(payload);
      expect((await fs.stat(copy)).mode & 0o777).toBe(0o750);
      expect(isNonDecreasing(progress)).toBe(true);
      expect(progress[progress.length - 1]).toBe(1);
      expect(fleet.handshakes(node1)).toBe(1);
    });

    it("reports a missing remote file", async () => {
      const error = await engine
        .get(node1, "/tmp/nope", path.join(dir, "nope"))
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransferProtocolError);
      if (error instanceof TransferProtocolError) {
        expect(error.line).toBe("scp: /tmp/nope: No such file or directory");
      }
    });

    it("rejects a malformed control line with the literal line", async () => {
      const host = fleet.host("node-1");
      host.files.set("/data", { data: Buffer.from("x"), mode: 0o644 });
      host.controlLineOverride = "D0755 0 data\n";

      const error = await engine.get(node1, "/data", path.join(dir, "data")).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransferProtocolError);
      if (error instanceof TransferProtocolError) {
        expect(error.line).toBe("D0755 0 data");
      }
      await expect(fs.access(path.join(dir, "data"))).rejects.toThrow("ENOENT");
    });

    it("fails when the local file cannot be created", async () => {
      fleet.host("node-1").files.set("/data", { data: Buffer.from("x"), mode: 0o644 });
      const unwritable = path.join(dir, "no-such-dir", "data");

      const error = await engine.get(node1, "/data", unwritable).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(TransferIOError);
      if (error instanceof TransferIOError) {
        expect(error.path).toBe(unwritable);
      }
    });

    it("reports completion once for an empty file", async () => {
      fleet.host("node-1").files.set("/tmp/empty", { data: Buffer.alloc(0), mode: 0o644 });
      const progress: number[] = [];

      await engine.get(node1, "/tmp/empty", path.join(dir, "empty"), (fraction) => progress.push(fraction));

      expect(progress).toEqual([1]);
      expect(await fs.readFile(path.join(dir, "empty"))).toEqual(Buffer.alloc(0));
    });
  });

  it("needs a pool for put and get", async () => {
    await expect(new FileTransferEngine().put(node1, "/tmp/a", "/tmp/b")).rejects.toThrow(
      "FileTransferEngine was created without a connection pool"
    );
  });
});
