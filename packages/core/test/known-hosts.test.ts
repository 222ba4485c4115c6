import crypto from "node:crypto";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { HostIdentityVerifier } from "../src/ssh/host-verifier.js";
import { KnownHosts, fingerprint, keyTypeOf, knownHostsAddress } from "../src/ssh/known-hosts.js";

function keyBlob(type: string, fill: number): Buffer {
  const name = Buffer.from(type, "ascii");
  const body = Buffer.alloc(32, fill);
  const header = Buffer.alloc(4);
  header.writeUInt32BE(name.length);
  const bodyLength = Buffer.alloc(4);
  bodyLength.writeUInt32BE(body.length);
  return Buffer.concat([header, name, bodyLength, body]);
}

function hashedHost(address: string, salt: Buffer): string {
  const hash = crypto.createHmac("sha1", salt).update(address).digest("base64");
  return `|1|${salt.toString("base64")}|${hash}`;
}

const alphaKey = keyBlob("ssh-ed25519", 1);
const betaKey = keyBlob("ssh-ed25519", 2);
const rsaKey = keyBlob("ssh-rsa", 3);
const line = (hosts: string, key: Buffer, type = "ssh-ed25519"): string => `${hosts} ${type} ${key.toString("base64")}`;

describe("knownHostsAddress", () => {
  it("brackets non-default ports", () => {
    expect(knownHostsAddress("node-1", 22)).toBe("node-1");
    expect(knownHostsAddress("node-1", 2222)).toBe("[node-1]:2222");
  });
});

describe("KnownHosts", () => {
  it("accepts a listed key and skips comments", () => {
    const store = KnownHosts.parse(["# fleet", "", line("node-1,node-2", alphaKey)].join("\n"));

    expect(store.size).toBe(1);
    expect(store.lookup("node-2", 22, alphaKey)).toEqual({ status: "known" });
    expect(store.lookup("node-3", 22, alphaKey)).toEqual({ status: "unknown" });
  });

  it("reports a mismatch with the expected key types", () => {
    const store = KnownHosts.parse([line("node-1", alphaKey), line("node-1", rsaKey, "ssh-rsa")].join("\n"));

    expect(store.lookup("node-1", 22, betaKey)).toEqual({
      status: "mismatch",
      expectedTypes: ["ssh-ed25519", "ssh-rsa"],
    });
  });

  it("matches hashed host names", () => {
    const store = KnownHosts.parse(line(hashedHost("node-1", Buffer.alloc(20, 7)), alphaKey));

    expect(store.lookup("node-1", 22, alphaKey)).toEqual({ status: "known" });
    expect(store.lookup("node-10", 22, alphaKey)).toEqual({ status: "unknown" });
  });

  it("matches non-default ports only in bracketed form", () => {
    const store = KnownHosts.parse(line("[node-1]:2222", alphaKey));

    expect(store.lookup("node-1", 2222, alphaKey)).toEqual({ status: "known" });
    expect(store.lookup("node-1", 22, alphaKey)).toEqual({ status: "unknown" });
  });

  it("honors wildcards and negation", () => {
    const store = KnownHosts.parse(line("node-*,!node-9", alphaKey));

    expect(store.lookup("node-4", 22, alphaKey)).toEqual({ status: "known" });
    expect(store.lookup("node-9", 22, alphaKey)).toEqual({ status: "unknown" });
  });

  it("rejects revoked keys for every host", () => {
    const store = KnownHosts.parse([line("node-1", alphaKey), `@revoked * ssh-ed25519 ${alphaKey.toString("base64")}`].join("\n"));

    expect(store.lookup("node-1", 22, alphaKey)).toEqual({ status: "revoked" });
  });
});

describe("key helpers", () => {
  it("reads the key type from the blob", () => {
    expect(keyTypeOf(rsaKey)).toBe("ssh-rsa");
    expect(keyTypeOf(Buffer.from([0, 0]))).toBe("unknown");
  });

  it("formats an unpadded SHA256 fingerprint", () => {
    const digest = crypto.createHash("sha256").update(alphaKey).digest("base64").replace(/=+$/, "");
    expect(fingerprint(alphaKey)).toBe(`SHA256:${digest}`);
  });
});

describe("HostIdentityVerifier", () => {
  it("accepts any key in permissive mode", async () => {
    const verifier = HostIdentityVerifier.permissive();
    await verifier.prepare();
    expect(verifier.check("node-1", 22, betaKey)).toEqual({ accepted: true });
  });

  it("describes a rejected key", () => {
    const verifier = HostIdentityVerifier.fromKnownHosts(KnownHosts.parse(line("node-1", alphaKey)));

    expect(verifier.check("node-1", 22, betaKey)).toEqual({
      accepted: false,
      reason: "mismatch",
      keyType: "ssh-ed25519",
      fingerprint: fingerprint(betaKey),
    });
  });

  it("requires prepare before checking in strict mode", () => {
    const verifier = HostIdentityVerifier.strict("/nonexistent/known_hosts");
    expect(() => verifier.check("node-1", 22, alphaKey)).toThrow("Trust store not loaded. Call prepare() first.");
  });

  it("retries a failed load", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "shellfleet-hosts-"));
    const file = path.join(dir, "known_hosts");
    try {
      const verifier = HostIdentityVerifier.strict(file);
      await expect(verifier.prepare()).rejects.toThrow("ENOENT");

      await fs.writeFile(file, line("node-1", alphaKey));
      await verifier.prepare();
      expect(verifier.check("node-1", 22, alphaKey)).toEqual({ accepted: true });
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
