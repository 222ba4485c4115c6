/**
 * Known hosts trust store
 * Parser and matcher for OpenSSH known_hosts files
 */

import crypto from "node:crypto";
import fs from "node:fs/promises";

/**
 * One key line of a known_hosts file
 */
interface KnownHostLine {
  marker: "revoked" | "cert-authority" | null;
  hosts: string;
  keyType: string;
  key: Buffer;
  lineNumber: number;
}

/**
 * Outcome of looking a presented key up in the trust store
 */
export type KnownHostsVerdict =
  | { status: "known" }
  | { status: "unknown" }
  | { status: "revoked" }
  | { status: "mismatch"; expectedTypes: string[] };

/**
 * Host string as written in known_hosts: `host` on port 22, `[host]:port` otherwise
 */
export function knownHostsAddress(host: string, port: number): string {
  return port === 22 ? host : `[${host}]:${port}`;
}

const HASHED_PREFIX = "|1|";

function matchesHashed(entry: string, address: string): boolean {
  const [, , salt, hash] = entry.split("|");
  if (!salt || !hash) {
    return false;
  }
  const digest = crypto.createHmac("sha1", Buffer.from(salt, "base64")).update(address).digest();
  const expected = Buffer.from(hash, "base64");
  return expected.length === digest.length && crypto.timingSafeEqual(expected, digest);
}

function wildcardToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("")
    .map((char) => {
      if (char === "*") {
        return ".*";
      }
      if (char === "?") {
        return ".";
      }
      return char.replace(/[\\^$.+()|{}[\]]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${source}$`, "i");
}

function matchesPatterns(list: string, address: string): boolean {
  let matched = false;
  for (const raw of list.split(",")) {
    const negated = raw.startsWith("!");
    const pattern = negated ? raw.slice(1) : raw;
    if (!pattern || !wildcardToRegExp(pattern).test(address)) {
      continue;
    }
    if (negated) {
      return false;
    }
    matched = true;
  }
  return matched;
}

/**
 * Parsed known_hosts file
 */
export class KnownHosts {
  private readonly lines: KnownHostLine[];

  private constructor(lines: KnownHostLine[]) {
    this.lines = lines;
  }

  /**
   * Parse known_hosts text. Comments, blank lines and lines without a
   * decodable key are skipped.
   */
  public static parse(text: string): KnownHosts {
    const lines: KnownHostLine[] = [];

    text.split(/\r?\n/).forEach((rawLine, index) => {
      const line = rawLine.trim();
      if (!line || line.startsWith("#")) {
        return;
      }

      const fields = line.split(/\s+/);
      let marker: KnownHostLine["marker"] = null;
      if (fields[0].startsWith("@")) {
        const name = fields.shift();
        if (name === "@revoked") {
          marker = "revoked";
        } else if (name === "@cert-authority") {
          marker = "cert-authority";
        } else {
          return;
        }
      }

      if (fields.length < 3) {
        return;
      }
      const [hosts, keyType, encodedKey] = fields;
      const key = Buffer.from(encodedKey, "base64");
      if (key.length === 0) {
        return;
      }

      lines.push({ marker, hosts, keyType, key, lineNumber: index + 1 });
    });

    return new KnownHosts(lines);
  }

  /**
   * Read and parse a known_hosts file
   */
  public static async load(filePath: string): Promise<KnownHosts> {
    return KnownHosts.parse(await fs.readFile(filePath, "utf-8"));
  }

  /**
   * Number of key lines in the store
   */
  public get size(): number {
    return this.lines.length;
  }

  /**
   * Check a presented host key blob against the store
   */
  public lookup(host: string, port: number, key: Buffer): KnownHostsVerdict {
    const address = knownHostsAddress(host, port);

    const revoked = this.lines.some((line) => line.marker === "revoked" && line.key.equals(key));
    if (revoked) {
      return { status: "revoked" };
    }

    const matching = this.lines.filter((line) => line.marker === null && this.matchesHost(line, address));
    if (matching.some((line) => line.key.equals(key))) {
      return { status: "known" };
    }
    if (matching.length > 0) {
      return { status: "mismatch", expectedTypes: [...new Set(matching.map((line) => line.keyType))] };
    }
    return { status: "unknown" };
  }

  private matchesHost(line: KnownHostLine, address: string): boolean {
    if (line.hosts.startsWith(HASHED_PREFIX)) {
      return matchesHashed(line.hosts, address);
    }
    return matchesPatterns(line.hosts, address);
  }
}

/**
 * Algorithm name embedded at the start of an SSH public key blob
 */
export function keyTypeOf(key: Buffer): string {
  if (key.length < 4) {
    return "unknown";
  }
  const length = key.readUInt32BE(0);
  if (length === 0 || 4 + length > key.length) {
    return "unknown";
  }
  return key.subarray(4, 4 + length).toString("ascii");
}

/**
 * OpenSSH-style SHA256 fingerprint of a public key blob
 */
export function fingerprint(key: Buffer): string {
  const digest = crypto.createHash("sha256").update(key).digest("base64");
  return `SHA256:${digest.replace(/=+$/, "")}`;
}
