/**
 * Host Identity Verifier
 * Checks a server's host key against the known_hosts trust store, or accepts any key
 */

import { createScopedLogger } from "../utils/logger.js";
import { HostVerificationMode } from "../config/types.js";
import type { SSHSettings } from "../config/types.js";
import { KnownHosts, fingerprint, keyTypeOf } from "./known-hosts.js";

const logger = createScopedLogger("known-hosts");

/**
 * Why a host key was rejected
 */
export type HostKeyRejection = "unknown" | "mismatch" | "revoked";

/**
 * Result of a host key check
 */
export type HostKeyCheck =
  | { accepted: true }
  | { accepted: false; reason: HostKeyRejection; keyType: string; fingerprint: string };

/**
 * Verifier built once at startup and shared by every connection attempt
 */
export class HostIdentityVerifier {
  public readonly mode: HostVerificationMode;
  private readonly knownHostsPath: string | null;
  private store: KnownHosts | null = null;
  private loading: Promise<KnownHosts> | null = null;

  private constructor(mode: HostVerificationMode, knownHostsPath: string | null) {
    this.mode = mode;
    this.knownHostsPath = knownHostsPath;
  }

  /**
   * Verify against the known_hosts file at `knownHostsPath`
   */
  public static strict(knownHostsPath: string): HostIdentityVerifier {
    return new HostIdentityVerifier(HostVerificationMode.STRICT, knownHostsPath);
  }

  /**
   * Accept any host key
   */
  public static permissive(): HostIdentityVerifier {
    return new HostIdentityVerifier(HostVerificationMode.PERMISSIVE, null);
  }

  /**
   * Verifier for an already-parsed trust store
   */
  public static fromKnownHosts(store: KnownHosts): HostIdentityVerifier {
    const verifier = new HostIdentityVerifier(HostVerificationMode.STRICT, null);
    verifier.store = store;
    return verifier;
  }

  public static fromConfig(settings: SSHSettings): HostIdentityVerifier {
    return settings.hostVerification === HostVerificationMode.PERMISSIVE
      ? HostIdentityVerifier.permissive()
      : HostIdentityVerifier.strict(settings.knownHostsPath);
  }

  /**
   * Load the trust store once. Must complete before `check` in strict mode;
   * a failed load is retried by the next call.
   */
  public async prepare(): Promise<void> {
    if (this.mode === HostVerificationMode.PERMISSIVE || this.store) {
      return;
    }
    if (!this.knownHostsPath) {
      throw new Error("No known_hosts path configured");
    }

    if (!this.loading) {
      const knownHostsPath = this.knownHostsPath;
      this.loading = KnownHosts.load(knownHostsPath).then(
        (store) => {
          logger.debug("Loaded known hosts", { path: knownHostsPath, entries: store.size });
          return store;
        },
        (error: unknown) => {
          this.loading = null;
          throw error;
        }
      );
    }
    this.store = await this.loading;
  }

  /**
   * Check the key blob presented by `host:port`
   */
  public check(host: string, port: number, key: Buffer): HostKeyCheck {
    if (this.mode === HostVerificationMode.PERMISSIVE) {
      return { accepted: true };
    }
    if (!this.store) {
      throw new Error("Trust store not loaded. Call prepare() first.");
    }

    const verdict = this.store.lookup(host, port, key);
    if (verdict.status === "known") {
      return { accepted: true };
    }

    const rejection: HostKeyCheck = {
      accepted: false,
      reason: verdict.status,
      keyType: keyTypeOf(key),
      fingerprint: fingerprint(key),
    };
    logger.warn("Host key rejected", { host, port, ...rejection });
    return rejection;
  }
}
