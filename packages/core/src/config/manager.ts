/**
 * Configuration Manager
 * Handles loading, saving, and managing the configuration file
 */

import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import yaml from "js-yaml";
import { toError } from "../errors/index.js";
import { createScopedLogger, LogLevel } from "../utils/logger.js";
import type { ShellFleetConfig } from "./types.js";
import { DEFAULT_CONFIG, HostVerificationMode, ReconnectPolicy } from "./types.js";

const logger = createScopedLogger("config");

type PlainObject = Record<string, unknown>;

const isPlainObject = (value: unknown): value is PlainObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const stringOr = (value: unknown, fallback: string): string =>
  typeof value === "string" && value.length > 0 ? value : fallback;

const numberOr = (value: unknown, fallback: number): number => {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
    return Number(value);
  }
  return fallback;
};

const booleanOr = (value: unknown, fallback: boolean): boolean => {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === "true" || value === "false") {
    return value === "true";
  }
  return fallback;
};

const enumOr = <E extends string>(values: readonly E[], value: unknown, fallback: E): E => {
  const match = values.find((candidate) => candidate === value);
  return match ?? fallback;
};

/**
 * Configuration Manager class
 */
export class ConfigManager {
  private config: ShellFleetConfig | null = null;
  private configPath: string;

  /**
   * Create a new ConfigManager instance
   * @param configPath Optional path to configuration file
   */
  constructor(configPath?: string) {
    this.configPath = configPath ?? ConfigManager.getDefaultConfigPath();
  }

  /**
   * Default configuration file location
   */
  public static getDefaultConfigPath(): string {
    return path.join(os.homedir(), ".shellfleet", "config.yaml");
  }

  /**
   * Get the configuration file path
   */
  public getConfigPath(): string {
    return this.configPath;
  }

  /**
   * Load configuration from file, falling back to defaults when it does not exist
   */
  public async load(): Promise<ShellFleetConfig> {
    try {
      const fileContent = await fs.readFile(this.configPath, "utf-8");
      this.config = this.mergeWithDefaults(yaml.load(fileContent));
      logger.debug("Configuration loaded", { path: this.configPath });
      return this.config;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        logger.debug("Configuration file not found, using defaults", { path: this.configPath });
        this.config = this.mergeWithDefaults({});
        return this.config;
      }

      logger.error("Failed to load configuration", error);
      throw new Error(`Failed to load configuration: ${toError(error).message}`, { cause: error });
    }
  }

  /**
   * Save configuration to file
   * @param config Optional configuration to save (uses current config if not provided)
   */
  public async save(config?: ShellFleetConfig): Promise<void> {
    const configToSave = config ?? this.config;

    if (!configToSave) {
      throw new Error("No configuration to save");
    }

    try {
      await fs.mkdir(path.dirname(this.configPath), { recursive: true });

      const yamlContent = yaml.dump(configToSave, {
        indent: 2,
        lineWidth: 100,
        noRefs: true,
      });

      await fs.writeFile(this.configPath, yamlContent, "utf-8");

      this.config = configToSave;
      logger.info("Configuration saved successfully", { path: this.configPath });
    } catch (error) {
      logger.error("Failed to save configuration", error);
      throw new Error(`Failed to save configuration: ${toError(error).message}`, { cause: error });
    }
  }

  /**
   * Get the current configuration
   */
  public get(): ShellFleetConfig {
    if (!this.config) {
      throw new Error("Configuration not loaded. Call load() first.");
    }
    return this.config;
  }

  /**
   * Get a nested configuration value using dot notation
   */
  public getNestedValue(keyPath: string): unknown {
    let value: unknown = this.get();

    for (const key of keyPath.split(".")) {
      if (isPlainObject(value) && key in value) {
        value = value[key];
      } else {
        return undefined;
      }
    }

    return value;
  }

  /**
   * Set a nested configuration value using dot notation.
   * The value is coerced to the type of the setting; unknown keys are rejected.
   */
  public setNestedValue(keyPath: string, value: unknown): void {
    if (this.getNestedValue(keyPath) === undefined) {
      throw new Error(`Unknown configuration key: ${keyPath}`);
    }

    const draft: unknown = JSON.parse(JSON.stringify(this.get()));
    const keys = keyPath.split(".");
    const lastKey = keys.pop();

    if (!lastKey || !isPlainObject(draft)) {
      throw new Error("Invalid path");
    }

    let current: PlainObject = draft;
    for (const key of keys) {
      const next = current[key];
      if (!isPlainObject(next)) {
        throw new Error(`Unknown configuration key: ${keyPath}`);
      }
      current = next;
    }
    current[lastKey] = value;

    this.config = this.mergeWithDefaults(draft);
  }

  /**
   * Reset configuration to defaults
   */
  public reset(): ShellFleetConfig {
    this.config = this.mergeWithDefaults({});
    logger.info("Configuration reset to defaults");
    return this.config;
  }

  /**
   * Validate configuration
   */
  public validate(config?: ShellFleetConfig): { valid: boolean; errors: string[] } {
    const configToValidate = config ?? this.config;

    if (!configToValidate) {
      return { valid: false, errors: ["No configuration to validate"] };
    }

    const errors: string[] = [];
    const { ssh, cluster } = configToValidate;

    if (!ssh.user) {
      errors.push("SSH user is required");
    }
    if (!Number.isInteger(ssh.port) || ssh.port < 1 || ssh.port > 65535) {
      errors.push("SSH port must be an integer between 1 and 65535");
    }
    if (ssh.connectTimeoutMs <= 0) {
      errors.push("Connect timeout must be positive");
    }
    if (!ssh.agentSocketEnv) {
      errors.push("Agent socket environment variable name is required");
    }

    if (!cluster.name) {
      errors.push("Cluster name is required");
    }
    if (!Number.isInteger(cluster.count) || cluster.count < 1) {
      errors.push("Cluster host count must be a positive integer");
    }
    if (!/\{index(:0\d+)?\}/.test(cluster.hostTemplate)) {
      errors.push("Host template must contain an {index} placeholder");
    }

    return { valid: errors.length === 0, errors };
  }

  /**
   * Merge loaded values with defaults, dropping anything of the wrong type
   */
  private mergeWithDefaults(loaded: unknown): ShellFleetConfig {
    const root = isPlainObject(loaded) ? loaded : {};
    const ssh = isPlainObject(root.ssh) ? root.ssh : {};
    const cluster = isPlainObject(root.cluster) ? root.cluster : {};
    const logging = isPlainObject(root.logging) ? root.logging : {};
    const defaults = DEFAULT_CONFIG;

    return {
      ssh: {
        user: stringOr(ssh.user, defaults.ssh.user),
        port: numberOr(ssh.port, defaults.ssh.port),
        connectTimeoutMs: numberOr(ssh.connectTimeoutMs, defaults.ssh.connectTimeoutMs),
        agentSocketEnv: stringOr(ssh.agentSocketEnv, defaults.ssh.agentSocketEnv),
        hostVerification: enumOr(
          Object.values(HostVerificationMode),
          ssh.hostVerification,
          defaults.ssh.hostVerification
        ),
        knownHostsPath: stringOr(ssh.knownHostsPath, defaults.ssh.knownHostsPath),
        reconnect: enumOr(Object.values(ReconnectPolicy), ssh.reconnect, defaults.ssh.reconnect),
      },
      cluster: {
        name: stringOr(cluster.name, defaults.cluster.name),
        count: numberOr(cluster.count, defaults.cluster.count),
        hostTemplate: stringOr(cluster.hostTemplate, defaults.cluster.hostTemplate),
      },
      logging: {
        level: enumOr(Object.values(LogLevel), logging.level, defaults.logging.level),
        logToFile: booleanOr(logging.logToFile, defaults.logging.logToFile),
      },
    };
  }
}
