/**
 * CLI context
 * Loads the configuration and builds the pool, topology and executor a command works with
 */

import {
  ClusterTopology,
  ConfigManager,
  ConnectionPool,
  FileTransferEngine,
  HostIdentityVerifier,
  LogLevel,
  ParallelExecutor,
  initLogger,
  logger,
} from '@shellfleet/core';
import type { ShellFleetConfig, Target } from '@shellfleet/core';

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  config?: string;
  permissive?: boolean;
  verbose?: boolean;
}

export interface CliContext {
  config: ShellFleetConfig;
  topology: ClusterTopology;
  pool: ConnectionPool;
  executor: ParallelExecutor;
  transfers: FileTransferEngine;
  target(host: string): Target;
}

/**
 * Load and validate the configuration file named by `--config` (or the default one)
 */
export async function loadConfig(options: GlobalOptions): Promise<ShellFleetConfig> {
  const configManager = new ConfigManager(options.config);
  const config = await configManager.load();

  const validation = configManager.validate(config);
  if (!validation.valid) {
    throw new Error(`Invalid configuration in ${configManager.getConfigPath()}: ${validation.errors.join('; ')}`);
  }
  return config;
}

export async function createContext(options: GlobalOptions): Promise<CliContext> {
  const config = await loadConfig(options);

  initLogger({
    level: options.verbose ? LogLevel.DEBUG : config.logging.level,
    logToFile: config.logging.logToFile,
  });

  const verifier = options.permissive ? HostIdentityVerifier.permissive() : HostIdentityVerifier.fromConfig(config.ssh);
  if (options.permissive) {
    logger.warn('Host key verification disabled');
  }

  const pool = ConnectionPool.fromConfig(config.ssh, verifier);
  const topology = new ClusterTopology(config.cluster, config.ssh.user);

  return {
    config,
    topology,
    pool,
    executor: new ParallelExecutor(topology.resolver()),
    transfers: new FileTransferEngine(pool),
    target: (host) => ({ user: config.ssh.user, host }),
  };
}

/**
 * Run `fn` with a fresh context and close every pooled connection afterwards
 */
export async function withContext<T>(options: GlobalOptions, fn: (context: CliContext) => Promise<T>): Promise<T> {
  const context = await createContext(options);
  try {
    return await fn(context);
  } finally {
    await context.pool.close();
  }
}
