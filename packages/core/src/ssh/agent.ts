/**
 * SSH agent access
 * Locates the agent socket and lists the identities it can sign with
 */

import ssh2 from "ssh2";
import type { OpenSSHAgent } from "ssh2";
import { ConnectError } from "../errors/index.js";
import type { Target } from "../types/common.js";
import { createScopedLogger } from "../utils/logger.js";

const logger = createScopedLogger("ssh");

export interface AgentHandle {
  agent: OpenSSHAgent;
  socketPath: string;
  identities: number;
}

/**
 * Open the agent named by `envName` and request its identities
 */
export async function connectAgent(
  target: Target,
  envName: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<AgentHandle> {
  const socketPath = env[envName];
  if (!socketPath) {
    throw new ConnectError(target, "agent-missing", `${envName} empty`);
  }

  const agent = new ssh2.OpenSSHAgent(socketPath);
  const identities = await new Promise<number>((resolve, reject) => {
    agent.getIdentities((error, keys) => {
      if (error) {
        reject(new ConnectError(target, "agent-unavailable", `SSH agent: ${error.message}`, { cause: error }));
        return;
      }
      resolve(Array.isArray(keys) ? keys.length : 0);
    });
  });

  if (identities === 0) {
    logger.warn("SSH agent holds no identities", { socketPath });
  }
  return { agent, socketPath, identities };
}
