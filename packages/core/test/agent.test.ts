import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConnectError } from "../src/errors/index.js";
import { connectAgent } from "../src/ssh/agent.js";
import { HostIdentityVerifier } from "../src/ssh/host-verifier.js";
import { SSHTransport } from "../src/ssh/transport.js";

const target = { user: "ops", host: "node-1" };

async function connectFailure(promise: Promise<unknown>): Promise<ConnectError> {
  const error = await promise.catch((caught: unknown) => caught);
  if (!(error instanceof ConnectError)) {
    throw new Error(`expected a ConnectError, got ${String(error)}`);
  }
  return error;
}

describe("connectAgent", () => {
  it("fails when the socket variable is unset", async () => {
    const error = await connectFailure(connectAgent(target, "SSH_AUTH_SOCK", {}));

    expect(error.reason).toBe("agent-missing");
    expect(error.message).toBe("ops@node-1: SSH_AUTH_SOCK empty");
  });

  it("fails when nothing listens on the socket", async () => {
    const socketPath = path.join(os.tmpdir(), `shellfleet-no-agent-${process.pid}.sock`);

    const error = await connectFailure(connectAgent(target, "TEST_AGENT_SOCK", { TEST_AGENT_SOCK: socketPath }));

    expect(error.reason).toBe("agent-unavailable");
  });
});

describe("SSHTransport", () => {
  it("does not dial without an agent", async () => {
    const error = await connectFailure(
      SSHTransport.connect(target, {
        port: 22,
        connectTimeoutMs: 1000,
        agentSocketEnv: "TEST_AGENT_SOCK",
        verifier: HostIdentityVerifier.permissive(),
        env: {},
      })
    );

    expect(error.reason).toBe("agent-missing");
    expect(error.message).toBe("ops@node-1: TEST_AGENT_SOCK empty");
  });
});
