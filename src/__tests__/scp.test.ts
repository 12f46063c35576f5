import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { resolve } from "node:path";

const execaMock = vi.hoisted(() =>
  vi.fn<
    (
      file: string,
      args: string[],
      options?: Record<string, unknown>
    ) => Promise<{ exitCode?: number; failed: boolean; stderr: string }>
  >()
);

const ssh2State = vi.hoisted(() => {
  const connected: Array<Record<string, unknown>> = [];
  const fastPut = vi.fn((_local: string, _remote: string, done: (err?: Error) => void) => {
    done();
  });
  return { connected, fastPut, ended: 0 };
});

vi.mock("execa", () => ({ execa: execaMock }));

vi.mock("ssh2", () => ({
  Client: class {
    private onReady?: () => void;

    on(event: string, listener: () => void) {
      if (event === "ready") this.onReady = listener;
      return this;
    }

    connect(config: Record<string, unknown>) {
      ssh2State.connected.push(config);
      this.onReady?.();
    }

    sftp(callback: (err: Error | undefined, sftp: { fastPut: typeof ssh2State.fastPut }) => void) {
      callback(undefined, { fastPut: ssh2State.fastPut });
    }

    end() {
      ssh2State.ended++;
    }
  },
}));

import { buildScpArgs, copyFile, copyWithScp, isScpAvailable, remoteDestination } from "../lib/scp.js";
import { CopyError } from "../lib/errors.js";
import type { DeploymentContext } from "../config/context.js";

const context: DeploymentContext = {
  sshHost: "deploy@example.com",
  sshPath: "/var/www/app",
  verbose: false,
};

beforeEach(() => {
  execaMock.mockReset();
  ssh2State.fastPut.mockClear();
  ssh2State.connected.length = 0;
  ssh2State.ended = 0;
  vi.stubEnv("SSH_AUTH_SOCK", "/tmp/agent.sock");
});

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("remoteDestination", () => {
  it("places the file under the remote path", () => {
    expect(remoteDestination(context, "build.tgz")).toBe("/var/www/app/build.tgz");
    expect(remoteDestination(context, "dist/app.js")).toBe("/var/www/app/dist/app.js");
  });
});

describe("buildScpArgs", () => {
  it("targets host:path", () => {
    expect(buildScpArgs(context, "build.tgz", "/var/www/app/build.tgz")).toEqual([
      "build.tgz",
      "deploy@example.com:/var/www/app/build.tgz",
    ]);
  });

  it("uses -P for the port", () => {
    const full: DeploymentContext = { ...context, verbose: true, port: 2222, identity: "/keys/deploy" };
    expect(buildScpArgs(full, "a.txt", "/var/www/app/a.txt")).toEqual([
      "-v",
      "-P",
      "2222",
      "-i",
      "/keys/deploy",
      "a.txt",
      "deploy@example.com:/var/www/app/a.txt",
    ]);
  });
});

describe("copyWithScp", () => {
  it("returns the remote path on success", async () => {
    execaMock.mockResolvedValue({ exitCode: 0, failed: false, stderr: "" });

    await expect(copyWithScp(context, "build.tgz", "/work")).resolves.toEqual({
      method: "scp",
      remotePath: "/var/www/app/build.tgz",
    });
    expect(execaMock).toHaveBeenCalledWith(
      "scp",
      ["build.tgz", "deploy@example.com:/var/www/app/build.tgz"],
      { cwd: "/work", reject: false }
    );
  });

  it("throws CopyError with the scp error output", async () => {
    execaMock.mockResolvedValue({ exitCode: 1, failed: true, stderr: "Permission denied\n" });

    await expect(copyWithScp(context, "build.tgz", "/work")).rejects.toThrow(
      new CopyError("Copy to deploy@example.com:/var/www/app/build.tgz failed: Permission denied")
    );
  });
});

describe("isScpAvailable", () => {
  it("looks for scp itself on the PATH", async () => {
    execaMock.mockResolvedValue({ exitCode: 0, failed: false, stderr: "" });

    await expect(isScpAvailable()).resolves.toBe(true);
    expect(execaMock).toHaveBeenCalledWith("sh", ["-c", "command -v scp"]);
  });

  it("is false when scp cannot be found", async () => {
    execaMock.mockRejectedValue(new Error("Command failed with exit code 1: sh -c command -v scp"));
    await expect(isScpAvailable()).resolves.toBe(false);
  });
});

describe("copyFile", () => {
  it("uses scp when it is installed", async () => {
    execaMock.mockResolvedValue({ exitCode: 0, failed: false, stderr: "" });
    const progress: string[] = [];

    const result = await copyFile(context, "build.tgz", "/work", (m) => progress.push(m));

    expect(result.method).toBe("scp");
    expect(progress).toEqual(["Using scp for file transfer"]);
    expect(execaMock.mock.calls.map((call) => call[0])).toEqual(["sh", "scp"]);
  });

  it("falls back to SFTP through the agent when scp is missing", async () => {
    execaMock.mockRejectedValue(new Error("Command failed with exit code 1: sh -c command -v scp"));

    const result = await copyFile({ ...context, port: 2222 }, "build.tgz", "/work");

    expect(result).toEqual({ method: "sftp", remotePath: "/var/www/app/build.tgz" });
    expect(ssh2State.connected[0]).toMatchObject({
      host: "example.com",
      port: 2222,
      username: "deploy",
      agent: "/tmp/agent.sock",
      agentForward: true,
    });
    expect(ssh2State.fastPut).toHaveBeenCalledWith(
      resolve("/work", "build.tgz"),
      "/var/www/app/build.tgz",
      expect.any(Function)
    );
    expect(ssh2State.ended).toBe(1);
  });
});
