import { readFileSync } from "node:fs";
import { userInfo } from "node:os";
import { execa } from "execa";
import { Client, type ConnectConfig, type SFTPWrapper } from "ssh2";
import type { DeploymentContext } from "../config/context.js";
import { RemoteDirectoryMissingError, RemoteScriptError } from "./errors.js";
import { logger } from "../utils/logger.js";

/** Exit status of the guard script when the remote path is missing */
export const REMOTE_DIRECTORY_MISSING_EXIT = 66;

export interface RemoteRunOptions {
  /** Request a pseudo-terminal (interactive sessions) */
  tty?: boolean;
}

/**
 * Quote a value for a POSIX shell
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Wrap a script so it stops on the first failure and runs inside `path`
 */
export function buildGuardScript(path: string, body: string): string {
  const dir = shellQuote(path);
  const message = shellQuote(`Remote directory ${path} does not exist`);

  return [
    "set -e",
    `if [ ! -d ${dir} ]; then`,
    `  printf '\\033[1;31m%s\\033[0m\\n' ${message} >&2`,
    `  exit ${REMOTE_DIRECTORY_MISSING_EXIT}`,
    "fi",
    `cd ${dir}`,
    body,
  ].join("\n");
}

/**
 * Arguments for the system ssh client
 */
export function buildSshArgs(
  context: DeploymentContext,
  script: string,
  options: RemoteRunOptions = {}
): string[] {
  // -A forwards the local agent so the remote side can reach git remotes
  const args = ["-A"];

  if (context.verbose) args.push("-v");
  if (options.tty) args.push("-t");
  if (context.port) args.push("-p", String(context.port));
  if (context.identity) args.push("-i", context.identity);

  args.push(context.sshHost, script);
  return args;
}

/**
 * Run a script on the remote host inside the configured path.
 * Returns the remote exit status (255 when ssh itself fails).
 */
export async function runRemoteScript(
  context: DeploymentContext,
  body: string,
  options: RemoteRunOptions = {}
): Promise<number> {
  const script = buildGuardScript(context.sshPath, body);
  logger.debug(`ssh ${context.sshHost} (path: ${context.sshPath})`);

  const result = await execa("ssh", buildSshArgs(context, script, options), {
    stdio: "inherit",
    reject: false,
  });

  if (result.exitCode === undefined) {
    logger.debug("ssh exited without a status");
    return 255;
  }
  return result.exitCode;
}

/**
 * Turn a non-zero remote exit status into the matching error
 */
export function assertRemoteSuccess(status: number, context: DeploymentContext): void {
  if (status === 0) return;

  if (status === REMOTE_DIRECTORY_MISSING_EXIT) {
    throw new RemoteDirectoryMissingError(context.sshPath, status);
  }
  throw new RemoteScriptError(status);
}

/**
 * Split `user@host`; without a user the local username is used
 */
export function parseHost(host: string): { username: string; hostname: string } {
  const at = host.lastIndexOf("@");
  if (at === -1) {
    return { username: userInfo().username, hostname: host };
  }
  return { username: host.slice(0, at), hostname: host.slice(at + 1) };
}

export interface SSHConnection {
  client: Client;
  sftp: () => Promise<SFTPWrapper>;
  close: () => void;
}

/**
 * Open an ssh2 connection, authenticating with the agent or the identity key
 */
export async function createSSHConnection(context: DeploymentContext): Promise<SSHConnection> {
  const client = new Client();
  const { username, hostname } = parseHost(context.sshHost);

  const connectConfig: ConnectConfig = {
    host: hostname,
    port: context.port ?? 22,
    username,
    agent: process.env.SSH_AUTH_SOCK,
    agentForward: Boolean(process.env.SSH_AUTH_SOCK),
    privateKey: context.identity ? readFileSync(context.identity) : undefined,
    debug: context.verbose ? (message: string) => logger.debug(message) : undefined,
  };

  return new Promise((resolve, reject) => {
    client.on("ready", () => {
      resolve({
        client,
        sftp: () => openSftp(client),
        close: () => client.end(),
      });
    });

    client.on("error", (err) => {
      reject(new Error(`SSH connection failed: ${err.message}`));
    });

    client.connect(connectConfig);
  });
}

function openSftp(client: Client): Promise<SFTPWrapper> {
  return new Promise((resolve, reject) => {
    client.sftp((err, sftp) => {
      if (err) {
        reject(new Error(`SFTP session failed: ${err.message}`));
        return;
      }
      resolve(sftp);
    });
  });
}
