import { posix, resolve } from "node:path";
import { execa } from "execa";
import type { DeploymentContext } from "../config/context.js";
import { createSSHConnection, type SSHConnection } from "./ssh.js";
import { CopyError } from "./errors.js";

export interface CopyResult {
  method: "scp" | "sftp";
  remotePath: string;
}

/**
 * Remote destination of a copied file: `<path>/<file>`
 */
export function remoteDestination(context: DeploymentContext, localFile: string): string {
  return posix.join(context.sshPath, localFile.split("\\").join("/"));
}

/**
 * Check if scp is on the PATH
 */
export async function isScpAvailable(): Promise<boolean> {
  try {
    await execa("sh", ["-c", "command -v scp"]);
    return true;
  } catch {
    return false;
  }
}

export function buildScpArgs(
  context: DeploymentContext,
  localFile: string,
  remotePath: string
): string[] {
  const args: string[] = [];

  if (context.verbose) args.push("-v");
  // scp takes the port as -P
  if (context.port) args.push("-P", String(context.port));
  if (context.identity) args.push("-i", context.identity);

  args.push(localFile, `${context.sshHost}:${remotePath}`);
  return args;
}

/**
 * Copy with the system scp
 */
export async function copyWithScp(
  context: DeploymentContext,
  localFile: string,
  cwd: string = process.cwd()
): Promise<CopyResult> {
  const remotePath = remoteDestination(context, localFile);
  const result = await execa("scp", buildScpArgs(context, localFile, remotePath), {
    cwd,
    reject: false,
  });

  if (result.exitCode !== 0) {
    const detail = result.stderr.trim() || `scp exited with code ${result.exitCode ?? "unknown"}`;
    throw new CopyError(`Copy to ${context.sshHost}:${remotePath} failed: ${detail}`);
  }

  return { method: "scp", remotePath };
}

/**
 * Copy over SFTP (no OpenSSH client installed)
 */
export async function copyWithSFTP(
  context: DeploymentContext,
  localFile: string,
  cwd: string = process.cwd()
): Promise<CopyResult> {
  const remotePath = remoteDestination(context, localFile);
  let conn: SSHConnection | null = null;

  try {
    conn = await createSSHConnection(context);
    const sftp = await conn.sftp();
    const localPath = resolve(cwd, localFile);

    await new Promise<void>((done, reject) => {
      sftp.fastPut(localPath, remotePath, (err) => {
        if (err) {
          reject(err);
          return;
        }
        done();
      });
    });

    return { method: "sftp", remotePath };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CopyError(`Copy to ${context.sshHost}:${remotePath} failed: ${message}`);
  } finally {
    conn?.close();
  }
}

/**
 * Copy a local file to `<path>/<file>` on the remote host
 */
export async function copyFile(
  context: DeploymentContext,
  localFile: string,
  cwd: string = process.cwd(),
  onProgress?: (message: string) => void
): Promise<CopyResult> {
  if (await isScpAvailable()) {
    onProgress?.("Using scp for file transfer");
    return copyWithScp(context, localFile, cwd);
  }

  onProgress?.("Using SFTP for file transfer (scp not available)");
  return copyWithSFTP(context, localFile, cwd);
}
