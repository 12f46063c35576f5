import { join } from "node:path";
import { homedir } from "node:os";
import type { ShipitSettings } from "./schema.js";

export interface DeploymentContext {
  readonly sshHost: string;
  readonly sshPath: string;
  readonly verbose: boolean;
  readonly port?: number;
  readonly identity?: string;
}

export interface ContextOverrides {
  /** Host from -r/--remote */
  remote?: string;
  verbose?: boolean;
}

/**
 * Replace a leading ~ with the home directory
 */
export function expandTilde(filePath: string): string {
  if (filePath === "~" || filePath.startsWith("~/")) {
    return join(homedir(), filePath.slice(1));
  }
  return filePath;
}

/**
 * Host precedence: --remote, then SHIPIT_REMOTE, then the header
 */
export function createContext(
  settings: ShipitSettings,
  overrides: ContextOverrides = {}
): DeploymentContext {
  const sshHost = overrides.remote || process.env.SHIPIT_REMOTE || settings.host;

  return Object.freeze({
    sshHost,
    sshPath: settings.path,
    verbose: overrides.verbose ?? false,
    port: settings.port,
    identity: settings.identity ? expandTilde(settings.identity) : undefined,
  });
}
