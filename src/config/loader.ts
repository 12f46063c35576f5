import { join } from "node:path";
import { config as loadEnv } from "dotenv";
import { locateConfig, DEFAULT_CONFIG_NAME } from "./locator.js";
import { parseConfig } from "./parser.js";
import type { ConfigDocument } from "./schema.js";

export interface LoadConfigOptions {
  /** Config file name searched for, defaults to SHIPIT_CONFIG or .shipit */
  configName?: string;
  cwd?: string;
}

export interface LoadedConfig {
  /** Absolute path of the config file that was found */
  path: string;
  document: ConfigDocument;
}

let envLoaded = false;

/**
 * Load .env from the working directory once per process
 */
export function loadEnvironment(cwd: string = process.cwd()): void {
  if (envLoaded) return;
  loadEnv({ path: join(cwd, ".env") });
  envLoaded = true;
}

/**
 * Locate the config upward from cwd and parse it
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const cwd = options.cwd || process.cwd();
  const configName =
    options.configName || process.env.SHIPIT_CONFIG || DEFAULT_CONFIG_NAME;

  const path = locateConfig(cwd, configName);
  return { path, document: parseConfig(path) };
}
