import { execa } from "execa";
import { logger } from "../utils/logger.js";

export interface LocalRunOptions {
  cwd?: string;
}

export interface LocalRunResult {
  success: boolean;
  exitCode: number;
}

/**
 * Run a script with `sh -e`: the first failing statement stops it.
 * A failing script is reported, not thrown.
 */
export async function runLocalScript(
  body: string,
  options: LocalRunOptions = {}
): Promise<LocalRunResult> {
  const cwd = options.cwd || process.cwd();
  logger.debug(`sh -e -c (cwd: ${cwd})`);

  const result = await execa("sh", ["-e", "-c", body], {
    cwd,
    stdio: "inherit",
    reject: false,
  });

  const exitCode = result.exitCode ?? 1;
  return { success: !result.failed && exitCode === 0, exitCode };
}
