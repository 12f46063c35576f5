import { existsSync } from "node:fs";
import { resolve } from "node:path";
import type { ConfigDocument } from "../config/schema.js";
import { createContext, type ContextOverrides } from "../config/context.js";
import { copyFile, type CopyResult } from "../lib/scp.js";
import { LocalFileNotFoundError, ShipitError } from "../lib/errors.js";
import { logger } from "../utils/logger.js";

export interface CopyOptions extends ContextOverrides {
  cwd?: string;
}

/**
 * Copy a local file to the same relative path under the remote path
 */
export async function runCopy(
  doc: ConfigDocument,
  localFile: string,
  options: CopyOptions = {}
): Promise<CopyResult> {
  const cwd = options.cwd || process.cwd();

  if (localFile === "") {
    throw new ShipitError("No file given to copy", "USAGE");
  }
  if (!existsSync(resolve(cwd, localFile))) {
    throw new LocalFileNotFoundError(localFile);
  }

  const context = createContext(doc.settings, options);
  const spinner = logger.spinner(`Copying ${localFile} to ${context.sshHost}...`);
  spinner.start();

  try {
    const result = await copyFile(context, localFile, cwd, (message) => {
      spinner.update({ text: message });
    });

    spinner.success({
      text: `Copied ${localFile} to ${context.sshHost}:${result.remotePath} (via ${result.method})`,
    });
    return result;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    spinner.error({ text: `Copy failed: ${message}` });
    throw error;
  }
}
