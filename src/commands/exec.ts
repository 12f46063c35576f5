import type { ConfigDocument } from "../config/schema.js";
import { createContext, type ContextOverrides } from "../config/context.js";
import { runRemoteScript, assertRemoteSuccess } from "../lib/ssh.js";
import { ShipitError } from "../lib/errors.js";

/**
 * Run a single command line on the remote host, inside the remote path
 */
export async function runExec(
  doc: ConfigDocument,
  commandLine: string,
  options: ContextOverrides = {}
): Promise<void> {
  if (commandLine.trim() === "") {
    throw new ShipitError("No command given to exec", "USAGE");
  }

  const context = createContext(doc.settings, options);
  const status = await runRemoteScript(context, commandLine);
  assertRemoteSuccess(status, context);
}
