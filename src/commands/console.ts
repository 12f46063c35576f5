import type { ConfigDocument } from "../config/schema.js";
import { createContext, type ContextOverrides } from "../config/context.js";
import { runRemoteScript, assertRemoteSuccess } from "../lib/ssh.js";

/** Login shell started inside the remote path */
export const LOGIN_SHELL_COMMAND = "exec $SHELL --login";

/**
 * Open an interactive shell on the remote host
 */
export async function runConsole(
  doc: ConfigDocument,
  options: ContextOverrides = {}
): Promise<void> {
  const context = createContext(doc.settings, options);
  const status = await runRemoteScript(context, LOGIN_SHELL_COMMAND, { tty: true });
  assertRemoteSuccess(status, context);
}
