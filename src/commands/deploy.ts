import type { ConfigDocument } from "../config/schema.js";
import { createContext, type ContextOverrides } from "../config/context.js";
import { resolveTarget, targetExists } from "../lib/targets.js";
import { runLocalScript } from "../lib/local.js";
import { runRemoteScript, assertRemoteSuccess } from "../lib/ssh.js";
import { LocalScriptError, TargetNotFoundError } from "../lib/errors.js";
import { logger, showPhase, showPlan, showSummary } from "../utils/logger.js";

export const DEFAULT_TARGET = "deploy";

export interface DeployOptions extends ContextOverrides {
  dryRun?: boolean;
  /** Working directory of the local phase */
  cwd?: string;
}

export interface DeployResult {
  target: string;
  phases: {
    local?: { duration: number };
    remote?: { duration: number };
  };
  totalDuration: number;
  dryRun: boolean;
}

/**
 * Deploy a target: local script first, then the remote script.
 * A failing local phase stops the deploy before anything runs remotely.
 */
export async function runDeploy(
  doc: ConfigDocument,
  targetName: string = DEFAULT_TARGET,
  options: DeployOptions = {}
): Promise<DeployResult> {
  if (!targetExists(doc, targetName)) {
    throw new TargetNotFoundError(targetName);
  }

  const target = resolveTarget(doc, targetName);
  const context = createContext(doc.settings, options);
  const startTime = Date.now();
  const result: DeployResult = {
    target: targetName,
    phases: {},
    totalDuration: 0,
    dryRun: Boolean(options.dryRun),
  };

  if (options.dryRun) {
    showPlan({
      target: targetName,
      host: context.sshHost,
      remotePath: context.sshPath,
      localScript: target.localScript,
      remoteScript: target.remoteScript,
    });
    return result;
  }

  if (target.localScript !== undefined) {
    showPhase("Running local script");
    const phaseStart = Date.now();
    const local = await runLocalScript(target.localScript, { cwd: options.cwd });

    if (!local.success) {
      throw new LocalScriptError(local.exitCode);
    }
    result.phases.local = { duration: Date.now() - phaseStart };
    logger.success("Local script finished");
  }

  if (target.remoteScript !== undefined) {
    showPhase(`Running remote script at ${context.sshHost}:${context.sshPath}`);
    const phaseStart = Date.now();
    const status = await runRemoteScript(context, target.remoteScript);

    assertRemoteSuccess(status, context);
    result.phases.remote = { duration: Date.now() - phaseStart };
    logger.success("Remote script finished");
  }

  result.totalDuration = Date.now() - startTime;
  logger.debug(`Target "${targetName}" finished in ${result.totalDuration}ms`);

  showSummary({
    target: targetName,
    host: context.sshHost,
    remotePath: context.sshPath,
    duration: result.totalDuration,
  });

  return result;
}
