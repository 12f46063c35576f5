import pc from "picocolors";
import { createSpinner, type Spinner } from "nanospinner";
import { isShipitError } from "../lib/errors.js";

export interface Logger {
  info: (message: string) => void;
  success: (message: string) => void;
  debug: (message: string) => void;
  spinner: (message: string) => Spinner;
}

let verboseMode = false;

/**
 * Set verbose mode
 */
export function setVerbose(value: boolean): void {
  verboseMode = value;
}

/**
 * Create logger
 */
export function createLogger(): Logger {
  return {
    info: (message: string) => {
      console.log(pc.blue("ℹ"), message);
    },

    success: (message: string) => {
      console.log(pc.green("✔"), message);
    },

    debug: (message: string) => {
      if (verboseMode) {
        console.log(pc.gray("◦"), pc.gray(message));
      }
    },

    spinner: (message: string) => {
      return createSpinner(message, {
        color: "cyan",
      });
    },
  };
}

/**
 * Show banner
 */
export function showBanner(): void {
  console.log();
  console.log(pc.cyan(pc.bold("  shipit")));
  console.log(pc.gray("  Local and remote deploy scripts"));
  console.log();
}

/**
 * Announce a deploy phase before it runs
 */
export function showPhase(title: string): void {
  console.log();
  console.log(pc.bold(pc.yellow(`▸ ${title}`)));
}

/**
 * Print target names, one per line
 */
export function showTargets(names: string[]): void {
  for (const name of names) {
    console.log(name);
  }
}

function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Dry-run output of a deploy
 */
export function showPlan(options: {
  target: string;
  host: string;
  remotePath: string;
  localScript?: string;
  remoteScript?: string;
}): void {
  const { target, host, remotePath, localScript, remoteScript } = options;
  const indent = (script: string) =>
    script
      .split("\n")
      .map((line) => `      ${line}`)
      .join("\n");

  logger.info("Dry-run mode enabled. Nothing will be executed.");
  console.log();
  console.log(`  ${pc.gray("Target:")}  ${target}`);
  console.log(`  ${pc.gray("Server:")}  ${host}`);
  console.log(`  ${pc.gray("Path:")}    ${remotePath}`);
  if (localScript !== undefined) {
    console.log(`  ${pc.gray("Local:")}`);
    console.log(indent(localScript));
  }
  if (remoteScript !== undefined) {
    console.log(`  ${pc.gray("Remote:")}`);
    console.log(indent(remoteScript));
  }
  console.log();
}

/**
 * Show deployment summary
 */
export function showSummary(options: {
  target: string;
  host: string;
  remotePath: string;
  duration: number;
}): void {
  const { target, host, remotePath, duration } = options;

  console.log();
  console.log(pc.green(pc.bold("  Deployment Complete!")));
  console.log();
  console.log(`  ${pc.gray("Target:")}  ${target}`);
  console.log(`  ${pc.gray("Server:")}  ${host}`);
  console.log(`  ${pc.gray("Path:")}    ${remotePath}`);
  console.log(`  ${pc.gray("Total:")}   ${formatDuration(duration)}`);
  console.log();
}

/**
 * Show error details
 */
export function showError(error: Error | string, verbose?: boolean): void {
  const message = error instanceof Error ? error.message : error;
  const title = isShipitError(error) ? error.code.replace(/_/g, " ").toLowerCase() : "error";

  console.error();
  console.error(pc.red(pc.bold(`  Failed: ${title}`)));
  console.error();
  console.error(`  ${pc.red("Error:")} ${message}`);

  if (verbose && error instanceof Error && error.stack) {
    console.error();
    console.error(pc.gray(error.stack));
  }

  console.error();
}

export const logger = createLogger();
