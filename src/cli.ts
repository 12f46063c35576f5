#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { loadConfig, loadEnvironment } from "./config/index.js";
import {
  runDeploy,
  runList,
  runConsole,
  runExec,
  runCopy,
  DEFAULT_TARGET,
} from "./commands/index.js";
import { logger, showBanner, showError, setVerbose } from "./utils/logger.js";
import { normalizeArgs, splitExecArgs } from "./utils/args.js";

const { cliArgs, execCommand } = splitExecArgs(process.argv.slice(2));

const main = defineCommand({
  meta: {
    name: "shipit",
    version: "0.1.0",
    description: "Run the local and remote scripts of a .shipit target",
  },
  args: {
    target: {
      type: "positional",
      required: false,
      description:
        "Target to deploy, or: list|ls, console|shell|ssh, exec|run <cmd...>, copy|cp <file>",
      default: DEFAULT_TARGET,
    },
    config: {
      type: "string",
      alias: "c",
      description: "Config file name to search for (default: .shipit)",
    },
    remote: {
      type: "string",
      alias: "r",
      description: "Override the remote host",
    },
    "dry-run": {
      type: "boolean",
      description: "Show what a deploy would run without running it",
      default: false,
    },
    verbose: {
      type: "boolean",
      alias: "v",
      description: "Enable verbose output",
      default: false,
    },
  },
  async run({ args }) {
    setVerbose(args.verbose);
    loadEnvironment();

    const [command = DEFAULT_TARGET, ...rest] = args._;
    const overrides = { remote: args.remote, verbose: args.verbose };

    try {
      const config = loadConfig({ configName: args.config });
      logger.debug(`Using config ${config.path}`);

      switch (command) {
        case "list":
        case "ls":
          runList(config.document);
          break;
        case "console":
        case "shell":
        case "ssh":
          await runConsole(config.document, overrides);
          break;
        case "exec":
        case "run":
          await runExec(config.document, execCommand ?? "", overrides);
          break;
        case "copy":
        case "cp":
          await runCopy(config.document, rest[0] ?? "", overrides);
          break;
        default:
          showBanner();
          await runDeploy(config.document, command, {
            ...overrides,
            dryRun: args["dry-run"],
          });
      }
    } catch (error) {
      showError(error instanceof Error ? error : new Error(String(error)), args.verbose);
      process.exit(1);
    }
  },
});

runMain(main, { rawArgs: normalizeArgs(cliArgs) });
