// shipit - run local and remote deploy scripts from a .shipit file
// Programmatic API exports

export {
  loadConfig,
  locateConfig,
  parseConfig,
  parseConfigText,
  stringifySection,
  createContext,
  DEFAULT_CONFIG_NAME,
  type LoadConfigOptions,
  type LoadedConfig,
  type ConfigDocument,
  type Section,
  type ShipitSettings,
  type DeploymentContext,
  type ContextOverrides,
} from "./config/index.js";

export { runDeploy, type DeployOptions, type DeployResult } from "./commands/deploy.js";
export { runList } from "./commands/list.js";
export { runConsole } from "./commands/console.js";
export { runExec } from "./commands/exec.js";
export { runCopy, type CopyOptions } from "./commands/copy.js";

export { resolveTarget, targetExists, listTargets, type ResolvedTarget } from "./lib/targets.js";
export { runLocalScript, type LocalRunResult } from "./lib/local.js";
export { runRemoteScript, buildGuardScript, REMOTE_DIRECTORY_MISSING_EXIT } from "./lib/ssh.js";
export { copyFile, type CopyResult } from "./lib/scp.js";
export * from "./lib/errors.js";
