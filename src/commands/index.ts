export {
  runDeploy,
  DEFAULT_TARGET,
  type DeployOptions,
  type DeployResult,
} from "./deploy.js";
export { runList } from "./list.js";
export { runConsole, LOGIN_SHELL_COMMAND } from "./console.js";
export { runExec } from "./exec.js";
export { runCopy, type CopyOptions } from "./copy.js";
