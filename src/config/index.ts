export {
  loadConfig,
  loadEnvironment,
  type LoadConfigOptions,
  type LoadedConfig,
} from "./loader.js";
export { locateConfig, DEFAULT_CONFIG_NAME } from "./locator.js";
export { parseConfig, parseConfigText, stringifySection } from "./parser.js";
export {
  createContext,
  expandTilde,
  type DeploymentContext,
  type ContextOverrides,
} from "./context.js";
export {
  settingsSchema,
  type ShipitSettings,
  type ConfigDocument,
  type Section,
} from "./schema.js";
