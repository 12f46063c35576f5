import type { ConfigDocument } from "../config/schema.js";
import { listTargets } from "../lib/targets.js";
import { showTargets } from "../utils/logger.js";

/**
 * Print every target defined in the config
 */
export function runList(doc: ConfigDocument): string[] {
  const names = listTargets(doc);
  showTargets(names);
  return names;
}
