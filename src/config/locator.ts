import { statSync } from "node:fs";
import { dirname, join, resolve, sep } from "node:path";
import { ConfigError } from "../lib/errors.js";

export const DEFAULT_CONFIG_NAME = ".shipit";

function isFile(filePath: string): boolean {
  try {
    return statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Find the nearest `fileName` walking up from `startDir`, root included
 */
export function locateConfig(
  startDir: string = process.cwd(),
  fileName: string = DEFAULT_CONFIG_NAME
): string {
  let dir = resolve(startDir);
  // dirname() is a fixed point at the root; the depth bound is a backstop
  const maxSteps = dir.split(sep).filter(Boolean).length + 1;

  for (let step = 0; step <= maxSteps; step++) {
    const candidate = join(dir, fileName);
    if (isFile(candidate)) {
      return candidate;
    }

    const parent = dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }

  throw new ConfigError(
    `Config file ${fileName} not found in ${resolve(startDir)} or any parent directory`,
    "CONFIG_NOT_FOUND"
  );
}
