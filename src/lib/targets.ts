import type { ConfigDocument } from "../config/schema.js";

export interface ResolvedTarget {
  name: string;
  localScript?: string;
  remoteScript?: string;
}

/**
 * Pick the `name:local` and `name` sections of a target
 */
export function resolveTarget(doc: ConfigDocument, name: string): ResolvedTarget {
  const local = doc.sections.find((s) => s.name === name && s.isLocalVariant);
  const remote = doc.sections.find((s) => s.name === name && !s.isLocalVariant);

  return {
    name,
    localScript: local?.body,
    remoteScript: remote?.body,
  };
}

export function targetExists(doc: ConfigDocument, name: string): boolean {
  return doc.sections.some((s) => s.name === name);
}

/**
 * Unique target names in the order they first appear
 */
export function listTargets(doc: ConfigDocument): string[] {
  return [...new Set(doc.sections.map((s) => s.name))];
}
