import { readFileSync } from "node:fs";
import { ConfigError } from "../lib/errors.js";
import { settingsSchema, type ConfigDocument, type Section } from "./schema.js";

const SECTION_LINE = /^\[([^:\]]+)(:local)?\]$/;
// Looks like a section header but isn't one, e.g. `[a:b]` or `[]`
const BRACKETED_LINE = /^\[.*\]$/;
const HEADER_LINE = /^([A-Za-z_][\w.-]*)\s*[=:]\s*(.*)$/;
const LOCAL_SUFFIX = ":local";

interface SectionDraft {
  name: string;
  isLocalVariant: boolean;
  line: number;
  lines: string[];
}

function isBlank(line: string): boolean {
  return line.trim() === "";
}

/**
 * Strip one pair of matching surrounding quotes
 */
function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    const last = value[value.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Drop leading and trailing blank lines, keep everything in between verbatim
 */
function toBody(lines: string[]): string {
  let start = 0;
  let end = lines.length;
  while (start < end && isBlank(lines[start] ?? "")) start++;
  while (end > start && isBlank(lines[end - 1] ?? "")) end--;
  return lines.slice(start, end).join("\n");
}

function sectionKey(name: string, isLocalVariant: boolean): string {
  return isLocalVariant ? `${name}${LOCAL_SUFFIX}` : name;
}

/**
 * Parse config text into a header mapping and its sections
 */
export function parseConfigText(text: string, source = "config"): ConfigDocument {
  const lines = text.replace(/\r\n?/g, "\n").split("\n");
  const header: Record<string, string> = {};
  let index = 0;

  while (index < lines.length && isBlank(lines[index] ?? "")) {
    index++;
  }

  // Header: first blank-line-delimited block
  for (; index < lines.length; index++) {
    const line = (lines[index] ?? "").trim();
    if (line === "" || BRACKETED_LINE.test(line)) {
      break;
    }
    if (line.startsWith("#")) {
      continue;
    }

    const match = HEADER_LINE.exec(line);
    if (!match?.[1]) {
      throw new ConfigError(
        `Malformed header line ${index + 1} in ${source}: ${line}`,
        "MALFORMED_HEADER",
        { line: index + 1 }
      );
    }
    header[match[1]] = unquote((match[2] ?? "").trim());
  }

  const drafts: SectionDraft[] = [];
  const seen = new Set<string>();
  let current: SectionDraft | null = null;

  // Section headers are only recognised as the first line of a block
  let atBlockStart = true;

  for (; index < lines.length; index++) {
    const raw = lines[index] ?? "";
    const line = raw.trim();
    const lineNumber = index + 1;

    if (line === "") {
      atBlockStart = true;
      current?.lines.push(raw);
      continue;
    }

    if (!atBlockStart) {
      current?.lines.push(raw);
      continue;
    }

    const match = SECTION_LINE.exec(line);
    if (match?.[1]) {
      const name = match[1];
      const isLocalVariant = match[2] !== undefined;
      const key = sectionKey(name, isLocalVariant);

      if (seen.has(key)) {
        throw new ConfigError(
          `Duplicate section [${key}] on line ${lineNumber} in ${source}`,
          "DUPLICATE_SECTION",
          { line: lineNumber }
        );
      }
      seen.add(key);

      current = { name, isLocalVariant, line: lineNumber, lines: [] };
      drafts.push(current);
      atBlockStart = false;
      continue;
    }

    if (BRACKETED_LINE.test(line)) {
      throw new ConfigError(
        `Malformed section header on line ${lineNumber} in ${source}: ${line}`,
        "MALFORMED_SECTION",
        { line: lineNumber }
      );
    }

    if (!current) {
      if (line.startsWith("#")) {
        continue;
      }
      throw new ConfigError(
        `Expected a [section] header on line ${lineNumber} in ${source}, found: ${line}`,
        "MALFORMED_SECTION",
        { line: lineNumber }
      );
    }

    // A block that is not a section continues the current body
    current.lines.push(raw);
    atBlockStart = false;
  }

  const result = settingsSchema.safeParse(header);
  if (!result.success) {
    const issue = result.error.errors[0];
    const key = String(issue?.path[0] ?? "");

    if (key === "host" || key === "path") {
      throw new ConfigError(
        `Incomplete config: "${key}" is required in ${source}`,
        "INCOMPLETE_CONFIG",
        { missingKey: key }
      );
    }
    throw new ConfigError(
      `Invalid value for "${key}" in ${source}: ${issue?.message ?? "invalid"}`,
      "MALFORMED_HEADER"
    );
  }

  const sections: Section[] = drafts.map((draft) => ({
    name: draft.name,
    isLocalVariant: draft.isLocalVariant,
    body: toBody(draft.lines),
  }));

  return { header, sections, settings: result.data };
}

/**
 * Read and parse a config file
 */
export function parseConfig(filePath: string): ConfigDocument {
  let text: string;

  try {
    text = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${filePath}\n${error instanceof Error ? error.message : String(error)}`,
      "CONFIG_UNREADABLE"
    );
  }

  return parseConfigText(text, filePath);
}

/**
 * Render a section back to config text
 */
export function stringifySection(section: Section): string {
  const title = `[${sectionKey(section.name, section.isLocalVariant)}]`;
  return section.body === "" ? title : `${title}\n${section.body}`;
}
