import { describe, it, expect } from "vitest";
import { parseConfigText } from "../config/parser.js";
import { resolveTarget, targetExists, listTargets } from "../lib/targets.js";

const doc = parseConfigText(
  [
    "host = example.com",
    "path = /var/www/app",
    "",
    "[a]",
    "echo remote a",
    "",
    "[a:local]",
    "echo local a",
    "",
    "[b]",
    "echo b",
    "",
    "[c:local]",
    "echo c",
    "",
    "[B]",
    "echo upper",
  ].join("\n")
);

describe("resolveTarget", () => {
  it("fills both scripts with their verbatim bodies", () => {
    expect(resolveTarget(doc, "a")).toEqual({
      name: "a",
      localScript: "echo local a",
      remoteScript: "echo remote a",
    });
  });

  it("leaves the missing variant undefined", () => {
    const remoteOnly = resolveTarget(doc, "b");
    expect(remoteOnly.localScript).toBeUndefined();
    expect(remoteOnly.remoteScript).toBe("echo b");

    const localOnly = resolveTarget(doc, "c");
    expect(localOnly.localScript).toBe("echo c");
    expect(localOnly.remoteScript).toBeUndefined();
  });

  it("returns no scripts for an unknown target", () => {
    expect(resolveTarget(doc, "nope")).toEqual({ name: "nope" });
  });
});

describe("targetExists", () => {
  it("is true when either variant exists", () => {
    expect(targetExists(doc, "a")).toBe(true);
    expect(targetExists(doc, "b")).toBe(true);
    expect(targetExists(doc, "c")).toBe(true);
  });

  it("is false otherwise and case-sensitive", () => {
    expect(targetExists(doc, "nope")).toBe(false);
    expect(targetExists(doc, "A")).toBe(false);
  });
});

describe("listTargets", () => {
  it("returns unique names in first-seen order", () => {
    expect(listTargets(doc)).toEqual(["a", "b", "c", "B"]);
  });

  it("collapses a target's local and remote sections", () => {
    const small = parseConfigText("host=h\npath=/p\n\n[a]\nx\n\n[a:local]\ny\n\n[b]\nz");
    expect(listTargets(small)).toEqual(["a", "b"]);
  });
});
