import { describe, it, expect } from "vitest";
import {
  ShipitError,
  ConfigError,
  TargetNotFoundError,
  LocalScriptError,
  RemoteScriptError,
  RemoteDirectoryMissingError,
  LocalFileNotFoundError,
  isShipitError,
} from "../lib/errors.js";

describe("ShipitError", () => {
  it("sets name, message and code", () => {
    const err = new ShipitError("bad usage", "USAGE");
    expect(err.name).toBe("ShipitError");
    expect(err.message).toBe("bad usage");
    expect(err.code).toBe("USAGE");
    expect(err instanceof Error).toBe(true);
  });

  it("stores config error details", () => {
    const err = new ConfigError("missing", "INCOMPLETE_CONFIG", { missingKey: "path" });
    expect(err.name).toBe("ConfigError");
    expect(err.missingKey).toBe("path");
    expect(err.line).toBeUndefined();
  });

  it("builds messages for each kind", () => {
    expect(new TargetNotFoundError("prod").message).toBe("Target not found: prod");
    expect(new LocalScriptError(1).message).toBe("Local script failed (exit code 1)");
    expect(new RemoteScriptError(255).message).toBe("Remote script failed (exit code 255)");
    expect(new LocalFileNotFoundError("a.txt").message).toBe("Local file not found: a.txt");
  });

  it("keeps a missing remote directory a remote script failure", () => {
    const err = new RemoteDirectoryMissingError("/srv/app", 66);
    expect(err).toBeInstanceOf(RemoteScriptError);
    expect(err.code).toBe("REMOTE_DIRECTORY_MISSING");
    expect(err.exitCode).toBe(66);
    expect(err.message).toBe(
      "Remote directory does not exist: /srv/app (or the remote script exited with status 66)"
    );
  });
});

describe("isShipitError()", () => {
  it("recognises subclasses only", () => {
    expect(isShipitError(new LocalScriptError(2))).toBe(true);
    expect(isShipitError(new Error("plain"))).toBe(false);
    expect(isShipitError("text")).toBe(false);
  });
});
