export type ShipitErrorCode =
  | "CONFIG_NOT_FOUND"
  | "CONFIG_UNREADABLE"
  | "MALFORMED_HEADER"
  | "INCOMPLETE_CONFIG"
  | "MALFORMED_SECTION"
  | "DUPLICATE_SECTION"
  | "TARGET_NOT_FOUND"
  | "LOCAL_SCRIPT_FAILED"
  | "REMOTE_SCRIPT_FAILED"
  | "REMOTE_DIRECTORY_MISSING"
  | "LOCAL_FILE_NOT_FOUND"
  | "COPY_FAILED"
  | "USAGE";

/**
 * Base error for everything the CLI reports as a fatal failure.
 */
export class ShipitError extends Error {
  readonly code: ShipitErrorCode;

  constructor(message: string, code: ShipitErrorCode) {
    super(message);
    this.name = "ShipitError";
    this.code = code;
  }
}

export function isShipitError(error: unknown): error is ShipitError {
  return error instanceof ShipitError;
}

/**
 * Config file missing, unreadable or invalid
 */
export class ConfigError extends ShipitError {
  /** Header key that was missing, for INCOMPLETE_CONFIG */
  readonly missingKey?: string;
  /** 1-based line number, for parse errors */
  readonly line?: number;

  constructor(
    message: string,
    code: ShipitErrorCode,
    details: { missingKey?: string; line?: number } = {}
  ) {
    super(message, code);
    this.name = "ConfigError";
    this.missingKey = details.missingKey;
    this.line = details.line;
  }
}

export class TargetNotFoundError extends ShipitError {
  readonly target: string;

  constructor(target: string) {
    super(`Target not found: ${target}`, "TARGET_NOT_FOUND");
    this.name = "TargetNotFoundError";
    this.target = target;
  }
}

export class LocalScriptError extends ShipitError {
  readonly exitCode: number;

  constructor(exitCode: number) {
    super(`Local script failed (exit code ${exitCode})`, "LOCAL_SCRIPT_FAILED");
    this.name = "LocalScriptError";
    this.exitCode = exitCode;
  }
}

export class RemoteScriptError extends ShipitError {
  readonly exitCode: number;

  constructor(
    exitCode: number,
    message = `Remote script failed (exit code ${exitCode})`,
    code: ShipitErrorCode = "REMOTE_SCRIPT_FAILED"
  ) {
    super(message, code);
    this.name = "RemoteScriptError";
    this.exitCode = exitCode;
  }
}

/**
 * Raised from the guard script's exit status, so it is a remote failure too.
 * A remote script that exits with the same status on its own lands here.
 */
export class RemoteDirectoryMissingError extends RemoteScriptError {
  readonly path: string;

  constructor(path: string, exitCode: number) {
    super(
      exitCode,
      `Remote directory does not exist: ${path} (or the remote script exited with status ${exitCode})`,
      "REMOTE_DIRECTORY_MISSING"
    );
    this.name = "RemoteDirectoryMissingError";
    this.path = path;
  }
}

export class LocalFileNotFoundError extends ShipitError {
  readonly path: string;

  constructor(path: string) {
    super(`Local file not found: ${path}`, "LOCAL_FILE_NOT_FOUND");
    this.name = "LocalFileNotFoundError";
    this.path = path;
  }
}

export class CopyError extends ShipitError {
  constructor(message: string) {
    super(message, "COPY_FAILED");
    this.name = "CopyError";
  }
}
