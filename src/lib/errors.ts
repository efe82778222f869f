/**
 * Error types for store and lifecycle failures, plus CLI formatting.
 */

import { ExitCodes, type ExitCode } from "./models.js";

export type AdrErrorKind =
  | "StoreUnavailable"
  | "MissingTitle"
  | "RecordUnreadable"
  | "RecordWriteFailed"
  | "IndexWriteFailed"
  | "InvalidNumber"
  | "MissingArgument"
  | "ConfigInvalid";

const EXIT_CODE_BY_KIND: Record<AdrErrorKind, ExitCode> = {
  StoreUnavailable: ExitCodes.FAILURE,
  MissingTitle: ExitCodes.USAGE_ERROR,
  RecordUnreadable: ExitCodes.DATA_ERROR,
  RecordWriteFailed: ExitCodes.FAILURE,
  IndexWriteFailed: ExitCodes.PARTIAL_FAILURE,
  InvalidNumber: ExitCodes.USAGE_ERROR,
  MissingArgument: ExitCodes.USAGE_ERROR,
  ConfigInvalid: ExitCodes.DATA_ERROR,
};

/**
 * A failure of one lifecycle step. The message names the step and the path
 * involved; the underlying error, if any, is kept as `cause`.
 */
export class AdrError extends Error {
  readonly kind: AdrErrorKind;

  constructor(kind: AdrErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "AdrError";
    this.kind = kind;
  }

  get exitCode(): ExitCode {
    return EXIT_CODE_BY_KIND[this.kind];
  }
}

export function isAdrError(err: unknown): err is AdrError {
  return err instanceof AdrError;
}

/** Wrap an unknown thrown value as an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Node.js system error shape (ENOENT, EACCES, EPERM, etc.).
 */
interface NodeSystemError extends Error {
  code: string;
  path?: string;
  syscall?: string;
}

export function isNodeSystemError(err: unknown): err is NodeSystemError {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

/**
 * Syntax error thrown by the toml parser.
 */
interface TomlSyntaxErrorLike extends Error {
  name: "SyntaxError";
  line: number;
  column: number;
}

export function isTomlSyntaxError(err: unknown): err is TomlSyntaxErrorLike {
  return (
    err instanceof Error &&
    err.name === "SyntaxError" &&
    "line" in err &&
    typeof err.line === "number" &&
    "column" in err &&
    typeof err.column === "number"
  );
}

function describeSystemError(err: NodeSystemError): string {
  const filePath = err.path ? ` "${err.path}"` : "";
  switch (err.code) {
    case "ENOENT":
      return `File not found:${filePath}`;
    case "EACCES":
    case "EPERM":
      return `Permission denied:${filePath}`;
    case "EISDIR":
      return `Expected a file but found a directory:${filePath}`;
    case "ENOTDIR":
      return `Expected a directory:${filePath}`;
    default:
      return `System error (${err.code}):${filePath} ${err.message}`;
  }
}

/**
 * Format an error into a one-line CLI message.
 *
 * An AdrError keeps its own message, with the system error it wraps appended.
 */
export function formatCliError(err: unknown): string {
  if (isAdrError(err)) {
    if (isNodeSystemError(err.cause)) {
      return `${err.message} (${describeSystemError(err.cause)})`;
    }
    if (isTomlSyntaxError(err.cause)) {
      return `${err.message} (${formatCliError(err.cause)})`;
    }
    return err.message;
  }

  if (isTomlSyntaxError(err)) {
    return `Failed to parse TOML: ${err.message} (line ${err.line}, column ${err.column})`;
  }

  if (isNodeSystemError(err)) {
    return describeSystemError(err);
  }

  if (err instanceof Error) {
    return err.message;
  }

  return String(err);
}

/**
 * Exit code for an error caught at the command boundary.
 */
export function exitCodeFor(err: unknown): ExitCode {
  return isAdrError(err) ? err.exitCode : ExitCodes.FAILURE;
}
