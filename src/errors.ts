export type WorkspaceErrorCode =
  | "PATH_VIOLATION"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_ARGUMENT"
  | "SANITIZATION_REJECTED"
  | "DUPLICATE_HOST"
  | "HOST_NOT_FOUND"
  | "BACKUP_FAILURE"
  | "SUBPROCESS_TIMEOUT"
  | "SUBPROCESS_NON_ZERO_EXIT"
  | "PARSE_ERROR";

export class WorkspaceError extends Error {
  readonly code: WorkspaceErrorCode;

  constructor(code: WorkspaceErrorCode, message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
  }
}

/** Escape attempt or malformed path. The offending input is never kept. */
export class PathViolation extends WorkspaceError {
  constructor(readonly reason: "empty" | "absolute" | "traversal" | "escape" | "backup") {
    super("PATH_VIOLATION", `path rejected (${reason})`);
  }
}

export class NotFound extends WorkspaceError {
  constructor(readonly what: string) {
    super("NOT_FOUND", `${what} not found`);
  }
}

export class AlreadyExists extends WorkspaceError {
  constructor(readonly what: string) {
    super("ALREADY_EXISTS", `${what} already exists`);
  }
}

export class InvalidArgument extends WorkspaceError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class SanitizationRejected extends WorkspaceError {
  constructor(readonly field: string) {
    super("SANITIZATION_REJECTED", `${field} contains disallowed characters`);
  }
}

export class DuplicateHost extends WorkspaceError {
  constructor(readonly host: string) {
    super("DUPLICATE_HOST", `host '${host}' already exists in inventory`);
  }
}

export class HostNotFound extends WorkspaceError {
  constructor(readonly host: string) {
    super("HOST_NOT_FOUND", `host '${host}' not found in inventory`);
  }
}

export class BackupFailure extends WorkspaceError {
  constructor(readonly relativePath: string, cause: unknown) {
    super("BACKUP_FAILURE", `backup of ${relativePath} failed: ${errorText(cause)}`, { cause });
  }
}

export class SubprocessTimeout extends WorkspaceError {
  constructor(readonly timeoutMs: number, readonly output: string) {
    super("SUBPROCESS_TIMEOUT", `command timed out after ${Math.round(timeoutMs / 1000)}s`);
  }
}

export class SubprocessNonZeroExit extends WorkspaceError {
  constructor(readonly exitCode: number | null, readonly output: string) {
    super("SUBPROCESS_NON_ZERO_EXIT", `command exited with code ${exitCode ?? "unknown"}`);
  }
}

export class ParseError extends WorkspaceError {
  constructor(readonly source: string, detail: string) {
    super("PARSE_ERROR", `${source}: ${detail}`);
  }
}

export function errorText(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Tool-facing text for an error. Path and sanitization violations stay generic
 * so that rejected input is never reflected back to the caller.
 */
export function describeError(err: unknown): string {
  if (!(err instanceof WorkspaceError)) return "Internal error while handling the request.";
  switch (err.code) {
    case "PATH_VIOLATION":
      return "Access denied - path must stay within the Ansible workspace.";
    case "SANITIZATION_REJECTED":
      return err instanceof SanitizationRejected
        ? `Input rejected: '${err.field}' contains characters that are not allowed.`
        : "Input rejected.";
    case "SUBPROCESS_TIMEOUT":
    case "SUBPROCESS_NON_ZERO_EXIT":
      return err instanceof SubprocessTimeout || err instanceof SubprocessNonZeroExit
        ? `${capitalize(err.message)}.\n${err.output}`.trimEnd()
        : capitalize(err.message);
    default:
      return `${capitalize(err.message)}.`;
  }
}

function capitalize(s: string): string {
  return s ? s[0].toUpperCase() + s.slice(1) : s;
}
