import { describe, expect, it } from "vitest";

import {
  BackupFailure,
  NotFound,
  PathViolation,
  SanitizationRejected,
  SubprocessNonZeroExit,
  SubprocessTimeout,
  describeError,
  errorText,
} from "../src/errors.js";

describe("errors", () => {
  it("keeps path and sanitization failures generic", () => {
    expect(describeError(new PathViolation("traversal"))).toBe(
      "Access denied - path must stay within the Ansible workspace.",
    );
    expect(describeError(new SanitizationRejected("group"))).toBe(
      "Input rejected: 'group' contains characters that are not allowed.",
    );
  });

  it("describes domain errors as sentences", () => {
    expect(describeError(new NotFound("playbook 'x.yml'"))).toBe("Playbook 'x.yml' not found.");
  });

  it("appends captured output to subprocess failures", () => {
    expect(describeError(new SubprocessTimeout(90_000, "=== OUTPUT ===\npartial\n"))).toBe(
      "Command timed out after 90s.\n=== OUTPUT ===\npartial",
    );
    expect(describeError(new SubprocessNonZeroExit(null, ""))).toBe("Command exited with code unknown.");
  });

  it("hides unexpected errors", () => {
    expect(describeError(new Error("ENOMEM at 0xdeadbeef"))).toBe("Internal error while handling the request.");
    expect(describeError("plain string")).toBe("Internal error while handling the request.");
  });

  it("keeps the cause of a backup failure", () => {
    const cause = new Error("EACCES: permission denied");
    const err = new BackupFailure("group_vars/all.yml", cause);
    expect(err.message).toBe("backup of group_vars/all.yml failed: EACCES: permission denied");
    expect(err.cause).toBe(cause);
    expect(err.code).toBe("BACKUP_FAILURE");
    expect(err.name).toBe("BackupFailure");
    expect(errorText(42)).toBe("42");
  });
});
