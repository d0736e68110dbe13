import type { EngineConfig } from "../config.js";
import { SubprocessNonZeroExit, SubprocessTimeout } from "../errors.js";
import { maskSecrets } from "../modules/security/redaction.js";
import type { ExecutionResult } from "./commandRunner.js";

export type PlaybookMode = "run" | "check" | "syntax";

export type PlaybookArgs = {
  inventory: string;
  playbook: string;
  mode: PlaybookMode;
  limit?: string | null;
  tags?: string | null;
  extraVars?: string | null;
  verbose?: boolean;
};

export type AdhocArgs = {
  inventory: string;
  target: string;
  module: string;
  args?: string | null;
  check?: boolean;
};

export function buildPlaybookArgv(engine: EngineConfig, a: PlaybookArgs): string[] {
  const argv = [...engine.playbookCommand, "-i", a.inventory, a.playbook];
  if (a.mode === "syntax") argv.push("--syntax-check");
  if (a.mode === "check") argv.push("--check", "--diff");
  if (a.limit) argv.push("--limit", a.limit);
  if (a.tags) argv.push("--tags", a.tags);
  if (a.extraVars) argv.push("--extra-vars", a.extraVars);
  if (a.verbose) argv.push("-vvv");
  return argv;
}

export function buildAdhocArgv(engine: EngineConfig, a: AdhocArgs): string[] {
  const argv = [...engine.adhocCommand, "-i", a.inventory, a.target, "-m", a.module];
  if (a.args) argv.push("-a", a.args);
  if (a.check) argv.push("--check");
  return argv;
}

export type EngineOutcome = "success" | "warning" | "failure";

export type EngineReport = Readonly<{
  outcome: EngineOutcome;
  reason: string;
  exitCode: number | null;
  timedOut: boolean;
  /** masked `PLAY RECAP` and failure lines, when the output has any */
  summary: string | null;
  /** masked full output */
  output: string;
}>;

const EXIT_REASONS: Readonly<Record<number, string>> = {
  1: "error",
  2: "one or more hosts failed",
  3: "one or more hosts were unreachable",
  4: "parser error",
  5: "bad or incomplete options",
  99: "interrupted",
  250: "unexpected error",
};

export function describeExitCode(code: number | null): string {
  if (code === null) return "no exit code";
  if (code === 0) return "completed successfully";
  return EXIT_REASONS[code] ?? `exit code ${code}`;
}

export function classifyExecution(result: ExecutionResult, timeoutMs: number): { outcome: EngineOutcome; reason: string } {
  if (result.error) return { outcome: "failure", reason: `could not start the engine: ${result.error}` };
  if (result.timedOut) return { outcome: "failure", reason: `timed out after ${Math.round(timeoutMs / 1000)}s` };
  if (result.exitCode === 0) {
    return result.stderr.includes("[WARNING]")
      ? { outcome: "warning", reason: "completed with warnings" }
      : { outcome: "success", reason: describeExitCode(0) };
  }
  return { outcome: "failure", reason: describeExitCode(result.exitCode) };
}

/** `PLAY RECAP` block plus `fatal:` / `failed:` lines of engine output. */
export function summarizeOutput(stdout: string): string | null {
  const lines = stdout.split("\n");
  const failures = lines.filter((l) => /^\s*(?:fatal|failed):/.test(l));

  const recap: string[] = [];
  const start = lines.findIndex((l) => l.includes("PLAY RECAP"));
  if (start >= 0) {
    for (const line of lines.slice(start)) {
      if (!line.trim() && recap.length > 1) break;
      if (line.trim()) recap.push(line.trimEnd());
    }
  }

  const parts = [...failures.map((l) => l.trimEnd()), ...recap];
  return parts.length ? parts.join("\n") : null;
}

export function reportExecution(result: ExecutionResult, timeoutMs: number): EngineReport {
  const { outcome, reason } = classifyExecution(result, timeoutMs);
  const summary = summarizeOutput(result.stdout);
  return {
    outcome,
    reason,
    exitCode: result.exitCode,
    timedOut: result.timedOut,
    summary: summary === null ? null : maskSecrets(summary),
    output: result.maskedOutput,
  };
}

export function renderReport(report: EngineReport): string {
  if (!report.summary) return report.output;
  return `=== SUMMARY ===\n${report.summary}\n\n${report.output}`;
}

/** For callers where anything but a clean exit is an error. */
export function assertSucceeded(result: ExecutionResult, timeoutMs: number): ExecutionResult {
  if (result.timedOut) throw new SubprocessTimeout(timeoutMs, result.maskedOutput);
  if (result.exitCode !== 0) throw new SubprocessNonZeroExit(result.exitCode, result.maskedOutput);
  return result;
}
