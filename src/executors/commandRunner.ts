import { spawn } from "node:child_process";
import type { Readable } from "node:stream";

import type { LoggerFn } from "../logger.js";
import { maskSecrets } from "../modules/security/redaction.js";

/** `separate` keeps stdout/stderr apart; `merged` appends both to stdout in arrival order. */
export type CaptureMode = "separate" | "merged";

export type RunOptions = {
  timeoutMs: number;
  captureMode?: CaptureMode;
  signal?: AbortSignal;
};

export type ExecutionResult = Readonly<{
  argv: readonly string[];
  pid: number | null;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  maskedOutput: string;
  timedOut: boolean;
  durationMs: number;
  /** set when the process could not be started */
  error?: string;
}>;

const TRUNCATED_MARKER = "\n[output truncated]\n";

class OutputBuffer {
  private readonly chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(private readonly maxBytes: number) {}

  push(chunk: Buffer) {
    if (this.truncated) return;
    const room = this.maxBytes - this.size;
    if (chunk.length > room) {
      if (room > 0) this.chunks.push(chunk.subarray(0, room));
      this.size = this.maxBytes;
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  text(): string {
    const body = Buffer.concat(this.chunks).toString("utf8");
    return this.truncated ? body + TRUNCATED_MARKER : body;
  }
}

export function formatExecutionOutput(r: {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  timedOut: boolean;
  error?: string;
}): string {
  const parts: string[] = [];
  if (r.stdout) parts.push(`=== OUTPUT ===\n${r.stdout}`);
  if (r.stderr) parts.push(`=== STDERR ===\n${r.stderr}`);
  if (r.error) parts.push(`=== ERROR ===\n${r.error}`);
  if (r.timedOut) parts.push("\n=== TIMED OUT ===");
  else if (r.exitCode !== 0) parts.push(`\n=== RETURN CODE: ${r.exitCode ?? "none"} ===`);
  return parts.length ? parts.join("\n") : "Command completed with no output.";
}

/**
 * Runs the automation engine as a direct child process. The argv is handed to
 * spawn as-is (no shell), every run has a wall-clock deadline, and a non-zero
 * exit is reported rather than thrown.
 */
export class CommandRunner {
  constructor(
    private readonly opts: {
      cwd: string;
      env?: Readonly<Record<string, string>>;
      maxOutputBytes: number;
      killGraceMs: number;
      log: LoggerFn;
    },
  ) {}

  async run(argv: readonly string[], runOpts: RunOptions): Promise<ExecutionResult> {
    if (!argv.length || !argv[0]) throw new Error("argv is empty");
    if (!Number.isFinite(runOpts.timeoutMs) || runOpts.timeoutMs <= 0) throw new Error("timeoutMs must be > 0");

    const [cmd, ...args] = argv;
    const captureMode = runOpts.captureMode ?? "separate";
    const started = Date.now();

    this.opts.log("spawn engine command", { cmd, args: maskSecrets(args.join(" ")), timeoutMs: runOpts.timeoutMs });

    const stdout = new OutputBuffer(this.opts.maxOutputBytes);
    const stderr = captureMode === "merged" ? stdout : new OutputBuffer(this.opts.maxOutputBytes);

    const child = spawn(cmd, args, {
      cwd: this.opts.cwd,
      env: { ...process.env, ...(this.opts.env ?? {}) },
      stdio: ["ignore", "pipe", "pipe"],
      shell: false,
      windowsHide: true,
    });

    const pipe = (stream: Readable, sink: OutputBuffer) => {
      stream.on("data", (chunk: Buffer | string) => sink.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
    };
    pipe(child.stdout, stdout);
    pipe(child.stderr, stderr);

    return await new Promise<ExecutionResult>((resolve) => {
      let settled = false;
      let timedOut = false;
      let spawnError: string | undefined;
      const timers: NodeJS.Timeout[] = [];

      const finish = (exitCode: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        for (const t of timers) clearTimeout(t);
        runOpts.signal?.removeEventListener("abort", onAbort);

        const out = stdout.text();
        const err = captureMode === "merged" ? "" : stderr.text();
        const base = { stdout: out, stderr: err, exitCode, timedOut, error: spawnError };
        const result: ExecutionResult = {
          argv: [...argv],
          pid: child.pid ?? null,
          exitCode,
          signal,
          stdout: out,
          stderr: err,
          maskedOutput: maskSecrets(formatExecutionOutput(base)),
          timedOut,
          durationMs: Date.now() - started,
          ...(spawnError ? { error: spawnError } : {}),
        };
        this.opts.log("engine command finished", {
          cmd,
          exitCode,
          signal,
          timedOut,
          durationMs: result.durationMs,
        });
        resolve(result);
      };

      const terminate = () => {
        if (settled || timedOut) return;
        timedOut = true;
        child.kill("SIGTERM");
        timers.push(
          setTimeout(() => {
            if (child.exitCode === null && child.signalCode === null) child.kill("SIGKILL");
            // a grandchild may keep the pipes open after the child is gone
            timers.push(
              setTimeout(() => {
                child.stdout.destroy();
                child.stderr.destroy();
                finish(child.exitCode, child.signalCode ?? "SIGKILL");
              }, 250),
            );
          }, this.opts.killGraceMs),
        );
      };

      const onAbort = () => terminate();

      child.once("error", (err) => {
        spawnError = err.message;
        finish(null, null);
      });
      child.once("close", (code, signal) => finish(code, signal));

      timers.push(setTimeout(terminate, runOpts.timeoutMs));
      if (runOpts.signal?.aborted) terminate();
      else runOpts.signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
