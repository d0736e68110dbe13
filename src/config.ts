import { z } from "zod";
import os from "node:os";
import path from "node:path";

const defaultWorkspaceRoot = path.join(os.homedir(), "ansible");

function stringWithDefault(defaultValue: string) {
  return z.preprocess((v) => {
    if (typeof v !== "string") return defaultValue;
    const trimmed = v.trim();
    return trimmed ? trimmed : defaultValue;
  }, z.string().min(1));
}

const optionalFlag = z.preprocess((v) => {
  if (typeof v !== "string" || !v.trim()) return undefined;
  return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
}, z.boolean().optional());

const envSchema = z.object({
  ANSIBLE_DIR: stringWithDefault(defaultWorkspaceRoot),
  LOG_LEVEL: z.string().min(1).default("info"),
  LOG_PRETTY: optionalFlag,
  ANSIBLE_PLAYBOOK_BIN: stringWithDefault("ansible-playbook"),
  ANSIBLE_BIN: stringWithDefault("ansible"),
  COMMAND_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(300),
  SYNTAX_CHECK_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(60),
  DEVICE_COMMAND_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(180),
  KILL_GRACE_MS: z.coerce.number().int().nonnegative().default(2000),
  MAX_OUTPUT_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
});

export type Env = z.infer<typeof envSchema>;

export type EngineConfig = Readonly<{
  /** argv prefix for playbook runs, e.g. ["ansible-playbook"] */
  playbookCommand: readonly string[];
  /** argv prefix for ad-hoc module runs, e.g. ["ansible"] */
  adhocCommand: readonly string[];
  env: Readonly<Record<string, string>>;
}>;

export type TimeoutConfig = Readonly<{
  runMs: number;
  syntaxCheckMs: number;
  deviceMs: number;
  killGraceMs: number;
}>;

export type WorkspaceConfig = Readonly<{
  root: string;
  engine: EngineConfig;
  timeouts: TimeoutConfig;
  maxOutputBytes: number;
}>;

export const DEFAULT_ENGINE_ENV: Readonly<Record<string, string>> = Object.freeze({
  ANSIBLE_HOST_KEY_CHECKING: "False",
  ANSIBLE_FORCE_COLOR: "false",
  ANSIBLE_NOCOLOR: "1",
});

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new Error(`invalid environment: ${parsed.error.message}`);
  }
  return parsed.data;
}

export function defineWorkspaceConfig(input: {
  root: string;
  engine?: Partial<EngineConfig>;
  timeouts?: Partial<TimeoutConfig>;
  maxOutputBytes?: number;
}): WorkspaceConfig {
  const root = String(input.root ?? "").trim();
  if (!root) throw new Error("workspace root is empty");

  const playbookCommand = input.engine?.playbookCommand ?? ["ansible-playbook"];
  const adhocCommand = input.engine?.adhocCommand ?? ["ansible"];
  if (!playbookCommand.length || !adhocCommand.length) throw new Error("engine command is empty");

  return Object.freeze({
    root: path.resolve(root),
    engine: Object.freeze({
      playbookCommand: Object.freeze([...playbookCommand]),
      adhocCommand: Object.freeze([...adhocCommand]),
      env: Object.freeze({ ...DEFAULT_ENGINE_ENV, ...(input.engine?.env ?? {}) }),
    }),
    timeouts: Object.freeze({
      runMs: input.timeouts?.runMs ?? 300_000,
      syntaxCheckMs: input.timeouts?.syntaxCheckMs ?? 60_000,
      deviceMs: input.timeouts?.deviceMs ?? 180_000,
      killGraceMs: input.timeouts?.killGraceMs ?? 2000,
    }),
    maxOutputBytes: input.maxOutputBytes ?? 1024 * 1024,
  });
}

export function workspaceConfigFromEnv(env: Env): WorkspaceConfig {
  return defineWorkspaceConfig({
    root: env.ANSIBLE_DIR,
    engine: {
      playbookCommand: [env.ANSIBLE_PLAYBOOK_BIN],
      adhocCommand: [env.ANSIBLE_BIN],
    },
    timeouts: {
      runMs: env.COMMAND_TIMEOUT_SECONDS * 1000,
      syntaxCheckMs: env.SYNTAX_CHECK_TIMEOUT_SECONDS * 1000,
      deviceMs: env.DEVICE_COMMAND_TIMEOUT_SECONDS * 1000,
      killGraceMs: env.KILL_GRACE_MS,
    },
    maxOutputBytes: env.MAX_OUTPUT_BYTES,
  });
}
