import { InvalidArgument } from "../errors.js";
import { sanitize, sanitizeList, sanitizeOptional, type InputKind } from "../modules/security/sanitize.js";
import { isTruthyArg } from "../utils/validate.js";
import type { ToolArgs } from "./types.js";

export function rawArg(args: ToolArgs, name: string): string {
  return String(args[name] ?? "");
}

export function isBlank(args: ToolArgs, name: string): boolean {
  return !rawArg(args, name).trim();
}

export function requiredArg(args: ToolArgs, name: string, kind: InputKind): string {
  if (isBlank(args, name)) throw new InvalidArgument(`no ${name} given`);
  return sanitize(kind, name, rawArg(args, name));
}

export function optionalArg(args: ToolArgs, name: string, kind: InputKind): string | null {
  return sanitizeOptional(kind, name, rawArg(args, name));
}

export function listArg(args: ToolArgs, name: string, kind: InputKind): string[] {
  return sanitizeList(kind, name, rawArg(args, name));
}

export function flagArg(args: ToolArgs, name: string): boolean {
  return isTruthyArg(rawArg(args, name));
}

/** Host pattern argument, `fallback` when blank. */
export function targetArg(args: ToolArgs, name: string, fallback = "all"): string {
  return optionalArg(args, name, "pattern") ?? fallback;
}

export function choiceArg<T extends string>(args: ToolArgs, name: string, choices: readonly T[], fallback: T): T {
  const raw = rawArg(args, name).trim().toLowerCase();
  if (!raw) return fallback;
  const match = choices.find((c) => c === raw);
  if (!match) throw new InvalidArgument(`${name} must be one of: ${choices.join(", ")}`);
  return match;
}

export function requireConfirm(args: ToolArgs, action: string): void {
  if (!flagArg(args, "confirm")) throw new InvalidArgument(`set confirm=yes to ${action}`);
}
