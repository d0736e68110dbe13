import { SanitizationRejected } from "../../errors.js";

/**
 * Input classes accepted from tool arguments:
 * - name: host, group, playbook, template and variable-file names
 * - path: workspace-relative file paths
 * - pattern: host patterns, --limit targets, tag lists
 * - text: free text that becomes a single process argument
 * - content: file bodies; only control characters are refused
 */
export type InputKind = "name" | "path" | "pattern" | "text" | "content";

const MAX_NAME_LENGTH = 200;

const ALLOWED: Record<Exclude<InputKind, "content">, RegExp> = {
  name: /^[A-Za-z0-9][A-Za-z0-9_.-]*$/,
  path: /^[A-Za-z0-9_./:-]+$/,
  pattern: /^[A-Za-z0-9_./:,-]+$/,
  text: /^[A-Za-z0-9_./:=,@+"'[\] \t-]*$/,
};

const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/;

export function sanitize(kind: InputKind, field: string, value: string): string {
  const raw = String(value ?? "");

  if (kind === "content") {
    if (CONTROL_CHARS.test(raw)) throw new SanitizationRejected(field);
    return raw;
  }

  const normalized = raw.trim();
  if (kind === "name" && normalized.length > MAX_NAME_LENGTH) throw new SanitizationRejected(field);
  if (!ALLOWED[kind].test(normalized)) throw new SanitizationRejected(field);
  return normalized;
}

export function sanitizeOptional(kind: InputKind, field: string, value: string): string | null {
  const raw = String(value ?? "");
  if (!raw.trim()) return null;
  return sanitize(kind, field, raw);
}

/** Splits a comma separated list and checks each item as `kind`. */
export function sanitizeList(kind: InputKind, field: string, value: string): string[] {
  return String(value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean)
    .map((item) => sanitize(kind, field, item));
}
