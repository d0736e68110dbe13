export function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === "object" && !Array.isArray(v);
}

export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err && typeof err.code === "string";
}

export function isMissingError(err: unknown): boolean {
  return isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

export function isTruthyArg(v: unknown): boolean {
  const raw = String(v ?? "").trim().toLowerCase();
  return raw === "yes" || raw === "true" || raw === "1" || raw === "y" || raw === "on";
}
