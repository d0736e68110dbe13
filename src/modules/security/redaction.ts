export const MASK = "********";

const TOKEN_PATTERNS: RegExp[] = [
  /\bghp_[a-zA-Z0-9]{20,}\b/g,
  /\bgithub_pat_[a-zA-Z0-9_]{20,}\b/g,
  /\bglpat-[a-zA-Z0-9_-]{10,}\b/g,
  /\bsk-[a-zA-Z0-9]{20,}\b/g,
];

// `pass` also covers ansible_pass, ansible_ssh_pass and ansible_become_pass
const KEY = String.raw`[A-Za-z0-9_.-]*(?:pass|secret|token|key)[A-Za-z0-9_.-]*`;

const NON_SECRET_KEYS = new Set(["host_key_checking", "ansible_host_key_checking", "record_host_keys"]);

const QUOTED_KEY_RE = new RegExp(
  String.raw`(["'])(${KEY})\1(\s*:\s*)("(?:[^"\\]|\\.)*"|'[^']*'|[^\s,}\]]+)`,
  "gi",
);
const YAML_KEY_RE = new RegExp(String.raw`^(\s*(?:-\s+)?)(${KEY})(\s*:[ \t]+)(\S.*?)\s*$`, "i");
const INI_KEY_RE = new RegExp(String.raw`^(\s*)(${KEY})(\s*=\s*)(\S.*?)\s*$`, "i");
const INLINE_PAIR_RE = new RegExp(String.raw`(^|[\s,;(])(${KEY})(=)("[^"]*"|'[^']*'|[^\s,;)]+)`, "gi");
const URL_CREDENTIALS_RE = /(\b[a-z][a-z0-9+.-]*:\/\/[^\s:/@]+:)([^\s@/]+)(@)/gi;
const BLOCK_SCALAR_RE = /^(?:!\S+\s+)?[|>][-+0-9]*$/;

function isSecretKey(key: string): boolean {
  return !NON_SECRET_KEYS.has(key.toLowerCase());
}

function maskValue(value: string): string {
  if (value.startsWith("\"") && value.endsWith("\"") && value.length >= 2) return `"${MASK}"`;
  if (value.startsWith("'") && value.endsWith("'") && value.length >= 2) return `'${MASK}'`;
  return MASK;
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function redactTokens(input: string): string {
  let text = String(input ?? "");
  for (const re of TOKEN_PATTERNS) {
    text = text.replace(re, (m) => `${m.slice(0, 6)}…REDACTED…${m.slice(-4)}`);
  }
  return text;
}

/**
 * Masks values of secret-looking keys in `key: value`, `"key": "value"` and
 * `key=value` pairs, YAML block scalars under such keys, URL credentials and
 * well-known token shapes. Masking already-masked text returns it unchanged.
 */
export function maskSecrets(input: string): string {
  const lines = String(input ?? "").split("\n");
  let blockIndent: number | null = null;

  const out = lines.map((line) => {
    if (blockIndent !== null) {
      if (!line.trim()) return line;
      if (indentOf(line) > blockIndent) return `${" ".repeat(indentOf(line))}${MASK}`;
      blockIndent = null;
    }

    let next = line.replace(QUOTED_KEY_RE, (m, q: string, key: string, sep: string, value: string) =>
      isSecretKey(key) ? `${q}${key}${q}${sep}${maskValue(value)}` : m,
    );

    const yaml = YAML_KEY_RE.exec(next);
    if (yaml && isSecretKey(yaml[2])) {
      const [, lead, key, sep, value] = yaml;
      if (BLOCK_SCALAR_RE.test(value)) {
        blockIndent = indentOf(next);
        return next;
      }
      next = `${lead}${key}${sep}${maskValue(value)}`;
    }

    const ini = INI_KEY_RE.exec(next);
    if (ini && isSecretKey(ini[2])) {
      const [, lead, key, sep, value] = ini;
      next = `${lead}${key}${sep}${maskValue(value)}`;
    } else {
      next = next.replace(INLINE_PAIR_RE, (m, lead: string, key: string, eq: string, value: string) =>
        isSecretKey(key) ? `${lead}${key}${eq}${maskValue(value)}` : m,
      );
    }

    return next.replace(URL_CREDENTIALS_RE, (_m, head: string, _secret: string, at: string) => `${head}${MASK}${at}`);
  });

  return redactTokens(out.join("\n"));
}
