import { ParseError } from "../../errors.js";

export type InventoryHost = {
  name: string;
  vars: Record<string, string>;
  /** groups the host is listed in directly, declared order */
  groups: string[];
};

export type InventoryGroup = {
  name: string;
  hosts: string[];
  children: string[];
  parents: string[];
  vars: Record<string, string>;
};

export type InventoryModel = {
  /** declared order; always contains `all` and `ungrouped` */
  groups: Map<string, InventoryGroup>;
  hosts: Map<string, InventoryHost>;
};

type SectionKind = "hosts" | "children" | "vars";

const SOURCE = "inventory";
const GROUP_NAME_RE = /^[A-Za-z0-9_.-]+$/;
const HEADER_RE = /^\[([^\]]*)\]\s*(?:[#;].*)?$/;

// inventories saved on Windows end lines with \r\n
function stripCarriageReturn(line: string): string {
  return line.endsWith("\r") ? line.slice(0, -1) : line;
}

function isBlankOrComment(line: string): boolean {
  const t = line.trim();
  return !t || t.startsWith("#") || t.startsWith(";");
}

/**
 * Splits an inventory line on whitespace, keeping quoted runs together.
 * A `#` that starts a token begins a comment. Returns null on an unterminated quote.
 */
export function tokenizeLine(line: string): string[] | null {
  const tokens: string[] = [];
  let cur = "";
  let quote: string | null = null;

  for (const ch of line) {
    if (quote) {
      cur += ch;
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "\"" || ch === "'") {
      quote = ch;
      cur += ch;
      continue;
    }
    if (ch === " " || ch === "\t") {
      if (cur) tokens.push(cur);
      cur = "";
      continue;
    }
    if (ch === "#" && !cur) break;
    cur += ch;
  }

  if (quote) return null;
  if (cur) tokens.push(cur);
  return tokens;
}

function unquote(v: string): string {
  if (v.length >= 2 && (v[0] === "\"" || v[0] === "'") && v[v.length - 1] === v[0]) return v.slice(1, -1);
  return v;
}

export function parseAssignment(token: string): [string, string] | null {
  const eq = token.indexOf("=");
  if (eq <= 0) return null;
  return [token.slice(0, eq).trim(), unquote(token.slice(eq + 1).trim())];
}

/** `[name]`, `[name:children]` or `[name:vars]`; null when the line is no header. */
export function parseHeader(line: string, lineNo = 0): { group: string; kind: SectionKind } | null {
  const t = line.trim();
  if (!t.startsWith("[")) return null;
  const m = HEADER_RE.exec(t);
  if (!m) throw new ParseError(SOURCE, `line ${lineNo}: malformed section header`);

  const [name, suffix, ...rest] = m[1].trim().split(":");
  if (rest.length || !name || !GROUP_NAME_RE.test(name)) {
    throw new ParseError(SOURCE, `line ${lineNo}: invalid section name`);
  }
  if (suffix === undefined) return { group: name, kind: "hosts" };
  if (suffix === "children" || suffix === "vars") return { group: name, kind: suffix };
  throw new ParseError(SOURCE, `line ${lineNo}: unknown section type ':${suffix}'`);
}

function ensureGroup(model: InventoryModel, name: string): InventoryGroup {
  let g = model.groups.get(name);
  if (!g) {
    g = { name, hosts: [], children: [], parents: [], vars: {} };
    model.groups.set(name, g);
  }
  return g;
}

export function parseInventory(text: string): InventoryModel {
  const model: InventoryModel = { groups: new Map(), hosts: new Map() };
  ensureGroup(model, "all");
  ensureGroup(model, "ungrouped");

  let section: { group: string; kind: SectionKind } = { group: "ungrouped", kind: "hosts" };

  String(text ?? "")
    .split("\n")
    .map(stripCarriageReturn)
    .forEach((raw, idx) => {
      const lineNo = idx + 1;
      if (isBlankOrComment(raw)) return;

      const header = parseHeader(raw, lineNo);
      if (header) {
        section = header;
        ensureGroup(model, header.group);
        return;
      }

      const tokens = tokenizeLine(raw);
      if (tokens === null) throw new ParseError(SOURCE, `line ${lineNo}: unterminated quote`);
      if (!tokens.length) return;

      const group = ensureGroup(model, section.group);

      if (section.kind === "vars") {
        const pair = parseAssignment(raw.trim());
        if (!pair || !pair[0]) throw new ParseError(SOURCE, `line ${lineNo}: expected key=value`);
        group.vars[pair[0]] = pair[1];
        return;
      }

      if (section.kind === "children") {
        const child = tokens[0];
        if (tokens.length !== 1 || !GROUP_NAME_RE.test(child)) {
          throw new ParseError(SOURCE, `line ${lineNo}: expected a group name`);
        }
        if (child === group.name) throw new ParseError(SOURCE, `line ${lineNo}: group cannot contain itself`);
        const childGroup = ensureGroup(model, child);
        if (!group.children.includes(child)) group.children.push(child);
        if (!childGroup.parents.includes(group.name)) childGroup.parents.push(group.name);
        return;
      }

      const [name, ...assignments] = tokens;
      if (name.includes("=")) throw new ParseError(SOURCE, `line ${lineNo}: missing host name`);
      let host = model.hosts.get(name);
      if (!host) {
        host = { name, vars: {}, groups: [] };
        model.hosts.set(name, host);
      }
      for (const token of assignments) {
        const pair = parseAssignment(token);
        if (!pair || !pair[0]) throw new ParseError(SOURCE, `line ${lineNo}: expected key=value after host name`);
        host.vars[pair[0]] = pair[1];
      }
      if (!host.groups.includes(group.name)) host.groups.push(group.name);
      if (!group.hosts.includes(name)) group.hosts.push(name);
    });

  // a host listed in any real group is not ungrouped
  const ungrouped = ensureGroup(model, "ungrouped");
  ungrouped.hosts = ungrouped.hosts.filter((h) => {
    const host = model.hosts.get(h);
    return !host || host.groups.every((g) => g === "ungrouped");
  });
  for (const host of model.hosts.values()) {
    if (host.groups.length > 1) host.groups = host.groups.filter((g) => g !== "ungrouped");
  }

  return model;
}

function groupDepths(model: InventoryModel): Map<string, number> {
  const depths = new Map<string, number>([["all", 0]]);
  const visiting = new Set<string>();

  const depthOf = (name: string): number => {
    const known = depths.get(name);
    if (known !== undefined) return known;
    if (visiting.has(name)) throw new ParseError(SOURCE, `group '${name}' is its own ancestor`);
    visiting.add(name);
    const parents = (model.groups.get(name)?.parents ?? []).filter((p) => p !== "all");
    const depth = parents.length ? 1 + Math.max(...parents.map(depthOf)) : 1;
    visiting.delete(name);
    depths.set(name, depth);
    return depth;
  };

  for (const name of model.groups.keys()) depthOf(name);
  return depths;
}

/**
 * Every group a host belongs to, `all` first, then ancestors, then the
 * groups it is listed in. Groups at equal depth keep declared order.
 */
export function hostGroupChain(model: InventoryModel, hostName: string): string[] {
  const host = model.hosts.get(hostName);
  if (!host) return [];

  const members = new Set<string>(["all"]);
  const pending = [...host.groups];
  while (pending.length) {
    const name = pending.pop();
    if (name === undefined || members.has(name)) continue;
    members.add(name);
    pending.push(...(model.groups.get(name)?.parents ?? []));
  }

  const depths = groupDepths(model);
  const order = [...model.groups.keys()];
  return [...members].sort((a, b) => {
    const d = (depths.get(a) ?? 0) - (depths.get(b) ?? 0);
    return d !== 0 ? d : order.indexOf(a) - order.indexOf(b);
  });
}

/** Lines split on `\n`; a CRLF file keeps its `\r` on each line and `eol` is "\r\n". */
type Lines = { lines: string[]; trailingNewline: boolean; eol: "\n" | "\r\n" };

function splitLines(text: string): Lines {
  const eol = text.includes("\r\n") ? "\r\n" : "\n";
  if (!text) return { lines: [], trailingNewline: false, eol };
  const trailingNewline = text.endsWith("\n");
  return { lines: (trailingNewline ? text.slice(0, -1) : text).split("\n"), trailingNewline, eol };
}

function joinLines({ lines, trailingNewline }: Lines): string {
  if (!lines.length) return "";
  return lines.join("\n") + (trailingNewline ? "\n" : "");
}

/**
 * Inserts `hostLine` directly after the first `[group]` header, or appends a
 * new section separated by a blank line.
 */
export function insertHostLine(text: string, group: string, hostLine: string): string {
  const parsed = splitLines(text);
  const headerIdx = parsed.lines.findIndex((l, i) => {
    const h = parseHeader(l, i + 1);
    return h !== null && h.kind === "hosts" && h.group === group;
  });

  const { eol } = parsed;
  if (headerIdx >= 0) {
    parsed.lines.splice(headerIdx + 1, 0, eol === "\r\n" ? `${hostLine}\r` : hostLine);
    return joinLines(parsed);
  }

  if (!text) return `[${group}]\n${hostLine}\n`;
  if (parsed.trailingNewline) return `${text}${eol}[${group}]${eol}${hostLine}${eol}`;
  return `${text}${eol}${eol}[${group}]${eol}${hostLine}`;
}

/**
 * Deletes every host line naming `host`. A host section left with nothing but
 * blank lines is dropped together with one blank separator line; its group is
 * reported in `droppedGroups`.
 */
export function deleteHostLines(
  text: string,
  host: string,
): { text: string; removed: number; droppedGroups: string[] } {
  const parsed = splitLines(text);
  const { lines } = parsed;

  type Section = { header: number; group: string; kind: SectionKind; touched: boolean };
  const sections: Section[] = [];
  let current: Section | null = null;
  const keep: boolean[] = [];
  let removed = 0;
  const droppedGroups: string[] = [];

  lines.forEach((line, i) => {
    const header = parseHeader(line, i + 1);
    if (header) {
      current = { header: i, group: header.group, kind: header.kind, touched: false };
      sections.push(current);
      keep.push(true);
      return;
    }
    const kind: SectionKind = current === null ? "hosts" : current.kind;
    if (kind === "hosts" && !isBlankOrComment(line) && tokenizeLine(stripCarriageReturn(line))?.[0] === host) {
      keep.push(false);
      removed += 1;
      if (current) current.touched = true;
      return;
    }
    keep.push(true);
  });

  sections.forEach((section, idx) => {
    if (!section.touched || section.kind !== "hosts") return;
    const end = idx + 1 < sections.length ? sections[idx + 1].header : lines.length;
    const body: number[] = [];
    for (let i = section.header + 1; i < end; i++) if (keep[i]) body.push(i);
    if (body.some((i) => lines[i].trim())) return;

    keep[section.header] = false;
    if (!droppedGroups.includes(section.group)) droppedGroups.push(section.group);
    const before = section.header - 1;
    if (before >= 0 && keep[before] && !lines[before].trim()) keep[before] = false;
    else if (body.length) keep[body[0]] = false;
  });

  return {
    text: joinLines({ ...parsed, lines: lines.filter((_, i) => keep[i]) }),
    removed,
    droppedGroups,
  };
}
