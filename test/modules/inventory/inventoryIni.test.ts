import { describe, expect, it } from "vitest";

import { ParseError } from "../../../src/errors.js";
import {
  deleteHostLines,
  hostGroupChain,
  insertHostLine,
  parseHeader,
  parseInventory,
  tokenizeLine,
} from "../../../src/modules/inventory/inventoryIni.js";

const SAMPLE = `# lab inventory
loose1

[web]
w1 ansible_host=10.0.0.1 http_port=8080
w2 ansible_host=10.0.0.2 motd="hello world"

[db]
d1

[prod:children]
web
db

[prod:vars]
ntp_server = 10.1.1.1
`;

describe("inventory/inventoryIni", () => {
  it("tokenizes with quotes and trailing comments", () => {
    expect(tokenizeLine(`w1 a=1 motd="x y"  # note`)).toEqual(["w1", "a=1", `motd="x y"`]);
    expect(tokenizeLine(`w1 motd="open`)).toBeNull();
  });

  it("parses section headers", () => {
    expect(parseHeader("[web]")).toEqual({ group: "web", kind: "hosts" });
    expect(parseHeader("[prod:children]")).toEqual({ group: "prod", kind: "children" });
    expect(parseHeader(" [prod:vars] ")).toEqual({ group: "prod", kind: "vars" });
    expect(parseHeader("w1 a=1")).toBeNull();
    expect(() => parseHeader("[web", 3)).toThrow("inventory: line 3: malformed section header");
    expect(() => parseHeader("[web:bogus]", 4)).toThrow("inventory: line 4: unknown section type ':bogus'");
  });

  it("builds the group and host model", () => {
    const model = parseInventory(SAMPLE);

    expect([...model.groups.keys()]).toEqual(["all", "ungrouped", "web", "db", "prod"]);
    expect(model.groups.get("ungrouped")?.hosts).toEqual(["loose1"]);
    expect(model.groups.get("web")?.hosts).toEqual(["w1", "w2"]);
    expect(model.groups.get("web")?.parents).toEqual(["prod"]);
    expect(model.groups.get("prod")?.children).toEqual(["web", "db"]);
    expect(model.groups.get("prod")?.vars).toEqual({ ntp_server: "10.1.1.1" });

    expect(model.hosts.get("w1")).toEqual({
      name: "w1",
      vars: { ansible_host: "10.0.0.1", http_port: "8080" },
      groups: ["web"],
    });
    expect(model.hosts.get("w2")?.vars.motd).toBe("hello world");
  });

  it("reports the failing line", () => {
    expect(() => parseInventory("[web]\nw1 motd=\"x")).toThrow("inventory: line 2: unterminated quote");
    expect(() => parseInventory("[web:vars]\njust-a-word")).toThrow(ParseError);
    expect(() => parseInventory("[web:children]\nweb")).toThrow("inventory: line 2: group cannot contain itself");
  });

  it("orders the group chain from all to the host's own groups", () => {
    const model = parseInventory(SAMPLE);
    expect(hostGroupChain(model, "w1")).toEqual(["all", "prod", "web"]);
    expect(hostGroupChain(model, "loose1")).toEqual(["all", "ungrouped"]);
    expect(hostGroupChain(model, "ghost")).toEqual([]);
  });

  it("refuses cyclic group nesting", () => {
    const model = parseInventory("[a:children]\nb\n[b:children]\na\n[a]\nh1\n");
    expect(() => hostGroupChain(model, "h1")).toThrow(ParseError);
  });

  it("inserts host lines after the group header or in a new section", () => {
    expect(insertHostLine("", "web", "w1 a=1")).toBe("[web]\nw1 a=1\n");
    expect(insertHostLine("[web]\nw0\n", "web", "w1")).toBe("[web]\nw1\nw0\n");
    expect(insertHostLine("[db]\nd1\n", "web", "w1")).toBe("[db]\nd1\n\n[web]\nw1\n");
    expect(insertHostLine("[db]\nd1", "web", "w1")).toBe("[db]\nd1\n\n[web]\nw1");
    expect(insertHostLine("[web:vars]\nx=1\n", "web", "w1")).toBe("[web:vars]\nx=1\n\n[web]\nw1\n");
  });

  it("deleting an added host restores the original bytes", () => {
    for (const original of ["", "[db]\nd1\n", "[db]\nd1", "[db]\r\nd1\r\n"]) {
      const added = insertHostLine(original, "web", "w1 ansible_host=10.0.0.9");
      expect(deleteHostLines(added, "w1")).toEqual({ text: original, removed: 1, droppedGroups: ["web"] });
    }
    const added = insertHostLine("[web]\nw0\n", "web", "w1");
    expect(deleteHostLines(added, "w1")).toEqual({ text: "[web]\nw0\n", removed: 1, droppedGroups: [] });
  });

  it("removes every line naming the host", () => {
    const text = "w1\n[web]\nw1 a=1\nw10\n# w1 retired\n[db]\nw1\n";
    expect(deleteHostLines(text, "w1")).toEqual({
      text: "[web]\nw10\n# w1 retired\n",
      removed: 3,
      droppedGroups: ["db"],
    });
    expect(deleteHostLines(text, "nope")).toEqual({ text, removed: 0, droppedGroups: [] });
  });

  it("reports a declared group section that a removal leaves empty", () => {
    const added = insertHostLine("[core]\n\n[edge]\ne1\n", "core", "h1");
    expect(added).toBe("[core]\nh1\n\n[edge]\ne1\n");
    expect(deleteHostLines(added, "h1")).toEqual({ text: "[edge]\ne1\n", removed: 1, droppedGroups: ["core"] });
  });

  it("handles CRLF line endings", () => {
    const text = "[core]\r\nh1\r\nh2 a=1\r\n";
    const model = parseInventory(text);
    expect([...model.hosts.keys()]).toEqual(["h1", "h2"]);
    expect(model.hosts.get("h2")?.vars).toEqual({ a: "1" });

    expect(insertHostLine(text, "core", "h3")).toBe("[core]\r\nh3\r\nh1\r\nh2 a=1\r\n");
    expect(insertHostLine("[db]\r\nd1\r\n", "web", "w1")).toBe("[db]\r\nd1\r\n\r\n[web]\r\nw1\r\n");
    expect(deleteHostLines(text, "h1")).toEqual({ text: "[core]\r\nh2 a=1\r\n", removed: 1, droppedGroups: [] });
  });
});
