import { describe, expect, it } from "vitest";

import { SanitizationRejected } from "../../../src/errors.js";
import { sanitize, sanitizeList, sanitizeOptional } from "../../../src/modules/security/sanitize.js";

describe("security/sanitize", () => {
  it("accepts and trims names", () => {
    expect(sanitize("name", "hostname", "  core-sw01.lab  ")).toBe("core-sw01.lab");
    expect(sanitize("name", "group", "qfx_switches")).toBe("qfx_switches");
  });

  it.each(["web;rm -rf", ".hidden", "-flag", "a b", "x$(id)", "n".repeat(201)])("rejects name %j", (value) => {
    expect(() => sanitize("name", "hostname", value)).toThrow(SanitizationRejected);
  });

  it("names the field but never echoes the value", () => {
    try {
      sanitize("name", "hostname", "web;reboot");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SanitizationRejected);
      expect(err).toMatchObject({ field: "hostname" });
      expect(String(err)).not.toContain("reboot");
    }
  });

  it("allows path and pattern characters", () => {
    expect(sanitize("path", "file_path", "group_vars/all.yml")).toBe("group_vars/all.yml");
    expect(sanitize("pattern", "limit_hosts", "web:db")).toBe("web:db");
    expect(() => sanitize("pattern", "limit_hosts", "web:&db")).toThrow(SanitizationRejected);
  });

  it("keeps commas out of paths but allows them in patterns", () => {
    expect(() => sanitize("path", "file_path", "a,b")).toThrow(SanitizationRejected);
    expect(sanitize("pattern", "tags", "deploy,verify")).toBe("deploy,verify");
  });

  it("accepts argument text but refuses template and shell syntax", () => {
    expect(sanitize("text", "commands", "show interfaces terse")).toBe("show interfaces terse");
    expect(sanitize("text", "extra_vars", `env=prod users=["a","b"]`)).toBe(`env=prod users=["a","b"]`);
    for (const bad of ["{{ lookup('pipe', 'id') }}", "a;b", "a|b", "$(id)", "`id`", "a\nb", "x>y"]) {
      expect(() => sanitize("text", "extra_vars", bad)).toThrow(SanitizationRejected);
    }
  });

  it("lets content through unless it carries control characters", () => {
    expect(sanitize("content", "content", "- hosts: all\n\ttasks: []\r\n")).toBe("- hosts: all\n\ttasks: []\r\n");
    expect(sanitize("content", "content", "msg: {{ inventory_hostname }}")).toBe("msg: {{ inventory_hostname }}");
    expect(() => sanitize("content", "content", "bell\u0007")).toThrow(SanitizationRejected);
  });

  it("treats blank optional input as absent", () => {
    expect(sanitizeOptional("pattern", "limit_hosts", "   ")).toBeNull();
    expect(sanitizeOptional("pattern", "limit_hosts", " web ")).toBe("web");
  });

  it("splits and checks comma separated lists", () => {
    expect(sanitizeList("text", "commands", "show version, show interfaces,,")).toEqual([
      "show version",
      "show interfaces",
    ]);
    expect(() => sanitizeList("text", "commands", "show version, {{ x }}")).toThrow(SanitizationRejected);
  });
});
