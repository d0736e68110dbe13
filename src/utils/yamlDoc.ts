import { parseDocument } from "yaml";

import { ParseError } from "../errors.js";
import { isRecord } from "./validate.js";

/** Parses a variables document. An empty document is an empty mapping. */
export function parseYamlMapping(content: string, source: string): Record<string, unknown> {
  const doc = parseDocument(String(content ?? ""), { prettyErrors: false });
  const first = doc.errors[0];
  if (first) throw new ParseError(source, first.message.split("\n")[0]);

  const value: unknown = doc.toJS();
  if (value === null || value === undefined) return {};
  if (!isRecord(value)) throw new ParseError(source, "top level must be a mapping");
  return value;
}
