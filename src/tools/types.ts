import { renderReport, type EngineReport } from "../executors/engine.js";
import type { Workspace } from "../workspace.js";

export type ToolArgs = Readonly<Record<string, string>>;

export type ToolStatus = "SUCCESS" | "WARNING" | "ERROR";

export type ToolReply = Readonly<{ status: ToolStatus; text: string }>;

export type ToolContext = Readonly<{
  workspace: Workspace;
  signal?: AbortSignal;
}>;

/**
 * One dispatch-table entry. `parse` turns raw string arguments into a typed,
 * sanitized request; `execute` does the work; `render` builds the reply.
 */
export type ToolSpec<Req, Res> = {
  name: string;
  description: string;
  /** argument name -> description; every argument is a string defaulting to "" */
  args: Readonly<Record<string, string>>;
  mutating: boolean;
  parse(args: ToolArgs): Req;
  execute(ctx: ToolContext, req: Req): Promise<Res>;
  render(res: Res, req: Req): ToolReply;
};

export type ToolDefinition = Readonly<{
  name: string;
  description: string;
  args: Readonly<Record<string, string>>;
  mutating: boolean;
  invoke(ctx: ToolContext, args: ToolArgs): Promise<ToolReply>;
}>;

export function defineTool<Req, Res>(def: ToolSpec<Req, Res>): ToolDefinition {
  return {
    name: def.name,
    description: def.description,
    args: def.args,
    mutating: def.mutating,
    async invoke(ctx, args) {
      const req = def.parse(args);
      const res = await def.execute(ctx, req);
      return def.render(res, req);
    },
  };
}

export const success = (text: string): ToolReply => ({ status: "SUCCESS", text });
export const warning = (text: string): ToolReply => ({ status: "WARNING", text });
export const failure = (text: string): ToolReply => ({ status: "ERROR", text });

export function engineReply(report: EngineReport, heading?: string): ToolReply {
  const body = `${heading ? `${heading}\n` : ""}${capitalize(report.reason)}.\n\n${renderReport(report)}`;
  if (report.outcome === "success") return success(body);
  if (report.outcome === "warning") return warning(body);
  return failure(body);
}

function capitalize(s: string): string {
  return s ? s[0].toUpperCase() + s.slice(1) : s;
}
