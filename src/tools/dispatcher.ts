import { WorkspaceError, describeError, errorText } from "../errors.js";
import type { LoggerFn } from "../logger.js";
import { maskSecrets } from "../modules/security/redaction.js";
import { Semaphore } from "../semaphore.js";
import type { Workspace } from "../workspace.js";
import type { ToolArgs, ToolDefinition, ToolReply, ToolStatus } from "./types.js";

export type DispatcherState = "idle" | "in-flight";

const TOOL_NAME_RE = /^[a-z][a-z0-9_]{0,63}$/;

/** Keeps only declared arguments; anything that is not a string becomes "". */
function normalizeArgs(tool: ToolDefinition, raw: Readonly<Record<string, unknown>>): ToolArgs {
  const out: Record<string, string> = {};
  for (const name of Object.keys(tool.args)) {
    const v = raw[name];
    out[name] = typeof v === "string" ? v : "";
  }
  return out;
}

function formatReply(reply: ToolReply): string {
  return maskSecrets(`${reply.status}: ${reply.text}`);
}

/**
 * Routes tool calls through the dispatch table. Calls run one at a time;
 * every failure leaves here as an `ERROR:` string.
 */
export class Dispatcher {
  private readonly gate = new Semaphore(1);

  constructor(
    private readonly opts: {
      workspace: Workspace;
      tools: ReadonlyMap<string, ToolDefinition>;
      log: LoggerFn;
    },
  ) {}

  get state(): DispatcherState {
    return this.gate.inUse > 0 ? "in-flight" : "idle";
  }

  get tools(): ToolDefinition[] {
    return [...this.opts.tools.values()];
  }

  async call(name: string, rawArgs: Readonly<Record<string, unknown>> = {}, signal?: AbortSignal): Promise<string> {
    const tool = this.opts.tools.get(name);
    if (!tool) {
      return formatReply({ status: "ERROR", text: TOOL_NAME_RE.test(name) ? `Unknown tool '${name}'.` : "Unknown tool." });
    }

    const args = normalizeArgs(tool, rawArgs);
    const started = Date.now();
    let status: ToolStatus = "ERROR";
    try {
      const reply = await this.gate.use(() => tool.invoke({ workspace: this.opts.workspace, signal }, args), signal);
      status = reply.status;
      return formatReply(reply);
    } catch (err) {
      this.opts.log("tool call failed", {
        tool: name,
        code: err instanceof WorkspaceError ? err.code : "INTERNAL",
        ...(err instanceof WorkspaceError ? {} : { err: errorText(err) }),
      });
      return formatReply({ status: "ERROR", text: describeError(err) });
    } finally {
      this.opts.log("tool call", { tool: name, status, durationMs: Date.now() - started });
    }
  }
}
