import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { logToolInvocation } from "./audit.js";
import type { AuditSink } from "./bridge/questdb-ilp.js";
import { err, toolError, type ToolDef, type ToolResult } from "./types/tools.js";

export const SERVER_NAME = "station-trends";
export const SERVER_VERSION = "0.1.0";

const DEFAULT_INVOKER = "unknown";

// Invoker identity from MCP request _meta, recorded in the audit trail only
export function extractInvoker(meta: Record<string, unknown> | undefined): string {
  const id = meta?.agent_id;
  return typeof id === "string" && id.length > 0 ? id : DEFAULT_INVOKER;
}

export interface ServerOptions {
  /** Audit trail; omitted when AUDIT_ILP_ADDR is not configured. */
  audit?: AuditSink;
}

export async function handleToolCall(
  tools: ReadonlyMap<string, ToolDef>,
  name: string,
  args: Record<string, unknown>,
  invoker: string,
  options: ServerOptions = {},
): Promise<ToolResult> {
  const tool = tools.get(name);
  if (!tool) return err(`Unknown tool: ${name}`);

  const start = performance.now();
  let result: ToolResult;
  try {
    result = await tool.handler(args);
  } catch (e) {
    result = toolError(name, e);
  }
  const durationMs = performance.now() - start;

  if (options.audit) {
    await logToolInvocation(options.audit, name, invoker, args, result, durationMs);
  }
  return result;
}

export function createServer(tools: ReadonlyMap<string, ToolDef>, options: ServerOptions = {}): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  // List all registered tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: Array.from(tools.values()).map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    })),
  }));

  // Dispatch tool calls to handlers
  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args, _meta } = request.params;
    const result = await handleToolCall(tools, name, args ?? {}, extractInvoker(_meta), options);
    return {
      content: result.content.map((c) => ({ type: "text" as const, text: c.text })),
      isError: result.isError,
    };
  });

  return server;
}
