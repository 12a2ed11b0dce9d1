// Tool input/output types
import { ZodError, type ZodType, type ZodTypeDef } from "zod";
import { ServiceError, errorMessage } from "../errors.js";

export interface ToolResult {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function ok(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: typeof data === "string" ? data : JSON.stringify(data, null, 2) }],
  };
}

export function err(message: string): ToolResult {
  return {
    content: [{ type: "text", text: message }],
    isError: true,
  };
}

function describeZodError(e: ZodError): string {
  return e.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message)).join("; ");
}

/** Maps any failure to user-facing text; internal kinds and stack traces stay out. */
export function toolError(toolName: string, e: unknown): ToolResult {
  if (e instanceof ServiceError) return err(e.userMessage);
  if (e instanceof ZodError) return err(`Invalid arguments: ${describeZodError(e)}`);
  console.error(`[tools] ${toolName} failed:`, errorMessage(e));
  return err(`Internal error while running ${toolName}`);
}

export type ParsedArgs<T> = { ok: true; data: T } | { ok: false; result: ToolResult };

export function parseArgs<T>(schema: ZodType<T, ZodTypeDef, unknown>, args: Record<string, unknown>): ParsedArgs<T> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) return { ok: false, result: err(`Invalid arguments: ${describeZodError(parsed.error)}`) };
  return { ok: true, data: parsed.data };
}

// Tool handler type
export type ToolHandler = (args: Record<string, unknown>) => Promise<ToolResult>;

// Tool definition for registry
export interface ToolDef {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required?: string[];
  };
  handler: ToolHandler;
}
