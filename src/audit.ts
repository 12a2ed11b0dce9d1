// Audit trail middleware: records every tool invocation to the audit sink
import type { AuditRow, AuditSink } from "./bridge/questdb-ilp.js";
import { errorMessage } from "./errors.js";
import type { ToolResult } from "./types/tools.js";

// Max size for parameter/result JSON to avoid bloating the audit table
const MAX_JSON_LENGTH = 8192;

export function truncateJson(obj: unknown): string {
  const json = JSON.stringify(obj ?? {});
  if (json.length <= MAX_JSON_LENGTH) return json;
  return json.slice(0, MAX_JSON_LENGTH - 3) + "...";
}

function parseResultText(result: ToolResult): unknown {
  const text = result.content[0]?.text;
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function buildResultSummary(result: ToolResult): string {
  const parsed = parseResultText(result);
  if (parsed === undefined) return "{}";
  if (typeof parsed === "string") return truncateJson({ message: parsed.slice(0, 500) });
  if (Array.isArray(parsed)) return truncateJson({ length: parsed.length });
  if (!isRecord(parsed)) return truncateJson({ value: parsed });

  // Keep only scalar fields (row_count, truncated, elapsed_ms, ...)
  const summary: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(parsed)) {
    if (v === null || typeof v !== "object") summary[k] = v;
  }
  return truncateJson(summary);
}

function extractStation(args: Record<string, unknown>): number | null {
  const station = Number(args.station);
  return args.station !== undefined && Number.isSafeInteger(station) ? station : null;
}

export function buildAuditRow(
  toolName: string,
  invoker: string,
  args: Record<string, unknown>,
  result: ToolResult,
  durationMs: number,
): AuditRow {
  return {
    tool_name: toolName,
    invoker,
    parameters: truncateJson(args),
    result_status: result.isError ? "failure" : "success",
    result_summary: buildResultSummary(result),
    duration_ms: Math.round(durationMs),
    station: extractStation(args),
  };
}

export async function logToolInvocation(
  sink: AuditSink,
  toolName: string,
  invoker: string,
  args: Record<string, unknown>,
  result: ToolResult,
  durationMs: number,
): Promise<void> {
  try {
    await sink.write(buildAuditRow(toolName, invoker, args, result, durationMs));
  } catch (e) {
    // Never fail the tool response because of the audit trail
    console.error("[audit] Failed to write audit row:", errorMessage(e));
  }
}
