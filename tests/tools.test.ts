import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { buildResultSummary, truncateJson } from "../src/audit.js";
import type { AuditRow, AuditSink } from "../src/bridge/questdb-ilp.js";
import { loadServiceConfig } from "../src/config/loader.js";
import { createServer, extractInvoker, handleToolCall } from "../src/server.js";
import { WeatherService } from "../src/services/weather-service.js";
import { createTools } from "../src/tools/registry.js";
import { type ToolResult, err, ok } from "../src/types/tools.js";
import { FakeStorage, dailyRows, testRegistry } from "./helpers/fake-storage.js";

class RecordingSink implements AuditSink {
  readonly rows: AuditRow[] = [];
  fail = false;

  async write(row: AuditRow): Promise<void> {
    if (this.fail) throw new Error("ilp down");
    this.rows.push(row);
  }

  async close(): Promise<void> {}
}

function setup() {
  const storage = new FakeStorage(
    { etmgeg_320: dailyRows(320, { "19900101": 50, "19900102": -9999, "19900103": 70 }) },
    async () => ({ columns: ["TG"], rows: [[50], [70]] }),
  );
  const service = WeatherService.fromConfig(loadServiceConfig({}), testRegistry(), { storage });
  return { storage, tools: createTools(service) };
}

function text(result: ToolResult): string {
  return result.content[0]?.text ?? "";
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createTools", () => {
  it("registers every tool under a versioned name", () => {
    expect(Array.from(setup().tools.keys()).sort()).toEqual([
      "cache.invalidate_v1",
      "monitor.health_v1",
      "schema.describe_v1",
      "weather.list_stations_v1",
      "weather.run_query_v1",
      "weather.summarize_v1",
      "weather.trend_v1",
    ]);
  });
});

describe("handleToolCall", () => {
  it("returns one JSON result for a summary", async () => {
    const { tools } = setup();
    const result = await handleToolCall(
      tools,
      "weather.summarize_v1",
      { start_date: "19900101", end_date: "19900103", station: 320 },
      "agent-1",
    );
    expect(result.isError).toBeUndefined();
    expect(JSON.parse(text(result))).toMatchObject({ mean: 6, sample_count: 2, missing_count: 1, unit: "degC" });
  });

  it("accepts numeric strings for station and dates as numbers", async () => {
    const { tools } = setup();
    const result = await handleToolCall(
      tools,
      "weather.summarize_v1",
      { start_date: 19900101, end_date: 19900103, station: "320" },
      "agent-1",
    );
    expect(JSON.parse(text(result))).toMatchObject({ station: 320, mean: 6 });
  });

  it("surfaces gateway rejections verbatim", async () => {
    const { tools, storage } = setup();
    const result = await handleToolCall(tools, "weather.run_query_v1", { sql: "DROP TABLE etmgeg_320" }, "agent-1");
    expect(result.isError).toBe(true);
    expect(text(result)).toBe("Query rejected (NotReadOnly): statement must start with SELECT");
    expect(storage.calls).toHaveLength(0);
  });

  it("reports invalid arguments", async () => {
    const { tools } = setup();
    const missing = await handleToolCall(tools, "weather.trend_v1", { start_year: 1990, station: 320 }, "agent-1");
    expect(missing.isError).toBe(true);
    expect(text(missing)).toMatch(/^Invalid arguments: end_year: /);

    const limit = await handleToolCall(tools, "weather.run_query_v1", { sql: "SELECT TG FROM etmgeg_320", limit: 0 }, "a");
    expect(text(limit)).toBe("Query rejected (LimitOutOfRange): limit must be an integer in [1, 10000], got 0");
  });

  it("reports insufficient data for a trend", async () => {
    const { tools } = setup();
    const result = await handleToolCall(
      tools,
      "weather.trend_v1",
      { start_year: 1990, end_year: 1995, station: 320 },
      "agent-1",
    );
    expect(result.isError).toBe(true);
    expect(text(result)).toBe("Insufficient data for a trend: only 1 qualifying year(s) in 1990-1995, need at least 2");
  });

  it("rejects unknown tools", async () => {
    const result = await handleToolCall(setup().tools, "weather.nope", {}, "agent-1");
    expect(result).toEqual({ content: [{ type: "text", text: "Unknown tool: weather.nope" }], isError: true });
  });

  it("lists stations and invalidates the cache", async () => {
    const { tools } = setup();
    const stations = await handleToolCall(tools, "weather.list_stations_v1", {}, "agent-1");
    expect(JSON.parse(text(stations))).toEqual({ stations: [320], count: 1 });

    const invalidated = await handleToolCall(tools, "cache.invalidate_v1", { prefix: "stations:" }, "agent-1");
    expect(JSON.parse(text(invalidated))).toEqual({ prefix: "stations:", removed: 1 });
  });

  it("describes the schema", async () => {
    const result = await handleToolCall(setup().tools, "schema.describe_v1", {}, "agent-1");
    const description = JSON.parse(text(result));
    expect(description.sentinel).toBe(-9999);
    expect(description.stations).toHaveLength(2);
  });

  it("writes one audit row per invocation", async () => {
    const { tools } = setup();
    const audit = new RecordingSink();
    await handleToolCall(
      tools,
      "weather.summarize_v1",
      { start_date: "19900101", end_date: "19900103", station: 320 },
      "agent-7",
      { audit },
    );
    await handleToolCall(tools, "weather.run_query_v1", { sql: "DELETE FROM etmgeg_320" }, "agent-7", { audit });

    expect(audit.rows).toHaveLength(2);
    expect(audit.rows[0]).toMatchObject({
      tool_name: "weather.summarize_v1",
      invoker: "agent-7",
      result_status: "success",
      station: 320,
      parameters: '{"start_date":"19900101","end_date":"19900103","station":320}',
    });
    expect(audit.rows[1]).toMatchObject({ result_status: "failure", station: null });
  });

  it("still answers when the audit sink fails", async () => {
    const { tools } = setup();
    const audit = new RecordingSink();
    audit.fail = true;
    const result = await handleToolCall(tools, "schema.describe_v1", {}, "agent-1", { audit });
    expect(result.isError).toBeUndefined();
    expect(console.error).toHaveBeenCalledWith("[audit] Failed to write audit row:", "ilp down");
  });
});

describe("audit helpers", () => {
  it("keeps scalar fields in result summaries", () => {
    expect(buildResultSummary(ok({ prefix: "trend:", removed: 3, keys: ["a"] }))).toBe('{"prefix":"trend:","removed":3}');
    expect(buildResultSummary(err("boom"))).toBe('{"message":"boom"}');
  });

  it("truncates oversized parameters", () => {
    const json = truncateJson({ sql: "x".repeat(10_000) });
    expect(json).toHaveLength(8192);
    expect(json.endsWith("...")).toBe(true);
  });

  it("reads the invoker from request metadata", () => {
    expect(extractInvoker({ agent_id: "agent-3" })).toBe("agent-3");
    expect(extractInvoker(undefined)).toBe("unknown");
  });
});

describe("createServer", () => {
  it("serves tools/list and tools/call over MCP", async () => {
    const { tools } = setup();
    const server = createServer(tools);
    const client = new Client({ name: "test-client", version: "0.0.0" });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);

    const listed = await client.listTools();
    expect(listed.tools.map((t) => t.name)).toContain("weather.trend_v1");

    const called = await client.callTool({ name: "weather.list_stations_v1", arguments: {} });
    expect(called.isError).toBeFalsy();
    expect(called.content).toEqual([{ type: "text", text: JSON.stringify({ stations: [320], count: 1 }, null, 2) }]);

    await client.close();
    await server.close();
  });
});
