// weather.run_query: read-only SELECT against registered station tables
import { z } from "zod";
import { DEFAULT_LIMIT, MAX_LIMIT } from "../../gateway/query-gateway.js";
import type { WeatherService } from "../../services/weather-service.js";
import { ok, parseArgs, toolError, type ToolDef } from "../../types/tools.js";

// Range checks on limit/offset belong to the gateway so they surface as rejections
const Args = z.object({
  sql: z.string(),
  limit: z.number().optional(),
  offset: z.number().optional(),
});

export function runQueryTool(service: WeatherService): ToolDef {
  return {
    name: "weather.run_query_v1",
    description:
      "Execute a single read-only SELECT against the daily station tables (etmgeg_<station>). " +
      "Raw values are scaled integers (e.g. TG in 0.1 degC) and -9999 means missing; " +
      "see schema.describe_v1 for units. A LIMIT is always enforced.",
    inputSchema: {
      type: "object",
      properties: {
        sql: { type: "string", description: "SELECT statement; no DDL/DML, no ';'-chained statements" },
        limit: {
          type: "number",
          description: `Max rows to return (default ${DEFAULT_LIMIT}, max ${MAX_LIMIT})`,
          minimum: 1,
          maximum: MAX_LIMIT,
        },
        offset: { type: "number", description: "Row offset for pagination (default 0)", minimum: 0 },
      },
      required: ["sql"],
    },
    async handler(args) {
      const parsed = parseArgs(Args, args);
      if (!parsed.ok) return parsed.result;
      const { sql, limit, offset } = parsed.data;
      try {
        const result = await service.runQuery(sql, limit ?? DEFAULT_LIMIT, offset ?? 0);
        return ok(result);
      } catch (e) {
        return toolError("weather.run_query_v1", e);
      }
    },
  };
}
