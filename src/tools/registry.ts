// Tool registry: single source of truth for all MCP tools
import type { WeatherService } from "../services/weather-service.js";
import type { ToolDef } from "../types/tools.js";
import { cacheInvalidateTool } from "./cache/invalidate.js";
import { monitorHealthTool } from "./monitor/health.js";
import { schemaDescribeTool } from "./schema/describe.js";
import { listStationsTool, runQueryTool, summarizeTool, trendTool } from "./weather/index.js";

export function createTools(service: WeatherService): Map<string, ToolDef> {
  const allTools: ToolDef[] = [
    // Weather
    runQueryTool(service),
    listStationsTool(service),
    summarizeTool(service),
    trendTool(service),
    // Schema
    schemaDescribeTool(service),
    // Cache
    cacheInvalidateTool(service),
    // Monitor
    monitorHealthTool(service),
  ];

  // Indexed by tool name for fast lookup
  return new Map(allTools.map((t) => [t.name, t]));
}
