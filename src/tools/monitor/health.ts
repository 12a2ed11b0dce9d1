// monitor.health: storage connectivity and cache statistics
import type { WeatherService } from "../../services/weather-service.js";
import { ok, toolError, type ToolDef } from "../../types/tools.js";

export function monitorHealthTool(service: WeatherService): ToolDef {
  return {
    name: "monitor.health_v1",
    description:
      "Check service health: storage round-trip latency and cache statistics (hits, misses, " +
      "coalesced requests, entries).",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
    async handler() {
      try {
        return ok(await service.health());
      } catch (e) {
        return toolError("monitor.health_v1", e);
      }
    },
  };
}
