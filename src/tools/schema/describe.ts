// schema.describe: registered tables, stations and measurement units
import type { WeatherService } from "../../services/weather-service.js";
import { ok, toolError, type ToolDef } from "../../types/tools.js";

export function schemaDescribeTool(service: WeatherService): ToolDef {
  return {
    name: "schema.describe_v1",
    description:
      "Describe the weather store: station tables, key columns, the missing-value sentinel, and every " +
      "measurement code with its unit and the divisor that converts raw integers to that unit.",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
    async handler() {
      try {
        return ok(service.describeSchema());
      } catch (e) {
        return toolError("schema.describe_v1", e);
      }
    },
  };
}
