// weather.summarize: mean/min/max of a measurement over a date range
import { z } from "zod";
import { DEFAULT_MEASUREMENT, type WeatherService } from "../../services/weather-service.js";
import { ok, parseArgs, toolError, type ToolDef } from "../../types/tools.js";

const Args = z.object({
  start_date: z.coerce.string(),
  end_date: z.coerce.string(),
  station: z.coerce.number().int().positive(),
  measurement: z.string().min(1).optional(),
});

export function summarizeTool(service: WeatherService): ToolDef {
  return {
    name: "weather.summarize_v1",
    description:
      "Summarize a daily measurement (default TG, daily mean temperature) for one station between " +
      "start_date and end_date inclusive. Values are converted to physical units and missing (-9999) " +
      "days are excluded; statistics are omitted when no valid day exists. TG summaries also report " +
      "min_tn_c (lowest daily minimum, TN) and max_tx_c (highest daily maximum, TX).",
    inputSchema: {
      type: "object",
      properties: {
        start_date: { type: "string", description: "Start date, YYYYMMDD", pattern: "^\\d{8}$" },
        end_date: { type: "string", description: "End date, YYYYMMDD (inclusive)", pattern: "^\\d{8}$" },
        station: { type: "number", description: "Station id (see weather.list_stations_v1)" },
        measurement: { type: "string", description: `Measurement code (default ${DEFAULT_MEASUREMENT})` },
      },
      required: ["start_date", "end_date", "station"],
    },
    async handler(args) {
      const parsed = parseArgs(Args, args);
      if (!parsed.ok) return parsed.result;
      const { start_date, end_date, station, measurement } = parsed.data;
      try {
        return ok(await service.summarize(start_date, end_date, station, measurement ?? DEFAULT_MEASUREMENT));
      } catch (e) {
        return toolError("weather.summarize_v1", e);
      }
    },
  };
}
