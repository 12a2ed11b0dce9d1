// weather.trend: linear trend of yearly means
import { z } from "zod";
import { DEFAULT_MEASUREMENT, type WeatherService } from "../../services/weather-service.js";
import { ok, parseArgs, toolError, type ToolDef } from "../../types/tools.js";

const Args = z.object({
  start_year: z.coerce.number().int(),
  end_year: z.coerce.number().int(),
  station: z.coerce.number().int().positive(),
  measurement: z.string().min(1).optional(),
  min_samples: z.coerce.number().int().positive().optional(),
});

export function trendTool(service: WeatherService): ToolDef {
  return {
    name: "weather.trend_v1",
    description:
      "Fit an ordinary least squares trend to the yearly means of a measurement (default TG) for one " +
      "station. Returns slope per year and per decade, intercept, r_squared, years_used, and every " +
      "year in range; years without valid samples are reported with sample_count 0 and left out of the fit.",
    inputSchema: {
      type: "object",
      properties: {
        start_year: { type: "number", description: "First year (inclusive)" },
        end_year: { type: "number", description: "Last year (inclusive)" },
        station: { type: "number", description: "Station id (see weather.list_stations_v1)" },
        measurement: { type: "string", description: `Measurement code (default ${DEFAULT_MEASUREMENT})` },
        min_samples: {
          type: "number",
          description: "Minimum valid days for a year to enter the fit (default 1)",
          minimum: 1,
        },
      },
      required: ["start_year", "end_year", "station"],
    },
    async handler(args) {
      const parsed = parseArgs(Args, args);
      if (!parsed.ok) return parsed.result;
      const { start_year, end_year, station, measurement, min_samples } = parsed.data;
      try {
        const report = await service.trend(
          start_year,
          end_year,
          station,
          measurement ?? DEFAULT_MEASUREMENT,
          min_samples ?? 1,
        );
        return ok(report);
      } catch (e) {
        return toolError("weather.trend_v1", e);
      }
    },
  };
}
