// weather.list_stations: station ids present in the store
import type { WeatherService } from "../../services/weather-service.js";
import { ok, toolError, type ToolDef } from "../../types/tools.js";

export function listStationsTool(service: WeatherService): ToolDef {
  return {
    name: "weather.list_stations_v1",
    description: "List the station ids available in the weather store, in ascending order.",
    inputSchema: {
      type: "object",
      properties: {},
      required: [],
    },
    async handler() {
      try {
        const stations = await service.listStations();
        return ok({ stations, count: stations.length });
      } catch (e) {
        return toolError("weather.list_stations_v1", e);
      }
    },
  };
}
