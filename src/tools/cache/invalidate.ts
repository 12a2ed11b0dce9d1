// cache.invalidate: drop cached results by fingerprint prefix
import { z } from "zod";
import type { WeatherService } from "../../services/weather-service.js";
import { ok, parseArgs, toolError, type ToolDef } from "../../types/tools.js";

const Args = z.object({
  prefix: z.string().optional(),
});

export function cacheInvalidateTool(service: WeatherService): ToolDef {
  return {
    name: "cache.invalidate_v1",
    description:
      "Invalidate cached results. Keys look like <operation>:<station>:<digest>, e.g. \"trend:320:\" " +
      "drops all trend results for station 320; omit prefix to clear everything.",
    inputSchema: {
      type: "object",
      properties: {
        prefix: { type: "string", description: "Fingerprint prefix (default: all entries)" },
      },
      required: [],
    },
    async handler(args) {
      const parsed = parseArgs(Args, args);
      if (!parsed.ok) return parsed.result;
      const prefix = parsed.data.prefix ?? "";
      try {
        const removed = await service.invalidate(prefix);
        return ok({ prefix, removed });
      } catch (e) {
        return toolError("cache.invalidate_v1", e);
      }
    },
  };
}
