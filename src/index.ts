#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { IlpAuditSink } from "./bridge/questdb-ilp.js";
import { loadServiceConfig } from "./config/loader.js";
import { errorMessage } from "./errors.js";
import { SchemaRegistry } from "./schema/registry.js";
import { createServer } from "./server.js";
import { WeatherService } from "./services/weather-service.js";
import { createTools } from "./tools/registry.js";

async function main() {
  const config = loadServiceConfig();
  const registry = SchemaRegistry.load(config.schemaConfig);
  const service = WeatherService.fromConfig(config, registry);
  const audit = config.auditIlpAddr ? new IlpAuditSink(config.auditIlpAddr) : undefined;
  if (!audit) console.error("[audit] AUDIT_ILP_ADDR not set, audit trail disabled");

  const tools = createTools(service);
  const server = createServer(tools, { audit });

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;
    console.error(`[server] ${signal} received, shutting down`);
    const results = await Promise.allSettled([server.close(), service.close(), audit?.close()]);
    for (const r of results) {
      if (r.status === "rejected") console.error("[server] Shutdown error:", errorMessage(r.reason));
    }
    process.exit(0);
  };
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(
    `[server] ${tools.size} tools ready (${config.storage.dialect} at ${config.storage.host}:${config.storage.port})`,
  );
}

main().catch((e) => {
  console.error("[server] Fatal:", errorMessage(e));
  process.exit(1);
});
