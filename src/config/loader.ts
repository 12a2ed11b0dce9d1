// Config file loading + environment validation
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

const CONFIG_DIR = fileURLToPath(new URL("../../configs/", import.meta.url));

export type YamlSection = Record<string, string>;

export function loadYaml(pathOrName: string): Record<string, YamlSection> {
  const path = pathOrName.includes("/") ? pathOrName : `${CONFIG_DIR}${pathOrName}`;
  const raw = readFileSync(path, "utf-8");
  return parseSimpleYaml(raw);
}

function unquote(value: string): string {
  const v = value.trim();
  if (v.length >= 2 && (v[0] === '"' || v[0] === "'") && v[v.length - 1] === v[0]) {
    return v.slice(1, -1);
  }
  return v;
}

/**
 * Minimal YAML parser for sectioned key-value configs.
 * Handles the schema registry layout without pulling in a full YAML lib.
 */
export function parseSimpleYaml(text: string): Record<string, YamlSection> {
  const result: Record<string, YamlSection> = {};
  let currentSection: string | null = null;
  let currentObj: YamlSection = {};

  for (const line of text.split("\n")) {
    const trimmed = line.trimEnd();
    if (!trimmed || trimmed.trimStart().startsWith("#")) continue;

    // Top-level key (no indent)
    if (!line.startsWith(" ") && !line.startsWith("\t") && trimmed.endsWith(":")) {
      if (currentSection !== null) {
        result[currentSection] = currentObj;
      }
      currentSection = trimmed.slice(0, -1).trim();
      currentObj = {};
      continue;
    }

    // Indented key: value
    const match = trimmed.match(/^\s+([^\s:]+):\s*(.+)$/);
    if (match && currentSection !== null) {
      currentObj[unquote(match[1])] = unquote(match[2]);
    }
  }

  if (currentSection !== null) {
    result[currentSection] = currentObj;
  }

  return result;
}

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  WEATHER_DB_HOST: z.string().min(1).default("localhost"),
  WEATHER_DB_PORT: z.coerce.number().int().min(1).max(65535).default(8812),
  WEATHER_DB_USER: z.string().min(1).default("admin"),
  WEATHER_DB_PASSWORD: z.string().default("quest"),
  WEATHER_DB_NAME: z.string().min(1).default("qdb"),
  WEATHER_DB_DIALECT: z.enum(["questdb", "postgres"]).default("questdb"),
  QUERY_TIMEOUT_MS: intFromEnv(10_000),
  BUSY_RETRY_BACKOFF_MS: intFromEnv(100),
  CACHE_TTL_MS: intFromEnv(300_000),
  CACHE_MAX_ENTRIES: intFromEnv(1000),
  AUDIT_ILP_ADDR: z
    .string()
    .regex(/^[^\s:]+:\d+$/, "expected host:port")
    .optional(),
  SCHEMA_CONFIG: z.string().min(1).default("schema.yaml"),
});

export type SqlDialect = "questdb" | "postgres";

export interface ServiceConfig {
  storage: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
    dialect: SqlDialect;
  };
  queryTimeoutMs: number;
  busyRetryBackoffMs: number;
  cacheTtlMs: number;
  cacheMaxEntries: number;
  auditIlpAddr?: string;
  schemaConfig: string;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  return {
    storage: {
      host: e.WEATHER_DB_HOST,
      port: e.WEATHER_DB_PORT,
      user: e.WEATHER_DB_USER,
      password: e.WEATHER_DB_PASSWORD,
      database: e.WEATHER_DB_NAME,
      dialect: e.WEATHER_DB_DIALECT,
    },
    queryTimeoutMs: e.QUERY_TIMEOUT_MS,
    busyRetryBackoffMs: e.BUSY_RETRY_BACKOFF_MS,
    cacheTtlMs: e.CACHE_TTL_MS,
    cacheMaxEntries: e.CACHE_MAX_ENTRIES,
    auditIlpAddr: e.AUDIT_ILP_ADDR,
    schemaConfig: e.SCHEMA_CONFIG,
  };
}
