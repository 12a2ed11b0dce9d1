// Weather service: gateway, cache, engine and statistics behind the tool operations
import { PgStorage } from "../bridge/pg-storage.js";
import { type StorageBackend, isMissingTable } from "../bridge/storage.js";
import { type CacheStore, LruCacheStore } from "../cache/cache-store.js";
import { fingerprint } from "../cache/fingerprint.js";
import { type CacheStats, QueryCache } from "../cache/query-cache.js";
import type { ServiceConfig, SqlDialect } from "../config/loader.js";
import { ExecutionEngine } from "../engine/executor.js";
import { ExecutionError, InvalidArgumentError, errorMessage } from "../errors.js";
import { DEFAULT_LIMIT, QueryGateway } from "../gateway/query-gateway.js";
import { distinctStations, pingStatement, stationScan } from "../gateway/statements.js";
import { daysInclusive, parseDateLiteral, yearRange } from "../schema/dates.js";
import type { MeasurementSpec, SchemaRegistry, StationTable } from "../schema/registry.js";
import { aggregateYearly, summarizeValues, valuePolicy } from "../stats/aggregate.js";
import { fitTrend } from "../stats/trend.js";
import { type CellValue, type ResultSet, ResultSetSchema } from "../types/query.js";
import {
  type DailyObservation,
  StationListSchema,
  type SummaryResult,
  SummaryResultSchema,
  type TrendReport,
  TrendReportSchema,
} from "../types/weather.js";

export const DEFAULT_MEASUREMENT = "TG";

// Daily mean temperature summaries also report the extremes of these columns.
const DAILY_MIN_TEMPERATURE = "TN";
const DAILY_MAX_TEMPERATURE = "TX";

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

export interface WeatherServiceDeps {
  registry: SchemaRegistry;
  storage: StorageBackend;
  cache: QueryCache;
  engine: ExecutionEngine;
  dialect: SqlDialect;
}

export interface ServiceHealth {
  status: "healthy" | "degraded";
  storage: { status: "healthy" | "unhealthy"; latency_ms: number; error?: string };
  cache: CacheStats;
}

function toNumber(cell: CellValue): number | null {
  if (cell === null) return null;
  if (typeof cell === "number") return cell;
  if (typeof cell === "string" && cell.trim() !== "") return Number(cell);
  // Unparseable values stay numeric (NaN) so the aggregation counts them as rejected
  return Number.NaN;
}

// Station scans select [date, ...codes]
function toObservations(result: ResultSet, station: number, codes: readonly string[]): DailyObservation[] {
  return result.rows.map((row) => ({
    station,
    date: String(row[0]),
    values: Object.fromEntries(codes.map((code, i) => [code, toNumber(row[i + 1] ?? null)])),
  }));
}

export class WeatherService {
  readonly gateway: QueryGateway;
  private readonly registry: SchemaRegistry;
  private readonly storage: StorageBackend;
  private readonly cache: QueryCache;
  private readonly engine: ExecutionEngine;
  private readonly dialect: SqlDialect;

  constructor(deps: WeatherServiceDeps) {
    this.registry = deps.registry;
    this.storage = deps.storage;
    this.cache = deps.cache;
    this.engine = deps.engine;
    this.dialect = deps.dialect;
    this.gateway = new QueryGateway({ dialect: deps.dialect, registry: deps.registry });
  }

  static fromConfig(
    config: ServiceConfig,
    registry: SchemaRegistry,
    overrides: { storage?: StorageBackend; store?: CacheStore } = {},
  ): WeatherService {
    const storage =
      overrides.storage ??
      new PgStorage({
        host: config.storage.host,
        port: config.storage.port,
        user: config.storage.user,
        password: config.storage.password,
        database: config.storage.database,
        statementTimeoutMs: config.queryTimeoutMs,
      });
    const store = overrides.store ?? new LruCacheStore(config.cacheMaxEntries);
    return new WeatherService({
      registry,
      storage,
      cache: new QueryCache(store, { ttlMs: config.cacheTtlMs }),
      engine: new ExecutionEngine(storage, {
        timeoutMs: config.queryTimeoutMs,
        busyRetryBackoffMs: config.busyRetryBackoffMs,
      }),
      dialect: config.storage.dialect,
    });
  }

  /** Read-only statement through the gateway; the raw path for ad-hoc analysis. */
  async runQuery(sql: string, limit: number = DEFAULT_LIMIT, offset: number = 0): Promise<ResultSet> {
    const validated = this.gateway.validate(sql, limit, offset);
    if (!validated.ok) throw validated.error;
    const spec = validated.spec;
    const key = fingerprint("query", null, { statement: spec.statement, params: spec.params, limit, offset });
    return this.cache.getOrCompute(key, ResultSetSchema, () => this.engine.execute(spec));
  }

  /** Distinct station ids across registered tables, ascending. */
  async listStations(): Promise<number[]> {
    const tables = this.registry.stationTables();
    const key = fingerprint("stations", null, { tables: tables.map((t) => t.table) });
    return this.cache.getOrCompute(key, StationListSchema, async () => {
      const ids = new Set<number>();
      for (const table of tables) {
        let result: ResultSet;
        try {
          result = await this.engine.execute(distinctStations(this.registry, this.dialect, table));
        } catch (e) {
          if (!(e instanceof ExecutionError && isMissingTable(e.cause))) throw e;
          console.error(`[service] Skipping station table ${table.table}: ${e.message}`);
          continue;
        }
        for (const row of result.rows) {
          const id = toNumber(row[0] ?? null);
          if (id !== null && Number.isSafeInteger(id)) ids.add(id);
        }
      }
      return Array.from(ids).sort((a, b) => a - b);
    });
  }

  async summarize(
    startDate: string,
    endDate: string,
    station: number,
    measurementCode: string = DEFAULT_MEASUREMENT,
  ): Promise<SummaryResult> {
    const from = parseDateLiteral(startDate);
    const to = parseDateLiteral(endDate);
    if (from === null) throw new InvalidArgumentError(`start_date "${startDate}" is not a valid YYYYMMDD date`);
    if (to === null) throw new InvalidArgumentError(`end_date "${endDate}" is not a valid YYYYMMDD date`);
    if (to < from) throw new InvalidArgumentError("end_date must be on or after start_date");

    const table = this.stationTable(station);
    const measurement = this.measurement(measurementCode);
    const extremes = this.temperatureExtremes(measurement);
    const columns = extremes ? [measurement, extremes.low, extremes.high] : [measurement];
    const spec = stationScan(this.registry, this.dialect, {
      station: table,
      measurements: columns,
      fromDate: startDate,
      toDate: endDate,
      days: daysInclusive(from, to),
    });
    const key = fingerprint("summarize", station, { statement: spec.statement, params: spec.params });

    return this.cache.getOrCompute(key, SummaryResultSchema, async () => {
      const sentinel = this.registry.sentinel;
      const rows = toObservations(await this.engine.execute(spec), station, columns.map((m) => m.code));
      const summary: SummaryResult = {
        station,
        measurement: measurement.code,
        unit: measurement.unit,
        start_date: startDate,
        end_date: endDate,
        ...summarizeValues(rows, valuePolicy(measurement, sentinel)),
      };
      if (extremes) {
        summary.min_tn_c = summarizeValues(rows, valuePolicy(extremes.low, sentinel)).min;
        summary.max_tx_c = summarizeValues(rows, valuePolicy(extremes.high, sentinel)).max;
      }
      return summary;
    });
  }

  async trend(
    startYear: number,
    endYear: number,
    station: number,
    measurementCode: string = DEFAULT_MEASUREMENT,
    minSamples: number = 1,
  ): Promise<TrendReport> {
    for (const [name, year] of [["start_year", startYear], ["end_year", endYear]] as const) {
      if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
        throw new InvalidArgumentError(`${name} must be an integer year, got ${year}`);
      }
    }
    if (endYear < startYear) throw new InvalidArgumentError("end_year must be on or after start_year");
    if (!Number.isInteger(minSamples) || minSamples < 1) {
      throw new InvalidArgumentError(`min_samples must be a positive integer, got ${minSamples}`);
    }

    const table = this.stationTable(station);
    const measurement = this.measurement(measurementCode);
    const range = yearRange(startYear, endYear);
    const days = daysInclusive(Date.UTC(startYear, 0, 1), Date.UTC(endYear, 11, 31));
    const spec = stationScan(this.registry, this.dialect, {
      station: table,
      measurements: [measurement],
      fromDate: range.from,
      toDate: range.to,
      days,
    });
    const key = fingerprint("trend", station, { statement: spec.statement, params: spec.params, minSamples });

    return this.cache.getOrCompute(key, TrendReportSchema, async () => {
      const rows = toObservations(await this.engine.execute(spec), station, [measurement.code]);
      const years = aggregateYearly(rows, valuePolicy(measurement, this.registry.sentinel), {
        station,
        fromYear: startYear,
        toYear: endYear,
      });
      const fit = fitTrend(years, startYear, endYear, { minSamples });
      return { unit: measurement.unit, trend: { station, measurement: measurement.code, ...fit }, years };
    });
  }

  describeSchema() {
    return this.registry.describe();
  }

  invalidate(prefix = ""): Promise<number> {
    return this.cache.invalidate(prefix);
  }

  async health(): Promise<ServiceHealth> {
    const start = Date.now();
    let storage: ServiceHealth["storage"];
    try {
      await this.engine.execute(pingStatement());
      storage = { status: "healthy", latency_ms: Date.now() - start };
    } catch (e) {
      storage = { status: "unhealthy", latency_ms: Date.now() - start, error: errorMessage(e) };
    }
    const cache = await this.cache.stats();
    return { status: storage.status === "healthy" ? "healthy" : "degraded", storage, cache };
  }

  close(): Promise<void> {
    return this.storage.close();
  }

  private stationTable(station: number): StationTable {
    const table = this.registry.station(station);
    if (!table) {
      throw new InvalidArgumentError(
        `unknown station ${station}; registered stations: ${this.registry.stationIds().join(", ")}`,
      );
    }
    return table;
  }

  // TN/TX companions of the daily mean temperature, when the schema registers both
  private temperatureExtremes(
    measurement: MeasurementSpec,
  ): { low: MeasurementSpec; high: MeasurementSpec } | undefined {
    if (measurement.code !== DEFAULT_MEASUREMENT) return undefined;
    const low = this.registry.measurement(DAILY_MIN_TEMPERATURE);
    const high = this.registry.measurement(DAILY_MAX_TEMPERATURE);
    return low && high ? { low, high } : undefined;
  }

  private measurement(code: string): MeasurementSpec {
    const m = this.registry.measurement(code);
    if (!m) {
      throw new InvalidArgumentError(`unknown measurement "${code}"; see schema.describe for available codes`);
    }
    return m;
  }
}
