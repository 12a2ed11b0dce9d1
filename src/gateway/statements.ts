// Parameterized statements for the summary, trend and station paths.
// User values only ever travel as bound params; identifiers come from the registry.
import type { SqlDialect } from "../config/loader.js";
import type { MeasurementSpec, SchemaRegistry, StationTable } from "../schema/registry.js";
import type { QuerySpec } from "../types/query.js";
import { MAX_LIMIT, renderBound } from "./query-gateway.js";

export interface StationScan {
  station: StationTable;
  /** Selected after the date column, in this order. */
  measurements: readonly MeasurementSpec[];
  fromDate: string;
  toDate: string;
  /** At most one row per calendar day. */
  days: number;
}

export function stationScan(registry: SchemaRegistry, dialect: SqlDialect, scan: StationScan): QuerySpec {
  const date = registry.dateColumn;
  const columns = [date, ...scan.measurements.map((m) => m.code)].join(", ");
  const statement =
    `SELECT ${columns} FROM ${scan.station.table} ` +
    `WHERE ${date} BETWEEN $1 AND $2 ORDER BY ${date} ${renderBound(dialect, scan.days, 0)}`;
  return {
    statement,
    params: [scan.fromDate, scan.toDate],
    limit: scan.days,
    offset: 0,
    origin: "internal",
    tables: [scan.station.table],
  };
}

export function distinctStations(registry: SchemaRegistry, dialect: SqlDialect, station: StationTable): QuerySpec {
  const col = registry.stationColumn;
  return {
    statement: `SELECT DISTINCT ${col} FROM ${station.table} ORDER BY ${col} ${renderBound(dialect, MAX_LIMIT, 0)}`,
    params: [],
    limit: MAX_LIMIT,
    offset: 0,
    origin: "internal",
    tables: [station.table],
  };
}

export function pingStatement(): QuerySpec {
  return { statement: "SELECT 1 AS ok", params: [], limit: 1, offset: 0, origin: "internal", tables: [] };
}
