// Schema registry: queryable station tables, measurement units and sentinel
import { z } from "zod";
import { loadYaml, type YamlSection } from "../config/loader.js";

export interface MeasurementSpec {
  code: string;
  divisor: number;
  unit: string;
  description: string;
  /** Plausible range in normalized units; values outside it are rejected as outliers. */
  min?: number;
  max?: number;
}

export interface StationTable {
  station: number;
  name: string;
  table: string;
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const StoreSection = z.object({
  sentinel: z.coerce.number().int().default(-9999),
  station_column: z.string().regex(IDENTIFIER).default("STN"),
  date_column: z.string().regex(IDENTIFIER).default("YYYYMMDD"),
  table_prefix: z.string().regex(IDENTIFIER),
});

const MeasurementSection = z
  .object({
    divisor: z.coerce.number().positive(),
    unit: z.string().min(1),
    description: z.string().default(""),
    min: z.coerce.number().optional(),
    max: z.coerce.number().optional(),
  })
  .refine((m) => m.min === undefined || m.max === undefined || m.min <= m.max, {
    message: "min must not exceed max",
  });

const MEASUREMENT_PREFIX = "measurement.";

export class SchemaRegistry {
  readonly sentinel: number;
  readonly stationColumn: string;
  readonly dateColumn: string;
  private readonly stations: Map<number, StationTable>;
  private readonly tablesByName: Map<string, StationTable>;
  private readonly measurements: Map<string, MeasurementSpec>;
  private readonly extraColumns: Map<string, string>;

  constructor(sections: Record<string, YamlSection>) {
    const store = StoreSection.parse(sections.store ?? {});
    this.sentinel = store.sentinel;
    this.stationColumn = store.station_column;
    this.dateColumn = store.date_column;

    this.stations = new Map();
    this.tablesByName = new Map();
    for (const [id, name] of Object.entries(sections.stations ?? {})) {
      const station = Number(id);
      if (!Number.isSafeInteger(station) || station <= 0) {
        throw new Error(`Invalid station id in schema config: "${id}"`);
      }
      const entry: StationTable = { station, name, table: `${store.table_prefix}${station}` };
      this.stations.set(station, entry);
      this.tablesByName.set(entry.table.toLowerCase(), entry);
    }
    if (this.stations.size === 0) {
      throw new Error("Schema config declares no stations");
    }

    this.measurements = new Map();
    for (const [section, body] of Object.entries(sections)) {
      if (!section.startsWith(MEASUREMENT_PREFIX)) continue;
      const code = section.slice(MEASUREMENT_PREFIX.length);
      if (!IDENTIFIER.test(code)) {
        throw new Error(`Invalid measurement code in schema config: "${code}"`);
      }
      const parsed = MeasurementSection.safeParse(body);
      if (!parsed.success) {
        throw new Error(`Invalid measurement "${code}": ${parsed.error.issues.map((i) => i.message).join("; ")}`);
      }
      this.measurements.set(code.toUpperCase(), { code: code.toUpperCase(), ...parsed.data });
    }

    this.extraColumns = new Map(
      Object.entries(sections.columns ?? {}).map(([col, desc]) => [col.toUpperCase(), desc]),
    );
  }

  static load(pathOrName = "schema.yaml"): SchemaRegistry {
    return new SchemaRegistry(loadYaml(pathOrName));
  }

  /** Station ids in ascending order. */
  stationIds(): number[] {
    return Array.from(this.stations.keys()).sort((a, b) => a - b);
  }

  stationTables(): StationTable[] {
    return this.stationIds().map((id) => this.stations.get(id)).filter((t): t is StationTable => t !== undefined);
  }

  station(id: number): StationTable | undefined {
    return this.stations.get(id);
  }

  hasTable(name: string): boolean {
    return this.tablesByName.has(name.toLowerCase());
  }

  measurement(code: string): MeasurementSpec | undefined {
    return this.measurements.get(code.toUpperCase());
  }

  measurementCodes(): string[] {
    return Array.from(this.measurements.keys());
  }

  /** Every column a station table carries. */
  columns(): string[] {
    return [this.stationColumn, this.dateColumn, ...this.measurements.keys(), ...this.extraColumns.keys()];
  }

  hasColumn(name: string): boolean {
    const upper = name.toUpperCase();
    return this.columns().some((c) => c.toUpperCase() === upper);
  }

  describe() {
    return {
      sentinel: this.sentinel,
      station_column: this.stationColumn,
      date_column: this.dateColumn,
      date_format: "YYYYMMDD (text)",
      stations: this.stationTables(),
      measurements: Array.from(this.measurements.values()),
      other_columns: Array.from(this.extraColumns, ([column, description]) => ({ column, description })),
    };
  }
}
