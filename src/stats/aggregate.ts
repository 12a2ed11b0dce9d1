// Yearly and period aggregation with unit normalization and missing-value policy
import { yearOf } from "../schema/dates.js";
import type { MeasurementSpec } from "../schema/registry.js";
import type { AggregateRow, DailyObservation } from "../types/weather.js";

export interface ValuePolicy {
  code: string;
  divisor: number;
  sentinel: number;
  /** Plausible range in normalized units. */
  min?: number;
  max?: number;
}

export function valuePolicy(measurement: MeasurementSpec, sentinel: number): ValuePolicy {
  return {
    code: measurement.code,
    divisor: measurement.divisor,
    sentinel,
    min: measurement.min,
    max: measurement.max,
  };
}

export interface PeriodStats {
  mean?: number;
  min?: number;
  max?: number;
  sample_count: number;
  missing_count: number;
  rejected_count: number;
}

class Accumulator {
  private sum = 0;
  private lo: number | undefined;
  private hi: number | undefined;
  samples = 0;
  missing = 0;
  rejected = 0;

  constructor(private readonly policy: ValuePolicy) {}

  add(raw: number | null | undefined): void {
    if (raw === null || raw === undefined || raw === this.policy.sentinel) {
      this.missing++;
      return;
    }
    const value = raw / this.policy.divisor;
    const { min, max } = this.policy;
    if (!Number.isFinite(value) || (min !== undefined && value < min) || (max !== undefined && value > max)) {
      this.rejected++;
      return;
    }
    this.sum += value;
    this.samples++;
    if (this.lo === undefined || value < this.lo) this.lo = value;
    if (this.hi === undefined || value > this.hi) this.hi = value;
  }

  result(): PeriodStats {
    const counts = { sample_count: this.samples, missing_count: this.missing, rejected_count: this.rejected };
    if (this.samples === 0) return counts;
    return { mean: this.sum / this.samples, min: this.lo, max: this.hi, ...counts };
  }
}

function yearOfRow(row: DailyObservation): number {
  if (!/^\d{8}$/.test(row.date)) {
    throw new Error(`Malformed date literal "${row.date}" for station ${row.station}`);
  }
  return yearOf(row.date);
}

/** Statistics over every row in order, e.g. a date range. */
export function summarizeValues(rows: readonly DailyObservation[], policy: ValuePolicy): PeriodStats {
  const acc = new Accumulator(policy);
  for (const row of rows) acc.add(row.values[policy.code]);
  return acc.result();
}

export interface YearRange {
  station: number;
  fromYear: number;
  toYear: number;
}

/**
 * One AggregateRow per (station, year), sorted by station then year.
 * With `range`, every year in it is reported for that station, including years
 * without rows, so gaps stay visible instead of being interpolated.
 */
export function aggregateYearly(
  rows: readonly DailyObservation[],
  policy: ValuePolicy,
  range?: YearRange,
): AggregateRow[] {
  const groups = new Map<string, { station: number; year: number; acc: Accumulator }>();
  const group = (station: number, year: number) => {
    const key = `${station}:${year}`;
    let g = groups.get(key);
    if (!g) {
      g = { station, year, acc: new Accumulator(policy) };
      groups.set(key, g);
    }
    return g;
  };

  if (range) {
    for (let year = range.fromYear; year <= range.toYear; year++) group(range.station, year);
  }
  for (const row of rows) {
    const year = yearOfRow(row);
    if (range && (row.station !== range.station || year < range.fromYear || year > range.toYear)) continue;
    group(row.station, year).acc.add(row.values[policy.code]);
  }

  return Array.from(groups.values())
    .sort((a, b) => a.station - b.station || a.year - b.year)
    .map(({ station, year, acc }) => {
      const s = acc.result();
      return {
        station,
        year,
        mean_c: s.mean,
        min_c: s.min,
        max_c: s.max,
        sample_count: s.sample_count,
        missing_count: s.missing_count,
        rejected_count: s.rejected_count,
      };
    });
}
