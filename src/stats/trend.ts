// Ordinary least squares trend of yearly means
import { InsufficientDataError, InvalidArgumentError } from "../errors.js";
import type { AggregateRow, TrendResult } from "../types/weather.js";

export type TrendFit = Omit<TrendResult, "station" | "measurement">;

export interface TrendOptions {
  /** Years with fewer valid samples are left out of the fit. */
  minSamples?: number;
}

/**
 * Fits mean_c = intercept + slope * year over [startYear, endYear], using only
 * years with at least `minSamples` (default 1) valid samples. Sums accumulate
 * sequentially in year order, so identical input gives identical output.
 */
export function fitTrend(
  rows: readonly AggregateRow[],
  startYear: number,
  endYear: number,
  options: TrendOptions = {},
): TrendFit {
  if (!Number.isInteger(startYear) || !Number.isInteger(endYear) || startYear > endYear) {
    throw new InvalidArgumentError(`year range ${startYear}-${endYear} is not valid`);
  }
  const minSamples = Math.max(1, options.minSamples ?? 1);

  const points: Array<{ x: number; y: number }> = [];
  for (const row of [...rows].sort((a, b) => a.year - b.year)) {
    if (row.year < startYear || row.year > endYear) continue;
    if (row.sample_count < minSamples || row.mean_c === undefined) continue;
    points.push({ x: row.year, y: row.mean_c });
  }

  const n = points.length;
  if (n < 2) throw new InsufficientDataError(n, startYear, endYear);

  let sumX = 0;
  let sumY = 0;
  for (const p of points) {
    sumX += p.x;
    sumY += p.y;
  }
  const xBar = sumX / n;
  const yBar = sumY / n;

  let sxx = 0;
  let sxy = 0;
  let ssTot = 0;
  for (const p of points) {
    const dx = p.x - xBar;
    const dy = p.y - yBar;
    sxx += dx * dx;
    sxy += dx * dy;
    ssTot += dy * dy;
  }

  const slope = sxy / sxx;
  const intercept = yBar - slope * xBar;

  let ssRes = 0;
  for (const p of points) {
    const r = p.y - (intercept + slope * p.x);
    ssRes += r * r;
  }

  // A flat series is fitted exactly by a flat line
  const rSquared = ssTot === 0 ? 1 : Math.min(1, Math.max(0, 1 - ssRes / ssTot));

  const fit: TrendFit = {
    start_year: startYear,
    end_year: endYear,
    slope_c_per_year: slope,
    slope_per_decade: slope * 10,
    intercept,
    r_squared: rSquared,
    years_used: n,
  };
  if (n > 2) {
    const residualStd = Math.sqrt(ssRes / (n - 2));
    fit.residual_std = residualStd;
    fit.slope_stderr = residualStd / Math.sqrt(sxx);
  }
  return fit;
}
