// Station series, aggregates and trend payloads
import { z } from "zod";

/** One station-day. Raw values are scaled integers; the sentinel or null means missing. */
export interface DailyObservation {
  station: number;
  date: string;
  values: Readonly<Record<string, number | null>>;
}

// Statistics are absent (never 0, never the sentinel) when sample_count is 0.
export const AggregateRowSchema = z.object({
  station: z.number().int(),
  year: z.number().int(),
  mean_c: z.number().optional(),
  min_c: z.number().optional(),
  max_c: z.number().optional(),
  sample_count: z.number().int().nonnegative(),
  missing_count: z.number().int().nonnegative(),
  rejected_count: z.number().int().nonnegative(),
});
export type AggregateRow = z.infer<typeof AggregateRowSchema>;

export const TrendResultSchema = z.object({
  station: z.number().int(),
  measurement: z.string(),
  start_year: z.number().int(),
  end_year: z.number().int(),
  slope_c_per_year: z.number(),
  slope_per_decade: z.number(),
  intercept: z.number(),
  r_squared: z.number(),
  years_used: z.number().int(),
  slope_stderr: z.number().optional(),
  residual_std: z.number().optional(),
});
export type TrendResult = z.infer<typeof TrendResultSchema>;

export const TrendReportSchema = z.object({
  unit: z.string(),
  trend: TrendResultSchema,
  /** Every year in range, gaps included with sample_count 0. */
  years: z.array(AggregateRowSchema),
});
export type TrendReport = z.infer<typeof TrendReportSchema>;

export const SummaryResultSchema = z.object({
  station: z.number().int(),
  measurement: z.string(),
  unit: z.string(),
  start_date: z.string(),
  end_date: z.string(),
  mean: z.number().optional(),
  min: z.number().optional(),
  max: z.number().optional(),
  sample_count: z.number().int().nonnegative(),
  missing_count: z.number().int().nonnegative(),
  rejected_count: z.number().int().nonnegative(),
  // Temperature summaries: coldest daily minimum (TN) and hottest daily maximum (TX)
  min_tn_c: z.number().optional(),
  max_tx_c: z.number().optional(),
});
export type SummaryResult = z.infer<typeof SummaryResultSchema>;

export const StationListSchema = z.array(z.number().int());
