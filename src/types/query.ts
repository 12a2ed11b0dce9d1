// Query and result-set types shared by gateway, engine and tools
import { z } from "zod";

export type QueryParam = string | number | boolean | null;

/** Typed cell value; storage values are never passed through as opaque strings. */
export const CellValueSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);
export type CellValue = z.infer<typeof CellValueSchema>;

export interface QuerySpec {
  /** Canonical statement, already carrying its bound clause. */
  statement: string;
  params: readonly QueryParam[];
  limit: number;
  offset: number;
  origin: "user" | "internal";
  tables: readonly string[];
}

export const ResultSetSchema = z.object({
  columns: z.array(z.string()),
  rows: z.array(z.array(CellValueSchema)),
  row_count: z.number().int().nonnegative(),
  /** Row count reached the limit; more rows may exist. */
  truncated: z.boolean(),
  elapsed_ms: z.number().nonnegative(),
});
export type ResultSet = z.infer<typeof ResultSetSchema>;
