// Storage backend contract consumed by the execution engine
import type { QueryParam } from "../types/query.js";

export type StorageFailureReason = "busy" | "timeout" | "syntax" | "failure";

export class StorageError extends Error {
  /** Backend error code (SQLSTATE for PG-wire stores), when one was reported. */
  readonly code: string | undefined;

  constructor(
    readonly reason: StorageFailureReason,
    message: string,
    options?: { cause?: unknown; code?: string },
  ) {
    super(message, { cause: options?.cause });
    this.name = "StorageError";
    this.code = options?.code;
  }
}

const UNDEFINED_TABLE = "42P01";
// PostgreSQL: relation "x" does not exist; QuestDB: table does not exist [table=x]
const MISSING_TABLE_MESSAGE = /relation "[^"]*" does not exist|table does not exist/i;

/** True when the store reported that the queried table is absent. */
export function isMissingTable(e: unknown): boolean {
  if (!(e instanceof StorageError) || e.reason !== "syntax") return false;
  return e.code === UNDEFINED_TABLE || MISSING_TABLE_MESSAGE.test(e.message);
}

export interface StorageResult {
  columns: string[];
  rows: unknown[][];
}

export interface StorageBackend {
  /** Runs one read statement. Aborting `signal` cancels the operation best-effort. */
  run(statement: string, params: readonly QueryParam[], signal?: AbortSignal): Promise<StorageResult>;
  close(): Promise<void>;
}
