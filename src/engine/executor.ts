// Execution engine: runs validated QuerySpecs with a wall-clock timeout and one busy retry
import { setTimeout as delay } from "timers/promises";
import { type StorageBackend, StorageError, type StorageResult } from "../bridge/storage.js";
import { ExecutionError, type ExecutionErrorKind, errorMessage } from "../errors.js";
import type { CellValue, QuerySpec, ResultSet } from "../types/query.js";

export interface ExecutorOptions {
  timeoutMs: number;
  busyRetryBackoffMs: number;
}

const KIND_BY_REASON: Record<StorageError["reason"], ExecutionErrorKind> = {
  busy: "StorageBusy",
  timeout: "Timeout",
  syntax: "SyntaxRejectedByEngine",
  failure: "StorageFailure",
};

function toExecutionError(e: unknown): ExecutionError {
  if (e instanceof ExecutionError) return e;
  if (e instanceof StorageError) return new ExecutionError(KIND_BY_REASON[e.reason], e.message, { cause: e });
  return new ExecutionError("StorageFailure", errorMessage(e), { cause: e });
}

export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  switch (typeof value) {
    case "number":
      return Number.isFinite(value) ? value : null;
    case "string":
    case "boolean":
      return value;
    case "bigint":
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
  }
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value.toString("base64");
  return JSON.stringify(value);
}

export class ExecutionEngine {
  constructor(
    private readonly storage: StorageBackend,
    private readonly options: ExecutorOptions,
  ) {}

  async execute(spec: QuerySpec): Promise<ResultSet> {
    const start = Date.now();
    const raw = await this.runWithRetry(spec);
    const rows = raw.rows.slice(0, spec.limit).map((row) => row.map(toCell));
    return {
      columns: raw.columns,
      rows,
      row_count: rows.length,
      truncated: rows.length >= spec.limit,
      elapsed_ms: Date.now() - start,
    };
  }

  private async runWithRetry(spec: QuerySpec): Promise<StorageResult> {
    try {
      return await this.runOnce(spec);
    } catch (e) {
      if (!(e instanceof StorageError) || e.reason !== "busy") throw toExecutionError(e);
      console.error(`[engine] Storage busy (${e.message}), retrying once in ${this.options.busyRetryBackoffMs}ms`);
    }
    await delay(this.options.busyRetryBackoffMs);
    try {
      return await this.runOnce(spec);
    } catch (e) {
      throw toExecutionError(e);
    }
  }

  private async runOnce(spec: QuerySpec): Promise<StorageResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Settle the race before aborting; storage may reject on abort with its own error
        reject(new StorageError("timeout", `query exceeded ${this.options.timeoutMs}ms`));
        controller.abort();
      }, this.options.timeoutMs);
    });
    try {
      return await Promise.race([this.storage.run(spec.statement, spec.params, controller.signal), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
