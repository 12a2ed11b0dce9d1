// PG-wire storage backend (QuestDB or PostgreSQL) for station tables
import pg from "pg";
import { errorMessage } from "../errors.js";
import type { QueryParam } from "../types/query.js";
import { type StorageBackend, StorageError, type StorageResult } from "./storage.js";

// SQLSTATE codes: lock_not_available, serialization_failure, deadlock_detected,
// too_many_connections, cannot_connect_now, object_in_use
const BUSY_CODES: ReadonlySet<string> = new Set(["55P03", "40001", "40P01", "53300", "57P03", "55006"]);
const BUSY_SOCKET_CODES: ReadonlySet<string> = new Set(["ECONNRESET", "ETIMEDOUT", "EPIPE"]);
const QUERY_CANCELED = "57014";

const INT2_OID = 21;
const INT4_OID = 23;
const INT8_OID = 20;
const NUMERIC_OID = 1700;

export function classifyPgError(e: unknown): StorageError {
  const code = typeof e === "object" && e !== null && "code" in e && typeof e.code === "string" ? e.code : undefined;
  const message = errorMessage(e);

  if (code !== undefined) {
    if (BUSY_CODES.has(code) || BUSY_SOCKET_CODES.has(code)) return new StorageError("busy", message, { cause: e, code });
    if (code === QUERY_CANCELED) return new StorageError("timeout", message, { cause: e, code });
    // class 42: syntax error or access rule violation; class 22: data exception
    if (code.startsWith("42") || code.startsWith("22")) return new StorageError("syntax", message, { cause: e, code });
  }
  if (/timeout/i.test(message)) return new StorageError("timeout", message, { cause: e, code });
  return new StorageError("failure", message, { cause: e, code });
}

// 64-bit integers and numerics arrive as strings; QuestDB LONG columns included.
// Integers beyond 2^53 stay strings.
export function fromPg(value: unknown, typeId: number | undefined): unknown {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string" && (typeId === INT8_OID || typeId === NUMERIC_OID || typeId === INT2_OID || typeId === INT4_OID)) {
    const n = Number(value);
    if (!Number.isFinite(n)) return value;
    if (Number.isInteger(n) && !Number.isSafeInteger(n)) return value;
    return n;
  }
  return value;
}

export interface PgStorageOptions {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  statementTimeoutMs: number;
  maxConnections?: number;
}

export class PgStorage implements StorageBackend {
  private pool: pg.Pool | null = null;

  constructor(private readonly options: PgStorageOptions) {}

  private getPool(): pg.Pool {
    if (!this.pool) {
      this.pool = new pg.Pool({
        host: this.options.host,
        port: this.options.port,
        user: this.options.user,
        password: this.options.password,
        database: this.options.database,
        max: this.options.maxConnections ?? 4,
        statement_timeout: this.options.statementTimeoutMs,
        connectionTimeoutMillis: this.options.statementTimeoutMs,
      });
      // Idle client errors would otherwise crash the process
      this.pool.on("error", (err) => {
        console.error("[storage] Idle connection error:", err.message);
      });
    }
    return this.pool;
  }

  async run(statement: string, params: readonly QueryParam[], signal?: AbortSignal): Promise<StorageResult> {
    if (signal?.aborted) throw new StorageError("timeout", "query cancelled before start");

    let client: pg.PoolClient;
    try {
      client = await this.getPool().connect();
    } catch (e) {
      throw classifyPgError(e);
    }

    // Destroying the checked-out connection is the only cancel pg offers per query.
    let released = false;
    const onAbort = () => {
      if (released) return;
      released = true;
      client.release(new Error("query cancelled"));
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    // Extended protocol: the server refuses multi-statement text even without params.
    const query: pg.QueryArrayConfig<QueryParam[]> & { queryMode: "extended" } = {
      text: statement,
      values: [...params],
      rowMode: "array",
      queryMode: "extended",
    };

    try {
      const result = await client.query(query);
      const typeIds = result.fields.map((f) => f.dataTypeID);
      return {
        columns: result.fields.map((f) => f.name),
        rows: result.rows.map((row: unknown[]) => row.map((v, i) => fromPg(v, typeIds[i]))),
      };
    } catch (e) {
      if (signal?.aborted) throw new StorageError("timeout", "query cancelled", { cause: e });
      throw classifyPgError(e);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      if (!released) {
        released = true;
        client.release();
      }
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
