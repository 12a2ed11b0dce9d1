import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { StorageError } from "../src/bridge/storage.js";
import { ExecutionEngine, toCell } from "../src/engine/executor.js";
import { ExecutionError } from "../src/errors.js";
import type { QuerySpec } from "../src/types/query.js";
import { FakeStorage } from "./helpers/fake-storage.js";

const spec = (limit = 200): QuerySpec => ({
  statement: "SELECT TG FROM etmgeg_320 LIMIT 200",
  params: [],
  limit,
  offset: 0,
  origin: "user",
  tables: ["etmgeg_320"],
});

const options = { timeoutMs: 1000, busyRetryBackoffMs: 1 };

async function executionError(promise: Promise<unknown>): Promise<ExecutionError> {
  try {
    await promise;
  } catch (e) {
    if (e instanceof ExecutionError) return e;
    throw e;
  }
  throw new Error("expected an ExecutionError");
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("toCell", () => {
  it("maps storage values to typed cells", () => {
    expect(toCell(5)).toBe(5);
    expect(toCell("a")).toBe("a");
    expect(toCell(true)).toBe(true);
    expect(toCell(undefined)).toBeNull();
    expect(toCell(Number.NaN)).toBeNull();
    expect(toCell(Number.POSITIVE_INFINITY)).toBeNull();
    expect(toCell(10n)).toBe(10);
    expect(toCell(2n ** 64n)).toBe("18446744073709551616");
    expect(toCell(new Date(0))).toBe("1970-01-01T00:00:00.000Z");
    expect(toCell({ a: 1 })).toBe('{"a":1}');
  });
});

describe("ExecutionEngine", () => {
  it("returns typed rows with column names", async () => {
    const storage = new FakeStorage({}, async () => ({ columns: ["YYYYMMDD", "TG"], rows: [["19900101", 50], ["19900102", null]] }));
    const result = await new ExecutionEngine(storage, options).execute(spec());
    expect(result.columns).toEqual(["YYYYMMDD", "TG"]);
    expect(result.rows).toEqual([["19900101", 50], ["19900102", null]]);
    expect(result.row_count).toBe(2);
    expect(result.truncated).toBe(false);
    expect(storage.calls[0].statement).toBe("SELECT TG FROM etmgeg_320 LIMIT 200");
  });

  it("caps rows at the limit and flags truncation", async () => {
    const storage = new FakeStorage({}, async () => ({ columns: ["n"], rows: [[1], [2], [3]] }));
    const result = await new ExecutionEngine(storage, options).execute(spec(2));
    expect(result.rows).toEqual([[1], [2]]);
    expect(result.truncated).toBe(true);
  });

  it("retries a busy store exactly once", async () => {
    const storage = new FakeStorage({}, async () => ({ columns: ["n"], rows: [[1]] }));
    storage.failures.push(new StorageError("busy", "lock not available"));
    const result = await new ExecutionEngine(storage, options).execute(spec());
    expect(result.rows).toEqual([[1]]);
    expect(storage.calls).toHaveLength(2);
  });

  it("surfaces StorageBusy when the retry is busy too", async () => {
    const storage = new FakeStorage({}, async () => ({ columns: ["n"], rows: [[1]] }));
    storage.failures.push(new StorageError("busy", "lock"), new StorageError("busy", "lock"));
    const e = await executionError(new ExecutionEngine(storage, options).execute(spec()));
    expect(e.kind).toBe("StorageBusy");
    expect(e.userMessage).toBe("Query failed: the weather store is busy, try again shortly");
    expect(storage.calls).toHaveLength(2);
  });

  it("does not retry syntax errors", async () => {
    const storage = new FakeStorage({}, async () => ({ columns: [], rows: [] }));
    storage.failures.push(new StorageError("syntax", 'column "XX" does not exist'));
    const e = await executionError(new ExecutionEngine(storage, options).execute(spec()));
    expect(e.kind).toBe("SyntaxRejectedByEngine");
    expect(e.userMessage).toBe('Query failed: column "XX" does not exist');
    expect(storage.calls).toHaveLength(1);
  });

  it("maps unknown storage errors to StorageFailure with a generic message", async () => {
    const storage = new FakeStorage({}, async () => {
      throw new Error("connect ECONNREFUSED 10.0.0.1:8812");
    });
    const e = await executionError(new ExecutionEngine(storage, options).execute(spec()));
    expect(e.kind).toBe("StorageFailure");
    expect(e.userMessage).toBe("Query failed: the weather store is unavailable");
  });

  it("times out and aborts the storage call", async () => {
    const storage = new FakeStorage({}, (_statement, _params, signal) =>
      new Promise((_, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted by caller")));
      }),
    );
    const e = await executionError(new ExecutionEngine(storage, { timeoutMs: 20, busyRetryBackoffMs: 1 }).execute(spec()));
    expect(e.kind).toBe("Timeout");
    expect(e.message).toBe("query exceeded 20ms");
    expect(storage.calls[0].signal?.aborted).toBe(true);
  });
});
