import { type MockInstance, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { RejectionError } from "../src/errors.js";
import { QueryGateway, renderBound } from "../src/gateway/query-gateway.js";
import { scanTables } from "../src/gateway/table-access.js";
import { tokenize } from "../src/gateway/tokenizer.js";
import { testRegistry } from "./helpers/fake-storage.js";

const registry = testRegistry();
const questdb = new QueryGateway({ dialect: "questdb", registry });
const postgres = new QueryGateway({ dialect: "postgres", registry });

function statementOf(gateway: QueryGateway, sql: string, limit?: number, offset?: number): string {
  const result = gateway.validate(sql, limit, offset);
  if (!result.ok) throw result.error;
  return result.spec.statement;
}

function rejectionOf(sql: string, limit?: number, offset?: number): RejectionError {
  const result = questdb.validate(sql, limit, offset);
  if (result.ok) throw new Error(`expected rejection for: ${sql}`);
  return result.error;
}

let stderr: MockInstance<typeof console.error>;

beforeEach(() => {
  stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  stderr.mockRestore();
});

describe("renderBound", () => {
  it("uses LIMIT lo, hi row ranges for questdb", () => {
    expect(renderBound("questdb", 50, 0)).toBe("LIMIT 50");
    expect(renderBound("questdb", 50, 100)).toBe("LIMIT 100, 150");
  });

  it("uses LIMIT/OFFSET for postgres", () => {
    expect(renderBound("postgres", 50, 0)).toBe("LIMIT 50");
    expect(renderBound("postgres", 50, 100)).toBe("LIMIT 50 OFFSET 100");
  });
});

describe("QueryGateway accepts read-only statements", () => {
  it("appends the default bound", () => {
    expect(statementOf(postgres, "select YYYYMMDD, TG from etmgeg_320")).toBe(
      "SELECT YYYYMMDD, TG from etmgeg_320 LIMIT 200",
    );
  });

  it("renders the caller's offset per dialect", () => {
    expect(statementOf(questdb, "SELECT * FROM etmgeg_320", 50, 100)).toBe("SELECT * FROM etmgeg_320 LIMIT 100, 150");
    expect(statementOf(postgres, "SELECT * FROM etmgeg_320", 50, 100)).toBe(
      "SELECT * FROM etmgeg_320 LIMIT 50 OFFSET 100",
    );
  });

  it("never widens a trailing LIMIT", () => {
    expect(statementOf(postgres, "SELECT * FROM etmgeg_320 LIMIT 10")).toBe("SELECT * FROM etmgeg_320 LIMIT 10");
    expect(statementOf(postgres, "SELECT * FROM etmgeg_320 LIMIT 10", 5, 8)).toBe(
      "SELECT * FROM etmgeg_320 LIMIT 2 OFFSET 8",
    );
    expect(statementOf(questdb, "SELECT * FROM etmgeg_320 LIMIT 10 OFFSET 5")).toBe(
      "SELECT * FROM etmgeg_320 LIMIT 5, 15",
    );
  });

  it("wraps statements whose own bound cannot be rewritten", () => {
    expect(statementOf(questdb, "SELECT * FROM etmgeg_320 LIMIT $1")).toBe(
      "SELECT * FROM (SELECT * FROM etmgeg_320 LIMIT $1) AS bounded LIMIT 200",
    );
  });

  it("leaves LIMIT inside subqueries alone", () => {
    expect(statementOf(questdb, "SELECT * FROM (SELECT * FROM etmgeg_320 LIMIT 5) s")).toBe(
      "SELECT * FROM (SELECT * FROM etmgeg_320 LIMIT 5) s LIMIT 200",
    );
  });

  it("canonicalizes whitespace, comments and a trailing semicolon", () => {
    const a = statementOf(questdb, "SELECT  TG\nFROM etmgeg_320 -- comment");
    const b = statementOf(questdb, "select TG FROM /* c */ etmgeg_320;");
    expect(a).toBe("SELECT TG FROM etmgeg_320 LIMIT 200");
    expect(b).toBe(a);
  });

  it("drops nested block comments whole", () => {
    expect(statementOf(postgres, "SELECT TG /* a /* b */ ; DROP TABLE etmgeg_320 */ FROM etmgeg_320")).toBe(
      "SELECT TG FROM etmgeg_320 LIMIT 200",
    );
  });

  it("returns the bounded query with its referenced tables", () => {
    const result = questdb.validate("SELECT a.TG FROM etmgeg_320 a JOIN etmgeg_240 b ON a.YYYYMMDD = b.YYYYMMDD", 10);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.spec).toMatchObject({ params: [], limit: 10, offset: 0, origin: "user" });
    expect(result.spec.tables).toEqual(["etmgeg_320", "etmgeg_240"]);
  });

  it("accepts keywords inside string literals and quoted or qualified table names", () => {
    expect(questdb.validate("SELECT 'DROP TABLE x; --' AS s FROM etmgeg_320").ok).toBe(true);
    expect(questdb.validate('SELECT * FROM "ETMGEG_320"').ok).toBe(true);
    expect(questdb.validate("SELECT * FROM public.etmgeg_320").ok).toBe(true);
    expect(questdb.validate("SELECT EXTRACT(year FROM ts) FROM etmgeg_320").ok).toBe(true);
  });
});

describe("QueryGateway rejects", () => {
  it("statements that do not start with SELECT", () => {
    const e = rejectionOf("DROP TABLE etmgeg_320");
    expect(e.kind).toBe("NotReadOnly");
    expect(e.userMessage).toBe("Query rejected (NotReadOnly): statement must start with SELECT");
  });

  it("chained statements", () => {
    expect(rejectionOf("SELECT 1; SELECT 2").kind).toBe("MultiStatement");
    expect(rejectionOf("SELECT * FROM etmgeg_320; DROP TABLE etmgeg_320;").kind).toBe("MultiStatement");
  });

  it("statements chained behind dollar-quoted strings", () => {
    const result = postgres.validate("SELECT $$'$$ FROM etmgeg_320; DROP TABLE etmgeg_320; SELECT $$'$$");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("MultiStatement");
  });

  it("statements whose nested block comment is never closed", () => {
    const result = postgres.validate("SELECT TG FROM etmgeg_320 /* a /* b */");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("Malformed");
    expect(result.error.reason).toBe("unterminated block comment");
  });

  it("write keywords anywhere in the statement", () => {
    const e = rejectionOf("SELECT * INTO backup FROM etmgeg_320");
    expect(e.kind).toBe("NotReadOnly");
    expect(e.reason).toBe("keyword INTO is not allowed");
  });

  it("REPLACE as a keyword but not as a string function", () => {
    expect(rejectionOf("REPLACE INTO etmgeg_320 VALUES (1)").kind).toBe("NotReadOnly");
    expect(rejectionOf("SELECT * FROM etmgeg_320 REPLACE x").reason).toBe("keyword REPLACE is not allowed");
    expect(questdb.validate("SELECT replace(YYYYMMDD, '19', '20') FROM etmgeg_320").ok).toBe(true);
  });

  it("blocked functions", () => {
    const e = rejectionOf("SELECT pg_sleep(10)");
    expect(e.kind).toBe("NotReadOnly");
    expect(e.reason).toBe("function pg_sleep() is not allowed");
  });

  it("unregistered tables and table functions", () => {
    expect(rejectionOf("SELECT * FROM secrets").reason).toBe(
      "only registered station tables may be queried; not allowed: secrets",
    );
    expect(rejectionOf("SELECT * FROM etmgeg_320 JOIN etmgeg_999 ON true").reason).toBe(
      "only registered station tables may be queried; not allowed: etmgeg_999",
    );
    expect(rejectionOf("SELECT * FROM (SELECT 1) x, users").kind).toBe("UnknownTable");
    expect(rejectionOf("SELECT * FROM read_parquet('x')").reason).toBe(
      "only registered station tables may be queried; not allowed: read_parquet()",
    );
  });

  it("limits outside [1, 10000]", () => {
    for (const limit of [0, 10_001, 1.5]) {
      expect(rejectionOf("SELECT TG FROM etmgeg_320", limit).kind).toBe("LimitOutOfRange");
    }
    expect(rejectionOf("SELECT TG FROM etmgeg_320", 0).reason).toBe("limit must be an integer in [1, 10000], got 0");
  });

  it("negative offsets", () => {
    const e = rejectionOf("SELECT TG FROM etmgeg_320", 10, -1);
    expect(e.kind).toBe("OffsetOutOfRange");
    expect(e.reason).toBe("offset must be a non-negative integer, got -1");
  });

  it("empty or unlexable input", () => {
    expect(rejectionOf("").reason).toBe("empty statement");
    expect(rejectionOf(" ; ").reason).toBe("empty statement");
    expect(rejectionOf("SELECT 'abc").kind).toBe("Malformed");
  });

  it("and logs the reason with a statement hash", () => {
    rejectionOf("DELETE FROM etmgeg_320");
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toMatch(
      /^\[gateway\] rejected NotReadOnly: statement must start with SELECT \(statement sha256=[0-9a-f]{64}\)$/,
    );
  });
});

describe("scanTables", () => {
  function scan(sql: string) {
    const lexed = tokenize(sql);
    if (!lexed.ok) throw new Error(lexed.reason);
    return scanTables(lexed.tokens);
  }

  it("collects comma-joined sources after a subquery", () => {
    expect(scan("SELECT * FROM (SELECT * FROM etmgeg_240) x, etmgeg_320 y WHERE 1 = 1").tables).toEqual([
      "etmgeg_240",
      "etmgeg_320",
    ]);
  });

  it("does not treat select-list commas as sources", () => {
    expect(scan("SELECT TG, TN FROM etmgeg_320 WHERE TG > 0").tables).toEqual(["etmgeg_320"]);
  });
});
