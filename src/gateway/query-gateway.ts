// Query gateway: validates, canonicalizes and bounds read-only statements
import type { SqlDialect } from "../config/loader.js";
import { RejectionError, type RejectionKind } from "../errors.js";
import { sha256Hex } from "../cache/fingerprint.js";
import type { SchemaRegistry } from "../schema/registry.js";
import type { QuerySpec } from "../types/query.js";
import { checkTableAccess, scanTables, tableDeniedMessage } from "./table-access.js";
import { type Token, render, tokenize } from "./tokenizer.js";

export const DEFAULT_LIMIT = 200;
export const MAX_LIMIT = 10_000;

const READ_VERB = "SELECT";

// Write, DDL and session-altering keywords; never valid in a read-only statement
const FORBIDDEN_KEYWORDS: ReadonlySet<string> = new Set([
  "INSERT", "UPDATE", "DELETE", "DROP", "CREATE", "ALTER", "TRUNCATE", "GRANT", "REVOKE",
  "ATTACH", "DETACH", "PRAGMA", "COPY", "VACUUM", "REINDEX", "INTO", "MERGE", "RENAME",
  "CALL", "EXEC", "EXECUTE", "SET", "BACKUP", "SNAPSHOT", "LOCK", "UPSERT", "REPLACE",
]);

// Keywords that are also scalar functions, allowed only in call position: replace(s, a, b)
const CALLABLE_KEYWORDS: ReadonlySet<string> = new Set(["REPLACE"]);

function findForbiddenKeyword(tokens: readonly Token[]): Token | undefined {
  return tokens.find(
    (t, i) =>
      t.type === "word" &&
      FORBIDDEN_KEYWORDS.has(t.norm) &&
      !(CALLABLE_KEYWORDS.has(t.norm) && tokens[i + 1]?.text === "("),
  );
}

export type GatewayResult =
  | { ok: true; spec: QuerySpec }
  | { ok: false; error: RejectionError };

export interface GatewayOptions {
  dialect: SqlDialect;
  /** When set, FROM/JOIN sources must be registered station tables. */
  registry?: SchemaRegistry;
  maxLimit?: number;
}

/** Renders the bound clause in the storage dialect (QuestDB's LIMIT lo, hi is a row range). */
export function renderBound(dialect: SqlDialect, limit: number, offset: number): string {
  if (dialect === "questdb") {
    return offset > 0 ? `LIMIT ${offset}, ${offset + limit}` : `LIMIT ${limit}`;
  }
  return offset > 0 ? `LIMIT ${limit} OFFSET ${offset}` : `LIMIT ${limit}`;
}

const isIntLiteral = (t: Token | undefined): t is Token => t?.type === "number" && /^\d+$/.test(t.text);

interface TrailingBound {
  body: Token[];
  limit: number;
  offset: number;
}

// Matches a trailing top-level "LIMIT n" or "LIMIT n OFFSET m" with integer literals.
function splitTrailingBound(tokens: Token[]): TrailingBound | null {
  const n = tokens.length;
  const a = tokens[n - 4];
  const b = tokens[n - 3];
  const c = tokens[n - 2];
  const d = tokens[n - 1];
  if (a?.norm === "LIMIT" && isIntLiteral(b) && c?.norm === "OFFSET" && isIntLiteral(d)) {
    return { body: tokens.slice(0, n - 4), limit: Number(b.text), offset: Number(d.text) };
  }
  if (c?.norm === "LIMIT" && isIntLiteral(d)) {
    return { body: tokens.slice(0, n - 2), limit: Number(d.text), offset: 0 };
  }
  return null;
}

function hasTopLevelBound(tokens: readonly Token[]): boolean {
  let depth = 0;
  for (const t of tokens) {
    if (t.type === "punct" && t.text === "(") depth++;
    else if (t.type === "punct" && t.text === ")") depth--;
    else if (depth === 0 && t.type === "word" && (t.norm === "LIMIT" || t.norm === "OFFSET")) return true;
  }
  return false;
}

export class QueryGateway {
  private readonly dialect: SqlDialect;
  private readonly registry?: SchemaRegistry;
  private readonly maxLimit: number;

  constructor(options: GatewayOptions) {
    this.dialect = options.dialect;
    this.registry = options.registry;
    this.maxLimit = options.maxLimit ?? MAX_LIMIT;
  }

  validate(rawStatement: string, limit: number = DEFAULT_LIMIT, offset: number = 0): GatewayResult {
    const result = this.check(rawStatement, limit, offset);
    if (!result.ok) {
      console.error(
        `[gateway] rejected ${result.error.kind}: ${result.error.reason} (statement sha256=${sha256Hex(rawStatement)})`,
      );
    }
    return result;
  }

  private check(rawStatement: string, limit: number, offset: number): GatewayResult {
    const reject = (kind: RejectionKind, reason: string): GatewayResult => ({
      ok: false,
      error: new RejectionError(kind, reason),
    });

    const lexed = tokenize(rawStatement);
    if (!lexed.ok) return reject("Malformed", lexed.reason);

    const tokens = lexed.tokens;
    if (tokens[tokens.length - 1]?.type === "semicolon") tokens.pop();
    if (tokens.length === 0) return reject("Malformed", "empty statement");

    if (tokens.some((t) => t.type === "semicolon")) {
      return reject("MultiStatement", "only a single statement is allowed");
    }

    const first = tokens[0];
    if (first.type !== "word" || first.norm !== READ_VERB) {
      return reject("NotReadOnly", `statement must start with ${READ_VERB}`);
    }

    const forbidden = findForbiddenKeyword(tokens);
    if (forbidden) {
      return reject("NotReadOnly", `keyword ${forbidden.norm} is not allowed`);
    }

    const scan = scanTables(tokens);
    if (scan.forbiddenCalls.length > 0) {
      return reject("NotReadOnly", `function ${scan.forbiddenCalls[0]}() is not allowed`);
    }
    if (this.registry) {
      const access = checkTableAccess(this.registry, scan);
      if (!access.allowed) return reject("UnknownTable", tableDeniedMessage(access.denied ?? []));
    }

    if (!Number.isInteger(limit) || limit < 1 || limit > this.maxLimit) {
      return reject("LimitOutOfRange", `limit must be an integer in [1, ${this.maxLimit}], got ${limit}`);
    }
    if (!Number.isSafeInteger(offset) || offset < 0) {
      return reject("OffsetOutOfRange", `offset must be a non-negative integer, got ${offset}`);
    }

    tokens[0] = { ...first, text: READ_VERB };
    return {
      ok: true,
      spec: {
        statement: this.bound(tokens, limit, offset),
        params: [],
        limit,
        offset,
        origin: "user",
        tables: Array.from(new Set(scan.tables)),
      },
    };
  }

  // The caller's window is applied inside the statement's own window, never widening it.
  private bound(tokens: Token[], limit: number, offset: number): string {
    const trailing = splitTrailingBound(tokens);
    if (trailing && !hasTopLevelBound(trailing.body)) {
      const effectiveLimit = Math.min(limit, Math.max(0, trailing.limit - offset));
      const effectiveOffset = trailing.offset + offset;
      return `${render(trailing.body)} ${renderBound(this.dialect, effectiveLimit, effectiveOffset)}`;
    }
    if (!hasTopLevelBound(tokens)) {
      return `${render(tokens)} ${renderBound(this.dialect, limit, offset)}`;
    }
    return `SELECT * FROM (${render(tokens)}) AS bounded ${renderBound(this.dialect, limit, offset)}`;
  }
}
