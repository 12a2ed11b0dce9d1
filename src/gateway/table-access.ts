// SQL safety: table whitelisting and function blocklist for the query gateway
import type { SchemaRegistry } from "../schema/registry.js";
import { type Token, unquoteIdentifier } from "./tokenizer.js";

// Words that close a FROM list at the current nesting level
const FROM_LIST_END: ReadonlySet<string> = new Set([
  "WHERE", "GROUP", "ORDER", "HAVING", "LIMIT", "OFFSET", "UNION", "INTERSECT", "EXCEPT",
  "WINDOW", "SAMPLE", "LATEST", "FETCH", "FOR",
]);

// Keywords that may precede "(" without making it a function call
const NON_CALL_WORDS: ReadonlySet<string> = new Set([
  "FROM", "JOIN", "IN", "EXISTS", "AS", "ON", "AND", "OR", "NOT", "SELECT", "WHERE", "ANY", "ALL",
  "SOME", "UNION", "INTERSECT", "EXCEPT", "USING", "OVER", "THEN", "ELSE", "WHEN", "CASE", "BY",
]);

export const FORBIDDEN_FUNCTION_PATTERN = /^(?:pg_|lo_|dblink)|^(?:set_config|nextval|setval|current_setting|query_to_xml|txid_current)$/i;

interface Frame {
  kind: "root" | "call" | "subquery" | "group";
  inFromList: boolean;
}

export interface TableScan {
  tables: string[];
  /** Sources that are not plain table names (table functions). */
  functionSources: string[];
  forbiddenCalls: string[];
}

// Reads a possibly schema-qualified name starting at `i`; returns the last segment.
function readName(tokens: readonly Token[], i: number): { name: string; next: number } | null {
  const first = tokens[i];
  if (!first || (first.type !== "word" && first.type !== "quoted")) return null;
  let name = unquoteIdentifier(first);
  let j = i + 1;
  while (tokens[j]?.text === "." && (tokens[j + 1]?.type === "word" || tokens[j + 1]?.type === "quoted")) {
    name = unquoteIdentifier(tokens[j + 1]);
    j += 2;
  }
  return { name: name.toLowerCase(), next: j };
}

export function scanTables(tokens: readonly Token[]): TableScan {
  const tables: string[] = [];
  const functionSources: string[] = [];
  const forbiddenCalls: string[] = [];
  const frames: Frame[] = [{ kind: "root", inFromList: false }];
  let expectSource = false;

  for (let i = 0; i < tokens.length; i++) {
    const t = tokens[i];
    const frame = frames[frames.length - 1];

    if (expectSource) {
      expectSource = false;
      const ref = t.text === "(" ? null : readName(tokens, i);
      if (ref) {
        if (tokens[ref.next]?.text === "(") functionSources.push(ref.name);
        else tables.push(ref.name);
        i = ref.next - 1;
        continue;
      }
    }

    if (t.type === "punct" && t.text === "(") {
      const prev = tokens[i - 1];
      const next = tokens[i + 1];
      let kind: Frame["kind"] = "group";
      if (next?.norm === "SELECT") kind = "subquery";
      else if (prev && (prev.type === "word" || prev.type === "quoted") && !NON_CALL_WORDS.has(prev.norm)) {
        kind = "call";
        if (FORBIDDEN_FUNCTION_PATTERN.test(unquoteIdentifier(prev))) forbiddenCalls.push(prev.text);
      }
      frames.push({ kind, inFromList: false });
      continue;
    }
    if (t.type === "punct" && t.text === ")") {
      if (frames.length > 1) frames.pop();
      continue;
    }

    if (t.type === "word" && t.norm === "FROM" && frame.kind !== "call") {
      // EXTRACT(x FROM y) and SUBSTRING(x FROM 1) stay inside their call frame
      frame.inFromList = true;
      expectSource = true;
    } else if (t.type === "word" && t.norm === "JOIN") {
      frame.inFromList = true;
      expectSource = true;
    } else if (frame.inFromList && t.text === ",") {
      expectSource = true;
    } else if (frame.inFromList && t.type === "word" && FROM_LIST_END.has(t.norm)) {
      frame.inFromList = false;
    }
  }

  return { tables, functionSources, forbiddenCalls };
}

export interface TableAccessResult {
  allowed: boolean;
  denied?: string[];
}

export function checkTableAccess(registry: SchemaRegistry, scan: TableScan): TableAccessResult {
  const denied = [
    ...scan.tables.filter((t) => !registry.hasTable(t)),
    ...scan.functionSources.map((f) => `${f}()`),
  ];
  return denied.length === 0 ? { allowed: true } : { allowed: false, denied: Array.from(new Set(denied)) };
}

export function tableDeniedMessage(denied: string[]): string {
  return `only registered station tables may be queried; not allowed: ${denied.join(", ")}`;
}
