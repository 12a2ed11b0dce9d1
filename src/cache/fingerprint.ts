// Canonical fingerprints: "<operation>:<scope>:<sha256 of canonical JSON>"
import { createHash } from "crypto";

export function sha256Hex(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

/** JSON with object keys sorted and undefined members dropped. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => (v === undefined ? "null" : canonicalJson(v))).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalJson(v)}`).join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

// The readable prefix lets operators invalidate e.g. every "trend:320:" entry.
export function fingerprint(operation: string, scope: string | number | null, payload: unknown): string {
  return `${operation}:${scope ?? "-"}:${sha256Hex(canonicalJson(payload))}`;
}
