// YYYYMMDD date literals as stored in the station tables
const DATE_LITERAL = /^(\d{4})(\d{2})(\d{2})$/;
const DAY_MS = 86_400_000;

/** Epoch milliseconds of a valid calendar date literal, or null. */
export function parseDateLiteral(text: string): number | null {
  const m = DATE_LITERAL.exec(text);
  if (!m) return null;
  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = Number(m[3]);
  const ms = Date.UTC(year, month - 1, day);
  const d = new Date(ms);
  // Date.UTC rolls 19900230 over into March
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) return null;
  return ms;
}

export function daysInclusive(fromMs: number, toMs: number): number {
  return Math.round((toMs - fromMs) / DAY_MS) + 1;
}

export function yearOf(dateLiteral: string): number {
  return Number(dateLiteral.slice(0, 4));
}

export function yearRange(startYear: number, endYear: number): { from: string; to: string } {
  return { from: `${String(startYear).padStart(4, "0")}0101`, to: `${String(endYear).padStart(4, "0")}1231` };
}
