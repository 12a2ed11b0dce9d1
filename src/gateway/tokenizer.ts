// SQL tokenizer for the query gateway. Comments are dropped; literals stay verbatim.

export type TokenType = "word" | "number" | "string" | "quoted" | "param" | "punct" | "semicolon";

export interface Token {
  type: TokenType;
  text: string;
  /** Upper-cased text for words, the raw text otherwise. */
  norm: string;
  /** Whitespace or a comment separated this token from the previous one. */
  spaceBefore: boolean;
}

export type TokenizeResult =
  | { ok: true; tokens: Token[] }
  | { ok: false; reason: string };

const isSpace = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\f" || c === "\v";
const isDigit = (c: string) => c >= "0" && c <= "9";
const isWordStart = (c: string) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
const isWordPart = (c: string) => isWordStart(c) || isDigit(c) || c === "$";

// Scans a quoted run starting at `start` (the opening quote). Doubled quotes escape;
// backslashes escape too when `backslash` is set (E'...' strings).
function scanQuoted(sql: string, start: number, quote: string, backslash: boolean): number {
  let i = start + 1;
  while (i < sql.length) {
    const c = sql[i];
    if (backslash && c === "\\") {
      i += 2;
      continue;
    }
    if (c === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return -1;
}

// Block comments nest: each /* needs its own */.
function scanBlockComment(sql: string, start: number): number {
  let depth = 0;
  let i = start;
  while (i < sql.length) {
    if (sql[i] === "/" && sql[i + 1] === "*") {
      depth++;
      i += 2;
    } else if (sql[i] === "*" && sql[i + 1] === "/") {
      depth--;
      i += 2;
      if (depth === 0) return i;
    } else {
      i++;
    }
  }
  return -1;
}

// $$ or $tag$; the tag follows identifier rules without a $.
const DOLLAR_TAG = /^\$(?:[A-Za-z_][A-Za-z0-9_]*)?\$/;

export function tokenize(sql: string): TokenizeResult {
  const tokens: Token[] = [];
  let spaceBefore = false;
  let i = 0;

  const push = (type: TokenType, text: string) => {
    tokens.push({ type, text, norm: type === "word" ? text.toUpperCase() : text, spaceBefore });
    spaceBefore = false;
  };

  while (i < sql.length) {
    const c = sql[i];

    if (isSpace(c)) {
      spaceBefore = true;
      i++;
      continue;
    }

    if (c === "-" && sql[i + 1] === "-") {
      const nl = sql.indexOf("\n", i);
      i = nl === -1 ? sql.length : nl + 1;
      spaceBefore = true;
      continue;
    }

    if (c === "/" && sql[i + 1] === "*") {
      const end = scanBlockComment(sql, i);
      if (end === -1) return { ok: false, reason: "unterminated block comment" };
      i = end;
      spaceBefore = true;
      continue;
    }

    if (c === "'") {
      const prev = tokens[tokens.length - 1];
      const escaped = prev !== undefined && !spaceBefore && prev.type === "word" && prev.norm === "E";
      const end = scanQuoted(sql, i, "'", escaped);
      if (end === -1) return { ok: false, reason: "unterminated string literal" };
      push("string", sql.slice(i, end));
      i = end;
      continue;
    }

    if (c === '"' || c === "`") {
      const end = scanQuoted(sql, i, c, false);
      if (end === -1) return { ok: false, reason: "unterminated quoted identifier" };
      push("quoted", sql.slice(i, end));
      i = end;
      continue;
    }

    if (isDigit(c) || (c === "." && isDigit(sql[i + 1] ?? ""))) {
      const m = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/.exec(sql.slice(i));
      const text = m ? m[0] : c;
      push("number", text);
      i += text.length;
      continue;
    }

    if (isWordStart(c)) {
      let j = i + 1;
      while (j < sql.length && isWordPart(sql[j])) j++;
      push("word", sql.slice(i, j));
      i = j;
      continue;
    }

    if (c === "$" && isDigit(sql[i + 1] ?? "")) {
      let j = i + 1;
      while (j < sql.length && isDigit(sql[j])) j++;
      push("param", sql.slice(i, j));
      i = j;
      continue;
    }

    if (c === "$") {
      const tag = DOLLAR_TAG.exec(sql.slice(i));
      if (!tag) return { ok: false, reason: "unexpected character $" };
      const close = sql.indexOf(tag[0], i + tag[0].length);
      if (close === -1) return { ok: false, reason: "unterminated dollar-quoted string" };
      const end = close + tag[0].length;
      push("string", sql.slice(i, end));
      i = end;
      continue;
    }

    if (c === ";") {
      push("semicolon", c);
      i++;
      continue;
    }

    push("punct", c);
    i++;
  }

  return { ok: true, tokens };
}

/** Re-joins tokens, collapsing every whitespace/comment gap to one space. */
export function render(tokens: readonly Token[]): string {
  return tokens.map((t, i) => (i > 0 && t.spaceBefore ? " " : "") + t.text).join("");
}

export function unquoteIdentifier(token: Token): string {
  if (token.type !== "quoted") return token.text;
  const q = token.text[0];
  return token.text.slice(1, -1).split(q + q).join(q);
}
