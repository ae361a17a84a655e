const SIMPLE_ESCAPES: Record<string, string> = {
  n: "\n",
  r: "\r",
  t: "\t",
  a: "\x07",
  b: "\b",
  f: "\f",
  v: "\v",
  '"': '"',
  "'": "'",
  "?": "?",
  "\\": "\\",
};

const OCTAL = /^[0-7]{1,3}/;
const HEX = /^[0-9a-fA-F]{1,2}/;

export type EscapeIssueKind = "unknown-escape" | "trailing-backslash";

export interface EscapeIssue {
  kind: EscapeIssueKind;
  /** Offset of the backslash in the raw text. */
  offset: number;
  sequence: string;
}

export interface Unescaped {
  value: string;
  issues: EscapeIssue[];
}

/**
 * Decode the C-style escapes of one quoted PO fragment.
 * Unknown sequences are kept as written.
 */
export function unescapePo(raw: string): Unescaped {
  if (!raw.includes("\\")) return { value: raw, issues: [] };

  let value = "";
  const issues: EscapeIssue[] = [];
  let pos = 0;

  while (pos < raw.length) {
    const ch = raw[pos];
    if (ch !== "\\") {
      value += ch;
      pos++;
      continue;
    }
    if (pos + 1 >= raw.length) {
      issues.push({ kind: "trailing-backslash", offset: pos, sequence: "\\" });
      value += "\\";
      pos++;
      continue;
    }
    const step = decodeEscape(raw, pos);
    if (step) {
      value += step.text;
      pos += step.length;
    } else {
      const sequence = raw.slice(pos, pos + 2);
      issues.push({ kind: "unknown-escape", offset: pos, sequence });
      value += sequence;
      pos += 2;
    }
  }

  return { value, issues };
}

/** Length in the raw text of the escape at `pos`, and what it decodes to. */
function decodeEscape(raw: string, pos: number): { text: string; length: number } | null {
  const next = raw[pos + 1];
  const simple = SIMPLE_ESCAPES[next];
  if (simple !== undefined) return { text: simple, length: 2 };

  const rest = raw.slice(pos + 1);
  const octal = OCTAL.exec(rest);
  if (octal) {
    return { text: String.fromCharCode(parseInt(octal[0], 8)), length: 1 + octal[0].length };
  }
  if (next === "x") {
    const hex = HEX.exec(rest.slice(1));
    if (hex) {
      return { text: String.fromCharCode(parseInt(hex[0], 16)), length: 2 + hex[0].length };
    }
  }
  return null;
}

/**
 * Map an offset in the unescaped value of `raw` back to an offset in `raw`.
 */
export function rawOffset(raw: string, valueOffset: number): number {
  let pos = 0;
  let produced = 0;
  while (pos < raw.length && produced < valueOffset) {
    if (raw[pos] !== "\\" || pos + 1 >= raw.length) {
      pos++;
      produced++;
      continue;
    }
    const step = decodeEscape(raw, pos);
    if (step) {
      pos += step.length;
      produced += step.text.length;
    } else {
      pos += 2;
      produced += 2;
    }
  }
  return pos;
}

const DISPLAY_ESCAPES: Record<string, string> = {
  "\\": "\\\\",
  '"': '\\"',
  "\n": "\\n",
  "\r": "\\r",
  "\t": "\\t",
  "\x07": "\\a",
  "\b": "\\b",
  "\f": "\\f",
  "\v": "\\v",
};

/** Escape one character for display inside a PO quoted string. */
export function escapeChar(ch: string): string {
  return DISPLAY_ESCAPES[ch] ?? ch;
}

export function escapePo(value: string): string {
  let out = "";
  for (const ch of value) out += escapeChar(ch);
  return out;
}
