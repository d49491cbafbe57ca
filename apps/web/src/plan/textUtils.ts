const ATTRIBUTE_ID_RE = /#\d+L?/g;
const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };

export function parseNumberLike(v: string | null | undefined): number | null {
  if (!v) return null;
  const cleaned = v.replace(/[, _]/g, "").trim();
  if (!cleaned) return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

export function stripAttributeIds(s: string): string {
  return s.replace(ATTRIBUTE_ID_RE, "");
}

/** Index of the bracket closing the one at `openIndex`, or -1. */
export function findClosing(text: string, openIndex: number): number {
  const stack: string[] = [];
  let quote: string | null = null;
  for (let i = openIndex; i < text.length; i++) {
    const ch = text[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      continue;
    }
    const close = OPENERS[ch];
    if (close) {
      stack.push(close);
      continue;
    }
    if (stack.length > 0 && ch === stack[stack.length - 1]) {
      stack.pop();
      if (stack.length === 0) return i;
    }
  }
  return -1;
}

export function splitTopLevel(s: string, sep = ","): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let start = 0;
  for (let i = 0; i < s.length; i++) {
    const ch = s[i];
    if (quote) {
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === "'" || ch === '"') quote = ch;
    else if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth = Math.max(0, depth - 1);
    else if (ch === sep && depth === 0) {
      parts.push(s.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(s.slice(start));
  return parts.map((p) => p.trim()).filter(Boolean);
}

/** Contents of the top-level `[...]` groups, in order of appearance. */
export function bracketGroups(text: string): string[] {
  const groups: string[] = [];
  let i = 0;
  while (i < text.length) {
    const open = text.indexOf("[", i);
    if (open < 0) break;
    const close = findClosing(text, open);
    if (close < 0) break;
    groups.push(text.slice(open + 1, close));
    i = close + 1;
  }
  return groups;
}

export function unwrapBrackets(s: string): string {
  const v = s.trim();
  if (v.startsWith("[") && findClosing(v, 0) === v.length - 1) return v.slice(1, -1).trim();
  return v;
}

export function toExpressionList(content: string | null | undefined): string[] {
  if (!content) return [];
  return splitTopLevel(stripAttributeIds(content));
}

/**
 * Finds a bracketed list introduced by `label`, in either the inline form
 * `label=[a, b]` or the formatted-detail form `Label [2]: [a, b]`.
 */
export function findLabeledList(text: string, label: string): string | null {
  const re = new RegExp(`\\b${label}\\s*(?:=|\\[\\d+\\]\\s*:|:)\\s*\\[`, "i");
  const m = re.exec(text);
  if (!m) return null;
  const open = m.index + m[0].length - 1;
  const close = findClosing(text, open);
  if (close < 0) return null;
  return text.slice(open + 1, close);
}

/** Value of a `Label : value` detail line, up to the end of the line. */
export function findLabeledValue(text: string, label: string): string | null {
  const re = new RegExp(`(?:^|\\n)\\s*${label}\\s*:\\s*(.+)`, "i");
  const m = re.exec(text);
  if (!m) return null;
  const v = m[1].trim();
  return v && v.toLowerCase() !== "none" ? v : null;
}

const BYTE_UNITS: Record<string, number> = {
  b: 1,
  kb: 1024,
  kib: 1024,
  mb: 1024 ** 2,
  mib: 1024 ** 2,
  gb: 1024 ** 3,
  gib: 1024 ** 3,
  tb: 1024 ** 4,
  tib: 1024 ** 4,
};

export function parseByteSize(v: string): number | null {
  const m = v.match(/(-?\d[\d,]*(?:\.\d+)?)\s*([KMGT]i?B|B)?\b/i);
  if (!m) return null;
  const n = parseNumberLike(m[1]);
  if (n == null) return null;
  const unit = (m[2] ?? "b").toLowerCase();
  return Math.round(n * (BYTE_UNITS[unit] ?? 1));
}

const DURATION_UNITS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  min: 60_000,
  h: 3_600_000,
};

export function parseDurationMs(v: string): number | null {
  const m = v.match(/(-?\d[\d,]*(?:\.\d+)?)\s*(ms|min|s|m|h)?\b/i);
  if (!m) return null;
  const n = parseNumberLike(m[1]);
  if (n == null) return null;
  const unit = (m[2] ?? "ms").toLowerCase();
  return n * (DURATION_UNITS[unit] ?? 1);
}
