import { asObject, parseJsonText, toInvalidDataMessage } from "./payload";
import type { MetricsSource, RawMetrics } from "./types";

const SUBJECT = "metrics";

function parseRawMetrics(value: unknown): RawMetrics {
  const obj = asObject(value);
  if (!obj) {
    throw new Error(toInvalidDataMessage(SUBJECT, "expected an object of metric values", value));
  }
  const out: RawMetrics = {};
  for (const [k, v] of Object.entries(obj)) {
    if (typeof v === "number" || typeof v === "string") out[k] = v;
  }
  return out;
}

function parseMetricsRecord(value: unknown): Record<string, RawMetrics> {
  const obj = asObject(value);
  if (!obj) {
    throw new Error(toInvalidDataMessage(SUBJECT, "expected an object keyed by operator", value));
  }
  const out: Record<string, RawMetrics> = {};
  for (const [k, v] of Object.entries(obj)) out[k] = parseRawMetrics(v);
  return out;
}

/**
 * Accepts `{ keyBy, metrics }`, a bare object keyed by engine id, or a bare
 * array in traversal order. `null` means a static plan.
 */
export function parseMetricsSource(value: unknown): MetricsSource | null {
  if (value == null) return null;
  if (Array.isArray(value)) return { keyBy: "traversalOrder", metrics: value.map(parseRawMetrics) };

  const obj = asObject(value);
  if (!obj) {
    throw new Error(toInvalidDataMessage(SUBJECT, "expected an object or an array", value));
  }
  if (!("keyBy" in obj)) return { keyBy: "engineId", metrics: parseMetricsRecord(obj) };

  if (obj.keyBy === "engineId") return { keyBy: "engineId", metrics: parseMetricsRecord(obj.metrics) };
  if (obj.keyBy === "traversalOrder") {
    const metrics = Array.isArray(obj.metrics)
      ? obj.metrics.map(parseRawMetrics)
      : parseMetricsRecord(obj.metrics);
    return { keyBy: "traversalOrder", metrics };
  }
  throw new Error(
    toInvalidDataMessage(SUBJECT, 'expected keyBy "engineId" or "traversalOrder"', obj.keyBy)
  );
}

export function parseMetricsText(text: string): MetricsSource | null {
  if (!text.trim()) return null;
  return parseMetricsSource(parseJsonText(SUBJECT, text));
}
