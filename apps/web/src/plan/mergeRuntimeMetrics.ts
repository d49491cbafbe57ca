import { parseNumberLike } from "./textUtils";
import type {
  MetricsSource,
  PlanNode,
  PlanNodeMetrics,
  PlanTree,
  RawMetricValue,
  RawMetrics,
} from "./types";

const ROWS_ALIASES = ["number of output rows", "numOutputRows", "rowsOutput", "outputRows", "rows"];
const SPILL_ALIASES = ["spill size", "spillSize", "spillSizeBytes", "spilled bytes"];
const DURATION_ALIASES = [
  "duration",
  "durationMs",
  "total time",
  "time",
  "scan time",
  "sort time",
  "time in aggregation build",
];

const BYTE_FACTORS: Record<string, number> = {
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

const DURATION_FACTORS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  ms: 1,
  s: 1000,
  sec: 1000,
  m: 60_000,
  min: 60_000,
  h: 3_600_000,
};

const leadingValueRe = /^(-?\d[\d,]*(?:\.\d+)?)\s*([A-Za-z]+)?/;

/**
 * Reads a raw metric value: a number, or an engine-formatted string such as
 * `"1,024"`, `"10.0 MiB"`, `"2.5 s"` or a `total (min, med, max)` block whose
 * total sits on the last line. Sizes come back in bytes, times in ms.
 */
export function parseMetricValue(v: RawMetricValue): number | null {
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const lines = v.split("\n").map((l) => l.trim()).filter(Boolean);
  const last = lines[lines.length - 1];
  if (!last) return null;
  const m = last.match(leadingValueRe);
  if (!m) return null;
  const n = parseNumberLike(m[1]);
  if (n == null) return null;
  const unit = m[2]?.toLowerCase();
  if (!unit) return n;
  const byteFactor = BYTE_FACTORS[unit];
  if (byteFactor != null) return Math.round(n * byteFactor);
  const durationFactor = DURATION_FACTORS[unit];
  if (durationFactor != null) return n * durationFactor;
  return n;
}

function pickAlias(raw: Record<string, number>, aliases: readonly string[]): number | null {
  const byLowerKey = new Map(Object.entries(raw).map(([k, v]) => [k.trim().toLowerCase(), v]));
  for (const alias of aliases) {
    const v = byLowerKey.get(alias.toLowerCase());
    if (v != null) return v;
  }
  return null;
}

export function normalizeMetrics(input: RawMetrics): PlanNodeMetrics {
  const raw: Record<string, number> = {};
  for (const [k, v] of Object.entries(input)) {
    const n = parseMetricValue(v);
    if (n != null) raw[k] = n;
  }
  return {
    rowsOutput: pickAlias(raw, ROWS_ALIASES),
    spillSizeBytes: pickAlias(raw, SPILL_ALIASES),
    durationMs: pickAlias(raw, DURATION_ALIASES),
    raw,
  };
}

function resolveMetricsByNodeId(
  tree: PlanTree,
  source: MetricsSource
): { byNodeId: Map<number, RawMetrics>; unmatched: number } {
  const byNodeId = new Map<number, RawMetrics>();
  let unmatched = 0;

  if (source.keyBy === "engineId") {
    const byEngineId = new Map<string, number>();
    for (const n of tree.nodes) {
      if (n.engineId != null && !byEngineId.has(n.engineId)) byEngineId.set(n.engineId, n.id);
    }
    for (const [engineId, metrics] of Object.entries(source.metrics)) {
      const id = byEngineId.get(engineId.trim());
      if (id == null) unmatched++;
      else byNodeId.set(id, metrics);
    }
    return { byNodeId, unmatched };
  }

  const entries: Array<[string, RawMetrics]> = Array.isArray(source.metrics)
    ? source.metrics.map((m, i) => [String(i), m])
    : Object.entries(source.metrics);
  for (const [ordinal, metrics] of entries) {
    const id = /^\d+$/.test(ordinal.trim()) ? Number(ordinal) : null;
    if (id == null || !tree.byId.has(id)) unmatched++;
    else byNodeId.set(id, metrics);
  }
  return { byNodeId, unmatched };
}

function cloneWithMetrics(
  node: PlanNode,
  metricsById: Map<number, PlanNodeMetrics>,
  out: PlanNode[]
): PlanNode {
  const copy: PlanNode = {
    ...node,
    metrics: metricsById.get(node.id) ?? node.metrics,
    children: [],
  };
  out[copy.id] = copy;
  copy.children = node.children.map((c) => cloneWithMetrics(c, metricsById, out));
  return copy;
}

/**
 * Returns a copy of `tree` with runtime metrics attached. A missing source
 * leaves the plan static; entries that match no node are counted in a warning.
 */
export function mergeRuntimeMetrics(
  tree: PlanTree,
  source: MetricsSource | null | undefined
): PlanTree {
  if (!source) return tree;

  const { byNodeId, unmatched } = resolveMetricsByNodeId(tree, source);
  const metricsById = new Map<number, PlanNodeMetrics>();
  for (const [id, raw] of byNodeId) metricsById.set(id, normalizeMetrics(raw));

  const nodes: PlanNode[] = [];
  const root = cloneWithMetrics(tree.root, metricsById, nodes);
  const warnings = [...tree.warnings];
  if (unmatched > 0) warnings.push(`metrics for ${unmatched} operator(s) matched no plan node`);

  return {
    ...tree,
    root,
    nodes,
    byId: new Map(nodes.map((n) => [n.id, n])),
    edges: tree.edges.map((e) => ({ ...e })),
    warnings,
  };
}
