import type { PlanNodeMetrics } from "../plan/types";

const MISSING = "-";

const integerFormat = new Intl.NumberFormat("en-US");

type Step = { unit: string; factor: number };

const BYTE_STEPS: readonly Step[] = ["B", "KB", "MB", "GB", "TB"].map((unit, i) => ({
  unit,
  factor: 1024 ** i,
}));

const DURATION_STEPS: readonly Step[] = [
  { unit: "s", factor: 1000 },
  { unit: "min", factor: 60_000 },
  { unit: "h", factor: 3_600_000 },
];

function isPresent(n: number | null | undefined): n is number {
  return n != null && Number.isFinite(n);
}

/** Largest step the value reaches, or the first one. */
function pickStep(value: number, steps: readonly Step[]): Step {
  let picked = steps[0];
  for (const step of steps) {
    if (value >= step.factor) picked = step;
  }
  return picked;
}

export function formatNumber(n: number | null | undefined): string {
  return isPresent(n) ? integerFormat.format(n) : MISSING;
}

export function formatBytes(n: number | null | undefined): string {
  if (!isPresent(n)) return MISSING;
  const step = pickStep(n, BYTE_STEPS);
  return `${(n / step.factor).toFixed(1)} ${step.unit}`;
}

export function formatDurationMs(ms: number | null | undefined): string {
  if (!isPresent(ms)) return MISSING;
  if (ms < 1000) return `${ms.toFixed(0)} ms`;
  const step = pickStep(ms, DURATION_STEPS);
  return `${(ms / step.factor).toFixed(2)} ${step.unit}`;
}

/** One-line rows / spill / time summary used on exported cards. */
export function formatMetricsLine(m: PlanNodeMetrics): string {
  return [
    `rows ${formatNumber(m.rowsOutput)}`,
    `spill ${formatBytes(m.spillSizeBytes)}`,
    `time ${formatDurationMs(m.durationMs)}`,
  ].join(" · ");
}

export function truncateEnd(s: string, max: number): string {
  return s.length <= max ? s : `${s.slice(0, Math.max(0, max - 3))}...`;
}
