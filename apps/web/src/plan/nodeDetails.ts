import { formatBytes, formatDurationMs, formatNumber } from "../utils/format";
import type { PlanNode } from "./types";

export type NodeDetailRow = { label: string; value: string };

function humanizeKey(key: string): string {
  const spaced = key.replace(/([A-Z])/g, " $1").toLowerCase();
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

export function formatFieldValue(value: unknown): string {
  if (value == null) return "-";
  if (typeof value === "string") return value.trim() || "-";
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "boolean") return value ? "yes" : "no";
  if (Array.isArray(value)) {
    return value.length > 0 ? value.map((v) => formatFieldValue(v)).join(", ") : "-";
  }
  if (typeof value === "object") {
    return Object.values(value)
      .filter((v) => v != null)
      .map((v) => String(v))
      .join(" ");
  }
  return String(value);
}

/** Every field, annotation and metric of a node as label/value rows. */
export function buildNodeDetailRows(node: PlanNode): NodeDetailRow[] {
  const rows: NodeDetailRow[] = [
    { label: "Operator", value: node.operator || "-" },
    { label: "Kind", value: node.kind },
    { label: "Node", value: String(node.id) },
    { label: "Depth", value: String(node.depth) },
  ];
  if (node.engineId != null) rows.push({ label: "Engine id", value: node.engineId });
  if (node.codegenStageId != null) {
    rows.push({ label: "Codegen stage", value: String(node.codegenStageId) });
  }

  const fieldEntries: Array<[string, unknown]> = Object.entries(node.fields);
  for (const [key, value] of fieldEntries) {
    if (key === "kind") continue;
    rows.push({ label: humanizeKey(key), value: formatFieldValue(value) });
  }

  const stats = node.stageStats;
  if (stats) {
    rows.push({ label: "Query stage", value: formatFieldValue(stats.stageId) });
    rows.push({ label: "Stage rows", value: formatNumber(stats.rowCount) });
    rows.push({ label: "Stage size", value: formatBytes(stats.sizeInBytes) });
  }

  const m = node.metrics;
  if (m) {
    rows.push({ label: "Rows output", value: formatNumber(m.rowsOutput) });
    rows.push({ label: "Spill size", value: formatBytes(m.spillSizeBytes) });
    rows.push({ label: "Duration", value: formatDurationMs(m.durationMs) });
    for (const [key, value] of Object.entries(m.raw)) {
      rows.push({ label: `Metric: ${key}`, value: formatNumber(value) });
    }
  }

  return rows;
}
