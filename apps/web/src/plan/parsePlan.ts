import { buildPlanTree } from "./buildPlanTree";
import { isMalformedPlanError } from "./errors";
import { mergeRuntimeMetrics } from "./mergeRuntimeMetrics";
import { normalizePlanText } from "./normalizePlanText";
import type { MetricsSource, PlanParseResult, PlanTree, TextOrder } from "./types";

export interface ParsePlanOptions {
  textOrder?: TextOrder;
  metrics?: MetricsSource | null;
}

/** Runs the whole pipeline. Throws `MalformedPlanError` on unusable input. */
export function parsePlanTree(rawText: string, options: ParsePlanOptions = {}): PlanTree {
  const normalized = normalizePlanText(rawText);
  const tree = buildPlanTree(normalized, { textOrder: options.textOrder });
  return mergeRuntimeMetrics(tree, options.metrics);
}

export function parsePlan(rawText: string, options: ParsePlanOptions = {}): PlanParseResult {
  try {
    const tree = parsePlanTree(rawText, options);
    return { ok: true, rawText, tree, warnings: tree.warnings };
  } catch (e) {
    if (!isMalformedPlanError(e)) throw e;
    return { ok: false, rawText, error: e.message, reason: e.reason };
  }
}
