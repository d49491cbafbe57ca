import type { OperatorKind } from "../types";
import { aggregateRule } from "./aggregate";
import { exchangeRule } from "./exchange";
import { filterRule } from "./filter";
import { joinRule } from "./join";
import { projectRule } from "./project";
import type { OperatorRule } from "./rule";
import { scanRule } from "./scan";
import { sortRule } from "./sort";
import { unionRule } from "./union";
import { windowRule } from "./window";

export type { ClassifyContext, OperatorRule } from "./rule";

export const RULES_BY_KIND: Record<Exclude<OperatorKind, "Unknown">, OperatorRule> = {
  Scan: scanRule,
  Filter: filterRule,
  Join: joinRule,
  Exchange: exchangeRule,
  Aggregate: aggregateRule,
  Sort: sortRule,
  Project: projectRule,
  Window: windowRule,
  Union: unionRule,
};

/** Pattern order matters: the first matching rule wins. */
const PATTERN_ORDER: readonly OperatorRule[] = [
  joinRule,
  exchangeRule,
  aggregateRule,
  scanRule,
];

const RULES_BY_KEYWORD = new Map<string, OperatorRule>(
  Object.values(RULES_BY_KIND).flatMap((rule) => rule.keywords.map((k) => [k, rule] as const))
);

export function findOperatorRule(keyword: string): OperatorRule | null {
  const exact = RULES_BY_KEYWORD.get(keyword);
  if (exact) return exact;
  return PATTERN_ORDER.find((rule) => rule.patterns.some((p) => p.test(keyword))) ?? null;
}
