import {
  bracketGroups,
  findLabeledList,
  splitTopLevel,
  stripAttributeIds,
  toExpressionList,
} from "../textUtils";
import { defineOperatorRule, joinParts, textAfterKeyword } from "./rule";
import type { ClassifyContext } from "./rule";

const aliasRe = /\s+AS\s+[\w`]+$/i;
const partialRe = /^(?:partial_|merge_)/i;

function functionsFromOutput(content: string): string[] {
  return splitTopLevel(stripAttributeIds(content))
    .filter((item) => item.includes("("))
    .map((item) => item.replace(aliasRe, ""));
}

function extractGrouping(ctx: ClassifyContext): { groupingKeys: string[]; functions: string[] } {
  const keys = findLabeledList(ctx.fullText, "keys");
  const functions = findLabeledList(ctx.fullText, "functions");
  if (keys != null || functions != null) {
    return { groupingKeys: toExpressionList(keys), functions: toExpressionList(functions) };
  }
  const groups = bracketGroups(textAfterKeyword(ctx));
  return {
    groupingKeys: toExpressionList(groups[0]),
    functions: groups.length > 1 ? functionsFromOutput(groups[1]) : [],
  };
}

export const aggregateRule = defineOperatorRule({
  kind: "Aggregate",
  keywords: ["Aggregate", "HashAggregate", "SortAggregate", "ObjectHashAggregate"],
  patterns: [/Aggregate$/],
  extract: (ctx) => {
    const { groupingKeys, functions } = extractGrouping(ctx);
    return {
      kind: "Aggregate",
      groupingKeys,
      functions,
      partial: functions.some((f) => partialRe.test(f)),
    };
  },
  summarize: (f) =>
    joinParts([
      f.functions.length > 0 ? f.functions.join(", ") : "distinct",
      f.groupingKeys.length > 0 && `by ${f.groupingKeys.join(", ")}`,
      f.partial && "partial",
    ]),
});
