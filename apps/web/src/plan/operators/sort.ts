import type { SortOrder } from "../types";
import { bracketGroups, findLabeledList, findLabeledValue, toExpressionList } from "../textUtils";
import { defineOperatorRule, joinParts, textAfterKeyword } from "./rule";
import type { ClassifyContext } from "./rule";

const orderRe = /^(.*?)\s+(ASC|DESC)(?:\s+NULLS\s+(FIRST|LAST))?$/i;
const globalRe = /\]\s*,\s*(true|false)\b/;
const limitRe = /\blimit=(\d+)/i;

export function parseSortOrder(item: string): SortOrder {
  const m = item.trim().match(orderRe);
  if (!m) return { expression: item.trim(), direction: "ASC", nulls: null };
  const nulls = m[3]?.toUpperCase();
  return {
    expression: m[1].trim(),
    direction: m[2].toUpperCase() === "DESC" ? "DESC" : "ASC",
    nulls: nulls === "FIRST" || nulls === "LAST" ? nulls : null,
  };
}

/** Sort arguments, inline or from the formatted `Arguments:` detail line. */
function sortArguments(ctx: ClassifyContext): string {
  const inline = textAfterKeyword(ctx);
  if (inline.includes("[")) return inline;
  return findLabeledValue(ctx.fullText, "Arguments") ?? inline;
}

export const sortRule = defineOperatorRule({
  kind: "Sort",
  keywords: ["Sort", "TakeOrderedAndProject"],
  extract: (ctx) => {
    const args = sortArguments(ctx);
    const content = findLabeledList(ctx.fullText, "orderBy") ?? bracketGroups(args)[0];
    const global = args.match(globalRe)?.[1];
    const limit = ctx.fullText.match(limitRe)?.[1];
    return {
      kind: "Sort",
      orders: toExpressionList(content).map(parseSortOrder),
      global: global == null ? null : global === "true",
      limit: limit != null ? Number(limit) : null,
    };
  },
  summarize: (f) =>
    joinParts([
      f.orders.map((o) => `${o.expression} ${o.direction}`).join(", "),
      f.limit != null && `limit ${f.limit}`,
      f.global === false && "per partition",
    ]),
});
