import { bracketGroups, findLabeledValue, toExpressionList } from "../textUtils";
import { defineOperatorRule, joinParts, textAfterKeyword } from "./rule";

const functionNameRe = /^([A-Za-z_][\w]*)\s*\(/;

export const windowRule = defineOperatorRule({
  kind: "Window",
  keywords: ["Window", "WindowGroupLimit", "RunningWindowFunction"],
  extract: (ctx) => {
    const inline = textAfterKeyword(ctx);
    const args = inline.includes("[") ? inline : (findLabeledValue(ctx.fullText, "Arguments") ?? "");
    const [functions, partitionBy, orderBy] = bracketGroups(args);
    return {
      kind: "Window",
      functions: toExpressionList(functions).map((f) => f.match(functionNameRe)?.[1] ?? f),
      partitionBy: toExpressionList(partitionBy),
      orderBy: toExpressionList(orderBy),
    };
  },
  summarize: (f) =>
    joinParts([
      f.functions.join(", "),
      f.partitionBy.length > 0 && `partition by ${f.partitionBy.join(", ")}`,
      f.orderBy.length > 0 && `order by ${f.orderBy.join(", ")}`,
    ]),
});
