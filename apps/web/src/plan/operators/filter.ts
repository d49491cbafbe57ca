import { findLabeledValue, stripAttributeIds, unwrapBrackets } from "../textUtils";
import { defineOperatorRule, textAfterKeyword } from "./rule";

export const filterRule = defineOperatorRule({
  kind: "Filter",
  keywords: ["Filter"],
  extract: (ctx) => {
    const raw =
      findLabeledValue(ctx.fullText, "Condition") ?? textAfterKeyword(ctx).replace(/^:\s*/, "");
    const condition = stripAttributeIds(unwrapBrackets(raw)).trim();
    return { kind: "Filter", condition: condition || null };
  },
  summarize: (f) => f.condition ?? "",
});
