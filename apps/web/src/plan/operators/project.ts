import { bracketGroups, findLabeledList, toExpressionList } from "../textUtils";
import { defineOperatorRule, textAfterKeyword } from "./rule";

const SUMMARY_COLUMNS = 5;

export const projectRule = defineOperatorRule({
  kind: "Project",
  keywords: ["Project"],
  extract: (ctx) => {
    const inline = bracketGroups(textAfterKeyword(ctx))[0];
    const content = inline ?? findLabeledList(ctx.fullText, "Output");
    return { kind: "Project", columns: toExpressionList(content) };
  },
  summarize: (f) => {
    const shown = f.columns.slice(0, SUMMARY_COLUMNS).join(", ");
    const rest = f.columns.length - SUMMARY_COLUMNS;
    return rest > 0 ? `${shown} +${rest}` : shown;
  },
});
