import { defineOperatorRule } from "./rule";

export const unionRule = defineOperatorRule({
  kind: "Union",
  keywords: ["Union", "UnionExec"],
  extract: () => ({ kind: "Union" }),
  summarize: () => "",
});
