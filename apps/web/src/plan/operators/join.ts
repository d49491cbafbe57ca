import type { JoinType } from "../types";
import {
  bracketGroups,
  findLabeledList,
  findLabeledValue,
  stripAttributeIds,
  toExpressionList,
} from "../textUtils";
import { defineOperatorRule, joinParts, textAfterKeyword } from "./rule";
import type { ClassifyContext } from "./rule";

const JOIN_TYPES: readonly JoinType[] = [
  "Inner",
  "LeftOuter",
  "RightOuter",
  "FullOuter",
  "LeftSemi",
  "LeftAnti",
  "Cross",
];

const joinTypeRe = new RegExp(`\\b(${JOIN_TYPES.join("|")})\\b`);
const buildSideRe = /\bBuild\s*(?:side\s*:\s*)?(Left|Right)\b/i;
const broadcastHintRe = /strategy=broadcast|\bBroadcast(?:HashJoin|NestedLoopJoin)\b/i;
const logicalConditionRe = new RegExp(`\\b(?:${JOIN_TYPES.join("|")}),\\s*(.+)$`);

function toJoinType(v: string | undefined): JoinType | null {
  return JOIN_TYPES.find((t) => t === v) ?? null;
}

function extractJoinType(ctx: ClassifyContext): JoinType | null {
  const t = toJoinType(ctx.fullText.match(joinTypeRe)?.[1]);
  if (t) return t;
  return ctx.keyword === "CartesianProduct" ? "Cross" : null;
}

function extractBuildSide(fullText: string): "Left" | "Right" | null {
  const side = fullText.match(buildSideRe)?.[1]?.toLowerCase();
  if (side === "left") return "Left";
  if (side === "right") return "Right";
  return null;
}

function extractKeys(ctx: ClassifyContext): { leftKeys: string[]; rightKeys: string[] } {
  const left = findLabeledList(ctx.fullText, "Left keys");
  const right = findLabeledList(ctx.fullText, "Right keys");
  if (left != null || right != null) {
    return { leftKeys: toExpressionList(left), rightKeys: toExpressionList(right) };
  }
  const groups = bracketGroups(textAfterKeyword(ctx));
  if (groups.length < 2) return { leftKeys: [], rightKeys: [] };
  return { leftKeys: toExpressionList(groups[0]), rightKeys: toExpressionList(groups[1]) };
}

function extractCondition(ctx: ClassifyContext): string | null {
  const labeled = findLabeledValue(ctx.fullText, "Join condition");
  if (labeled) return stripAttributeIds(labeled);
  if (ctx.keyword !== "Join") return null;
  const m = ctx.body.match(logicalConditionRe);
  if (!m) return null;
  return stripAttributeIds(m[1].replace(/,\s*\w+Hint=.*$/, "")).trim() || null;
}

export const joinRule = defineOperatorRule({
  kind: "Join",
  keywords: [
    "Join",
    "BroadcastHashJoin",
    "SortMergeJoin",
    "ShuffledHashJoin",
    "BroadcastNestedLoopJoin",
    "CartesianProduct",
  ],
  patterns: [/Join$/],
  extract: (ctx) => ({
    kind: "Join",
    strategy: ctx.keyword,
    joinType: extractJoinType(ctx),
    broadcast: ctx.keyword.startsWith("Broadcast") || broadcastHintRe.test(ctx.fullText),
    buildSide: extractBuildSide(ctx.fullText),
    ...extractKeys(ctx),
    condition: extractCondition(ctx),
  }),
  summarize: (f) =>
    joinParts([
      f.joinType ? `${f.joinType} join` : f.strategy,
      f.broadcast && "broadcast",
      f.buildSide && `build ${f.buildSide.toLowerCase()}`,
      f.leftKeys.length > 0 && `${f.leftKeys.join(", ")} = ${f.rightKeys.join(", ")}`,
      f.condition,
    ]),
});
