import type { AdaptiveExchangeRole, Partitioning } from "../types";
import {
  findClosing,
  parseNumberLike,
  splitTopLevel,
  stripAttributeIds,
} from "../textUtils";
import { defineOperatorRule, joinParts, pluralize, textAfterKeyword } from "./rule";
import type { ClassifyContext } from "./rule";

const partitioningCallRe = /\b(hash|range)partitioning\(/i;
const roundRobinRe = /\broundrobinpartitioning\((\d+)\)/i;
const singlePartitionRe = /\bsinglepartition\b/i;
const partitionCountRe = /(\d+)\s*partitions?\b/i;
const planIdRe = /\[(?:plan_id|id)=#?(\d+)\]/;
const broadcastModeRe = /\b(?:HashedRelation|Identity)BroadcastMode\b/;

const SHUFFLE_READ_KEYWORDS = new Set(["AQEShuffleRead", "CustomShuffleReader"]);
const QUERY_STAGE_KEYWORDS = new Set(["ShuffleQueryStage", "BroadcastQueryStage"]);

type PartitioningCall = { kind: "Hash" | "Range"; args: string[] };

function adaptiveRole(keyword: string): AdaptiveExchangeRole | null {
  if (SHUFFLE_READ_KEYWORDS.has(keyword) || /ShuffleReader?$/.test(keyword)) return "read";
  if (QUERY_STAGE_KEYWORDS.has(keyword)) return "stage";
  return null;
}

function readPartitioningCall(text: string): PartitioningCall | null {
  const m = partitioningCallRe.exec(text);
  if (!m) return null;
  const open = m.index + m[0].length - 1;
  const close = findClosing(text, open);
  if (close < 0) return null;
  return {
    kind: m[1].toLowerCase() === "hash" ? "Hash" : "Range",
    args: splitTopLevel(text.slice(open + 1, close)),
  };
}

function detectPartitioning(ctx: ClassifyContext, call: PartitioningCall | null): Partitioning | null {
  if (ctx.keyword === "BroadcastExchange" || ctx.keyword === "BroadcastQueryStage") return "Broadcast";
  if (broadcastModeRe.test(ctx.fullText)) return "Broadcast";
  if (call) return call.kind;
  if (roundRobinRe.test(ctx.fullText) || ctx.keyword === "Repartition") return "RoundRobin";
  if (singlePartitionRe.test(ctx.fullText)) return "Single";
  if (ctx.keyword === "RepartitionByExpression") return "Hash";
  return null;
}

function detectPartitions(
  ctx: ClassifyContext,
  call: PartitioningCall | null,
  adaptive: AdaptiveExchangeRole | null
): number | null {
  const fromCall = call ? parseNumberLike(call.args[call.args.length - 1]) : null;
  if (fromCall != null) return fromCall;
  const rr = ctx.fullText.match(roundRobinRe);
  if (rr) return Number(rr[1]);
  if (singlePartitionRe.test(ctx.fullText)) return 1;
  const labeled = ctx.fullText.match(partitionCountRe);
  if (labeled) return Number(labeled[1]);
  // A query stage's leading number is its stage id.
  if (adaptive) return null;
  for (const arg of splitTopLevel(textAfterKeyword(ctx))) {
    const n = parseNumberLike(arg);
    if (n != null) return n;
  }
  return null;
}

export const exchangeRule = defineOperatorRule({
  kind: "Exchange",
  keywords: [
    "Exchange",
    "ShuffleExchange",
    "BroadcastExchange",
    "ReusedExchange",
    "Repartition",
    "RepartitionByExpression",
    "RebalancePartitions",
    ...SHUFFLE_READ_KEYWORDS,
    ...QUERY_STAGE_KEYWORDS,
  ],
  patterns: [/Exchange$/, /ShuffleReader?$/],
  extract: (ctx) => {
    const adaptive = adaptiveRole(ctx.keyword);
    const call = readPartitioningCall(ctx.fullText);
    const partitioning = detectPartitioning(ctx, call);
    const keys = call
      ? call.args.filter((a) => parseNumberLike(a) == null).map((a) => stripAttributeIds(a))
      : [];
    return {
      kind: "Exchange",
      partitions: detectPartitions(ctx, call, adaptive),
      partitioning,
      // Stages and reads wrap the exchange below them, which is the shuffle.
      isShuffle: partitioning !== "Broadcast" && adaptive == null,
      keys,
      reused: ctx.keyword === "ReusedExchange",
      planId: ctx.fullText.match(planIdRe)?.[1] ?? null,
      adaptive,
    };
  },
  summarize: (f) =>
    joinParts([
      f.adaptive === "read" && "shuffle read",
      f.adaptive === "stage" && `${f.partitioning === "Broadcast" ? "broadcast" : "shuffle"} query stage`,
      f.adaptive == null && (f.partitioning ? `${f.partitioning} partitioning` : "exchange"),
      f.partitions != null && pluralize(f.partitions, "partition"),
      f.keys.length > 0 && `by ${f.keys.join(", ")}`,
      f.reused && "reused",
    ]),
});
