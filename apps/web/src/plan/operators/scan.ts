import { bracketGroups, findLabeledList, toExpressionList } from "../textUtils";
import { defineOperatorRule, joinParts, pluralize, textAfterKeyword } from "./rule";
import type { ClassifyContext } from "./rule";

const KNOWN_FORMATS = [
  "parquet",
  "orc",
  "json",
  "csv",
  "avro",
  "delta",
  "iceberg",
  "hudi",
  "jdbc",
  "text",
];

const formatRe = new RegExp(`\\b(${KNOWN_FORMATS.join("|")})\\b`, "i");
const locationRe = /Location:\s*[^[\n]*\[(?<paths>[^\]\n]+)\]/;
const tableLabelRe = /\bTable:\s*(?<table>[^\s,\n]+)/;
const sourceTokenRe = /^[A-Za-z_`][\w.`$-]*/;

function extractFormat(ctx: ClassifyContext): string | null {
  const m = ctx.body.match(formatRe) ?? ctx.fullText.match(formatRe);
  return m ? m[1].toLowerCase() : null;
}

function lastPathSegment(path: string): string | null {
  const segments = path
    .trim()
    .replace(/\/+$/, "")
    .split("/")
    .filter(Boolean);
  return segments.length > 0 ? segments[segments.length - 1] : null;
}

function extractLocation(fullText: string): string | null {
  const paths = fullText.match(locationRe)?.groups?.paths;
  if (!paths) return null;
  return paths.split(",")[0].trim() || null;
}

function extractSource(ctx: ClassifyContext, format: string | null, location: string | null) {
  const tokens = textAfterKeyword(ctx).split(/\s+/).filter(Boolean);
  const candidate = tokens[0]?.toLowerCase() === format ? tokens[1] : tokens[0];
  const token = candidate?.match(sourceTokenRe)?.[0];
  if (token && token.toLowerCase() !== format) return token.replace(/`/g, "");

  const table = ctx.fullText.match(tableLabelRe)?.groups?.table;
  if (table) return table;
  return location ? lastPathSegment(location) : null;
}

export const scanRule = defineOperatorRule({
  kind: "Scan",
  keywords: [
    "Scan",
    "FileScan",
    "BatchScan",
    "InMemoryTableScan",
    "LocalTableScan",
    "RowDataSourceScan",
    "HiveTableScan",
    "Relation",
    "LocalRelation",
    "LogicalRDD",
  ],
  patterns: [/Scan$/, /Relation$/],
  extract: (ctx) => {
    const format = extractFormat(ctx);
    const location = extractLocation(ctx.fullText);
    const inlineColumns = bracketGroups(textAfterKeyword(ctx))[0];
    const pushedFilters = toExpressionList(findLabeledList(ctx.fullText, "PushedFilters"));
    return {
      kind: "Scan",
      source: extractSource(ctx, format, location),
      format,
      columns: toExpressionList(inlineColumns ?? findLabeledList(ctx.fullText, "Output")),
      pushedFilters,
      hasPushedFilters: pushedFilters.length > 0,
      partitionFilters: toExpressionList(findLabeledList(ctx.fullText, "PartitionFilters")),
      location,
    };
  },
  summarize: (f) =>
    joinParts([
      [f.format, f.source].filter(Boolean).join(" "),
      f.hasPushedFilters && pluralize(f.pushedFilters.length, "pushed filter"),
      f.partitionFilters.length > 0 && pluralize(f.partitionFilters.length, "partition filter"),
    ]),
});
