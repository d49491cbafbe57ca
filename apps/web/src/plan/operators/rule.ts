import type { FieldsOfKind, OperatorFields, OperatorKind } from "../types";

export interface ClassifyContext {
  keyword: string;
  /** Operator text without the echoed engine id. */
  body: string;
  /** `body` followed by the formatted-mode detail lines, newline separated. */
  fullText: string;
}

export interface OperatorRule {
  kind: OperatorKind;
  keywords: readonly string[];
  patterns: readonly RegExp[];
  classify(ctx: ClassifyContext): { fields: OperatorFields; summary: string };
}

export interface OperatorRuleSpec<K extends OperatorKind> {
  kind: K;
  keywords: readonly string[];
  patterns?: readonly RegExp[];
  extract: (ctx: ClassifyContext) => FieldsOfKind<K>;
  summarize: (fields: FieldsOfKind<K>) => string;
}

export function defineOperatorRule<K extends OperatorKind>(spec: OperatorRuleSpec<K>): OperatorRule {
  return {
    kind: spec.kind,
    keywords: spec.keywords,
    patterns: spec.patterns ?? [],
    classify(ctx) {
      const fields = spec.extract(ctx);
      return { fields, summary: spec.summarize(fields) };
    },
  };
}

export function textAfterKeyword(ctx: ClassifyContext): string {
  return ctx.body.slice(ctx.keyword.length).trim();
}

export function joinParts(parts: Array<string | null | false>): string {
  return parts.filter((p): p is string => !!p).join(" · ");
}

export function pluralize(n: number, noun: string): string {
  return `${n} ${noun}${n === 1 ? "" : "s"}`;
}
