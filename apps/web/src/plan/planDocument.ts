import type { DiagramOrientation, PlanLayout, PlanLayoutRect } from "./layoutPlanTree";
import { parseMetricsSource } from "./metricsSource";
import { asObject, parseJsonText, toInvalidDataMessage } from "./payload";
import type {
  MetricsSource,
  OperatorFields,
  OperatorKind,
  PlanEdge,
  PlanNodeMetrics,
  PlanTree,
  StageStats,
  TextOrder,
} from "./types";

export const PLAN_DOCUMENT_VERSION = 1;

const SUBJECT = "plan document";

export type PlanDocumentNode = {
  id: number;
  key: string;
  parentId: number | null;
  depth: number;
  kind: OperatorKind;
  operator: string;
  summary: string;
  text: string;
  fields: OperatorFields;
  engineId: string | null;
  codegenStageId: number | null;
  stageStats: StageStats | null;
  metrics: PlanNodeMetrics | null;
  rect: PlanLayoutRect | null;
};

/**
 * Self-contained rendering of a parsed plan. The source fields are enough to
 * rebuild the tree; nodes, edges and rects are there for other consumers.
 */
export type PlanDocument = {
  version: typeof PLAN_DOCUMENT_VERSION;
  rawText: string;
  textOrder: TextOrder;
  orientation: DiagramOrientation;
  metrics: MetricsSource | null;
  section: string | null;
  warnings: string[];
  nodes: PlanDocumentNode[];
  edges: PlanEdge[];
  bbox: PlanLayout["bbox"];
};

export type PlanDocumentSource = Pick<
  PlanDocument,
  "rawText" | "textOrder" | "orientation" | "metrics"
>;

export function buildPlanDocument(input: {
  rawText: string;
  tree: PlanTree;
  layout: PlanLayout;
  metrics: MetricsSource | null;
}): PlanDocument {
  const { rawText, tree, layout, metrics } = input;
  return {
    version: PLAN_DOCUMENT_VERSION,
    rawText,
    textOrder: tree.textOrder,
    orientation: layout.orientation,
    metrics,
    section: tree.section,
    warnings: [...tree.warnings],
    nodes: tree.nodes.map((n) => ({
      id: n.id,
      key: n.key,
      parentId: n.parentId,
      depth: n.depth,
      kind: n.kind,
      operator: n.operator,
      summary: n.summary,
      text: n.text,
      fields: n.fields,
      engineId: n.engineId,
      codegenStageId: n.codegenStageId,
      stageStats: n.stageStats,
      metrics: n.metrics,
      rect: layout.byKey.get(n.key) ?? null,
    })),
    edges: tree.edges.map((e) => ({ ...e })),
    bbox: { ...layout.bbox },
  };
}

export function serializePlanDocument(doc: PlanDocument): string {
  return JSON.stringify(doc, null, 2);
}

function parseTextOrder(v: unknown): TextOrder {
  if (v === "parentFirst" || v === "childrenFirst") return v;
  throw new Error(toInvalidDataMessage(SUBJECT, "expected textOrder parentFirst | childrenFirst", v));
}

function parseOrientation(v: unknown): DiagramOrientation {
  if (v === "sourcesAtTop" || v === "resultAtTop") return v;
  throw new Error(
    toInvalidDataMessage(SUBJECT, "expected orientation sourcesAtTop | resultAtTop", v)
  );
}

/** Reads the source part of a serialized document; the caller re-parses it. */
export function parsePlanDocument(json: string): PlanDocumentSource {
  const data = parseJsonText(SUBJECT, json);
  const obj = asObject(data);
  if (!obj) throw new Error(toInvalidDataMessage(SUBJECT, "expected an object", data));
  if (obj.version !== PLAN_DOCUMENT_VERSION) {
    throw new Error(
      toInvalidDataMessage(SUBJECT, `unsupported version, expected ${PLAN_DOCUMENT_VERSION}`, obj.version)
    );
  }
  if (typeof obj.rawText !== "string" || !obj.rawText.trim()) {
    throw new Error(toInvalidDataMessage(SUBJECT, "expected rawText: string", obj.rawText));
  }
  return {
    rawText: obj.rawText,
    textOrder: parseTextOrder(obj.textOrder),
    orientation: parseOrientation(obj.orientation),
    metrics: parseMetricsSource(obj.metrics),
  };
}
