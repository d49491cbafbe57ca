export type OperatorKind =
  | "Scan"
  | "Filter"
  | "Join"
  | "Exchange"
  | "Aggregate"
  | "Sort"
  | "Project"
  | "Window"
  | "Union"
  | "Unknown";

export type JoinType =
  | "Inner"
  | "LeftOuter"
  | "RightOuter"
  | "FullOuter"
  | "LeftSemi"
  | "LeftAnti"
  | "Cross";

export type Partitioning = "Hash" | "Range" | "RoundRobin" | "Single" | "Broadcast";

export interface ScanFields {
  kind: "Scan";
  source: string | null;
  format: string | null;
  columns: string[];
  pushedFilters: string[];
  hasPushedFilters: boolean;
  partitionFilters: string[];
  location: string | null;
}

export interface FilterFields {
  kind: "Filter";
  condition: string | null;
}

export interface JoinFields {
  kind: "Join";
  strategy: string;
  joinType: JoinType | null;
  broadcast: boolean;
  buildSide: "Left" | "Right" | null;
  leftKeys: string[];
  rightKeys: string[];
  condition: string | null;
}

export type AdaptiveExchangeRole = "read" | "stage";

export interface ExchangeFields {
  kind: "Exchange";
  partitions: number | null;
  partitioning: Partitioning | null;
  isShuffle: boolean;
  keys: string[];
  reused: boolean;
  planId: string | null;
  /** Set on the shuffle reads and query stages of adaptive plans. */
  adaptive: AdaptiveExchangeRole | null;
}

export interface AggregateFields {
  kind: "Aggregate";
  groupingKeys: string[];
  functions: string[];
  partial: boolean;
}

export type SortDirection = "ASC" | "DESC";

export interface SortOrder {
  expression: string;
  direction: SortDirection;
  nulls: "FIRST" | "LAST" | null;
}

export interface SortFields {
  kind: "Sort";
  orders: SortOrder[];
  global: boolean | null;
  limit: number | null;
}

export interface ProjectFields {
  kind: "Project";
  columns: string[];
}

export interface WindowFields {
  kind: "Window";
  functions: string[];
  partitionBy: string[];
  orderBy: string[];
}

export interface UnionFields {
  kind: "Union";
}

export interface UnknownFields {
  kind: "Unknown";
  keyword: string;
}

export type OperatorFields =
  | ScanFields
  | FilterFields
  | JoinFields
  | ExchangeFields
  | AggregateFields
  | SortFields
  | ProjectFields
  | WindowFields
  | UnionFields
  | UnknownFields;

export type FieldsOfKind<K extends OperatorKind> = Extract<OperatorFields, { kind: K }>;

/** One operator line of the selected plan section. */
export interface PlanLine {
  lineNumber: number;
  depth: number;
  /** Text after the nesting marker and the codegen ordinal. */
  text: string;
  rawLine: string;
  keyword: string;
  /** Operator id echoed by the engine, e.g. `(4)` in formatted output. */
  engineId: string | null;
  codegenStageId: number | null;
}

export interface NormalizedPlanText {
  section: string | null;
  lines: PlanLine[];
  detailsByEngineId: Map<string, string[]>;
  warnings: string[];
}

/** Statistics an adaptive plan echoes on its query-stage lines. */
export interface StageStats {
  stageId: number | null;
  rowCount: number | null;
  sizeInBytes: number | null;
}

export type RawMetricValue = number | string;
export type RawMetrics = Record<string, RawMetricValue>;

export interface PlanNodeMetrics {
  rowsOutput: number | null;
  spillSizeBytes: number | null;
  durationMs: number | null;
  raw: Record<string, number>;
}

export interface ClassifiedPlanNode {
  kind: OperatorKind;
  operator: string;
  fields: OperatorFields;
  summary: string;
  text: string;
  rawLine: string;
  engineId: string | null;
  codegenStageId: number | null;
  stageStats: StageStats | null;
  details: string[];
}

export interface PlanNode extends ClassifiedPlanNode {
  id: number;
  key: string;
  depth: number;
  parentId: number | null;
  children: PlanNode[];
  metrics: PlanNodeMetrics | null;
}

export type TextOrder = "parentFirst" | "childrenFirst";

export interface PlanEdge {
  parentId: number;
  childId: number;
  /** Data producer; always the child operator. */
  sourceId: number;
  targetId: number;
}

export interface PlanTree {
  root: PlanNode;
  /** Arena indexed by node id. */
  nodes: PlanNode[];
  byId: Map<number, PlanNode>;
  edges: PlanEdge[];
  textOrder: TextOrder;
  section: string | null;
  warnings: string[];
}

export type MetricsSource =
  | { keyBy: "engineId"; metrics: Record<string, RawMetrics> }
  | { keyBy: "traversalOrder"; metrics: RawMetrics[] | Record<string, RawMetrics> };

export type MalformedPlanReason =
  | "empty"
  | "noPlanSection"
  | "misalignedIndent"
  | "depthJump"
  | "multipleRoots"
  | "invalidRoot";

export type PlanParseResult =
  | { ok: true; rawText: string; tree: PlanTree; warnings: string[] }
  | { ok: false; rawText: string; error: string; reason: MalformedPlanReason };
