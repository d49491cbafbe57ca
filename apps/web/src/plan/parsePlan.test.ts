import { describe, expect, it } from "vitest";
import {
  PLAN_FIXTURE_ADAPTIVE,
  PLAN_FIXTURE_EXTENDED,
  PLAN_FIXTURE_FORMATTED,
  PLAN_FIXTURE_INDENTED,
  PLAN_FIXTURE_PHYSICAL,
  PLAN_FIXTURE_SCALAR_SUBQUERY,
  PLAN_FIXTURE_TABLE_FRAMED,
} from "./fixtures";
import { parsePlan, parsePlanTree } from "./parsePlan";

describe("parsePlan", () => {
  it("parses an indented plan into three typed nodes", () => {
    const res = parsePlan(PLAN_FIXTURE_INDENTED);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    const [project, filter, scan] = res.tree.nodes;
    expect(project.kind).toBe("Project");
    expect(project.summary).toBe("Project");
    expect(filter.fields).toEqual({ kind: "Filter", condition: "amount > 50" });
    expect(scan.fields).toMatchObject({ kind: "Scan", format: "parquet", source: "orders" });
    expect(scan.summary).toBe("parquet orders");
    expect(res.warnings).toEqual([]);
  });

  it("parses a bare exchange with a partition count", () => {
    const tree = parsePlanTree("Exchange 200");
    expect(tree.nodes).toHaveLength(1);
    expect(tree.root.fields).toMatchObject({ kind: "Exchange", partitions: 200 });
  });

  it("reports a depth jump as a failed result", () => {
    const res = parsePlan("A\n  B\n      C");
    expect(res).toEqual({
      ok: false,
      rawText: "A\n  B\n      C",
      error: "Depth jumps from 1 to 3 (line 3)",
      reason: "depthJump",
    });
  });

  it("parses a filter whose condition holds a scalar subquery", () => {
    const res = parsePlan(PLAN_FIXTURE_SCALAR_SUBQUERY);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.tree.nodes.map((n) => [n.id, n.operator, n.parentId])).toEqual([
      [0, "Filter", null],
      [1, "ColumnarToRow", 0],
      [2, "FileScan", 1],
    ]);
    expect(res.warnings).toEqual(["inline Subquery plan on line 3 is not rendered"]);
  });

  it("reports empty input", () => {
    const res = parsePlan("");
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.reason).toBe("empty");
    expect(res.error).toBe("Plan text is empty");
  });

  it("parses a physical plan with a broadcast join", () => {
    const tree = parsePlanTree(PLAN_FIXTURE_PHYSICAL);
    expect(tree.nodes.map((n) => n.kind)).toEqual([
      "Sort",
      "Exchange",
      "Aggregate",
      "Exchange",
      "Aggregate",
      "Project",
      "Join",
      "Filter",
      "Unknown",
      "Scan",
      "Exchange",
      "Filter",
      "Unknown",
      "Scan",
    ]);

    const [sort, range, finalAgg, hash, partialAgg, project, join] = tree.nodes;
    expect(sort.fields).toEqual({
      kind: "Sort",
      orders: [{ expression: "total", direction: "DESC", nulls: "LAST" }],
      global: true,
      limit: null,
    });
    expect(sort.codegenStageId).toBe(3);
    expect(range.fields).toEqual({
      kind: "Exchange",
      partitions: 200,
      partitioning: "Range",
      isShuffle: true,
      keys: ["total DESC NULLS LAST"],
      reused: false,
      planId: "61",
      adaptive: null,
    });
    expect(range.summary).toBe("Range partitioning · 200 partitions · by total DESC NULLS LAST");
    expect(finalAgg.summary).toBe("sum(amount) · by customer_id");
    expect(hash.fields).toMatchObject({ partitioning: "Hash", partitions: 200, planId: "57" });
    expect(partialAgg.fields).toMatchObject({ functions: ["partial_sum(amount)"], partial: true });
    expect(project.fields).toEqual({ kind: "Project", columns: ["customer_id", "amount"] });
    expect(join.fields).toEqual({
      kind: "Join",
      strategy: "BroadcastHashJoin",
      joinType: "Inner",
      broadcast: true,
      buildSide: "Right",
      leftKeys: ["customer_id"],
      rightKeys: ["id"],
      condition: null,
    });
    expect(join.summary).toBe("Inner join · broadcast · build right · customer_id = id");
    expect(join.children.map((c) => c.id)).toEqual([7, 10]);

    const broadcast = tree.nodes[10];
    expect(broadcast.fields).toMatchObject({
      partitioning: "Broadcast",
      isShuffle: false,
      partitions: null,
      planId: "50",
    });

    const orders = tree.nodes[9];
    expect(orders.fields).toEqual({
      kind: "Scan",
      source: "shop.orders",
      format: "parquet",
      columns: ["customer_id", "amount"],
      pushedFilters: ["IsNotNull(amount)", "GreaterThan(amount,50)"],
      hasPushedFilters: true,
      partitionFilters: [],
      location: "file:/warehouse/orders",
    });
    expect(orders.summary).toBe("parquet shop.orders · 2 pushed filters");
    expect(tree.nodes[13].depth).toBe(10);
  });

  it("parses the final plan of an adaptive plan", () => {
    const res = parsePlan(PLAN_FIXTURE_ADAPTIVE);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.warnings).toEqual(["adaptive plan: showing final plan"]);
    expect(res.tree.nodes).toHaveLength(7);
    const stage = res.tree.nodes[3];
    expect(stage.operator).toBe("ShuffleQueryStage");
    expect(stage.stageStats).toEqual({ stageId: 0, rowCount: 64, sizeInBytes: 1024 });
    expect(res.tree.nodes[4].fields).toMatchObject({ kind: "Exchange", planId: "30" });
  });

  it("enriches formatted operators from their detail blocks", () => {
    const tree = parsePlanTree(PLAN_FIXTURE_FORMATTED);
    expect(tree.nodes.map((n) => n.engineId)).toEqual(["5", "4", "3", "2", "1", "0"]);
    expect(tree.nodes[1].fields).toEqual({
      kind: "Exchange",
      partitions: 200,
      partitioning: "Hash",
      isShuffle: true,
      keys: ["customer_id"],
      reused: false,
      planId: "15",
      adaptive: null,
    });
    expect(tree.nodes[2].fields).toEqual({
      kind: "Aggregate",
      groupingKeys: ["customer_id"],
      functions: ["partial_sum(amount)"],
      partial: true,
    });
    expect(tree.nodes[3].fields).toEqual({
      kind: "Filter",
      condition: "(isnotnull(amount) AND (amount > 50))",
    });
    expect(tree.nodes[5].fields).toMatchObject({
      source: "shop.orders",
      columns: ["customer_id", "amount"],
      location: "file:/warehouse/orders",
      hasPushedFilters: true,
    });
  });

  it("renders only the physical section of an extended explain", () => {
    const tree = parsePlanTree(PLAN_FIXTURE_EXTENDED);
    expect(tree.section).toBe("Physical Plan");
    expect(tree.nodes.map((n) => n.operator)).toEqual(["Filter", "ColumnarToRow", "FileScan"]);
  });

  it("parses a plan copied out of a result table", () => {
    const res = parsePlan(PLAN_FIXTURE_TABLE_FRAMED);
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.warnings).toEqual(["table framing detected and removed"]);
    expect(res.tree.nodes[0].fields).toEqual({ kind: "Filter", condition: "(amount > 50)" });
    expect(res.tree.nodes[1].fields).toMatchObject({
      source: "ExistingRDD",
      format: null,
      columns: ["customer_id", "amount"],
    });
  });

  it("attaches metrics when a source is given", () => {
    const tree = parsePlanTree(PLAN_FIXTURE_FORMATTED, {
      metrics: { keyBy: "engineId", metrics: { "0": { "number of output rows": "1,024" } } },
    });
    expect(tree.nodes[5].metrics?.rowsOutput).toBe(1024);
    expect(tree.nodes[0].metrics).toBeNull();
  });

  it("yields the same tree for the same text", () => {
    const a = parsePlanTree(PLAN_FIXTURE_PHYSICAL);
    const b = parsePlanTree(PLAN_FIXTURE_PHYSICAL);
    expect(b.nodes.map((n) => [n.id, n.kind, n.parentId, n.summary])).toEqual(
      a.nodes.map((n) => [n.id, n.kind, n.parentId, n.summary])
    );
  });

  it("builds one node per operator line", () => {
    const lines = PLAN_FIXTURE_PHYSICAL.split("\n").filter((l) => l.trim() && !l.startsWith("=="));
    expect(parsePlanTree(PLAN_FIXTURE_PHYSICAL).nodes).toHaveLength(lines.length);
  });
});
