import { describe, expect, it } from "vitest";
import { MalformedPlanError } from "./errors";
import {
  PLAN_FIXTURE_ADAPTIVE,
  PLAN_FIXTURE_EXTENDED,
  PLAN_FIXTURE_FORMATTED,
  PLAN_FIXTURE_INDENTED,
  PLAN_FIXTURE_PHYSICAL,
  PLAN_FIXTURE_SCALAR_SUBQUERY,
  PLAN_FIXTURE_TABLE_FRAMED,
} from "./fixtures";
import { normalizePlanText, toPlanLine } from "./normalizePlanText";

function reasonOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (e) {
    return e instanceof MalformedPlanError ? e.reason : "other";
  }
}

describe("normalizePlanText", () => {
  it("reads depth from space indentation", () => {
    const out = normalizePlanText(PLAN_FIXTURE_INDENTED);
    expect(out.section).toBeNull();
    expect(out.lines.map((l) => [l.depth, l.keyword])).toEqual([
      [0, "Project"],
      [1, "Filter"],
      [2, "Scan"],
    ]);
    expect(out.lines[1].text).toBe("Filter [amount > 50]");
    expect(out.warnings).toEqual([]);
  });

  it("reads depth from tree markers including sibling continuation bars", () => {
    const out = normalizePlanText(PLAN_FIXTURE_PHYSICAL);
    expect(out.section).toBe("Physical Plan");
    expect(out.lines.map((l) => l.depth)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 7, 8, 9, 10]);
    expect(out.lines[0].codegenStageId).toBe(3);
    expect(out.lines[0].keyword).toBe("Sort");
    expect(out.lines[7].keyword).toBe("Filter");
    expect(out.lines[10].keyword).toBe("BroadcastExchange");
    expect(out.lines[10].codegenStageId).toBeNull();
  });

  it("prefers the physical section of an extended explain", () => {
    const out = normalizePlanText(PLAN_FIXTURE_EXTENDED);
    expect(out.section).toBe("Physical Plan");
    expect(out.lines.map((l) => l.keyword)).toEqual(["Filter", "ColumnarToRow", "FileScan"]);
    expect(out.lines[0].lineNumber).toBe(18);
  });

  it("keeps the final plan of an adaptive plan and rebases it under the root", () => {
    const out = normalizePlanText(PLAN_FIXTURE_ADAPTIVE);
    expect(out.lines.map((l) => [l.depth, l.keyword])).toEqual([
      [0, "AdaptiveSparkPlan"],
      [1, "HashAggregate"],
      [2, "AQEShuffleRead"],
      [3, "ShuffleQueryStage"],
      [4, "Exchange"],
      [5, "HashAggregate"],
      [6, "FileScan"],
    ]);
    expect(out.warnings).toEqual(["adaptive plan: showing final plan"]);
  });

  it("collects formatted detail blocks by operator id", () => {
    const out = normalizePlanText(PLAN_FIXTURE_FORMATTED);
    expect(out.lines.map((l) => l.engineId)).toEqual(["5", "4", "3", "2", "1", "0"]);
    expect(out.lines[0].codegenStageId).toBeNull();
    expect(out.lines[0].text).toBe("HashAggregate (5)");
    expect(out.detailsByEngineId.get("2")).toEqual([
      "Filter [codegen id : 1]",
      "Input [2]: [customer_id#12, amount#13]",
      "Condition : (isnotnull(amount#13) AND (amount#13 > 50))",
    ]);
    expect([...out.detailsByEngineId.keys()]).toEqual(["0", "1", "2", "3", "4", "5"]);
  });

  it("skips a filter's scalar subquery and keeps its main input", () => {
    const out = normalizePlanText(PLAN_FIXTURE_SCALAR_SUBQUERY);
    expect(out.lines.map((l) => [l.depth, l.keyword])).toEqual([
      [0, "Filter"],
      [1, "ColumnarToRow"],
      [2, "FileScan"],
    ]);
    expect(out.warnings).toEqual(["inline Subquery plan on line 3 is not rendered"]);
  });

  it("skips the cached relation under an in-memory scan", () => {
    const out = normalizePlanText(
      [
        "InMemoryTableScan [a#1]",
        "   +- InMemoryRelation [a#1], StorageLevel(disk, memory, deserialized, 1 replicas)",
        "         +- *(1) Scan ExistingRDD[a#1]",
        "+- Exchange SinglePartition",
      ].join("\n")
    );
    expect(out.lines.map((l) => [l.depth, l.keyword])).toEqual([
      [0, "InMemoryTableScan"],
      [1, "Exchange"],
    ]);
    expect(out.warnings).toEqual(["inline InMemoryRelation plan on line 2 is not rendered"]);
  });

  it("keeps other two-level jumps for the tree builder to reject", () => {
    const out = normalizePlanText("Project [a#1]\n:  +- Filter (a#1 > 1)");
    expect(out.lines.map((l) => [l.depth, l.keyword])).toEqual([
      [0, "Project"],
      [2, "Filter"],
    ]);
    expect(out.warnings).toEqual([]);
  });

  it("strips table framing and reports it", () => {
    const out = normalizePlanText(PLAN_FIXTURE_TABLE_FRAMED);
    expect(out.warnings).toEqual(["table framing detected and removed"]);
    expect(out.lines.map((l) => [l.depth, l.keyword])).toEqual([
      [0, "Filter"],
      [1, "Scan"],
    ]);
  });

  it("accepts tab indentation", () => {
    const out = normalizePlanText("Project\n\tFilter x\n\t\tScan t");
    expect(out.lines.map((l) => l.depth)).toEqual([0, 1, 2]);
  });

  it("rejects empty input", () => {
    expect(reasonOf(() => normalizePlanText("  \n\n"))).toBe("empty");
  });

  it("rejects indentation that does not align to the nesting unit", () => {
    expect(reasonOf(() => normalizePlanText("A\n  B\n   C"))).toBe("misalignedIndent");
  });

  it("rejects tree markers off the three-column grid", () => {
    expect(reasonOf(() => normalizePlanText("A\n+- B\n  +- C"))).toBe("misalignedIndent");
  });

  it("rejects a section with only a header", () => {
    expect(reasonOf(() => normalizePlanText("== Physical Plan =="))).toBe("noPlanSection");
  });

  it("warns when subquery plans are present", () => {
    const out = normalizePlanText("== Physical Plan ==\nProject\n+- Scan t\n\n===== Subqueries =====\nSort\n");
    expect(out.lines.map((l) => l.keyword)).toEqual(["Project", "Scan"]);
    expect(out.warnings).toEqual(["subquery plans are not rendered"]);
  });
});

describe("toPlanLine", () => {
  it("splits off the codegen ordinal and the echoed operator id", () => {
    const line = toPlanLine(4, 2, "*(7) Project (12)", "raw");
    expect(line).toEqual({
      lineNumber: 4,
      depth: 2,
      text: "Project (12)",
      rawLine: "raw",
      keyword: "Project",
      engineId: "12",
      codegenStageId: 7,
    });
  });
});
