import { describe, expect, it } from "vitest";
import { PLAN_FIXTURE_INDENTED } from "./fixtures";
import { layoutPlanTree } from "./layoutPlanTree";
import { parsePlanTree } from "./parsePlan";
import {
  PLAN_DOCUMENT_VERSION,
  buildPlanDocument,
  parsePlanDocument,
  serializePlanDocument,
} from "./planDocument";
import type { MetricsSource } from "./types";

describe("plan documents", () => {
  const metrics: MetricsSource = { keyBy: "traversalOrder", metrics: [{ rows: 3 }] };
  const tree = parsePlanTree(PLAN_FIXTURE_INDENTED, { metrics });
  const layout = layoutPlanTree(tree, { orientation: "resultAtTop" });

  it("captures nodes, edges and rects", () => {
    const doc = buildPlanDocument({ rawText: PLAN_FIXTURE_INDENTED, tree, layout, metrics });
    expect(doc.version).toBe(PLAN_DOCUMENT_VERSION);
    expect(doc.orientation).toBe("resultAtTop");
    expect(doc.textOrder).toBe("parentFirst");
    expect(doc.nodes.map((n) => [n.key, n.kind, n.parentId])).toEqual([
      ["n0", "Project", null],
      ["n1", "Filter", 0],
      ["n2", "Scan", 1],
    ]);
    expect(doc.nodes[0].metrics?.rowsOutput).toBe(3);
    expect(doc.nodes[0].rect).toEqual({ x: 20, y: 20, width: 300, height: 116 });
    expect(doc.edges).toHaveLength(2);
  });

  it("reads back the source of a serialized document", () => {
    const json = serializePlanDocument(
      buildPlanDocument({ rawText: PLAN_FIXTURE_INDENTED, tree, layout, metrics })
    );
    expect(parsePlanDocument(json)).toEqual({
      rawText: PLAN_FIXTURE_INDENTED,
      textOrder: "parentFirst",
      orientation: "resultAtTop",
      metrics,
    });
  });

  it("lays a loaded document out the way it was exported", () => {
    const exported = buildPlanDocument({ rawText: PLAN_FIXTURE_INDENTED, tree, layout, metrics });
    const source = parsePlanDocument(serializePlanDocument(exported));
    const reparsed = parsePlanTree(source.rawText, {
      textOrder: source.textOrder,
      metrics: source.metrics,
    });
    const relaid = layoutPlanTree(reparsed, { orientation: source.orientation });
    const loaded = buildPlanDocument({
      rawText: source.rawText,
      tree: reparsed,
      layout: relaid,
      metrics: source.metrics,
    });
    expect(loaded.orientation).toBe("resultAtTop");
    expect(loaded.nodes.map((n) => n.rect)).toEqual(exported.nodes.map((n) => n.rect));
    expect(loaded.bbox).toEqual(exported.bbox);
  });

  it("rejects other versions", () => {
    expect(() => parsePlanDocument('{"version":2,"rawText":"Scan t"}')).toThrowError(
      "Invalid plan document (unsupported version, expected 1): 2"
    );
  });

  it("rejects a document without plan text", () => {
    expect(() => parsePlanDocument('{"version":1,"rawText":"  "}')).toThrowError(
      'Invalid plan document (expected rawText: string): "  "'
    );
  });

  it("rejects an unknown orientation", () => {
    const json = JSON.stringify({
      version: 1,
      rawText: "Scan t",
      textOrder: "parentFirst",
      orientation: "sideways",
      metrics: null,
    });
    expect(() => parsePlanDocument(json)).toThrowError(
      'Invalid plan document (expected orientation sourcesAtTop | resultAtTop): "sideways"'
    );
  });

  it("rejects text that is not JSON", () => {
    expect(() => parsePlanDocument("plan")).toThrowError(/^Invalid plan document \(not JSON: /);
  });
});
