import { describe, expect, it } from "vitest";
import { PLAN_FIXTURE_INDENTED } from "../plan/fixtures";
import { layoutPlanTree } from "../plan/layoutPlanTree";
import { parsePlanTree } from "../plan/parsePlan";
import { renderPlanSvgDocument } from "./staticPlanSvg";

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe("renderPlanSvgDocument", () => {
  const layout = layoutPlanTree(parsePlanTree(PLAN_FIXTURE_INDENTED));

  it("sizes the canvas to the layout", () => {
    const svg = renderPlanSvgDocument(layout);
    expect(svg.startsWith('<?xml version="1.0" encoding="UTF-8"?>\n<svg')).toBe(true);
    expect(svg).toContain('viewBox="0 0 340 392"');
    expect(svg).toContain("<title>Plan</title>");
  });

  it("draws one card per node and one link per edge", () => {
    const svg = renderPlanSvgDocument(layout, "Orders");
    expect(count(svg, 'class="plan-card"')).toBe(3);
    expect(count(svg, 'class="plan-link"')).toBe(2);
    expect(svg).toContain('transform="translate(20,284)"');
    expect(svg).toContain("<title>Orders</title>");
  });

  it("escapes operator text", () => {
    expect(renderPlanSvgDocument(layout)).toContain(">amount &gt; 50</text>");
  });
});
