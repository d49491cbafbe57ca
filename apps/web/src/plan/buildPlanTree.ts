import { classifyPlanLine } from "./classifyPlanLine";
import { MalformedPlanError } from "./errors";
import type { NormalizedPlanText, PlanEdge, PlanLine, PlanNode, PlanTree, TextOrder } from "./types";

export interface BuildPlanTreeOptions {
  textOrder?: TextOrder;
}

export function nodeKey(id: number): string {
  return `n${id}`;
}

type LineEntry = { line: PlanLine; children: LineEntry[] };

/** Nests depth-annotated lines under their parents with a stack of ancestors. */
function nestLines(lines: readonly PlanLine[]): LineEntry {
  const stack: LineEntry[] = [];
  let root: LineEntry | null = null;

  for (const line of lines) {
    if (!root && line.depth !== 0) {
      throw new MalformedPlanError(
        "invalidRoot",
        `First operator must be at depth 0, found depth ${line.depth}`,
        line.lineNumber
      );
    }
    if (root && line.depth === 0) {
      throw new MalformedPlanError(
        "multipleRoots",
        "Plan has more than one root operator",
        line.lineNumber
      );
    }
    if (line.depth > stack.length) {
      throw new MalformedPlanError(
        "depthJump",
        `Depth jumps from ${stack.length - 1} to ${line.depth}`,
        line.lineNumber
      );
    }

    stack.length = line.depth;
    const entry: LineEntry = { line, children: [] };
    if (line.depth > 0) stack[line.depth - 1].children.push(entry);
    else root = entry;
    stack.push(entry);
  }

  if (!root) throw new MalformedPlanError("noPlanSection", "No operator lines to build a tree from");
  return root;
}

/**
 * Rebuilds the operator tree from depth-annotated lines. `childrenFirst`
 * input is read bottom-up, which lists siblings last to first, so their order
 * is restored before ids are assigned. Ids always follow a pre-order walk
 * from the root.
 */
export function buildPlanTree(
  normalized: NormalizedPlanText,
  options: BuildPlanTreeOptions = {}
): PlanTree {
  const textOrder = options.textOrder ?? "parentFirst";
  const childrenFirst = textOrder === "childrenFirst";
  const root = nestLines(childrenFirst ? [...normalized.lines].reverse() : normalized.lines);

  const nodes: PlanNode[] = [];
  const edges: PlanEdge[] = [];
  const pending: Array<{ entry: LineEntry; parent: PlanNode | null }> = [{ entry: root, parent: null }];

  for (let next = pending.pop(); next; next = pending.pop()) {
    const { entry, parent } = next;
    const { line } = entry;
    const details = line.engineId != null ? normalized.detailsByEngineId.get(line.engineId) : undefined;
    const id = nodes.length;
    const node: PlanNode = {
      ...classifyPlanLine(line, details),
      id,
      key: nodeKey(id),
      depth: line.depth,
      parentId: parent ? parent.id : null,
      children: [],
      metrics: null,
    };

    nodes.push(node);
    if (parent) {
      parent.children.push(node);
      edges.push({ parentId: parent.id, childId: id, sourceId: id, targetId: parent.id });
    }

    // Pushed last-to-visit first so the stack pops children in display order.
    const ordered = childrenFirst ? entry.children : [...entry.children].reverse();
    for (const child of ordered) pending.push({ entry: child, parent: node });
  }

  return {
    root: nodes[0],
    nodes,
    byId: new Map(nodes.map((n) => [n.id, n])),
    edges,
    textOrder,
    section: normalized.section,
    warnings: [...normalized.warnings],
  };
}
