import * as flextreeModule from "d3-flextree";
import type { FlextreeNode } from "d3-flextree";
import type { PlanNode, PlanTree } from "./types";

export type DiagramOrientation = "sourcesAtTop" | "resultAtTop";

export const CARD_WIDTH = 300;
export const CARD_HEIGHT = 88;
export const METRICS_ROW_HEIGHT = 28;
export const H_SPACING = 70;
export const V_SPACING = 44;
export const VIEW_PADDING = 20;

export type PlanLayoutRect = { x: number; y: number; width: number; height: number };

export type PlanLayoutNode = {
  key: string;
  id: number;
  /** Horizontal center of the card. */
  x: number;
  /** Top edge of the card. */
  y: number;
  width: number;
  height: number;
  node: PlanNode;
  hasChildren: boolean;
  collapsedChildCount: number;
};

/** A link always points the way data flows: from the child to its parent. */
export type PlanLayoutLink = {
  key: string;
  sourceKey: string;
  targetKey: string;
  sourceX: number;
  sourceY: number;
  targetX: number;
  targetY: number;
};

export type PlanLayout = {
  orientation: DiagramOrientation;
  nodes: PlanLayoutNode[];
  links: PlanLayoutLink[];
  bbox: { minX: number; minY: number; maxX: number; maxY: number };
  byKey: Map<string, PlanLayoutRect>;
};

export interface LayoutPlanTreeOptions {
  collapsedKeys?: ReadonlySet<string>;
  orientation?: DiagramOrientation;
}

export function linkKey(sourceKey: string, targetKey: string): string {
  return `${sourceKey}->${targetKey}`;
}

export function cardHeight(node: PlanNode): number {
  return node.metrics ? CARD_HEIGHT + METRICS_ROW_HEIGHT : CARD_HEIGHT;
}

function resolveFlextree(): typeof flextreeModule.flextree {
  const fn = flextreeModule.flextree ?? flextreeModule.default?.flextree;
  if (!fn) throw new Error("d3-flextree import returned no flextree export");
  return fn;
}

export function layoutPlanTree(tree: PlanTree, options: LayoutPlanTreeOptions = {}): PlanLayout {
  const collapsedKeys = options.collapsedKeys ?? new Set<string>();
  const orientation = options.orientation ?? "sourcesAtTop";

  const flextree = resolveFlextree();
  const layout = flextree<PlanNode>({
    nodeSize: (d) => [CARD_WIDTH + H_SPACING, cardHeight(d.data) + V_SPACING],
  });
  const root = layout.hierarchy(tree.root, (n) => (collapsedKeys.has(n.key) ? [] : n.children));
  layout(root);
  const placed = root.descendants();

  let maxBottom = 0;
  for (const d of placed) maxBottom = Math.max(maxBottom, d.y + cardHeight(d.data));

  const topOf = (d: FlextreeNode<PlanNode>): number =>
    orientation === "sourcesAtTop" ? maxBottom - (d.y + cardHeight(d.data)) : d.y;

  let minX = Number.POSITIVE_INFINITY;
  let maxX = Number.NEGATIVE_INFINITY;
  let minY = Number.POSITIVE_INFINITY;
  let maxY = Number.NEGATIVE_INFINITY;

  for (const d of placed) {
    const top = topOf(d);
    minX = Math.min(minX, d.x - CARD_WIDTH / 2);
    maxX = Math.max(maxX, d.x + CARD_WIDTH / 2);
    minY = Math.min(minY, top);
    maxY = Math.max(maxY, top + cardHeight(d.data));
  }

  if (!Number.isFinite(minX) || !Number.isFinite(minY)) {
    minX = 0;
    minY = 0;
    maxX = 0;
    maxY = 0;
  }

  const dx = -minX + VIEW_PADDING;
  const dy = -minY + VIEW_PADDING;

  const nodes: PlanLayoutNode[] = [];
  const byKey = new Map<string, PlanLayoutRect>();
  const positioned = new Map<number, PlanLayoutNode>();

  for (const d of placed) {
    const n = d.data;
    const collapsed = collapsedKeys.has(n.key);
    const item: PlanLayoutNode = {
      key: n.key,
      id: n.id,
      x: d.x + dx,
      y: topOf(d) + dy,
      width: CARD_WIDTH,
      height: cardHeight(n),
      node: n,
      hasChildren: n.children.length > 0,
      collapsedChildCount: collapsed ? n.children.length : 0,
    };
    nodes.push(item);
    positioned.set(n.id, item);
    byKey.set(n.key, { x: item.x - CARD_WIDTH / 2, y: item.y, width: CARD_WIDTH, height: item.height });
  }

  const links: PlanLayoutLink[] = [];
  for (const child of nodes) {
    const parent = child.node.parentId != null ? positioned.get(child.node.parentId) : undefined;
    if (!parent) continue;
    const sourcesAtTop = orientation === "sourcesAtTop";
    links.push({
      key: linkKey(child.key, parent.key),
      sourceKey: child.key,
      targetKey: parent.key,
      sourceX: child.x,
      sourceY: sourcesAtTop ? child.y + child.height : child.y,
      targetX: parent.x,
      targetY: sourcesAtTop ? parent.y : parent.y + parent.height,
    });
  }

  return {
    orientation,
    nodes,
    links,
    bbox: { minX: minX + dx, minY: minY + dy, maxX: maxX + dx, maxY: maxY + dy },
    byKey,
  };
}

export type ViewTransform = { x: number; y: number; k: number };

/**
 * Shifts a zoom transform so the card under `key` keeps its screen position
 * when the layout is recomputed, e.g. after its subtree is collapsed.
 */
export function keepCardInPlace(
  prev: PlanLayout,
  next: PlanLayout,
  key: string,
  t: ViewTransform
): ViewTransform {
  const before = prev.byKey.get(key);
  const after = next.byKey.get(key);
  if (!before || !after) return t;
  return {
    x: t.x + (before.x - after.x) * t.k,
    y: t.y + (before.y - after.y) * t.k,
    k: t.k,
  };
}

export function linkPath(l: PlanLayoutLink): string {
  const midY = (l.sourceY + l.targetY) / 2;
  return `M${l.sourceX},${l.sourceY} C${l.sourceX},${midY} ${l.targetX},${midY} ${l.targetX},${l.targetY}`;
}
