import type { PlanNode, PlanTree } from "./types";
import { countDescendants } from "./utils";

export type OutlineRow = {
  node: PlanNode;
  depth: number;
  hasChildren: boolean;
  collapsed: boolean;
  descendantCount: number;
};

/** Visible rows in text order; subtrees under a collapsed key are skipped. */
export function buildOutlineRows(tree: PlanTree, collapsedKeys: ReadonlySet<string>): OutlineRow[] {
  const rows: OutlineRow[] = [];
  const visit = (node: PlanNode) => {
    const collapsed = collapsedKeys.has(node.key) && node.children.length > 0;
    rows.push({
      node,
      depth: node.depth,
      hasChildren: node.children.length > 0,
      collapsed,
      descendantCount: collapsed ? countDescendants(tree, node.id) : 0,
    });
    if (!collapsed) node.children.forEach(visit);
  };
  visit(tree.root);
  return rows;
}

export function ancestorKeys(tree: PlanTree, key: string): string[] {
  const out: string[] = [];
  let node = tree.nodes.find((n) => n.key === key);
  while (node && node.parentId != null) {
    const parent = tree.byId.get(node.parentId);
    if (!parent) break;
    out.push(parent.key);
    node = parent;
  }
  return out;
}
