import type { PlanTree } from "./types";

export function toggleKey(prev: ReadonlySet<string>, key: string): Set<string> {
  const next = new Set(prev);
  if (next.has(key)) next.delete(key);
  else next.add(key);
  return next;
}

export function buildParentByKey(tree: PlanTree): Map<string, string | null> {
  const parent = new Map<string, string | null>();
  for (const n of tree.nodes) {
    parent.set(n.key, n.parentId != null ? (tree.byId.get(n.parentId)?.key ?? null) : null);
  }
  return parent;
}

/** Keys of every node that has children, for "collapse all". */
export function collectInnerKeys(tree: PlanTree): Set<string> {
  return new Set(tree.nodes.filter((n) => n.children.length > 0).map((n) => n.key));
}

export function countDescendants(tree: PlanTree, id: number): number {
  const node = tree.byId.get(id);
  if (!node) return 0;
  let count = 0;
  const stack = [...node.children];
  while (stack.length > 0) {
    const n = stack.pop();
    if (!n) break;
    count++;
    stack.push(...n.children);
  }
  return count;
}
