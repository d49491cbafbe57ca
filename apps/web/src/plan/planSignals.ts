import type { OperatorKind, PlanTree } from "./types";

export type PlanSignals = {
  nodeCount: number;
  maxDepth: number;
  countsByKind: Record<OperatorKind, number>;
  shuffleCount: number;
  broadcastJoinCount: number;
  scanCount: number;
  pushedFilterScanCount: number;
  totalShufflePartitions: number;
  spillNodeCount: number;
};

function emptyKindCounts(): Record<OperatorKind, number> {
  return {
    Scan: 0,
    Filter: 0,
    Join: 0,
    Exchange: 0,
    Aggregate: 0,
    Sort: 0,
    Project: 0,
    Window: 0,
    Union: 0,
    Unknown: 0,
  };
}

export function summarizePlanSignals(tree: PlanTree): PlanSignals {
  const countsByKind = emptyKindCounts();
  let maxDepth = 0;
  let shuffleCount = 0;
  let broadcastJoinCount = 0;
  let pushedFilterScanCount = 0;
  let totalShufflePartitions = 0;
  let spillNodeCount = 0;

  for (const n of tree.nodes) {
    countsByKind[n.kind]++;
    maxDepth = Math.max(maxDepth, n.depth);
    if ((n.metrics?.spillSizeBytes ?? 0) > 0) spillNodeCount++;

    const f = n.fields;
    if (f.kind === "Exchange" && f.isShuffle && !f.reused) {
      shuffleCount++;
      totalShufflePartitions += f.partitions ?? 0;
    } else if (f.kind === "Join" && f.broadcast) {
      broadcastJoinCount++;
    } else if (f.kind === "Scan" && f.hasPushedFilters) {
      pushedFilterScanCount++;
    }
  }

  return {
    nodeCount: tree.nodes.length,
    maxDepth,
    countsByKind,
    shuffleCount,
    broadcastJoinCount,
    scanCount: countsByKind.Scan,
    pushedFilterScanCount,
    totalShufflePartitions,
    spillNodeCount,
  };
}
