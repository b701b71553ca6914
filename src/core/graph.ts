import type { LevelKey } from "../execution/serviceKeys.js";

export interface NodeParallelization {
  blockSize: number;
  fullSize: number;
  nbBlocks: number;
}

/** A compute-graph node as handed over by the host application. */
export interface ComputeNode {
  name: string;
  uid: string;
  size: number;
  parallelization: NodeParallelization | null;
  cpu: LevelKey;
  ram: LevelKey;
  gpu: LevelKey;
  licenses: string[];
}

/** `[dependent, dependency]` node uids: the dependency finishes first. */
export type GraphEdge = readonly [string, string];

export interface ComputeGraph {
  nodes: ComputeNode[];
  edges: GraphEdge[];
}

export function blockCount(node: ComputeNode): number {
  return node.parallelization ? node.parallelization.nbBlocks : 1;
}
