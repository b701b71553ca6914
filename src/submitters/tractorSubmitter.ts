import type { ComputeNode } from "../core/graph.js";
import { blockCount } from "../core/graph.js";
import { requestPackages } from "../execution/rez.js";
import type { ChunkParams } from "../execution/tractor/jobInfos.js";
import { GraphSubmitter } from "./graphSubmitter.js";

export class TractorSubmitter extends GraphSubmitter {
  static readonly submitterName = "Tractor";
  readonly name = TractorSubmitter.submitterName;

  protected defaultShare(): string {
    return this.deps.env.MESHROOM_TRACTOR_SHARE || "vfx";
  }

  protected requestedPackages(): string[] {
    return requestPackages(this.deps.env);
  }

  protected chunkParamsFor(node: ComputeNode): ChunkParams | null {
    const nbBlocks = blockCount(node);
    return nbBlocks > 1 ? { start: 0, end: nbBlocks - 1 } : null;
  }

  protected nodeKey(node: ComputeNode): string {
    return node.uid;
  }

  protected cookOnly(): boolean {
    return false;
  }
}
