import { ConfigurationError } from "../core/errors.js";
import type { ComputeNode } from "../core/graph.js";
import { requestPackages } from "../execution/rez.js";
import type { ChunkParams } from "../execution/tractor/jobInfos.js";
import { GraphSubmitter } from "./graphSubmitter.js";
import type { SubmitterDeps } from "./types.js";

export const SIMPLEFARM_ENGINES = ["tractor", "tractor-dummy"] as const;
export type SimpleFarmEngine = (typeof SIMPLEFARM_ENGINES)[number];

function isSimpleFarmEngine(value: string): value is SimpleFarmEngine {
  return (SIMPLEFARM_ENGINES as readonly string[]).includes(value);
}

/**
 * Submitter of the simpleFarm wrapper. Nodes are keyed by name, every
 * parallelized node gets one task per block, and the `tractor-dummy` engine
 * cooks the job without spooling it.
 */
export class SimpleFarmSubmitter extends GraphSubmitter {
  static readonly submitterName = "SimpleFarm";
  readonly name = SimpleFarmSubmitter.submitterName;
  readonly engine: SimpleFarmEngine;

  constructor(deps: SubmitterDeps) {
    super(deps);
    const engine = deps.env.MESHROOM_SIMPLEFARM_ENGINE || "tractor";
    if (!isSimpleFarmEngine(engine)) {
      throw new ConfigurationError(`unsupported MESHROOM_SIMPLEFARM_ENGINE: ${engine}`);
    }
    this.engine = engine;
  }

  protected defaultShare(): string {
    return this.deps.env.MESHROOM_SIMPLEFARM_SHARE || "vfx";
  }

  protected requestedPackages(): string[] {
    const env = this.deps.env;
    if (env.REZ_REQUEST === undefined && env.REZ_MESHROOM_VERSION !== undefined) {
      return [`meshroom-${env.REZ_MESHROOM_VERSION}`];
    }
    return requestPackages(env);
  }

  protected chunkParamsFor(node: ComputeNode): ChunkParams | null {
    if (!node.parallelization) return null;
    return { start: 0, end: node.parallelization.nbBlocks - 1 };
  }

  protected nodeKey(node: ComputeNode): string {
    return node.name;
  }

  protected cookOnly(): boolean {
    return this.engine === "tractor-dummy";
  }
}
