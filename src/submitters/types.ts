import type { EnvSource, SubmitterEnvironment } from "../config/environment.js";
import type { FarmConfig } from "../config/farmConfig.js";
import type { ComputeGraph } from "../core/graph.js";
import type { FarmJobQuery, FarmJobQueryResult } from "../execution/tractor/jobQuery.js";
import type { JobEventSink } from "../execution/tractor/jobCreation.js";
import type { TractorSpooler } from "../execution/tractor/spooler.js";

export interface SubmitRequest {
  graph: ComputeGraph;
  /** Path of the saved graph file the farm tasks will load. */
  graphFile: string;
  /** Job title template; `{projectName}` is the graph file name without extension. */
  submitLabel?: string;
  priority?: string;
  share?: string | null;
  paused?: boolean;
  dryRun?: boolean;
}

export interface SubmitOutcome {
  submitter: string;
  title: string;
  owner: string;
  share: string[];
  priority: number;
  status: "dry_run" | "spooled";
  farmJobId: string | null;
  jobUrl: string | null;
  jobScript: string;
}

export interface Submitter {
  readonly name: string;
  readonly config: FarmConfig;
  createJob(request: SubmitRequest, onEvent?: JobEventSink): Promise<SubmitOutcome>;
  retrieveJob(jobId: string): Promise<FarmJobQueryResult>;
}

export interface FarmBackends {
  spooler: TractorSpooler;
  jobQuery: FarmJobQuery;
}

export interface SubmitterDeps extends FarmBackends {
  env: EnvSource;
  settings: SubmitterEnvironment;
  config: FarmConfig;
}
