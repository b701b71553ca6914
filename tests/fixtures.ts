import path from "path";
import type { EnvSource } from "../src/config/environment.js";
import { loadSubmitterEnvironment } from "../src/config/environment.js";
import { FarmConfig } from "../src/config/farmConfig.js";
import { TractorSpoolError } from "../src/core/errors.js";
import type { ComputeNode } from "../src/core/graph.js";
import type { FarmJobQuery, FarmJobQueryResult } from "../src/execution/tractor/jobQuery.js";
import type { TractorSpoolOptions, TractorSpooler, TractorSpoolResult } from "../src/execution/tractor/spooler.js";
import type { SubmitterDeps } from "../src/submitters/types.js";

export function tractorConfig(): Promise<FarmConfig> {
  return FarmConfig.loadFromFile(path.resolve("config/tractor.config.yaml"));
}

export class FakeSpooler implements TractorSpooler {
  readonly calls: Array<{ jobScript: string; options: TractorSpoolOptions }> = [];

  constructor(private readonly jobId = "101") {}

  async spool(jobScript: string, options: TractorSpoolOptions): Promise<TractorSpoolResult> {
    this.calls.push({ jobScript, options });
    return { jobId: this.jobId, stdout: `New jid: ${this.jobId}\n`, stderr: "" };
  }
}

export class FailingSpooler implements TractorSpooler {
  readonly calls: string[] = [];

  constructor(private readonly message = "tractor-spool exited with code 1") {}

  async spool(jobScript: string): Promise<TractorSpoolResult> {
    this.calls.push(jobScript);
    throw new TractorSpoolError(this.message, "", "engine unreachable");
  }
}

export class FakeJobQuery implements FarmJobQuery {
  readonly queried: string[] = [];

  constructor(private readonly result: FarmJobQueryResult) {}

  async query(jobId: string): Promise<FarmJobQueryResult> {
    this.queried.push(jobId);
    return this.result;
  }
}

export function node(init: Partial<ComputeNode> & { name: string; uid: string }): ComputeNode {
  return {
    size: 1,
    parallelization: null,
    cpu: "NORMAL",
    ram: "NORMAL",
    gpu: "NONE",
    licenses: [],
    ...init
  };
}

export async function submitterDeps(
  env: EnvSource,
  backends: { spooler?: TractorSpooler; jobQuery?: FarmJobQuery } = {}
): Promise<SubmitterDeps> {
  return {
    env,
    settings: loadSubmitterEnvironment(env),
    config: await tractorConfig(),
    spooler: backends.spooler ?? new FakeSpooler(),
    jobQuery: backends.jobQuery ?? new FakeJobQuery({ info: null, warnings: [] })
  };
}
