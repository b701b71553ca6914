import path from "path";
import { farmUser, forwardedEnvironment } from "../config/environment.js";
import type { FarmConfig } from "../config/farmConfig.js";
import { InvalidGraphError } from "../core/errors.js";
import type { ComputeNode } from "../core/graph.js";
import { Level, serviceKeyFor } from "../execution/serviceKeys.js";
import { joinShellWords } from "../execution/shellWords.js";
import type { FarmJobQueryResult } from "../execution/tractor/jobQuery.js";
import { FarmJob, type JobEventSink, type TaskNode } from "../execution/tractor/jobCreation.js";
import type { ChunkParams, FarmContext, Tags } from "../execution/tractor/jobInfos.js";
import type { SubmitOutcome, SubmitRequest, Submitter, SubmitterDeps } from "./types.js";

export const DEFAULT_SUBMIT_LABEL = "{projectName}";

export function projectNameOf(graphFile: string): string {
  return path.basename(graphFile, path.extname(graphFile));
}

export function jobTitle(graphFile: string, submitLabel: string = DEFAULT_SUBMIT_LABEL): string {
  return submitLabel.replaceAll("{projectName}", projectNameOf(graphFile));
}

/**
 * Turns a compute graph into one farm job: a task per node, dependencies
 * following the graph edges.
 */
export abstract class GraphSubmitter implements Submitter {
  abstract readonly name: string;
  protected readonly ctx: FarmContext;

  constructor(protected readonly deps: SubmitterDeps) {
    this.ctx = { env: deps.env, config: deps.config };
  }

  get config(): FarmConfig {
    return this.deps.config;
  }

  protected get prod(): string {
    return this.deps.env.PROD || "mvg";
  }

  protected abstract defaultShare(): string;
  /** Every rez package a task needs; the submitting context is not added on top. */
  protected abstract requestedPackages(): string[];
  protected abstract chunkParamsFor(node: ComputeNode): ChunkParams | null;
  /** Key under which a node's task is registered; edges resolve through it. */
  protected abstract nodeKey(node: ComputeNode): string;
  /** Whether this submitter only cooks the job (never spools it). */
  protected abstract cookOnly(): boolean;

  protected serviceFor(node: ComputeNode): string {
    return serviceKeyFor({ cpu: Level[node.cpu], ram: Level[node.ram], gpu: Level[node.gpu] }, this.config);
  }

  protected commandArgsFor(node: ComputeNode, graphFile: string): string {
    return joinShellWords(["--node", node.name, graphFile, "--extern"]);
  }

  protected createTask(job: FarmJob, node: ComputeNode, graphFile: string, packages: string[]): TaskNode {
    const tags: Tags = { prod: this.prod, nbFrames: node.size };
    return job.createTask({
      name: node.name,
      nodeUid: node.uid,
      commandArgs: this.commandArgsFor(node, graphFile),
      tags,
      rezPackages: packages,
      useRequestedContext: false,
      service: this.serviceFor(node),
      licenses: node.licenses,
      chunkParams: this.chunkParamsFor(node),
      submitterName: this.name
    });
  }

  async createJob(request: SubmitRequest, onEvent?: JobEventSink): Promise<SubmitOutcome> {
    const { graph, graphFile } = request;
    if (graph.nodes.length === 0) throw new InvalidGraphError("cannot submit a graph without nodes");

    const title = jobTitle(graphFile, request.submitLabel);
    const maxSize = Math.max(...graph.nodes.map((n) => n.size));
    const env = this.deps.env;

    const job = new FarmJob(
      {
        name: title,
        tags: { prod: this.prod, nbFrames: String(maxSize), comment: graphFile },
        service: this.config.baseService() || null,
        environment: forwardedEnvironment(env),
        user: farmUser(env),
        paused: request.paused ?? false
      },
      this.ctx,
      onEvent
    );

    const packages = this.requestedPackages();
    const tasksByUid = new Map<string, TaskNode>();
    const tasksByKey = new Map<string, TaskNode>();
    for (const node of graph.nodes) {
      const key = this.nodeKey(node);
      const known = tasksByKey.get(key);
      if (known) {
        tasksByUid.set(node.uid, known);
        continue;
      }
      const task = this.createTask(job, node, graphFile, packages);
      tasksByKey.set(key, task);
      tasksByUid.set(node.uid, task);
    }

    for (const [dependentUid, dependencyUid] of graph.edges) {
      const dependent = tasksByUid.get(dependentUid);
      const dependency = tasksByUid.get(dependencyUid);
      if (!dependent || !dependency) {
        throw new InvalidGraphError(`edge references unknown node: ${dependent ? dependencyUid : dependentUid}`);
      }
      dependent.addChild(dependency);
    }

    const result = await job.submit({
      priority: request.priority,
      share: request.share || this.defaultShare(),
      dryRun: (request.dryRun ?? false) || this.cookOnly(),
      engine: this.deps.settings.tractorEngine,
      spooler: this.deps.spooler
    });

    return {
      submitter: this.name,
      title,
      owner: job.jobInfos.user,
      share: [...job.jobInfos.share],
      priority: result.priority,
      status: result.kind,
      farmJobId: result.kind === "spooled" ? result.jobId : null,
      jobUrl: result.kind === "spooled" ? result.url : null,
      jobScript: result.jobScript
    };
  }

  async retrieveJob(jobId: string): Promise<FarmJobQueryResult> {
    return this.deps.jobQuery.query(jobId);
  }
}
