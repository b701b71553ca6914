import { InvalidGraphError } from "../../core/errors.js";
import type { JsonObject } from "../../core/json.js";
import { AuthorJob, AuthorTask } from "./author.js";
import { ChunkTaskInfos, JobInfos, TaskInfos, type FarmContext, type JobInfosInit, type TaskInfosInit } from "./jobInfos.js";
import type { TractorSpooler } from "./spooler.js";

export type JobEventSink = (kind: string, message: string, data: JsonObject | null) => void;

/** A cooked node: its task, plus one task per chunk when the node is split. */
export interface CookedTractorTask {
  task: AuthorTask;
  chunkTasks: Map<number, AuthorTask>;
}

export function cookTractorTask(infos: TaskInfos): CookedTractorTask {
  const task = new AuthorTask(infos.cook());
  const chunkTasks = new Map<number, AuthorTask>();

  if (infos.chunks.length > 0) {
    for (const chunk of infos.chunks) {
      const chunkTask = task.newTask(new ChunkTaskInfos(infos, chunk).cook());
      for (const cmd of chunkTask.cmds) {
        cmd.tags = [...infos.limits];
        cmd.envkey = infos.envkey;
      }
      chunkTasks.set(chunk.iteration, chunkTask);
    }
  } else {
    for (const cmd of task.cmds) {
      cmd.tags = [...infos.limits];
      cmd.envkey = infos.envkey;
      cmd.expand = infos.expandingTask;
    }
  }
  return { task, chunkTasks };
}

/**
 * One compute node submitted to the farm. Children must finish before their
 * parent starts.
 */
export class TaskNode {
  readonly children = new Set<TaskNode>();
  readonly parents = new Set<TaskNode>();

  constructor(readonly infos: TaskInfos) {}

  get key(): string {
    return `${this.infos.name}\u0000${this.infos.uid}`;
  }

  toString(): string {
    return `<Task ${this.infos.name} ${this.infos.uid}>`;
  }

  addChild(task: TaskNode | readonly TaskNode[]): void {
    if (task instanceof TaskNode) {
      this.children.add(task);
      task.parents.add(this);
      return;
    }
    for (const t of task) this.addChild(t);
  }
}

export class TaskGraph {
  private readonly tasks = new Map<string, TaskNode>();
  private readonly cooked = new Map<string, CookedTractorTask>();

  constructor(private readonly onEvent: JobEventSink) {}

  get size(): number {
    return this.tasks.size;
  }

  get all(): TaskNode[] {
    return [...this.tasks.values()];
  }

  get roots(): TaskNode[] {
    return this.all.filter((t) => t.parents.size === 0);
  }

  get leaves(): TaskNode[] {
    return this.all.filter((t) => t.children.size === 0);
  }

  find(key: string): TaskNode | undefined {
    return this.tasks.get(key);
  }

  add(task: TaskNode): void {
    this.tasks.set(task.key, task);
  }

  assertAcyclic(): void {
    const state = new Map<TaskNode, "visiting" | "done">();
    const visit = (task: TaskNode): void => {
      const s = state.get(task);
      if (s === "done") return;
      if (s === "visiting") throw new InvalidGraphError(`task graph has a cycle through ${task.infos.name}`);
      state.set(task, "visiting");
      for (const child of task.children) visit(child);
      state.set(task, "done");
    };
    for (const task of this.tasks.values()) visit(task);
  }

  cookTask(task: TaskNode): AuthorTask {
    const uid = task.infos.uid;
    const existing = this.cooked.get(uid);
    if (existing) return existing.task;

    this.onEvent("task.cooked", `create task ${task.infos.name}`, { node_uid: uid, chunks: task.infos.chunks.length });
    const cooked = cookTractorTask(task.infos);
    this.cooked.set(uid, cooked);

    for (const child of task.children) {
      const childTask = this.cookTask(child);
      if (cooked.chunkTasks.size > 0) {
        for (const chunkTask of cooked.chunkTasks.values()) chunkTask.addChild(childTask);
      } else {
        cooked.task.addChild(childTask);
      }
    }
    return cooked.task;
  }

  cook(jobTask: AuthorTask): void {
    this.cooked.clear();
    for (const root of this.roots) jobTask.addChild(this.cookTask(root));
  }
}

export interface FarmSubmitOptions {
  priority?: string;
  share?: string | string[] | null;
  dryRun?: boolean;
  engine: string;
  spooler: TractorSpooler;
}

export type FarmSubmitResult =
  | { kind: "dry_run"; jobScript: string; priority: number }
  | { kind: "spooled"; jobScript: string; priority: number; jobId: string; url: string };

export class FarmJob {
  readonly jobInfos: JobInfos;
  private readonly graph: TaskGraph;

  constructor(
    init: JobInfosInit,
    private readonly ctx: FarmContext,
    private readonly onEvent: JobEventSink = () => undefined
  ) {
    this.jobInfos = new JobInfos(init, ctx.env);
    this.graph = new TaskGraph(onEvent);
  }

  get tasks(): TaskNode[] {
    return this.graph.all;
  }

  /** Adds a task, or returns the already registered task with the same name and uid. */
  createTask(init: TaskInfosInit): TaskNode {
    const task = new TaskNode(new TaskInfos({ ...init, tags: init.tags ? { ...init.tags } : undefined }, this.ctx));
    const existing = this.graph.find(task.key);
    if (existing) {
      this.onEvent("task.duplicate", `task already created: ${existing.toString()}`, { node_uid: init.nodeUid });
      return existing;
    }
    this.graph.add(task);
    return task;
  }

  cook(): AuthorJob {
    this.graph.assertAcyclic();
    const job = new AuthorJob(this.jobInfos.cook());
    const serialsubtasks = this.graph.leaves.length === 1;
    const jobTask = job.newTask({ title: this.jobInfos.name, argv: null, serialsubtasks });
    this.graph.cook(jobTask);
    if (this.graph.size === 0) {
      // the engine refuses jobs without tasks
      job.newTask({ title: "dummy" });
    }
    return job;
  }

  async submit(options: FarmSubmitOptions): Promise<FarmSubmitResult> {
    if (options.share && options.share.length > 0) {
      this.jobInfos.share = JobInfos.resolveShare(options.share, this.ctx.env);
    }

    const job = this.cook();
    job.priority = this.ctx.config.priority(options.priority ?? "normal");
    const jobScript = job.asTcl();

    if (options.dryRun) {
      this.onEvent("job.dry_run", `job ${this.jobInfos.name} not spooled`, { priority: job.priority });
      return { kind: "dry_run", jobScript, priority: job.priority };
    }

    const res = await options.spooler.spool(jobScript, { owner: this.jobInfos.user, engine: options.engine });
    const url = this.ctx.config.jobUrl(res.jobId, options.engine);
    this.onEvent("job.spooled", `jid=${res.jobId}`, { job_id: res.jobId, url });
    return { kind: "spooled", jobScript, priority: job.priority, jobId: res.jobId, url };
  }
}
