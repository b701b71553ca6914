import type { EnvSource } from "../../config/environment.js";
import { farmUser } from "../../config/environment.js";
import type { FarmConfig } from "../../config/farmConfig.js";
import { ConfigurationError } from "../../core/errors.js";
import type { JsonPrimitive } from "../../core/json.js";
import { rezWrapCommand, type RezWrapOptions } from "../rez.js";
import { splitShellWords } from "../shellWords.js";
import type { AuthorJobInit, AuthorTaskInit } from "./author.js";

export interface FarmContext {
  env: EnvSource;
  config: FarmConfig;
}

export type Tags = Record<string, JsonPrimitive>;

export interface Chunk {
  iteration: number;
  start: number;
  end: number;
}

export interface ChunkParams {
  start: number;
  end: number;
  packetSize?: number;
}

export function toTractorEnv(environment: Record<string, string>): string[] {
  return Object.entries(environment).map(([k, v]) => `setenv ${k}=${v}`);
}

function requireService(service: string | null | undefined, env: EnvSource): string {
  const resolved = service || env.DEFAULT_TRACTOR_SERVICE;
  if (!resolved) throw new ConfigurationError("no service given and DEFAULT_TRACTOR_SERVICE is not set");
  return resolved;
}

export function chunksFor(params: ChunkParams | null | undefined): Chunk[] {
  if (!params) return [];
  const size = Math.max(1, Math.floor(params.packetSize ?? 1));
  const chunks: Chunk[] = [];
  for (let start = params.start, iteration = 0; start <= params.end; start += size, iteration++) {
    chunks.push({ iteration, start, end: Math.min(start + size - 1, params.end) });
  }
  return chunks;
}

export interface JobInfosInit {
  name: string;
  share?: string | string[] | null;
  service?: string | null;
  environment?: Record<string, string>;
  tags?: Tags;
  user?: string | null;
  comment?: string;
  paused?: boolean;
}

export class JobInfos {
  readonly name: string;
  share: string[];
  readonly service: string;
  readonly tags: Tags;
  readonly paused: boolean;
  readonly comment: string;
  readonly user: string;
  readonly environment: Record<string, string>;

  constructor(init: JobInfosInit, env: EnvSource) {
    this.name = init.name;
    this.share = JobInfos.resolveShare(init.share, env);
    this.service = requireService(init.service, env);
    this.tags = { ...(init.tags ?? {}) };
    this.paused = init.paused ?? false;
    this.comment = init.comment ?? "";
    this.user = init.user || farmUser(env);
    this.environment = { ...(init.environment ?? {}), FARM_USER: this.user };
  }

  static resolveShare(share: string | string[] | null | undefined, env: EnvSource): string[] {
    if (share && share.length > 0) return typeof share === "string" ? [share] : [...share];
    const fallback = env.DEFAULT_FARM_SHARE_TRACTOR;
    if (fallback) return fallback.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
    return [];
  }

  cook(): AuthorJobInit {
    return {
      title: this.name,
      service: this.service,
      metadata: JSON.stringify(this.tags),
      envkey: toTractorEnv(this.environment),
      paused: this.paused,
      comment: this.comment,
      spoolcwd: "/tmp",
      projects: this.share
    };
  }
}

export interface TaskInfosInit {
  name: string;
  commandArgs: string;
  nodeUid: string;
  environment?: Record<string, string>;
  rezPackages?: string[];
  /** Also request the packages of the submitting rez context (default true). */
  useRequestedContext?: boolean;
  service?: string | null;
  licenses?: string[];
  tags?: Tags;
  expandingTask?: boolean;
  chunkParams?: ChunkParams | null;
  submitterName?: string;
}

export interface CookedTask extends AuthorTaskInit {
  argv: string[] | null;
  service: string;
  metadata: string;
}

export class TaskInfos {
  readonly name: string;
  readonly uid: string;
  readonly commandArgs: string;
  readonly environment: Record<string, string>;
  readonly rezPackages: string[];
  readonly useRequestedContext: boolean;
  readonly service: string;
  readonly limits: string[];
  readonly tags: Tags;
  readonly expandingTask: boolean;
  readonly chunks: Chunk[];
  readonly submitterName: string;

  constructor(
    init: TaskInfosInit,
    private readonly ctx: FarmContext
  ) {
    this.name = init.name;
    this.uid = init.nodeUid;
    this.commandArgs = init.commandArgs;
    this.environment = { ...(init.environment ?? {}) };
    this.rezPackages = [...(init.rezPackages ?? [])];
    this.useRequestedContext = init.useRequestedContext ?? true;
    this.service = requireService(init.service, ctx.env);
    this.limits = TaskInfos.limitsFor(init.licenses ?? [], ctx);
    this.tags = { ...(init.tags ?? {}), nodeUid: init.nodeUid };
    this.expandingTask = init.expandingTask ?? false;
    this.chunks = this.expandingTask ? [] : chunksFor(init.chunkParams);
    this.submitterName = init.submitterName ?? "Tractor";
  }

  static limitsFor(licenses: string[], ctx: FarmContext): string[] {
    const limits = licenses.map((license) => ctx.config.licenseLimit(license));
    const defaultLimit = ctx.env.DEFAULT_TRACTOR_LIMIT;
    if (defaultLimit) limits.push(defaultLimit);
    return limits;
  }

  get envkey(): string[] {
    return toTractorEnv(this.environment);
  }

  get context(): FarmContext {
    return this.ctx;
  }

  private rezOptions(): RezWrapOptions {
    return { useRequestedContext: this.useRequestedContext, extraPackages: this.rezPackages };
  }

  computeCommand(extraArgs = ""): string {
    const compute = this.ctx.config.data.commands.compute;
    const cmd = `${compute} ${this.commandArgs}${extraArgs}`;
    return rezWrapCommand(cmd, this.ctx.env, this.rezOptions());
  }

  /** Command of a task that creates its own chunk subtasks at run time. */
  expandingCommand(): string {
    const scriptsDir = this.ctx.env.MR_SUBMITTERS_SCRITPS;
    if (!scriptsDir) throw new ConfigurationError("MR_SUBMITTERS_SCRITPS is required for expanding tasks");

    const createChunks = this.ctx.config.data.commands.create_chunks;
    let cmd = `${createChunks} --submitter ${this.submitterName} ${this.commandArgs}`;
    cmd = rezWrapCommand(cmd, this.ctx.env, this.rezOptions());
    // The wrapper keeps stdout for subtask definitions only.
    return `${this.ctx.config.subtaskWrapperCommand(scriptsDir)} ${cmd}`;
  }

  cook(): CookedTask {
    let cmd: string | null;
    if (this.expandingTask) cmd = this.expandingCommand();
    else if (this.chunks.length > 0) cmd = null;
    else cmd = this.computeCommand();

    return {
      title: this.name,
      argv: cmd ? splitShellWords(cmd) : null,
      service: this.service,
      metadata: JSON.stringify(this.tags)
    };
  }
}

export class ChunkTaskInfos {
  constructor(
    readonly taskInfos: TaskInfos,
    readonly chunk: Chunk
  ) {}

  cook(): CookedTask & { argv: string[] } {
    const tags: Tags = { ...this.taskInfos.tags, iteration: this.chunk.iteration };
    const cmd = this.taskInfos.computeCommand(` --iteration ${this.chunk.iteration}`);
    return {
      title: `${this.taskInfos.name}_${this.chunk.start}_${this.chunk.end}`,
      argv: splitShellWords(cmd),
      service: this.taskInfos.service,
      metadata: JSON.stringify(tags)
    };
  }
}
