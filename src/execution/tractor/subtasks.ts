/**
 * Subtask definitions written by a running expanding task.
 *
 * An expanding task runs under the subtask wrapper, which hands it a private
 * stream (TRACTOR_SUBTASK_STDOUT_FD). Every task script written there is read
 * back by the engine when the task ends and added under it.
 */
import { appendFile } from "fs/promises";
import { writeSync } from "fs";
import type { EnvSource } from "../../config/environment.js";
import type { ComputeNode } from "../../core/graph.js";
import { blockCount } from "../../core/graph.js";
import { SubtaskStreamError } from "../../core/errors.js";
import { splitShellWords } from "../shellWords.js";
import { AuthorTask } from "./author.js";
import { ChunkTaskInfos, TaskInfos, type ChunkParams, type FarmContext, type Tags } from "./jobInfos.js";

export const SUBTASK_FD_VARIABLE = "TRACTOR_SUBTASK_STDOUT_FD";
export const EXPAND_FILE_VARIABLE = "EXPAND_FILE";

export type ExpandMode = "stdout" | "file";

export interface SubtaskSink {
  write(definition: string): Promise<void>;
}

export class FdSubtaskSink implements SubtaskSink {
  constructor(readonly fd: number) {}

  async write(definition: string): Promise<void> {
    writeSync(this.fd, definition);
  }
}

export class FileSubtaskSink implements SubtaskSink {
  constructor(readonly filePath: string) {}

  async write(definition: string): Promise<void> {
    await appendFile(this.filePath, `\n${definition}\n`, "utf8");
  }
}

export function openSubtaskSink(env: EnvSource, mode: ExpandMode = "stdout"): SubtaskSink {
  if (mode === "file") {
    const filePath = env[EXPAND_FILE_VARIABLE];
    if (!filePath) throw new SubtaskStreamError(`${EXPAND_FILE_VARIABLE} is not set`);
    return new FileSubtaskSink(filePath);
  }

  const raw = env[SUBTASK_FD_VARIABLE];
  if (!raw) throw new SubtaskStreamError(`${SUBTASK_FD_VARIABLE} is not set; run the command through the subtask wrapper`);
  const fd = Number.parseInt(raw, 10);
  if (!Number.isInteger(fd) || fd < 0) throw new SubtaskStreamError(`invalid ${SUBTASK_FD_VARIABLE}: ${raw}`);
  return new FdSubtaskSink(fd);
}

export interface SubtaskDefinition {
  title: string;
  argv: string | string[];
  service?: string;
  limits?: string[];
  metadata?: Tags | string | null;
  envkey?: string[];
}

export function renderSubtask(def: SubtaskDefinition): string {
  const argv = typeof def.argv === "string" ? splitShellWords(def.argv) : [...def.argv];
  const metadata =
    def.metadata === undefined || def.metadata === null
      ? ""
      : typeof def.metadata === "string"
        ? def.metadata
        : JSON.stringify(def.metadata);

  const task = new AuthorTask({ title: def.title, service: def.service, metadata });
  task.addCommand({ argv, service: def.service, tags: def.limits, envkey: def.envkey });
  return task.asTcl();
}

export async function queueSubtask(def: SubtaskDefinition, sink: SubtaskSink): Promise<void> {
  await sink.write(renderSubtask(def));
  console.error(`queued subtask: ${def.title}`);
}

export interface QueueChunkOptions {
  tags?: Tags;
  rezPackages?: string[];
  environment?: Record<string, string>;
}

/**
 * Queues the work of one node from inside its expanding task: one subtask per
 * block, or a single compute subtask when the node is not split.
 */
export async function queueChunkTasks(
  node: ComputeNode,
  commandArgs: string,
  service: string,
  options: QueueChunkOptions,
  ctx: FarmContext,
  sink: SubtaskSink
): Promise<number> {
  const nbBlocks = blockCount(node);
  const chunkParams: ChunkParams | null = nbBlocks > 1 ? { start: 0, end: nbBlocks - 1 } : null;

  const infos = new TaskInfos(
    {
      name: node.name,
      commandArgs,
      nodeUid: node.uid,
      environment: options.environment,
      rezPackages: options.rezPackages,
      service,
      licenses: node.licenses,
      tags: options.tags ? { ...options.tags } : undefined,
      expandingTask: false,
      chunkParams
    },
    ctx
  );

  if (infos.chunks.length === 0) {
    const cooked = infos.cook();
    await queueSubtask(
      {
        title: cooked.title,
        argv: cooked.argv ?? [],
        service: cooked.service,
        metadata: cooked.metadata,
        limits: infos.limits,
        envkey: infos.envkey
      },
      sink
    );
    return 1;
  }

  for (const chunk of infos.chunks) {
    const cooked = new ChunkTaskInfos(infos, chunk).cook();
    await queueSubtask(
      {
        title: cooked.title,
        argv: cooked.argv,
        service: cooked.service,
        metadata: cooked.metadata,
        limits: infos.limits,
        envkey: infos.envkey
      },
      sink
    );
  }
  return infos.chunks.length;
}
