import { spawn } from "child_process";
import { Readable, type Writable } from "stream";
import { joinShellWords } from "../shellWords.js";
import { SUBTASK_FD_VARIABLE } from "./subtasks.js";

export const SUBTASK_FD = 3;

export const TaskReturnCode = {
  SUCCESS: 0,
  ERROR: 1,
  // -999 as seen through an 8-bit process exit status
  ERROR_NO_RETRY: -999 & 0xff
} as const;

export const NO_RETRY_STATUS_LINE = "TR_EXIT_STATUS -999";

export interface WrapperStreams {
  stdout: Writable;
  stderr: Writable;
}

export function isNoRetryExit(exitCode: number): boolean {
  return exitCode === TaskReturnCode.ERROR_NO_RETRY || exitCode === -999;
}

/**
 * Runs `argv` through bash with its stdout and stderr both sent to our stderr.
 * The child gets a pipe on fd 3 for subtask definitions, copied to our stdout,
 * which the engine reads to expand the task.
 */
export async function runSubtaskWrapper(
  argv: string[],
  streams: WrapperStreams = { stdout: process.stdout, stderr: process.stderr },
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  if (argv.length === 0) {
    streams.stderr.write("usage: subtask_wrapper <command> [args...]\n");
    return TaskReturnCode.ERROR;
  }

  const commandLine = joinShellWords(argv);
  streams.stderr.write(`[subtask_wrapper] executing: ${commandLine}\n`);

  const child = spawn("/bin/bash", ["-c", commandLine], {
    env: { ...env, [SUBTASK_FD_VARIABLE]: String(SUBTASK_FD) },
    stdio: ["ignore", "pipe", "pipe", "pipe"]
  });

  child.stdout?.on("data", (chunk: Buffer) => streams.stderr.write(chunk));
  child.stderr?.on("data", (chunk: Buffer) => streams.stderr.write(chunk));

  const subtaskStream = child.stdio[SUBTASK_FD];
  if (subtaskStream instanceof Readable) {
    subtaskStream.on("data", (chunk: Buffer) => streams.stdout.write(chunk));
  }

  let exitCode: number;
  try {
    exitCode = await new Promise<number>((resolve, reject) => {
      child.on("error", reject);
      child.on("close", (code: number | null) => resolve(code ?? TaskReturnCode.ERROR));
    });
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    streams.stderr.write(`[subtask_wrapper] error running ${commandLine}: ${message}\n`);
    return TaskReturnCode.ERROR;
  }

  streams.stderr.write(`[subtask_wrapper] command completed with exit code ${exitCode}\n`);
  if (isNoRetryExit(exitCode)) {
    streams.stderr.write("[subtask_wrapper] exit status set to prevent automatic retry\n");
    streams.stdout.write(NO_RETRY_STATUS_LINE);
  }
  return exitCode;
}
