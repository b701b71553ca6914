import { promises as fs } from "fs";
import { farmUser } from "../src/config/environment.js";
import { FarmConfig } from "../src/config/farmConfig.js";
import { Level, serviceKeyFor } from "../src/execution/serviceKeys.js";
import { requestPackages } from "../src/execution/rez.js";
import { openSubtaskSink, queueChunkTasks, type ExpandMode } from "../src/execution/tractor/subtasks.js";
import { toComputeNode } from "../src/mcp/gatewayServer.js";
import { zComputeNode } from "../src/mcp/toolSchemas.js";

function usage(): string {
  return [
    "usage:",
    "  tsx scripts/queue_chunks.ts --node <node.json> --args <command args> [--submitter Tractor] [--service <expr>] [--mode stdout|file]",
    "",
    "env:",
    "  TRACTOR_SUBTASK_STDOUT_FD (set by the subtask wrapper, --mode stdout)",
    "  EXPAND_FILE (--mode file)",
    ""
  ].join("\n");
}

function parseArgs(argv: string[]): Record<string, string | boolean> {
  const out: Record<string, string | boolean> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a) continue;
    if (!a.startsWith("--")) throw new Error(`unexpected arg: ${a}`);
    const key = a.slice(2);
    if (key === "help") {
      out[key] = true;
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined) throw new Error(`missing value for --${key}`);
    out[key] = next;
    i++;
  }
  return out;
}

function isExpandMode(value: string): value is ExpandMode {
  return value === "stdout" || value === "file";
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    process.stderr.write(usage());
    return;
  }

  const nodePath = args.node;
  const commandArgs = args.args;
  if (typeof nodePath !== "string" || typeof commandArgs !== "string") {
    throw new Error(`--node and --args are required\n\n${usage()}`);
  }
  const mode = typeof args.mode === "string" ? args.mode : "stdout";
  if (!isExpandMode(mode)) throw new Error(`invalid --mode: ${mode}`);
  const submitterName = typeof args.submitter === "string" ? args.submitter : "Tractor";

  const env = process.env;
  const node = toComputeNode(zComputeNode.parse(JSON.parse(await fs.readFile(nodePath, "utf8"))));
  const config = await FarmConfig.loadForSubmitter(submitterName, env);
  const service =
    typeof args.service === "string"
      ? args.service
      : serviceKeyFor({ cpu: Level[node.cpu], ram: Level[node.ram], gpu: Level[node.gpu] }, config);

  const sink = openSubtaskSink(env, mode);
  const count = await queueChunkTasks(
    node,
    commandArgs,
    service,
    {
      tags: { prod: env.PROD || "mvg", nbFrames: node.size },
      rezPackages: requestPackages(env),
      environment: { FARM_USER: farmUser(env) }
    },
    { env, config },
    sink
  );
  console.error(`queued ${count} subtask(s) for ${node.name}`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
