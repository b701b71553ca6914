import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import * as z from "zod/v4";
import { sha256Prefixed, stableJsonStringify, type Sha256Digest } from "../core/canonicalJson.js";
import { ConfigurationError } from "../core/errors.js";
import type { EnvSource } from "./environment.js";
import { splitSearchPath } from "./environment.js";
import { projectRoot } from "./paths.js";

export const LEVEL_NAMES = ["NONE", "NORMAL", "INTENSIVE", "EXTREME"] as const;
export type LevelName = (typeof LEVEL_NAMES)[number];

const zLevelTable = z.object({
  NONE: z.string(),
  NORMAL: z.string(),
  INTENSIVE: z.string(),
  EXTREME: z.string()
});

const zServiceKeyTable = z.object({
  levels: zLevelTable,
  ram: zLevelTable
});

const DEFAULT_COMMANDS = {
  compute: "meshroom_compute",
  create_chunks: "meshroom_createChunks",
  subtask_wrapper: "tsx {scripts}/subtask_wrapper.ts"
};

export const zFarmConfig = z.object({
  version: z.literal(1),
  service_keys: z.object({
    base: z.array(z.string().min(1)).default([]),
    script: z.string().min(1),
    cpu: zServiceKeyTable,
    gpu: zServiceKeyTable,
    exclude_hosts: z.array(z.string().min(1)).default([])
  }),
  licenses: z.record(z.string(), z.string()).default({}),
  priorities: z.record(z.string(), z.number().int()).default({ low: 4000, normal: 5000, high: 10000 }),
  default_priority: z.number().int().default(5000),
  job_url_template: z.string().default("http://{engine}/tv/#jid={jid}"),
  commands: z
    .object({
      compute: z.string().min(1).default(DEFAULT_COMMANDS.compute),
      create_chunks: z.string().min(1).default(DEFAULT_COMMANDS.create_chunks),
      subtask_wrapper: z.string().min(1).default(DEFAULT_COMMANDS.subtask_wrapper)
    })
    .default(() => ({ ...DEFAULT_COMMANDS }))
});

export type FarmConfigData = z.output<typeof zFarmConfig>;
export type ServiceKeyTable = z.output<typeof zServiceKeyTable>;

export const SUBMITTER_CONFIG_FILES: Record<string, { envVar: string; fileName: string }> = {
  Tractor: { envVar: "TRACTORCONFIG", fileName: "tractor.config.yaml" },
  SimpleFarm: { envVar: "SIMPLEFARMCONFIG", fileName: "simplefarm.config.yaml" }
};

export function bundledConfigDir(): string {
  return path.join(projectRoot(), "config");
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const st = await fs.stat(filePath);
    return st.isFile();
  } catch {
    return false;
  }
}

/**
 * Locates a submitter's config file: the submitter's own variable, then
 * MR_SUBMITTERS_CONFIGS, then each MESHROOM_SUBMITTERS_PATH entry, then the
 * bundled config directory.
 */
export async function resolveSubmitterConfigPath(submitterName: string, env: EnvSource): Promise<string> {
  const entry = Object.hasOwn(SUBMITTER_CONFIG_FILES, submitterName) ? SUBMITTER_CONFIG_FILES[submitterName] : undefined;
  if (!entry) throw new ConfigurationError(`no config file registered for submitter ${submitterName}`);

  const explicit = env[entry.envVar]?.trim();
  if (explicit) {
    if (!(await isFile(explicit))) throw new ConfigurationError(`${entry.envVar} points to a missing file: ${explicit}`);
    return explicit;
  }

  const dirs: string[] = [];
  const configsDir = env.MR_SUBMITTERS_CONFIGS?.trim();
  if (configsDir) dirs.push(configsDir);
  dirs.push(...splitSearchPath(env.MESHROOM_SUBMITTERS_PATH));
  dirs.push(bundledConfigDir());

  for (const dir of dirs) {
    const candidate = path.join(dir, entry.fileName);
    if (await isFile(candidate)) return candidate;
  }
  throw new ConfigurationError(`config file ${entry.fileName} not found (searched ${dirs.join(", ")})`);
}

export class FarmConfig {
  readonly configHash: Sha256Digest;

  constructor(readonly data: FarmConfigData) {
    this.configHash = sha256Prefixed(stableJsonStringify(data));
  }

  static parse(value: unknown, source = "inline config"): FarmConfig {
    const parsed = zFarmConfig.safeParse(value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new ConfigurationError(
        `invalid farm config at ${source}: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`.trim()
      );
    }
    return new FarmConfig(parsed.data);
  }

  static async loadFromFile(filePath: string): Promise<FarmConfig> {
    const raw = await fs.readFile(filePath, "utf8");
    return FarmConfig.parse(YAML.parse(raw) as unknown, filePath);
  }

  static async loadForSubmitter(submitterName: string, env: EnvSource): Promise<FarmConfig> {
    return FarmConfig.loadFromFile(await resolveSubmitterConfigPath(submitterName, env));
  }

  /** Service expression for the job itself, before any task-level requirement. */
  baseService(): string {
    return this.data.service_keys.base.join(",");
  }

  // names come from clients, so only the table's own keys count
  priority(name: string): number {
    const table = this.data.priorities;
    return (Object.hasOwn(table, name) ? table[name] : undefined) ?? this.data.default_priority;
  }

  licenseLimit(license: string): string {
    const table = this.data.licenses;
    return (Object.hasOwn(table, license) ? table[license] : undefined) ?? license;
  }

  jobUrl(jobId: string, engine: string): string {
    return this.data.job_url_template.replaceAll("{engine}", engine).replaceAll("{jid}", jobId);
  }

  subtaskWrapperCommand(scriptsDir: string): string {
    return this.data.commands.subtask_wrapper.replaceAll("{scripts}", scriptsDir);
  }
}
