import os from "os";
import path from "path";
import * as z from "zod/v4";
import { ConfigurationError } from "../core/errors.js";
import type { JsonObject } from "../core/json.js";

export type EnvSource = Readonly<Record<string, string | undefined>>;

export const DEFAULT_SUBMITTER = "Tractor";
export const DEFAULT_TRACTOR_ENGINE = "tractor-engine";

// Variables propagated from the submitting session into every farm job.
const FORWARDED_VARIABLES = ["REZ_DEV_PACKAGES_ROOT", "REZ_PROD_PACKAGES_PATH", "PROD", "PROD_ROOT"] as const;

const zEngine = z
  .string()
  .regex(/^[A-Za-z0-9][A-Za-z0-9.-]*(:\d{1,5})?$/, "TRACTOR_ENGINE must be host or host:port");

const zRawEnvironment = z.object({
  MESHROOM_DEFAULT_SUBMITTER: z.string().trim().min(1).optional(),
  MESHROOM_SUBMITTERS_PATH: z.string().optional(),
  MR_SUBMITTERS_CONFIGS: z.string().trim().min(1).optional(),
  MR_SUBMITTERS_SCRITPS: z.string().trim().min(1).optional(),
  TRACTOR_ENGINE: zEngine.optional(),
  TRACTOR_USER: z.string().min(1).optional(),
  TRACTOR_PASSWORD: z.string().min(1).optional(),
  DATABASE_URL: z.string().min(1).optional(),
  AUTO_SCHEMA: z.enum(["true", "false", "TRUE", "FALSE", "1", "0"]).optional()
});

export interface SubmitterEnvironment {
  defaultSubmitter: string;
  submittersPath: string[];
  submittersConfigDir: string | null;
  submittersScriptsDir: string | null;
  tractorEngine: string;
  tractorUser: string | null;
  tractorPassword: string | null;
  databaseUrl: string | null;
  autoSchema: boolean;
}

function blankToUndefined(env: EnvSource): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim().length > 0) out[k] = v;
  }
  return out;
}

export function splitSearchPath(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(path.delimiter)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function loadSubmitterEnvironment(env: EnvSource = process.env): SubmitterEnvironment {
  const parsed = zRawEnvironment.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") ?? "environment";
    throw new ConfigurationError(`invalid ${where}: ${issue?.message ?? "unknown issue"}`);
  }
  const raw = parsed.data;
  const autoSchema = raw.AUTO_SCHEMA === undefined ? true : !["false", "FALSE", "0"].includes(raw.AUTO_SCHEMA);

  return {
    defaultSubmitter: raw.MESHROOM_DEFAULT_SUBMITTER ?? DEFAULT_SUBMITTER,
    submittersPath: splitSearchPath(raw.MESHROOM_SUBMITTERS_PATH),
    submittersConfigDir: raw.MR_SUBMITTERS_CONFIGS ?? null,
    submittersScriptsDir: raw.MR_SUBMITTERS_SCRITPS ?? null,
    tractorEngine: raw.TRACTOR_ENGINE ?? DEFAULT_TRACTOR_ENGINE,
    tractorUser: raw.TRACTOR_USER ?? null,
    tractorPassword: raw.TRACTOR_PASSWORD ?? null,
    databaseUrl: raw.DATABASE_URL ?? null,
    autoSchema
  };
}

export function farmUser(env: EnvSource): string {
  return env.FARM_USER || env.USER || os.userInfo().username;
}

export function forwardedEnvironment(env: EnvSource): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of FORWARDED_VARIABLES) {
    const value = env[key];
    if (value !== undefined) out[key] = value;
  }
  return out;
}

/**
 * Directories the compute-graph host expects on its module search path,
 * relative to the install root (the parent of MR_SUBMITTERS_SCRITPS).
 */
export function expectedHostSearchPath(settings: SubmitterEnvironment): string[] {
  if (!settings.submittersScriptsDir) return [];
  const root = path.dirname(path.resolve(settings.submittersScriptsDir));
  return [root, path.join(root, "meshroom"), path.join(root, "python")];
}

export function envSnapshot(settings: SubmitterEnvironment, env: EnvSource = process.env): JsonObject {
  const hostSearchPath = new Set(splitSearchPath(env.PYTHONPATH).map((p) => path.resolve(p)));
  return {
    node: process.version,
    mode: settings.databaseUrl ? "postgres" : "pg-mem",
    default_submitter: settings.defaultSubmitter,
    submitters_path: settings.submittersPath,
    submitters_configs: settings.submittersConfigDir,
    submitters_scripts: settings.submittersScriptsDir,
    tractor_engine: settings.tractorEngine,
    host_search_path: expectedHostSearchPath(settings).map((dir) => ({ dir, present: hostSearchPath.has(dir) }))
  };
}
