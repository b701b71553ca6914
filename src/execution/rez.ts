import path from "path";
import type { EnvSource } from "../config/environment.js";

const REZ_DELIMITER_PATTERN = /-|==|>=|>|<=|</;

function words(value: string | undefined): string[] {
  return (value ?? "").split(/\s+/).filter((w) => w.length > 0);
}

/** `{name: version}` for the current resolve, implicit (`~`) packages excluded. */
export function resolvedVersions(env: EnvSource): Map<string, string> {
  const out = new Map<string, string>();
  for (const entry of words(env.REZ_RESOLVE)) {
    if (entry.startsWith("~")) continue;
    const dash = entry.indexOf("-");
    if (dash <= 0 || dash === entry.length - 1) continue;
    out.set(entry.slice(0, dash), entry.slice(dash + 1));
  }
  return out;
}

/**
 * Packages the farm job must request so that it runs with the same versions
 * as the submitting session. "==" pins exact versions.
 */
export function requestPackages(env: EnvSource, delimiter = "=="): string[] {
  const packages = new Set<string>();

  if (env.REZ_REQUEST !== undefined) {
    const versions = resolvedVersions(env);
    const names = new Set<string>();
    for (const request of words(env.REZ_USED_REQUEST)) {
      if (request.startsWith("~") || request.startsWith("!")) continue;
      const name = request.split(REZ_DELIMITER_PATTERN)[0];
      if (name) names.add(name);
    }
    for (const name of names) {
      const version = versions.get(name);
      if (version !== undefined) packages.add(`${name}${delimiter}${version}`);
    }
  } else if (env.REZ_MESHROOM_VERSION !== undefined) {
    packages.add(`meshroom${delimiter}${env.REZ_MESHROOM_VERSION}`);
  }

  return [...packages].sort();
}

export function rezBinary(env: EnvSource): string {
  if (env.REZ_BIN) return env.REZ_BIN;
  if (env.REZ_PACKAGES_ROOT) return path.join(env.REZ_PACKAGES_ROOT, "bin", "rez");
  return "rez";
}

export interface RezWrapOptions {
  useCurrentContext?: boolean;
  useRequestedContext?: boolean;
  extraPackages?: string[];
}

export function rezWrapCommand(command: string, env: EnvSource, options: RezWrapOptions = {}): string {
  const packages = new Set<string>();
  if (options.useCurrentContext) {
    for (const p of words(env.REZ_RESOLVE)) packages.add(p);
  } else if (options.useRequestedContext ?? true) {
    for (const p of requestPackages(env)) packages.add(p);
  }
  for (const p of options.extraPackages ?? []) {
    if (p) packages.add(p);
  }

  if (packages.size === 0) return command;
  return `${rezBinary(env)} env ${[...packages].sort().join(" ")} -- ${command}`;
}
