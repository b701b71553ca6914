import { ConfigurationError } from "../core/errors.js";
import { LEVEL_NAMES, type FarmConfig, type LevelName, type ServiceKeyTable } from "../config/farmConfig.js";

export const Level = {
  SCRIPT: -1,
  NONE: 0,
  NORMAL: 1,
  INTENSIVE: 2,
  EXTREME: 3
} as const;

export type LevelValue = (typeof Level)[keyof typeof Level];
export type LevelKey = keyof typeof Level;

function tableKey(level: number, what: string): LevelName {
  const name = LEVEL_NAMES[level];
  if (!name) throw new ConfigurationError(`no ${what} service key for level ${level}`);
  return name;
}

export interface ServiceRequirements {
  cpu: LevelValue;
  ram: LevelValue;
  gpu: LevelValue;
  excludeHosts?: string[];
}

export function serviceKeyFor(req: ServiceRequirements, config: FarmConfig): string {
  const keys = config.data.service_keys;
  if (req.cpu === Level.SCRIPT && req.gpu <= 0) return keys.script;

  const [table, level]: [ServiceKeyTable, number] = req.gpu > 0 ? [keys.gpu, req.gpu] : [keys.cpu, req.cpu];
  let service = table.levels[tableKey(level, "level")];

  const ramService = table.ram[tableKey(req.ram, "ram")];
  if (ramService) service += `,${ramService}`;

  const excluded = [...keys.exclude_hosts, ...(req.excludeHosts ?? [])];
  if (excluded.length > 0) service += "," + excluded.map((host) => `!${host}`).join(",");

  return service;
}
