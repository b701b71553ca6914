import { spawnSync } from "child_process";

export type FarmJobState = "queued" | "running" | "succeeded" | "failed" | "unknown";

export interface FarmJobInfo {
  jobId: string;
  state: FarmJobState;
  numTasks: number;
  numActive: number;
  numDone: number;
  numError: number;
}

export interface FarmJobQueryResult {
  info: FarmJobInfo | null;
  warnings: string[];
}

export interface FarmJobQuery {
  query(jobId: string): Promise<FarmJobQueryResult>;
}

export interface TractorCredentials {
  engine: string;
  user: string | null;
  password: string | null;
}

export const TQ_COLUMNS = ["jid", "numtasks", "numactive", "numdone", "numerror"] as const;

export function normalizeJobState(counts: Omit<FarmJobInfo, "jobId" | "state">): FarmJobState {
  if (counts.numError > 0) return "failed";
  if (counts.numTasks > 0 && counts.numDone >= counts.numTasks) return "succeeded";
  if (counts.numActive > 0 || counts.numDone > 0) return "running";
  if (counts.numTasks > 0) return "queued";
  return "unknown";
}

function toCount(value: string | undefined): number | null {
  if (value === undefined) return null;
  const n = Number.parseInt(value, 10);
  return Number.isInteger(n) && n >= 0 ? n : null;
}

/** Parses `tq jobs` rows printed with the TQ_COLUMNS column order. */
export function parseTqJobRows(stdout: string, jobId: string): FarmJobInfo | null {
  const rows = stdout
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0)
    .map((l) => l.split(/\s+/));

  const row = rows.find((r) => r[0] === jobId);
  if (!row) return null;

  const numTasks = toCount(row[1]);
  const numActive = toCount(row[2]);
  const numDone = toCount(row[3]);
  const numError = toCount(row[4]);
  if (numTasks === null || numActive === null || numDone === null || numError === null) return null;

  const counts = { numTasks, numActive, numDone, numError };
  return { jobId, state: normalizeJobState(counts), ...counts };
}

export class TqJobQuery implements FarmJobQuery {
  constructor(
    private readonly credentials: TractorCredentials,
    private readonly command = "tq"
  ) {}

  async query(jobId: string): Promise<FarmJobQueryResult> {
    if (!/^\d+$/.test(jobId)) return { info: null, warnings: [`invalid farm job id: ${jobId}`] };

    const env: NodeJS.ProcessEnv = { ...process.env, TRACTOR_ENGINE: this.credentials.engine };
    if (this.credentials.user) env.TRACTOR_USER = this.credentials.user;
    if (this.credentials.password) env.TRACTOR_PASSWORD = this.credentials.password;

    const res = spawnSync(
      this.command,
      ["--noheader", "--nocolor", "jobs", `jid=${jobId}`, "--cols", TQ_COLUMNS.join(",")],
      { stdio: ["ignore", "pipe", "pipe"], env }
    );
    const stdout = res.stdout ? res.stdout.toString("utf8") : "";
    const stderr = res.stderr ? res.stderr.toString("utf8") : "";

    if (res.error) {
      return { info: null, warnings: [`${this.command} unavailable: ${res.error.message}`] };
    }
    if (res.status !== 0) {
      return { info: null, warnings: [`${this.command} failed (exit ${res.status})${stderr ? `: ${stderr.trim()}` : ""}`] };
    }

    const info = parseTqJobRows(stdout, jobId);
    if (!info) return { info: null, warnings: [`${this.command} returned no row for job ${jobId}`] };
    return { info, warnings: [] };
  }
}
