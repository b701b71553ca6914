import { spawnSync } from "child_process";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { TractorSpoolError } from "../../core/errors.js";

export interface TractorSpoolResult {
  jobId: string;
  stdout: string;
  stderr: string;
}

export interface TractorSpoolOptions {
  owner: string;
  engine: string;
}

export interface TractorSpooler {
  spool(jobScript: string, options: TractorSpoolOptions): Promise<TractorSpoolResult>;
}

export function parseSpoolJobId(output: string): string | null {
  const m = /\bjid[\s:=]+(\d+)/i.exec(output);
  return m && m[1] ? m[1] : null;
}

/** Spools through the `tractor-spool` command shipped with the farm client tools. */
export class TractorSpoolCommand implements TractorSpooler {
  constructor(private readonly command = "tractor-spool") {}

  async spool(jobScript: string, options: TractorSpoolOptions): Promise<TractorSpoolResult> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "farmbridge-spool-"));
    const scriptPath = path.join(dir, "job.alf");
    try {
      await fs.writeFile(scriptPath, jobScript, "utf8");
      const res = spawnSync(this.command, [`--engine=${options.engine}`, `--user=${options.owner}`, scriptPath], {
        stdio: ["ignore", "pipe", "pipe"]
      });
      const stdout = res.stdout ? res.stdout.toString("utf8") : "";
      const stderr = res.stderr ? res.stderr.toString("utf8") : "";

      if (res.error) {
        throw new TractorSpoolError(`${this.command} unavailable: ${res.error.message}`, stdout, stderr);
      }
      if (res.status !== 0) {
        throw new TractorSpoolError(
          `${this.command} failed (exit ${res.status})${stderr ? `: ${stderr.trim()}` : ""}`,
          stdout,
          stderr
        );
      }

      const jobId = parseSpoolJobId(stdout) ?? parseSpoolJobId(stderr);
      if (!jobId) {
        throw new TractorSpoolError(`unable to parse job id from ${this.command} output: ${stdout || stderr}`, stdout, stderr);
      }
      return { jobId, stdout, stderr };
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }
}
