import type { Kysely, Selectable } from "kysely";
import type { Sha256Digest } from "../core/canonicalJson.js";
import type { SubmissionId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { SubmissionEvent, SubmissionRecord, SubmissionStatus } from "../core/submission.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function toStringList(value: unknown): string[] {
  const parsed: unknown = typeof value === "string" ? JSON.parse(value) : value;
  return Array.isArray(parsed) ? parsed.map((v) => String(v)) : [];
}

export type SubmissionPatch = Partial<
  Pick<
    SubmissionRecord,
    "status" | "title" | "owner" | "share" | "priority" | "farmJobId" | "jobUrl" | "jobScript" | "finishedAt" | "error" | "log"
  >
>;

export class SubmissionStore {
  constructor(private readonly db: Kysely<DB>) {}

  async createSubmission(input: {
    submissionId: SubmissionId;
    submitter: string;
    title: string;
    owner: string;
    share: string[];
    priority: number;
    configHash: Sha256Digest;
    graphHash: Sha256Digest;
    environment: JsonObject | null;
  }): Promise<SubmissionRecord> {
    await this.db
      .insertInto("submissions")
      .values({
        submission_id: input.submissionId,
        submitter: input.submitter,
        title: input.title,
        owner: input.owner,
        share: JSON.stringify(input.share),
        priority: input.priority,
        status: "pending",
        config_hash: input.configHash,
        graph_hash: input.graphHash,
        environment: input.environment
      })
      .execute();

    const row = await this.db
      .selectFrom("submissions")
      .selectAll()
      .where("submission_id", "=", input.submissionId)
      .executeTakeFirstOrThrow();
    return this.mapSubmission(row);
  }

  async getSubmission(submissionId: SubmissionId): Promise<SubmissionRecord | null> {
    const row = await this.db
      .selectFrom("submissions")
      .selectAll()
      .where("submission_id", "=", submissionId)
      .executeTakeFirst();
    return row ? this.mapSubmission(row) : null;
  }

  async findByFarmJobId(farmJobId: string): Promise<SubmissionRecord | null> {
    const row = await this.db
      .selectFrom("submissions")
      .selectAll()
      .where("farm_job_id", "=", farmJobId)
      .orderBy("created_at", "desc")
      .executeTakeFirst();
    return row ? this.mapSubmission(row) : null;
  }

  async updateSubmission(submissionId: SubmissionId, patch: SubmissionPatch): Promise<void> {
    const updates: {
      status?: string;
      title?: string;
      owner?: string;
      share?: string;
      farm_job_id?: string | null;
      job_url?: string | null;
      job_script?: string | null;
      finished_at?: string | null;
      error?: string | null;
      log?: string | null;
      priority?: number;
    } = {};
    if (patch.status) updates.status = patch.status;
    if (patch.title !== undefined) updates.title = patch.title;
    if (patch.owner !== undefined) updates.owner = patch.owner;
    if (patch.share !== undefined) updates.share = JSON.stringify(patch.share);
    if (patch.farmJobId !== undefined) updates.farm_job_id = patch.farmJobId;
    if (patch.jobUrl !== undefined) updates.job_url = patch.jobUrl;
    if (patch.jobScript !== undefined) updates.job_script = patch.jobScript;
    if (patch.finishedAt !== undefined) updates.finished_at = patch.finishedAt;
    if (patch.error !== undefined) updates.error = patch.error;
    if (patch.log !== undefined) updates.log = patch.log;
    if (patch.priority !== undefined) updates.priority = patch.priority;

    if (Object.keys(updates).length === 0) return;

    await this.db.updateTable("submissions").set(updates).where("submission_id", "=", submissionId).execute();
  }

  async addSubmissionEvent(
    submissionId: SubmissionId,
    kind: string,
    message: string | null,
    data: JsonObject | null
  ): Promise<void> {
    await this.db
      .insertInto("submission_events")
      .values({ submission_id: submissionId, kind, message, data: data ?? null })
      .execute();
  }

  async listSubmissionEvents(submissionId: SubmissionId): Promise<SubmissionEvent[]> {
    const rows = await this.db
      .selectFrom("submission_events")
      .selectAll()
      .where("submission_id", "=", submissionId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({
      ts: toIso(r.ts),
      kind: r.kind,
      message: r.message,
      data: r.data ?? null
    }));
  }

  private mapSubmission(row: Selectable<DB["submissions"]>): SubmissionRecord {
    return {
      submissionId: row.submission_id as SubmissionId,
      submitter: row.submitter,
      title: row.title,
      owner: row.owner,
      share: toStringList(row.share),
      priority: row.priority,
      status: row.status as SubmissionStatus,
      farmJobId: row.farm_job_id,
      jobUrl: row.job_url,
      jobScript: row.job_script,
      configHash: row.config_hash as Sha256Digest,
      graphHash: row.graph_hash as Sha256Digest,
      createdAt: toIso(row.created_at),
      finishedAt: toIsoOrNull(row.finished_at),
      error: row.error,
      environment: row.environment ?? null,
      log: row.log
    };
  }
}
