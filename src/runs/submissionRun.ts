import type { SubmissionId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { SubmissionStatus } from "../core/submission.js";
import type { Sha256Digest } from "../core/canonicalJson.js";
import type { SubmitOutcome } from "../submitters/types.js";
import type { SubmissionPatch, SubmissionStore } from "../store/submissionStore.js";

/**
 * Bookkeeping for one farm submission: the stored record, its events and the
 * log assembled from them.
 */
export class SubmissionRun {
  readonly submissionId: SubmissionId;
  private readonly logLines: string[] = [];
  private readonly queued: Array<{ kind: string; message: string; data: JsonObject | null }> = [];

  constructor(
    private readonly store: SubmissionStore,
    private readonly info: {
      submissionId: SubmissionId;
      submitter: string;
      title: string;
      owner: string;
      share: string[];
      priority: number;
      configHash: Sha256Digest;
      graphHash: Sha256Digest;
      environment: JsonObject | null;
    }
  ) {
    this.submissionId = info.submissionId;
  }

  async start(): Promise<void> {
    await this.store.createSubmission(this.info);
    await this.event("submission.started", `submitter=${this.info.submitter}`, {
      config_hash: this.info.configHash,
      graph_hash: this.info.graphHash
    });
  }

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    const line = JSON.stringify({ ts: new Date().toISOString(), kind, message, data });
    this.logLines.push(line);
    await this.store.addSubmissionEvent(this.submissionId, kind, message, data);
  }

  /** Synchronous event sink for job cooking; queued events are stored by {@link flush}. */
  sink(): (kind: string, message: string, data: JsonObject | null) => void {
    return (kind, message, data) => {
      this.queued.push({ kind, message, data });
    };
  }

  async flush(): Promise<void> {
    const events = this.queued.splice(0, this.queued.length);
    for (const e of events) await this.event(e.kind, e.message, e.data);
  }

  async finishSubmitted(outcome: SubmitOutcome): Promise<JsonObject> {
    const summary = outcome.status === "spooled" ? `spooled jid=${outcome.farmJobId ?? ""}` : "cooked without spooling";
    await this.finish(outcome.status, null, summary, {
      title: outcome.title,
      owner: outcome.owner,
      share: outcome.share,
      farmJobId: outcome.farmJobId,
      jobUrl: outcome.jobUrl,
      jobScript: outcome.jobScript,
      priority: outcome.priority
    });

    return {
      submission_id: this.submissionId,
      submitter: outcome.submitter,
      status: outcome.status,
      title: outcome.title,
      owner: outcome.owner,
      share: outcome.share,
      priority: outcome.priority,
      farm_job_id: outcome.farmJobId,
      job_url: outcome.jobUrl,
      job_script: outcome.jobScript
    };
  }

  async finishFailure(errorMessage: string): Promise<void> {
    await this.finish("failed", errorMessage, `failed: ${errorMessage}`, {});
  }

  private async finish(
    status: SubmissionStatus,
    error: string | null,
    finalMessage: string,
    patch: SubmissionPatch
  ): Promise<void> {
    await this.flush();
    await this.event(`submission.${status}`, finalMessage, error ? { error } : null);
    await this.store.updateSubmission(this.submissionId, {
      ...patch,
      status,
      error,
      finishedAt: new Date().toISOString(),
      log: this.logLines.join("\n") + "\n"
    });
  }
}
