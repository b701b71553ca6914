import type { Sha256Digest } from "./canonicalJson.js";
import type { SubmissionId } from "./ids.js";
import type { JsonObject } from "./json.js";

export type SubmissionStatus = "pending" | "dry_run" | "spooled" | "failed";

export interface SubmissionRecord {
  submissionId: SubmissionId;
  submitter: string;
  title: string;
  owner: string;
  share: string[];
  priority: number;
  status: SubmissionStatus;
  farmJobId: string | null;
  jobUrl: string | null;
  jobScript: string | null;
  configHash: Sha256Digest;
  graphHash: Sha256Digest;
  createdAt: string;
  finishedAt: string | null;
  error: string | null;
  environment: JsonObject | null;
  log: string | null;
}

export interface SubmissionEvent {
  ts: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}
