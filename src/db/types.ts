import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;
type Timestamp = ColumnType<Date | string, string | undefined, string>;
type TimestampNullable = ColumnType<Date | string | null, string | null | undefined, string | null>;

export interface SubmissionsTable {
  submission_id: string;
  submitter: string;
  title: string;
  owner: string;
  share: JSONColumnType<string[]>;
  priority: number;
  status: string;
  farm_job_id: OptionalNullable<string>;
  job_url: OptionalNullable<string>;
  job_script: OptionalNullable<string>;
  config_hash: string;
  graph_hash: string;
  created_at: Generated<Timestamp>;
  finished_at: TimestampNullable;
  error: OptionalNullable<string>;
  environment: JsonNullable;
  log: OptionalNullable<string>;
}

export interface SubmissionEventsTable {
  event_id: Generated<string>;
  submission_id: string;
  ts: Generated<Timestamp>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface DB {
  submissions: SubmissionsTable;
  submission_events: SubmissionEventsTable;
}
