import * as z from "zod/v4";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zSubmissionId = z.string().regex(new RegExp(`^sub_${ulid26}$`), "invalid submission_id");
export const zSha256 = z.string().regex(/^sha256:[a-f0-9]{64}$/);
export const zFarmJobId = z.string().min(1).max(64);

export const zLevelName = z.enum(["SCRIPT", "NONE", "NORMAL", "INTENSIVE", "EXTREME"]);
// SCRIPT has no ram service key
export const zRamLevelName = z.enum(["NONE", "NORMAL", "INTENSIVE", "EXTREME"]);

export const zComputeNode = z.object({
  name: z.string().min(1).max(256),
  uid: z.string().min(1).max(256),
  size: z.number().int().min(0),
  parallelization: z
    .object({
      block_size: z.number().int().min(0),
      full_size: z.number().int().min(0),
      nb_blocks: z.number().int().min(0)
    })
    .nullable()
    .optional(),
  cpu: zLevelName.default("NORMAL"),
  ram: zRamLevelName.default("NORMAL"),
  gpu: zLevelName.default("NONE"),
  licenses: z.array(z.string().min(1)).default([])
});

export const zSubmitterSummary = z.object({
  name: z.string(),
  config_hash: zSha256,
  base_service: z.string(),
  priorities: z.record(z.string(), z.number().int())
});

export const zSubmittersListInput = z.object({});

export const zSubmittersListOutput = z.object({
  default_submitter: z.string(),
  submitters: z.array(zSubmitterSummary)
});

export const zServiceKeyInput = z.object({
  submitter: z.string().min(1).optional(),
  cpu: zLevelName.default("NORMAL"),
  ram: zRamLevelName.default("NORMAL"),
  gpu: zLevelName.default("NONE"),
  exclude_hosts: z.array(z.string().min(1)).optional()
});

export const zServiceKeyOutput = z.object({
  submitter: z.string(),
  service: z.string()
});

export const zSubmitInput = z.object({
  submitter: z.string().min(1).optional(),
  graph_file: z.string().min(1).max(4096),
  nodes: z.array(zComputeNode).max(10000),
  edges: z.array(z.tuple([z.string().min(1), z.string().min(1)])).default([]),
  submit_label: z.string().min(1).max(256).optional(),
  priority: z.string().min(1).optional(),
  share: z.string().min(1).optional(),
  paused: z.boolean().optional(),
  dry_run: z.boolean().optional()
});

export const zSubmitOutput = z.object({
  submission_id: zSubmissionId,
  submitter: z.string(),
  status: z.enum(["dry_run", "spooled"]),
  title: z.string(),
  owner: z.string(),
  share: z.array(z.string()),
  priority: z.number().int(),
  farm_job_id: z.string().nullable(),
  job_url: z.string().nullable(),
  job_script: z.string()
});

export const zSubmissionSummary = z.object({
  submission_id: zSubmissionId,
  submitter: z.string(),
  title: z.string(),
  owner: z.string(),
  share: z.array(z.string()),
  priority: z.number().int(),
  status: z.enum(["pending", "dry_run", "spooled", "failed"]),
  farm_job_id: z.string().nullable(),
  job_url: z.string().nullable(),
  config_hash: zSha256,
  graph_hash: zSha256,
  created_at: z.string(),
  finished_at: z.string().nullable(),
  error: z.string().nullable(),
  environment: z.record(z.string(), z.unknown()).nullable()
});

export const zSubmissionEvent = z.object({
  ts: z.string(),
  kind: z.string(),
  message: z.string().nullable(),
  data: z.record(z.string(), z.unknown()).nullable()
});

export const zSubmissionGetInput = z.object({
  submission_id: zSubmissionId,
  include_script: z.boolean().default(false),
  include_events: z.boolean().default(true)
});

export const zSubmissionGetOutput = z.object({
  submission: zSubmissionSummary,
  job_script: z.string().nullable(),
  events: z.array(zSubmissionEvent)
});

export const zFarmJobState = z.enum(["queued", "running", "succeeded", "failed", "unknown"]);

export const zJobGetInput = z.object({
  submission_id: zSubmissionId.optional(),
  farm_job_id: zFarmJobId.optional(),
  submitter: z.string().min(1).optional()
});

export const zJobGetOutput = z.object({
  farm_job_id: z.string(),
  submitter: z.string(),
  submission_id: zSubmissionId.nullable(),
  state: zFarmJobState,
  counts: z
    .object({
      tasks: z.number().int(),
      active: z.number().int(),
      done: z.number().int(),
      error: z.number().int()
    })
    .nullable(),
  warnings: z.array(z.string())
});
