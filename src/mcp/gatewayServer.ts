import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import { envSnapshot, farmUser, type EnvSource, type SubmitterEnvironment } from "../config/environment.js";
import { sha256Prefixed, stableJsonStringify } from "../core/canonicalJson.js";
import { ConfigurationError, InvalidGraphError, TractorSpoolError, UnknownSubmitterError } from "../core/errors.js";
import type { ComputeGraph, ComputeNode } from "../core/graph.js";
import { isSubmissionId, newSubmissionId, type SubmissionId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { SubmissionRecord } from "../core/submission.js";
import { Level, serviceKeyFor } from "../execution/serviceKeys.js";
import { SubmissionRun } from "../runs/submissionRun.js";
import type { SubmissionStore } from "../store/submissionStore.js";
import { jobTitle } from "../submitters/graphSubmitter.js";
import type { SubmitterRegistry } from "../submitters/registry.js";
import {
  zComputeNode,
  zJobGetInput,
  zJobGetOutput,
  zServiceKeyInput,
  zServiceKeyOutput,
  zSubmissionGetInput,
  zSubmissionGetOutput,
  zSubmitInput,
  zSubmitOutput,
  zSubmittersListInput,
  zSubmittersListOutput
} from "./toolSchemas.js";

export interface GatewayDeps {
  settings: SubmitterEnvironment;
  registry: SubmitterRegistry;
  store: SubmissionStore;
  env?: EnvSource;
}

function toSubmissionSummary(s: SubmissionRecord): JsonObject {
  return {
    submission_id: s.submissionId,
    submitter: s.submitter,
    title: s.title,
    owner: s.owner,
    share: s.share,
    priority: s.priority,
    status: s.status,
    farm_job_id: s.farmJobId,
    job_url: s.jobUrl,
    config_hash: s.configHash,
    graph_hash: s.graphHash,
    created_at: s.createdAt,
    finished_at: s.finishedAt,
    error: s.error,
    environment: s.environment
  };
}

export function toComputeNode(n: z.output<typeof zComputeNode>): ComputeNode {
  return {
    name: n.name,
    uid: n.uid,
    size: n.size,
    parallelization: n.parallelization
      ? { blockSize: n.parallelization.block_size, fullSize: n.parallelization.full_size, nbBlocks: n.parallelization.nb_blocks }
      : null,
    cpu: n.cpu,
    ram: n.ram,
    gpu: n.gpu,
    licenses: n.licenses
  };
}

export function toComputeGraph(args: z.output<typeof zSubmitInput>): ComputeGraph {
  return {
    nodes: args.nodes.map(toComputeNode),
    edges: args.edges.map(([dependent, dependency]) => [dependent, dependency] as const)
  };
}

/** Maps domain errors onto protocol errors; anything else passes through. */
function toMcpError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (e instanceof UnknownSubmitterError || e instanceof InvalidGraphError) {
    return new McpError(ErrorCode.InvalidRequest, e.message);
  }
  if (e instanceof ConfigurationError || e instanceof TractorSpoolError) {
    return new McpError(ErrorCode.InternalError, e.message);
  }
  return e;
}

function requireSubmissionId(value: string): SubmissionId {
  if (!isSubmissionId(value)) throw new McpError(ErrorCode.InvalidParams, `invalid submission_id: ${value}`);
  return value;
}

function errorMessage(e: unknown): string {
  if (e instanceof McpError || e instanceof Error) return e.message;
  return "unknown error";
}

export function createGatewayServer(deps: GatewayDeps): McpServer {
  const env = deps.env ?? process.env;
  const mcp = new McpServer({
    name: "farmbridge-gateway",
    version: "0.1.0"
  });

  mcp.registerTool(
    "farm_submitters_list",
    {
      description: "List the farm submitters and the configuration each one loaded.",
      inputSchema: zSubmittersListInput,
      outputSchema: zSubmittersListOutput
    },
    async () => {
      const submitters = deps.registry.names().map((name) => {
        const submitter = deps.registry.get(name);
        return {
          name,
          config_hash: submitter.config.configHash,
          base_service: submitter.config.baseService(),
          priorities: { ...submitter.config.data.priorities }
        };
      });
      const structured: JsonObject = { default_submitter: deps.registry.defaultName, submitters };
      return {
        content: [{ type: "text", text: `Submitters: ${submitters.map((s) => s.name).join(", ")}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "farm_service_key",
    {
      description: "Compute the farm service expression for a node's cpu, ram and gpu levels.",
      inputSchema: zServiceKeyInput,
      outputSchema: zServiceKeyOutput
    },
    async (args) => {
      try {
        const submitter = deps.registry.get(args.submitter);
        const service = serviceKeyFor(
          { cpu: Level[args.cpu], ram: Level[args.ram], gpu: Level[args.gpu], excludeHosts: args.exclude_hosts },
          submitter.config
        );
        return {
          content: [{ type: "text", text: service }],
          structuredContent: { submitter: submitter.name, service }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "farm_submit",
    {
      description: "Submit a compute graph to the farm as one job (or cook it without spooling on dry_run).",
      inputSchema: zSubmitInput,
      outputSchema: zSubmitOutput
    },
    async (args) => {
      let run: SubmissionRun | null = null;
      let started = false;

      try {
        const submitter = deps.registry.get(args.submitter);
        const graph = toComputeGraph(args);
        const graphHash = sha256Prefixed(stableJsonStringify({ graph_file: args.graph_file, ...graph }));

        run = new SubmissionRun(deps.store, {
          submissionId: newSubmissionId(),
          submitter: submitter.name,
          title: jobTitle(args.graph_file, args.submit_label),
          owner: farmUser(env),
          share: args.share ? [args.share] : [],
          priority: submitter.config.priority(args.priority ?? "normal"),
          configHash: submitter.config.configHash,
          graphHash,
          environment: envSnapshot(deps.settings, env)
        });
        await run.start();
        started = true;

        const outcome = await submitter.createJob(
          {
            graph,
            graphFile: args.graph_file,
            submitLabel: args.submit_label,
            priority: args.priority,
            share: args.share ?? null,
            paused: args.paused,
            dryRun: args.dry_run
          },
          run.sink()
        );
        const structured = await run.finishSubmitted(outcome);

        const text =
          outcome.status === "spooled"
            ? `Spooled ${outcome.title} as job ${outcome.farmJobId ?? "?"} (${run.submissionId})`
            : `Cooked ${outcome.title} without spooling (${run.submissionId})`;
        return {
          content: [{ type: "text", text }],
          structuredContent: structured
        };
      } catch (e) {
        const mapped = toMcpError(e);
        if (run && started) await run.finishFailure(errorMessage(e));
        throw mapped;
      }
    }
  );

  mcp.registerTool(
    "farm_submission_get",
    {
      description: "Fetch a stored submission, its events and optionally the job script.",
      inputSchema: zSubmissionGetInput,
      outputSchema: zSubmissionGetOutput
    },
    async (args) => {
      const submissionId = requireSubmissionId(args.submission_id);
      const submission = await deps.store.getSubmission(submissionId);
      if (!submission) throw new McpError(ErrorCode.InvalidParams, `unknown submission_id: ${args.submission_id}`);

      const events = args.include_events ? await deps.store.listSubmissionEvents(submissionId) : [];
      const structured: JsonObject = {
        submission: toSubmissionSummary(submission),
        job_script: args.include_script ? submission.jobScript : null,
        events: events.map((e) => ({ ts: e.ts, kind: e.kind, message: e.message, data: e.data }))
      };
      return {
        content: [{ type: "text", text: `Submission ${submission.submissionId}: ${submission.status}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "farm_job_get",
    {
      description: "Query the farm for the state of a spooled job.",
      inputSchema: zJobGetInput,
      outputSchema: zJobGetOutput
    },
    async (args) => {
      try {
        let submission: SubmissionRecord | null = null;
        if (args.submission_id) {
          submission = await deps.store.getSubmission(requireSubmissionId(args.submission_id));
          if (!submission) throw new McpError(ErrorCode.InvalidParams, `unknown submission_id: ${args.submission_id}`);
        } else if (args.farm_job_id) {
          submission = await deps.store.findByFarmJobId(args.farm_job_id);
        } else {
          throw new McpError(ErrorCode.InvalidParams, "submission_id or farm_job_id is required");
        }

        const farmJobId = args.farm_job_id ?? submission?.farmJobId;
        if (!farmJobId) {
          throw new McpError(ErrorCode.InvalidRequest, `submission ${args.submission_id ?? ""} was never spooled`);
        }

        const submitter = deps.registry.get(args.submitter ?? submission?.submitter);
        const res = await submitter.retrieveJob(farmJobId);
        const structured: JsonObject = {
          farm_job_id: farmJobId,
          submitter: submitter.name,
          submission_id: submission?.submissionId ?? null,
          state: res.info?.state ?? "unknown",
          counts: res.info
            ? { tasks: res.info.numTasks, active: res.info.numActive, done: res.info.numDone, error: res.info.numError }
            : null,
          warnings: res.warnings
        };
        return {
          content: [{ type: "text", text: `Job ${farmJobId}: ${res.info?.state ?? "unknown"}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
