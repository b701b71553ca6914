import { describe, it, expect } from "vitest";
import { ConfigurationError, InvalidGraphError, UnknownSubmitterError } from "../src/core/errors.js";
import type { ComputeGraph } from "../src/core/graph.js";
import { normalizeJobState, parseTqJobRows } from "../src/execution/tractor/jobQuery.js";
import { parseSpoolJobId } from "../src/execution/tractor/spooler.js";
import { jobTitle } from "../src/submitters/graphSubmitter.js";
import { SubmitterRegistry } from "../src/submitters/registry.js";
import { SimpleFarmSubmitter } from "../src/submitters/simpleFarmSubmitter.js";
import { TractorSubmitter } from "../src/submitters/tractorSubmitter.js";
import { loadSubmitterEnvironment } from "../src/config/environment.js";
import { FakeJobQuery, FakeSpooler, node, submitterDeps } from "./fixtures.js";

const GRAPH: ComputeGraph = {
  nodes: [
    node({ name: "CameraInit", uid: "u1", size: 10 }),
    node({
      name: "FeatureExtraction",
      uid: "u2",
      size: 10,
      parallelization: { blockSize: 4, fullSize: 10, nbBlocks: 3 },
      cpu: "INTENSIVE",
      ram: "INTENSIVE"
    })
  ],
  edges: [["u2", "u1"]]
};

describe("TractorSubmitter", () => {
  it("spools one job for the whole graph", async () => {
    const spooler = new FakeSpooler("101");
    const submitter = new TractorSubmitter(await submitterDeps({ FARM_USER: "artist" }, { spooler }));

    const outcome = await submitter.createJob({ graph: GRAPH, graphFile: "/proj/scene.mg" });
    expect(outcome).toMatchObject({
      submitter: "Tractor",
      title: "scene",
      owner: "artist",
      share: ["vfx"],
      priority: 5000,
      status: "spooled",
      farmJobId: "101",
      jobUrl: "http://tractor-engine/tv/#jid=101"
    });
    expect(spooler.calls[0]?.options).toEqual({ owner: "artist", engine: "tractor-engine" });

    const lines = outcome.jobScript.split("\n");
    expect(lines[2]).toBe(
      'Job -title {scene} -priority 5000 -service {mikrosRender} -envkey {{setenv FARM_USER=artist}} -metadata {{"prod":"mvg","nbFrames":"10","comment":"/proj/scene.mg"}} -projects {{vfx}} -spoolcwd {/tmp} -subtasks {'
    );
    expect(lines[3]).toBe("    Task -title {scene} -serialsubtasks 1 -subtasks {");
    expect(lines[4]).toBe(
      '        Task -title {FeatureExtraction} -service {mikrosRender,rnd,ram128} -metadata {{"prod":"mvg","nbFrames":10,"nodeUid":"u2"}} -subtasks {'
    );
    expect(lines[5]).toBe(
      '            Task -title {FeatureExtraction_0_0} -service {mikrosRender,rnd,ram128} -metadata {{"prod":"mvg","nbFrames":10,"nodeUid":"u2","iteration":0}} -subtasks {'
    );
    expect(lines[6]).toBe(
      '                Task -title {CameraInit} -service {mikrosRender} -metadata {{"prod":"mvg","nbFrames":10,"nodeUid":"u1"}} -cmds {'
    );
    expect(lines[7]).toBe(
      '                    RemoteCmd {{meshroom_compute} {--node} {CameraInit} {/proj/scene.mg} {--extern}} -service {mikrosRender}'
    );
    expect(lines).toContain(
      "                RemoteCmd {{meshroom_compute} {--node} {FeatureExtraction} {/proj/scene.mg} {--extern} {--iteration} {2}} -service {mikrosRender,rnd,ram128}"
    );
    expect(lines.filter((l) => l === "                Instance -title {CameraInit}")).toHaveLength(2);
  });

  it("cooks without spooling on dry run", async () => {
    const spooler = new FakeSpooler();
    const submitter = new TractorSubmitter(await submitterDeps({ FARM_USER: "artist", PROD: "show" }, { spooler }));

    const outcome = await submitter.createJob({
      graph: GRAPH,
      graphFile: "/proj/scene.mg",
      submitLabel: "[Meshroom] {projectName}",
      priority: "low",
      share: "mvg",
      dryRun: true
    });
    expect(outcome).toMatchObject({ status: "dry_run", farmJobId: null, jobUrl: null, priority: 4000, share: ["mvg"] });
    expect(spooler.calls).toHaveLength(0);
    expect(outcome.jobScript).toContain('Job -title {[Meshroom] scene} -priority 4000 ');
    expect(outcome.jobScript).toContain('-metadata {{"prod":"show","nbFrames":"10","comment":"/proj/scene.mg"}}');
  });

  it("only splits nodes with more than one block", async () => {
    const submitter = new TractorSubmitter(await submitterDeps({ FARM_USER: "artist" }));
    const graph: ComputeGraph = {
      nodes: [node({ name: "Meshing", uid: "u3", parallelization: { blockSize: 1, fullSize: 1, nbBlocks: 1 } })],
      edges: []
    };
    const outcome = await submitter.createJob({ graph, graphFile: "/proj/scene.mg", dryRun: true });
    expect(outcome.jobScript).not.toContain("Meshing_0_0");
  });

  it("rejects empty graphs and unknown edge endpoints", async () => {
    const submitter = new TractorSubmitter(await submitterDeps({ FARM_USER: "artist" }));
    await expect(submitter.createJob({ graph: { nodes: [], edges: [] }, graphFile: "/proj/scene.mg" })).rejects.toBeInstanceOf(
      InvalidGraphError
    );
    await expect(
      submitter.createJob({ graph: { nodes: GRAPH.nodes, edges: [["u2", "zz"]] }, graphFile: "/proj/scene.mg" })
    ).rejects.toThrow("edge references unknown node: zz");
  });

  it("falls back for priority and licence names the config does not define", async () => {
    const submitter = new TractorSubmitter(await submitterDeps({ FARM_USER: "artist" }));
    const graph: ComputeGraph = {
      nodes: [node({ name: "CameraInit", uid: "u1", licenses: ["constructor", "mtoa"] })],
      edges: []
    };
    const outcome = await submitter.createJob({ graph, graphFile: "/proj/scene.mg", priority: "toString", dryRun: true });
    expect(outcome.priority).toBe(5000);

    const lines = outcome.jobScript.split("\n").map((l) => l.trim());
    expect(lines[2]).toContain("Job -title {scene} -priority 5000 ");
    expect(lines).toContain(
      "RemoteCmd {{meshroom_compute} {--node} {CameraInit} {/proj/scene.mg} {--extern}} -service {mikrosRender} -tags {constructor arnold}"
    );
  });

  it("keeps graph files and node names as single command words", async () => {
    const submitter = new TractorSubmitter(await submitterDeps({ FARM_USER: "artist" }));
    const graph: ComputeGraph = { nodes: [node({ name: "Feature A", uid: "u1" })], edges: [] };
    const outcome = await submitter.createJob({ graph, graphFile: '/p/it"s $HOME.mg', dryRun: true });

    const lines = outcome.jobScript.split("\n").map((l) => l.trim());
    expect(lines).toContain(
      'RemoteCmd {{meshroom_compute} {--node} {Feature A} {/p/it"s $HOME.mg} {--extern}} -service {mikrosRender}'
    );
  });

  it("queries the farm for a job", async () => {
    const jobQuery = new FakeJobQuery({
      info: { jobId: "101", state: "running", numTasks: 4, numActive: 1, numDone: 2, numError: 0 },
      warnings: []
    });
    const submitter = new TractorSubmitter(await submitterDeps({ FARM_USER: "artist" }, { jobQuery }));
    const res = await submitter.retrieveJob("101");
    expect(res.info?.state).toBe("running");
    expect(jobQuery.queried).toEqual(["101"]);
  });
});

describe("SimpleFarmSubmitter", () => {
  it("cooks only with the dummy engine", async () => {
    const spooler = new FakeSpooler();
    const submitter = new SimpleFarmSubmitter(
      await submitterDeps(
        { FARM_USER: "artist", MESHROOM_SIMPLEFARM_ENGINE: "tractor-dummy", MESHROOM_SIMPLEFARM_SHARE: "mvg" },
        { spooler }
      )
    );
    const outcome = await submitter.createJob({ graph: GRAPH, graphFile: "/proj/scene.mg" });
    expect(outcome).toMatchObject({ submitter: "SimpleFarm", status: "dry_run", share: ["mvg"] });
    expect(spooler.calls).toHaveLength(0);
  });

  it("splits every parallelized node and keys tasks by name", async () => {
    const submitter = new SimpleFarmSubmitter(await submitterDeps({ FARM_USER: "artist" }));
    const graph: ComputeGraph = {
      nodes: [
        node({ name: "Meshing", uid: "u1", parallelization: { blockSize: 1, fullSize: 1, nbBlocks: 1 } }),
        node({ name: "Texturing", uid: "u2" }),
        node({ name: "Texturing", uid: "u3" })
      ],
      edges: [["u3", "u1"]]
    };
    const outcome = await submitter.createJob({ graph, graphFile: "/proj/scene.mg", dryRun: true });
    const lines = outcome.jobScript.split("\n");
    expect(lines.filter((l) => l.trim().startsWith("Task -title {Meshing_0_0}"))).toHaveLength(1);
    expect(lines.filter((l) => l.trim().startsWith("Task -title {Texturing}"))).toHaveLength(1);
  });

  it("requests the meshroom package alone outside a rez request", async () => {
    const submitter = new SimpleFarmSubmitter(await submitterDeps({ FARM_USER: "artist", REZ_MESHROOM_VERSION: "2023.3" }));
    const graph: ComputeGraph = { nodes: [node({ name: "CameraInit", uid: "u1" })], edges: [] };
    const outcome = await submitter.createJob({ graph, graphFile: "/proj/scene.mg", dryRun: true });

    const lines = outcome.jobScript.split("\n").map((l) => l.trim());
    expect(lines).toContain(
      "RemoteCmd {{rez} {env} {meshroom-2023.3} {--} {meshroom_compute} {--node} {CameraInit} {/proj/scene.mg} {--extern}} -service {mikrosRender}"
    );
  });

  it("rejects unknown engines", async () => {
    const deps = await submitterDeps({ MESHROOM_SIMPLEFARM_ENGINE: "slurm" });
    expect(() => new SimpleFarmSubmitter(deps)).toThrow(ConfigurationError);
  });
});

describe("SubmitterRegistry", () => {
  const backends = { spooler: new FakeSpooler(), jobQuery: new FakeJobQuery({ info: null, warnings: [] }) };

  it("builds the built-in submitters", async () => {
    const env = { FARM_USER: "artist" };
    const registry = await SubmitterRegistry.load(env, loadSubmitterEnvironment(env), backends);
    expect(registry.names()).toEqual(["SimpleFarm", "Tractor"]);
    expect(registry.get().name).toBe("Tractor");
    expect(registry.get("SimpleFarm").name).toBe("SimpleFarm");
    expect(() => registry.get("Nope")).toThrow(UnknownSubmitterError);
  });

  it("honours the default submitter variable", async () => {
    const env = { MESHROOM_DEFAULT_SUBMITTER: "SimpleFarm" };
    const registry = await SubmitterRegistry.load(env, loadSubmitterEnvironment(env), backends);
    expect(registry.get(null).name).toBe("SimpleFarm");
  });
});

describe("farm client output", () => {
  it("reads the job id printed by the spool command", () => {
    expect(parseSpoolJobId("OK job script accepted, jid: 4242\n")).toBe("4242");
    expect(parseSpoolJobId("jid=17")).toBe("17");
    expect(parseSpoolJobId("nothing here")).toBeNull();
  });

  it("parses tq rows", () => {
    expect(parseTqJobRows("4241 3 0 3 0\n4242 10 2 5 0\n", "4242")).toEqual({
      jobId: "4242",
      state: "running",
      numTasks: 10,
      numActive: 2,
      numDone: 5,
      numError: 0
    });
    expect(parseTqJobRows("4242 x 0 0 0", "4242")).toBeNull();
    expect(parseTqJobRows("", "4242")).toBeNull();
  });

  it("normalises job state from task counts", () => {
    expect(normalizeJobState({ numTasks: 4, numActive: 0, numDone: 1, numError: 1 })).toBe("failed");
    expect(normalizeJobState({ numTasks: 4, numActive: 0, numDone: 4, numError: 0 })).toBe("succeeded");
    expect(normalizeJobState({ numTasks: 4, numActive: 1, numDone: 0, numError: 0 })).toBe("running");
    expect(normalizeJobState({ numTasks: 4, numActive: 0, numDone: 0, numError: 0 })).toBe("queued");
    expect(normalizeJobState({ numTasks: 0, numActive: 0, numDone: 0, numError: 0 })).toBe("unknown");
  });
});

describe("jobTitle", () => {
  it("substitutes the project name", () => {
    expect(jobTitle("/proj/shot_010.mg")).toBe("shot_010");
    expect(jobTitle("/proj/shot_010.mg", "recon {projectName} v2")).toBe("recon shot_010 v2");
  });
});
