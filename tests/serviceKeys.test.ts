import { describe, it, expect, beforeAll } from "vitest";
import type { FarmConfig } from "../src/config/farmConfig.js";
import { ConfigurationError } from "../src/core/errors.js";
import { Level, serviceKeyFor } from "../src/execution/serviceKeys.js";
import { tractorConfig } from "./fixtures.js";

describe("serviceKeyFor", () => {
  let config: FarmConfig;

  beforeAll(async () => {
    config = await tractorConfig();
  });

  it("uses the cpu table when no gpu is required", () => {
    expect(serviceKeyFor({ cpu: Level.NORMAL, ram: Level.NORMAL, gpu: Level.NONE }, config)).toBe("mikrosRender");
    expect(serviceKeyFor({ cpu: Level.INTENSIVE, ram: Level.INTENSIVE, gpu: Level.NONE }, config)).toBe(
      "mikrosRender,rnd,ram128"
    );
    expect(serviceKeyFor({ cpu: Level.EXTREME, ram: Level.EXTREME, gpu: Level.NONE }, config)).toBe(
      "mikrosRender,rnd,@.nCPU>200,ram256"
    );
  });

  it("routes script nodes to script blades", () => {
    expect(serviceKeyFor({ cpu: Level.SCRIPT, ram: Level.NONE, gpu: Level.NONE }, config)).toBe("mikrosScript");
  });

  it("uses the gpu table as soon as a gpu is required", () => {
    expect(serviceKeyFor({ cpu: Level.SCRIPT, ram: Level.NONE, gpu: Level.NORMAL }, config)).toBe("mikrosRender,cuda8G");
    expect(serviceKeyFor({ cpu: Level.NORMAL, ram: Level.EXTREME, gpu: Level.INTENSIVE }, config)).toBe(
      "mikrosRender,cuda16G,ram128"
    );
  });

  it("appends excluded hosts", () => {
    expect(
      serviceKeyFor({ cpu: Level.NORMAL, ram: Level.NONE, gpu: Level.NONE, excludeHosts: ["blade01", "blade02"] }, config)
    ).toBe("mikrosRender,!blade01,!blade02");
  });

  it("rejects levels without a table entry", () => {
    expect(() => serviceKeyFor({ cpu: Level.NORMAL, ram: Level.SCRIPT, gpu: Level.NONE }, config)).toThrow(
      ConfigurationError
    );
  });
});
