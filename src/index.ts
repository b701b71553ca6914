#!/usr/bin/env node
import * as pg from "pg";
import { newDb } from "pg-mem";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadSubmitterEnvironment, type SubmitterEnvironment } from "./config/environment.js";
import { createDb, createPgPool } from "./db/connection.js";
import { applySqlFile } from "./db/bootstrap.js";
import { TqJobQuery } from "./execution/tractor/jobQuery.js";
import { TractorSpoolCommand } from "./execution/tractor/spooler.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { SubmissionStore } from "./store/submissionStore.js";
import { SubmitterRegistry } from "./submitters/registry.js";

async function createPool(settings: SubmitterEnvironment): Promise<pg.Pool> {
  if (settings.databaseUrl) return createPgPool(settings.databaseUrl);

  const mem = newDb({ autoCreateForeignKeyIndices: true });
  const adapter = mem.adapters.createPg();
  return new adapter.Pool() as unknown as pg.Pool;
}

async function main(): Promise<void> {
  const settings = loadSubmitterEnvironment(process.env);

  const pool = await createPool(settings);
  if (!settings.databaseUrl || settings.autoSchema) {
    await applySqlFile(pool);
  }

  const store = new SubmissionStore(createDb(pool));
  const registry = await SubmitterRegistry.load(process.env, settings, {
    spooler: new TractorSpoolCommand(),
    jobQuery: new TqJobQuery({
      engine: settings.tractorEngine,
      user: settings.tractorUser,
      password: settings.tractorPassword
    })
  });
  // fail at startup rather than on the first submission
  registry.get();

  const server = createGatewayServer({ settings, registry, store });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`farmbridge gateway ready (submitters: ${registry.names().join(", ")}; default: ${registry.defaultName})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
