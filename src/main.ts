#!/usr/bin/env node
import type { MongoClient } from "mongodb";
import type { AdvisoryService, PersistenceStore } from "./types.js";
import { VertexGeminiAdvisor } from "./advisor/vertexGemini.js";
import { USAGE, parseArgs } from "./cli.js";
import { loadConfig, loadEnvFiles } from "./libs/config.js";
import { errorMessage } from "./libs/errors.js";
import { createLogger } from "./libs/logger.js";
import { DecisionFusionEngine } from "./pipeline/decisionFusion.js";
import { runPipeline } from "./pipeline/index.js";
import { createPipelineRun, summarizeRun } from "./pipeline/runState.js";
import { UniProtSource } from "./sources/uniprot.js";
import { InMemoryStore } from "./storage/memoryStore.js";
import { MongoStore } from "./storage/mongoStore.js";

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  if (!args) {
    console.error(USAGE);
    return 2;
  }

  loadEnvFiles();
  const config = loadConfig();
  const log = createLogger({ level: config.logLevel });

  const advisor: AdvisoryService | null = config.advisor
    ? new VertexGeminiAdvisor({
        projectId: config.advisor.projectId,
        location: config.advisor.location,
        model: config.advisor.model,
      })
    : null;
  if (!advisor) log.info({}, "No advisor configured; decisions use the rule-based fallback");

  let store: PersistenceStore = new InMemoryStore();
  let mongo: MongoClient | undefined;
  if (config.mongo) {
    const connected = await MongoStore.connect(config.mongo.url, config.mongo.dbName);
    store = connected.store;
    mongo = connected.client;
  }

  try {
    const run = createPipelineRun({
      ...args,
      organismClass: config.organismClass,
      organismCategory: config.organismCategory,
    });
    const created = await store.createRun(run);
    if (!created.ok) log.warn({ runId: run.runId, err: created.error.message }, "Failed to record run");

    const start = performance.now();
    await runPipeline(run, {
      source: new UniProtSource({ log, baseUrl: config.uniprot.baseUrl }),
      fusion: new DecisionFusionEngine(advisor, { log, timeoutMs: config.advisor?.timeoutMs }),
      store,
      log,
    });
    const summary = summarizeRun(run, performance.now() - start);

    const brief = (c: (typeof run.candidates)[number]) => ({
      proteinId: c.proteinId,
      proteinName: c.proteinName,
      localization: c.localization,
      antigenicity: c.antigenicityScore,
      tier: c.confidenceTier,
      flags: c.flags,
    });
    console.log(
      JSON.stringify(
        {
          ...summary,
          active: summary.active.map(brief),
          deprioritized: summary.deprioritized.map(brief),
          discarded: summary.discarded.map(brief),
        },
        null,
        2
      )
    );
    return summary.errors.length > 0 ? 1 : 0;
  } finally {
    await mongo?.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(errorMessage(err));
    process.exitCode = 1;
  }
);
