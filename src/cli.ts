#!/usr/bin/env node

import { Command } from "commander";
import { serve } from "@hono/node-server";
import * as fs from "fs";
import * as path from "path";
import { collectFiles, collectOutputs } from "./collector.js";
import type { CollectResult } from "./collector.js";
import { compareRun } from "./comparison.js";
import { generateRunId, isValidRunId, loadEnv } from "./config.js";
import { ResultsStore } from "./db.js";
import { exportDelimited, formatExecutiveSummary, formatSummaryText, isExportTable, writeReports } from "./export.js";
import { formatScore, formatTable } from "./format.js";
import { buildReport } from "./report.js";
import { createServer } from "./routes.js";
import { VERSION } from "./index.js";

const env = loadEnv();
const program = new Command();

program
  .name("dbcompare")
  .description("Normalize, score and rank database benchmark results")
  .version(VERSION);

interface CompareOptions {
  run?: string;
  db?: string;
  out?: string;
  json: boolean;
  executive: boolean;
}

function openStore(dbPath: string): ResultsStore {
  const resolved = path.resolve(dbPath);
  fs.mkdirSync(path.dirname(resolved), { recursive: true });
  const store = new ResultsStore(resolved);
  store.initialize();
  return store;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

/**
 * Shared tail of `compare` and `collect`: score, print, persist, write files.
 */
function finishComparison(collected: CollectResult, options: CompareOptions): void {
  if (!collected.success) fail(collected.error.message);

  const runId = options.run ?? generateRunId();
  if (!isValidRunId(runId)) fail(`Invalid run id: ${runId}`);

  if (collected.samples.length === 0 && collected.rejected.length > 0) {
    fail(`No valid samples: ${collected.rejected.length} row(s) rejected`);
  }
  if (collected.rejected.length > 0) {
    console.error(`${collected.rejected.length} row(s) rejected`);
  }

  const comparison = compareRun(runId, collected.samples);
  const report = buildReport(comparison);
  const summary = formatSummaryText(report);

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else if (options.executive) {
    console.log(`\n${formatExecutiveSummary(report)}\n`);
  } else {
    console.log(`\n${summary}\n`);
  }

  if (options.db) {
    const store = openStore(options.db);
    try {
      store.saveComparison(comparison);
      store.saveReport(runId, summary);
    } finally {
      store.close();
    }
    console.error(`  [stored] run ${runId} → ${options.db}`);
  }

  if (options.out) {
    for (const file of writeReports(comparison, path.resolve(options.out))) {
      console.error(`  [written] ${file}`);
    }
  }
}

// ============================================================================
// compare - Score metric files
// ============================================================================

program
  .command("compare <files...>")
  .description("Compare databases from metric sample files (JSON)")
  .option("-r, --run <id>", "Run id (defaults to a timestamp)")
  .option("-d, --db <path>", "Store the run in this results database")
  .option("-o, --out <prefix>", "Write JSON, Markdown and CSV reports with this prefix")
  .option("--json", "Output the report as JSON", false)
  .option("--executive", "Print the one-page executive summary", false)
  .action((files: string[], options: CompareOptions) => {
    const collected = collectFiles(
      files.map((f) => ({ path: path.resolve(f) })),
      { onProgress: (msg) => console.error(msg) }
    );
    finishComparison(collected, options);
  });

// ============================================================================
// collect - Gather per-database output directories
// ============================================================================

program
  .command("collect <outputsDir>")
  .description("Collect <outputsDir>/<database>/*.json metric files and compare them")
  .option("-r, --run <id>", "Run id (defaults to a timestamp)")
  .option("-d, --db <path>", "Store the run in this results database")
  .option("-o, --out <prefix>", "Write JSON, Markdown and CSV reports with this prefix")
  .option("--json", "Output the report as JSON", false)
  .option("--executive", "Print the one-page executive summary", false)
  .action((outputsDir: string, options: CompareOptions) => {
    const collected = collectOutputs(path.resolve(outputsDir), {
      onProgress: (msg) => console.error(msg),
    });
    finishComparison(collected, options);
  });

// ============================================================================
// export - Delimited text for a stored run
// ============================================================================

program
  .command("export <table>")
  .description("Print a stored run's ranking, categories or detail table as delimited text")
  .option("-r, --run <id>", "Run id (defaults to the latest run)")
  .option("-d, --db <path>", "Results database", env.DBCOMPARE_DB_PATH)
  .option("--delimiter <char>", "Field delimiter", ",")
  .action((table: string, options: { run?: string; db: string; delimiter: string }) => {
    if (!isExportTable(table)) fail(`Unknown table: ${table}. Must be 'ranking', 'categories' or 'detail'`);

    const store = openStore(options.db);
    try {
      const runId = options.run ?? store.latestRunId();
      if (!runId) fail("No runs stored.");

      const comparison = store.loadComparison(runId);
      if (!comparison) fail(`Run not found: ${runId}`);

      process.stdout.write(exportDelimited(buildReport(comparison), table, options.delimiter));
    } finally {
      store.close();
    }
  });

// ============================================================================
// runs / trends - History
// ============================================================================

program
  .command("runs")
  .description("List stored runs")
  .option("-d, --db <path>", "Results database", env.DBCOMPARE_DB_PATH)
  .action((options: { db: string }) => {
    const store = openStore(options.db);
    try {
      const runs = store.listRuns();
      if (runs.length === 0) {
        console.log("No runs stored.");
        return;
      }
      console.log("");
      for (const line of formatTable(["runId", "createdAt", "sampleCount", "databaseCount"], runs.map((r) => ({ ...r })))) {
        console.log(`  ${line}`);
      }
      console.log("");
    } finally {
      store.close();
    }
  });

program
  .command("trends")
  .description("Daily average total score per database")
  .option("-d, --db <path>", "Results database", env.DBCOMPARE_DB_PATH)
  .action((options: { db: string }) => {
    const store = openStore(options.db);
    try {
      const rows = store.getTrends().map((t) => ({
        date: t.runDate,
        database: t.databaseName,
        avgScore: formatScore(t.avgDailyScore),
        runs: t.runsCount,
      }));
      if (rows.length === 0) {
        console.log("No scores stored.");
        return;
      }
      console.log("");
      for (const line of formatTable(["date", "database", "avgScore", "runs"], rows)) {
        console.log(`  ${line}`);
      }
      console.log("");
    } finally {
      store.close();
    }
  });

// ============================================================================
// serve - Start the HTTP server
// ============================================================================

program
  .command("serve")
  .description("Start the results HTTP server")
  .option("-p, --port <port>", "Port to listen on", String(env.PORT))
  .option("-H, --host <host>", "Host to bind to", env.HOST)
  .option("-d, --db <path>", "Results database", env.DBCOMPARE_DB_PATH)
  .action((options: { port: string; host: string; db: string }) => {
    const port = parseInt(options.port, 10);
    if (Number.isNaN(port)) fail(`Invalid port: ${options.port}`);

    const dataPath = path.resolve(options.db);
    fs.mkdirSync(path.dirname(dataPath), { recursive: true });
    const { app, store } = createServer({ port, dataPath });

    console.log(`dbcompare server v${VERSION}`);
    console.log(`  Endpoint:  http://${options.host}:${port}`);
    console.log(`  Results:   ${dataPath}`);

    serve({
      fetch: app.fetch,
      port,
      hostname: options.host,
    });

    const shutdown = () => {
      console.log("\nShutting down...");
      store.close();
      process.exit(0);
    };
    process.on("SIGINT", shutdown);
    process.on("SIGTERM", shutdown);
  });

// Parse and run
program.parse();
