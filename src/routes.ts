// HTTP Routes using Hono

import { Hono } from "hono";
import { compareRun } from "./comparison.js";
import { isValidRunId } from "./config.js";
import { ResultsStore } from "./db.js";
import { exportDelimited, formatSummaryText, isExportTable } from "./export.js";
import { ingestSamples } from "./ingest.js";
import { buildReport } from "./report.js";

// ============================================================================
// Types
// ============================================================================

export interface SamplesRequest {
  samples: unknown[];
}

function errorBody(message: string) {
  return { success: false as const, error: { message } };
}

// ============================================================================
// Create App
// ============================================================================

export function createApp(store: ResultsStore): Hono {
  const app = new Hono();

  // ============================================================================
  // Health Check
  // ============================================================================

  app.get("/health", (c) => {
    return c.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  // ============================================================================
  // Runs
  // ============================================================================

  app.get("/runs", (c) => {
    return c.json({ success: true, data: { runs: store.listRuns() } });
  });

  app.put("/runs/:runId/samples", async (c) => {
    const runId = c.req.param("runId");
    if (!isValidRunId(runId)) {
      return c.json(errorBody(`Invalid run id: ${runId}`), 400);
    }

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(errorBody("Invalid JSON body"), 400);
    }

    if (typeof body !== "object" || body === null || !("samples" in body) || !Array.isArray(body.samples)) {
      return c.json(errorBody("Missing or invalid 'samples' field"), 400);
    }

    const { accepted, rejected } = ingestSamples(body.samples);
    // A batch with rows but nothing usable must not wipe the stored run
    if (accepted.length === 0 && rejected.length > 0) {
      return c.json(
        {
          success: false,
          error: { message: `No valid samples: ${rejected.length} row(s) rejected`, rejected },
        },
        400
      );
    }

    const comparison = compareRun(runId, accepted);
    store.saveComparison(comparison);
    store.saveReport(runId, formatSummaryText(buildReport(comparison)));

    return c.json({
      success: true,
      data: { runId, accepted: accepted.length, rejected },
    });
  });

  app.get("/runs/:runId/report", (c) => {
    const runId = c.req.param("runId");
    const comparison = store.loadComparison(runId);
    if (!comparison) {
      return c.json(errorBody(`Run not found: ${runId}`), 404);
    }

    return c.json({ success: true, data: buildReport(comparison) });
  });

  app.get("/runs/:runId/export/:table", (c) => {
    const runId = c.req.param("runId");
    const table = c.req.param("table");

    if (!isExportTable(table)) {
      return c.json(errorBody(`Unknown table: ${table}. Must be 'ranking', 'categories' or 'detail'`), 400);
    }

    const comparison = store.loadComparison(runId);
    if (!comparison) {
      return c.json(errorBody(`Run not found: ${runId}`), 404);
    }

    const delimiter = c.req.query("delimiter") || undefined;
    return c.body(exportDelimited(buildReport(comparison), table, delimiter), 200, {
      "Content-Type": "text/csv; charset=utf-8",
    });
  });

  app.delete("/runs/:runId", (c) => {
    const runId = c.req.param("runId");
    if (!store.deleteRun(runId)) {
      return c.json(errorBody(`Run not found: ${runId}`), 404);
    }
    return c.json({ success: true, message: `Deleted run ${runId}` });
  });

  // ============================================================================
  // History
  // ============================================================================

  app.get("/trends", (c) => {
    return c.json({ success: true, data: { trends: store.getTrends() } });
  });

  return app;
}

// ============================================================================
// Server Factory
// ============================================================================

export interface ServerOptions {
  port?: number;
  dataPath?: string;
}

export function createServer(options: ServerOptions = {}) {
  const { port = 3000, dataPath = ":memory:" } = options;

  const store = new ResultsStore(dataPath);
  store.initialize();
  const app = createApp(store);

  return {
    app,
    store,
    port,
    fetch: app.fetch,
  };
}
