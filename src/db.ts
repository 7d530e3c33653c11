// Results store on SQLite

import Database from "better-sqlite3";
import { compareRun } from "./comparison.js";
import { isCategory, isPerformanceCategory } from "./types.js";
import type { Category, ComparisonResult, FinalScore, MetricSample } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface RunInfo {
  runId: string;
  createdAt: string;
  sampleCount: number;
  databaseCount: number;
}

export interface TrendRow {
  runDate: string;
  databaseName: string;
  avgDailyScore: number;
  runsCount: number;
}

export interface ReportHistoryEntry {
  reportId: number;
  runId: string;
  reportText: string;
  generatedAt: string;
}

interface SampleRow {
  database_name: string;
  test_category: string;
  metric_name: string;
  metric_value: number;
  unit: string;
  weight: number;
  notes: string | null;
}

interface FinalScoreRow {
  database_name: string;
  ingestion_score: number | null;
  query_score: number | null;
  storage_score: number | null;
  indexing_score: number | null;
  security_score: number | null;
  total_score: number;
  ranking: number;
  performance_category: string;
  missing_categories: string;
}

// ============================================================================
// Schema
// ============================================================================

const SCHEMA = `
CREATE TABLE IF NOT EXISTS runs (
    run_id TEXT PRIMARY KEY,
    created_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS metric_samples (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL,
    database_name TEXT NOT NULL,
    test_category TEXT NOT NULL,
    metric_name TEXT NOT NULL,
    metric_value REAL NOT NULL,
    unit TEXT NOT NULL,
    weight REAL NOT NULL DEFAULT 1.0,
    notes TEXT,
    FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS final_scores (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL,
    database_name TEXT NOT NULL,
    ingestion_score REAL,
    query_score REAL,
    storage_score REAL,
    indexing_score REAL,
    security_score REAL,
    total_score REAL NOT NULL,
    ranking INTEGER NOT NULL,
    performance_category TEXT NOT NULL,
    missing_categories JSON DEFAULT '[]',
    FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS report_history (
    report_id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL,
    report_text TEXT NOT NULL,
    generated_at TEXT NOT NULL,
    FOREIGN KEY (run_id) REFERENCES runs(run_id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_samples_run ON metric_samples(run_id);
CREATE INDEX IF NOT EXISTS idx_scores_run ON final_scores(run_id);
CREATE INDEX IF NOT EXISTS idx_history_run ON report_history(run_id);
`;

function parseMissingCategories(json: string): Category[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((c): c is Category => typeof c === "string" && isCategory(c));
}

// ============================================================================
// Results Store
// ============================================================================

export class ResultsStore {
  private db: Database.Database;
  private initialized: boolean = false;

  constructor(path: string = ":memory:") {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  /**
   * Initialize the database schema
   */
  initialize(): void {
    if (this.initialized) return;

    this.db.exec(SCHEMA);
    this.initialized = true;
  }

  /**
   * Replace everything stored for a run: its samples, final scores and
   * report history are deleted, then the comparison's rows are inserted, in
   * one transaction. Other runs are untouched.
   */
  saveComparison(comparison: ComparisonResult, createdAt: string = new Date().toISOString()): void {
    this.ensureInitialized();

    const upsertRun = this.db.prepare(
      "INSERT INTO runs (run_id, created_at) VALUES (?, ?) ON CONFLICT(run_id) DO UPDATE SET created_at = excluded.created_at"
    );
    const deleteSamples = this.db.prepare("DELETE FROM metric_samples WHERE run_id = ?");
    const deleteScores = this.db.prepare("DELETE FROM final_scores WHERE run_id = ?");
    const deleteReports = this.db.prepare("DELETE FROM report_history WHERE run_id = ?");
    const insertSample = this.db.prepare(
      `INSERT INTO metric_samples (run_id, database_name, test_category, metric_name, metric_value, unit, weight, notes)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    );
    const insertScore = this.db.prepare(
      `INSERT INTO final_scores (run_id, database_name, ingestion_score, query_score, storage_score,
         indexing_score, security_score, total_score, ranking, performance_category, missing_categories)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const { runId } = comparison;
    this.db.transaction(() => {
      upsertRun.run(runId, createdAt);
      deleteSamples.run(runId);
      deleteScores.run(runId);
      deleteReports.run(runId);

      for (const s of comparison.samples) {
        insertSample.run(
          runId,
          s.databaseName,
          s.testCategory,
          s.metricName,
          s.metricValue,
          s.unit,
          s.weight,
          s.notes ?? null
        );
      }

      for (const f of comparison.finalScores) {
        insertScore.run(
          runId,
          f.databaseName,
          f.ingestionScore,
          f.queryScore,
          f.storageScore,
          f.indexingScore,
          f.securityScore,
          f.totalScore,
          f.ranking,
          f.performanceCategory,
          JSON.stringify(f.missingCategories)
        );
      }
    })();
  }

  /**
   * Samples of a run, in insertion order
   */
  getSamples(runId: string): MetricSample[] {
    this.ensureInitialized();

    const rows = this.db
      .prepare<[string], SampleRow>(
        `SELECT database_name, test_category, metric_name, metric_value, unit, weight, notes
         FROM metric_samples WHERE run_id = ? ORDER BY id`
      )
      .all(runId);

    const samples: MetricSample[] = [];
    for (const row of rows) {
      if (!isCategory(row.test_category)) continue;
      const sample: MetricSample = {
        databaseName: row.database_name,
        testCategory: row.test_category,
        metricName: row.metric_name,
        metricValue: row.metric_value,
        unit: row.unit,
        weight: row.weight,
      };
      if (row.notes !== null) sample.notes = row.notes;
      samples.push(sample);
    }
    return samples;
  }

  /**
   * Stored final scores of a run, by ranking
   */
  getFinalScores(runId: string): FinalScore[] {
    this.ensureInitialized();

    const rows = this.db
      .prepare<[string], FinalScoreRow>(
        `SELECT database_name, ingestion_score, query_score, storage_score, indexing_score,
                security_score, total_score, ranking, performance_category, missing_categories
         FROM final_scores WHERE run_id = ? ORDER BY ranking, database_name`
      )
      .all(runId);

    const scores: FinalScore[] = [];
    for (const row of rows) {
      if (!isPerformanceCategory(row.performance_category)) continue;
      scores.push({
        databaseName: row.database_name,
        ingestionScore: row.ingestion_score,
        queryScore: row.query_score,
        storageScore: row.storage_score,
        indexingScore: row.indexing_score,
        securityScore: row.security_score,
        totalScore: row.total_score,
        ranking: row.ranking,
        performanceCategory: row.performance_category,
        missingCategories: parseMissingCategories(row.missing_categories),
      });
    }
    return scores;
  }

  /**
   * Re-derive a stored run's comparison from its samples
   */
  loadComparison(runId: string): ComparisonResult | null {
    if (!this.hasRun(runId)) return null;
    return compareRun(runId, this.getSamples(runId));
  }

  hasRun(runId: string): boolean {
    this.ensureInitialized();
    const row = this.db.prepare<[string], { run_id: string }>("SELECT run_id FROM runs WHERE run_id = ?").get(runId);
    return row !== undefined;
  }

  /**
   * Most recently created run, or null when the store is empty
   */
  latestRunId(): string | null {
    this.ensureInitialized();
    const row = this.db
      .prepare<[], { run_id: string }>("SELECT run_id FROM runs ORDER BY created_at DESC, run_id DESC LIMIT 1")
      .get();
    return row?.run_id ?? null;
  }

  /**
   * All runs, newest first
   */
  listRuns(): RunInfo[] {
    this.ensureInitialized();
    const rows = this.db
      .prepare<[], { run_id: string; created_at: string; sample_count: number; database_count: number }>(
        `SELECT r.run_id, r.created_at,
                COUNT(s.id) AS sample_count,
                COUNT(DISTINCT s.database_name) AS database_count
         FROM runs r LEFT JOIN metric_samples s ON s.run_id = r.run_id
         GROUP BY r.run_id, r.created_at
         ORDER BY r.created_at DESC, r.run_id DESC`
      )
      .all();

    return rows.map((row) => ({
      runId: row.run_id,
      createdAt: row.created_at,
      sampleCount: row.sample_count,
      databaseCount: row.database_count,
    }));
  }

  /**
   * Delete a run with its samples, scores and reports
   */
  deleteRun(runId: string): boolean {
    this.ensureInitialized();
    const result = this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId);
    return result.changes > 0;
  }

  /**
   * Daily average total score per database across stored runs
   */
  getTrends(): TrendRow[] {
    this.ensureInitialized();
    const rows = this.db
      .prepare<[], { run_date: string; database_name: string; avg_daily_score: number; runs_count: number }>(
        `SELECT substr(r.created_at, 1, 10) AS run_date,
                f.database_name,
                AVG(f.total_score) AS avg_daily_score,
                COUNT(*) AS runs_count
         FROM final_scores f JOIN runs r ON r.run_id = f.run_id
         GROUP BY run_date, f.database_name
         ORDER BY run_date DESC, avg_daily_score DESC, f.database_name`
      )
      .all();

    return rows.map((row) => ({
      runDate: row.run_date,
      databaseName: row.database_name,
      avgDailyScore: row.avg_daily_score,
      runsCount: row.runs_count,
    }));
  }

  saveReport(runId: string, reportText: string, generatedAt: string = new Date().toISOString()): number {
    this.ensureInitialized();
    const result = this.db
      .prepare("INSERT INTO report_history (run_id, report_text, generated_at) VALUES (?, ?, ?)")
      .run(runId, reportText, generatedAt);
    return Number(result.lastInsertRowid);
  }

  getReportHistory(runId: string): ReportHistoryEntry[] {
    this.ensureInitialized();
    const rows = this.db
      .prepare<[string], { report_id: number; run_id: string; report_text: string; generated_at: string }>(
        "SELECT report_id, run_id, report_text, generated_at FROM report_history WHERE run_id = ? ORDER BY report_id"
      )
      .all(runId);

    return rows.map((row) => ({
      reportId: row.report_id,
      runId: row.run_id,
      reportText: row.report_text,
      generatedAt: row.generated_at,
    }));
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      this.initialize();
    }
  }
}
