// Results collector - gathers metric files written by the per-database suites

import * as fs from "fs";
import * as path from "path";
import { DATABASE_DISPLAY_NAMES } from "./config.js";
import { formatRejection, ingestSamples } from "./ingest.js";
import type { FieldIssue } from "./ingest.js";
import type { MetricSample } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface FileRejection {
  file: string;
  index: number;
  issues: FieldIssue[];
}

export interface CollectSuccess {
  success: true;
  samples: MetricSample[];
  rejected: FileRejection[];
  files: string[];
}

export interface CollectError {
  success: false;
  error: { message: string };
}

export type CollectResult = CollectSuccess | CollectError;

export type LoadRowsResult =
  | { success: true; rows: unknown[] }
  | { success: false; error: { message: string } };

export interface CollectOptions {
  onProgress?: (msg: string) => void;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read a metric file: either a JSON array of rows or `{ "samples": [...] }`.
 */
export function loadSampleFile(filePath: string): LoadRowsResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: { message: `Cannot read ${filePath}: ${message}` } };
  }

  if (Array.isArray(parsed)) {
    return { success: true, rows: parsed };
  }
  if (typeof parsed === "object" && parsed !== null && "samples" in parsed && Array.isArray(parsed.samples)) {
    return { success: true, rows: parsed.samples };
  }
  return {
    success: false,
    error: { message: `${filePath}: expected an array of samples or an object with a "samples" array` },
  };
}

export function displayNameFor(directory: string): string {
  return DATABASE_DISPLAY_NAMES[directory.toLowerCase()] ?? directory;
}

function withDatabaseName(row: unknown, databaseName: string): unknown {
  if (typeof row !== "object" || row === null || Array.isArray(row)) return row;
  if ("database_name" in row || "databaseName" in row) return row;
  return { ...row, database_name: databaseName };
}

/**
 * Ingest rows from several files, tolerating bad rows. Unreadable files fail
 * the whole collection since a missing suite would skew every score.
 */
export function collectFiles(
  files: { path: string; databaseName?: string }[],
  options: CollectOptions = {}
): CollectResult {
  const samples: MetricSample[] = [];
  const rejected: FileRejection[] = [];

  for (const file of files) {
    const loaded = loadSampleFile(file.path);
    if (!loaded.success) return loaded;

    const { databaseName } = file;
    const rows = databaseName
      ? loaded.rows.map((row) => withDatabaseName(row, databaseName))
      : loaded.rows;
    const result = ingestSamples(rows);

    samples.push(...result.accepted);
    for (const r of result.rejected) {
      rejected.push({ file: file.path, ...r });
      options.onProgress?.(`  [rejected] ${path.basename(file.path)} ${formatRejection(r)}`);
    }
    options.onProgress?.(`  Loaded: ${path.basename(file.path)} (${result.accepted.length} sample(s))`);
  }

  return { success: true, samples, rejected, files: files.map((f) => f.path) };
}

/**
 * Collect `<outputsDir>/<database>/*.json`. The directory name supplies the
 * database name for rows that do not carry one.
 */
export function collectOutputs(outputsDir: string, options: CollectOptions = {}): CollectResult {
  if (!fs.existsSync(outputsDir)) {
    return { success: false, error: { message: `Outputs directory not found: ${outputsDir}` } };
  }

  const files: { path: string; databaseName: string }[] = [];
  const directories = fs
    .readdirSync(outputsDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  for (const dir of directories) {
    options.onProgress?.(`Collecting ${displayNameFor(dir)} results...`);
    const dirPath = path.join(outputsDir, dir);
    const jsonFiles = fs
      .readdirSync(dirPath)
      .filter((f) => f.endsWith(".json"))
      .sort();
    for (const f of jsonFiles) {
      files.push({ path: path.join(dirPath, f), databaseName: displayNameFor(dir) });
    }
  }

  if (files.length === 0) {
    return { success: false, error: { message: `No metric files found under ${outputsDir}` } };
  }

  return collectFiles(files, options);
}
