// Metric Ingest - validation of raw metric rows

import { z } from "zod";
import { COMPARISON_CONFIG } from "./config.js";
import { CATEGORIES } from "./types.js";
import type { MetricSample } from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface FieldIssue {
  field: string;
  message: string;
}

export interface RejectedRow {
  index: number;
  issues: FieldIssue[];
}

export interface IngestResult {
  accepted: MetricSample[];
  rejected: RejectedRow[];
}

export type SampleValidation =
  | { success: true; sample: MetricSample }
  | { success: false; issues: FieldIssue[] };

// ============================================================================
// Schema
// ============================================================================

const KNOWN_UNITS = new Set(COMPARISON_CONFIG.knownUnits);

const requiredString = z
  .string({ required_error: "is required", invalid_type_error: "must be a string" })
  .min(1, "must not be empty");

const sampleSchema = z.object({
  database_name: requiredString,
  test_category: z.enum(CATEGORIES, {
    errorMap: () => ({ message: `must be one of ${CATEGORIES.join(", ")}` }),
  }),
  metric_name: requiredString,
  metric_value: z
    .number({ required_error: "is required", invalid_type_error: "must be a number" })
    .finite("must be a finite number"),
  unit: z
    .string({ required_error: "is required", invalid_type_error: "must be a string" })
    .refine((unit) => KNOWN_UNITS.has(unit), (unit) => ({ message: `unknown unit "${unit}"` })),
  weight: z
    .number({ invalid_type_error: "must be a number" })
    .min(0, "must be between 0 and 1")
    .max(1, "must be between 0 and 1")
    .default(COMPARISON_CONFIG.defaultSampleWeight),
  notes: z.string({ invalid_type_error: "must be a string" }).nullish(),
});

// Wire rows may use either spelling
const FIELD_ALIASES: Record<string, string> = {
  databaseName: "database_name",
  testCategory: "test_category",
  metricName: "metric_name",
  metricValue: "metric_value",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function canonicalize(row: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    const canonical = FIELD_ALIASES[key] ?? key;
    if (canonical in out && key !== canonical) continue; // snake_case wins
    out[canonical] = value;
  }
  return out;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a single raw row. Every offending field gets its own issue.
 */
export function validateSample(row: unknown): SampleValidation {
  if (!isRecord(row)) {
    return { success: false, issues: [{ field: "row", message: "must be an object" }] };
  }

  const result = sampleSchema.safeParse(canonicalize(row));
  if (!result.success) {
    return {
      success: false,
      issues: result.error.issues.map((issue) => ({
        field: issue.path.join(".") || "row",
        message: issue.message,
      })),
    };
  }

  const data = result.data;
  const sample: MetricSample = {
    databaseName: data.database_name,
    testCategory: data.test_category,
    metricName: data.metric_name,
    metricValue: data.metric_value,
    unit: data.unit,
    weight: data.weight,
  };
  if (data.notes) sample.notes = data.notes;
  return { success: true, sample };
}

/**
 * Partial-batch ingestion: invalid rows are reported and skipped, the rest of
 * the batch is accepted.
 */
export function ingestSamples(rows: unknown[]): IngestResult {
  const accepted: MetricSample[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((row, index) => {
    const result = validateSample(row);
    if (result.success) {
      accepted.push(result.sample);
    } else {
      rejected.push({ index, issues: result.issues });
    }
  });

  return { accepted, rejected };
}

export function formatRejection(rejection: RejectedRow): string {
  const issues = rejection.issues.map((i) => `${i.field} ${i.message}`).join("; ");
  return `row ${rejection.index}: ${issues}`;
}
