import * as path from "path";
import { z } from "zod";
import type { Award, Category, PerformanceCategory, Recommendation, SecurityGrade } from "./types.js";

export const CATEGORY_WEIGHTS: Record<Category, number> = {
  ingestion: 0.25,
  query: 0.25,
  storage: 0.2,
  indexing: 0.2,
  security: 0.1,
};

// Checked top-down, lower bound inclusive
export const TIER_THRESHOLDS: { min: number; tier: PerformanceCategory }[] = [
  { min: 80, tier: "Excellent" },
  { min: 60, tier: "Good" },
  { min: 40, tier: "Fair" },
];

// Deployment advice by total score, same bound rules as the tiers
export const RECOMMENDATION_THRESHOLDS: { min: number; recommendation: Recommendation }[] = [
  { min: 80, recommendation: "Strongly Recommended" },
  { min: 70, recommendation: "Recommended" },
  { min: 60, recommendation: "Consider with Modifications" },
];

// Letter grades for the security category score; below 50 is "D"
export const SECURITY_GRADES: { min: number; grade: SecurityGrade }[] = [
  { min: 90, grade: "A+" },
  { min: 85, grade: "A" },
  { min: 80, grade: "A-" },
  { min: 75, grade: "B+" },
  { min: 70, grade: "B" },
  { min: 65, grade: "B-" },
  { min: 60, grade: "C+" },
  { min: 55, grade: "C" },
  { min: 50, grade: "C-" },
];

export const AWARDS: Record<number, Award> = {
  1: "Winner",
  2: "Runner-up",
  3: "Third Place",
};

// Output directory names of the collected benchmark suites
export const DATABASE_DISPLAY_NAMES: Record<string, string> = {
  postgresql: "PostgreSQL",
  influxdb: "InfluxDB",
  mongodb: "MongoDB",
};

export const COMPARISON_CONFIG = {
  // Units accepted at ingest
  knownUnits: [
    "rows/sec",
    "points/sec",
    "docs/sec",
    "ops/sec",
    "queries/sec",
    "ms",
    "s",
    "MB",
    "GB",
    "KB",
    "bytes",
    "x",
    "%",
    "count",
    "score",
  ],

  // Weight applied to samples that omit one
  defaultSampleWeight: 1.0,

  // Delimited text exports
  delimiter: ",",

  // Decimal places for report tables
  precision: 2,

  // Decimal places of stored scores; rankings compare stored values
  scorePrecision: 4,

  // Run ids double as file name parts, keep them tame
  runIdPattern: /^[A-Za-z0-9][A-Za-z0-9._:-]*$/,
  maxRunIdLength: 64,

  // Relative to the working directory
  dataPath: path.resolve("benchmark-data", "results.db"),
};

const envSchema = z.object({
  DBCOMPARE_DB_PATH: z.string().default(COMPARISON_CONFIG.dataPath),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default("localhost"),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Read environment overrides. Throws on the first invalid variable.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new Error(`Invalid environment variable ${issue.path.join(".")}: ${issue.message}`);
  }
  return result.data;
}

export function isValidRunId(runId: string): boolean {
  if (!runId || runId.length > COMPARISON_CONFIG.maxRunIdLength) return false;
  return COMPARISON_CONFIG.runIdPattern.test(runId);
}

/**
 * Generate a run id from a date: run_YYYYMMDD_HHmmss
 */
export function generateRunId(date: Date = new Date()): string {
  const pad = (n: number) => n.toString().padStart(2, "0");
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `run_${day}_${time}`;
}
