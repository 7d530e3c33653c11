import type { Category, MetricSample } from "../src/types.js";

export function sample(
  databaseName: string,
  testCategory: Category,
  metricName: string,
  metricValue: number,
  unit: string = "score",
  weight: number = 1
): MetricSample {
  return { databaseName, testCategory, metricName, metricValue, unit, weight };
}

/**
 * One metric per category for three databases.
 *
 * Expected totals: InfluxDB 59.1667, PostgreSQL 45, MongoDB 33.3333.
 */
export function threeDatabaseRun(): MetricSample[] {
  return [
    sample("PostgreSQL", "ingestion", "insert_rate", 50000, "rows/sec", 0.25),
    sample("PostgreSQL", "query", "query_latency", 20, "ms", 0.15),
    sample("PostgreSQL", "storage", "table_size", 500, "MB", 0.1),
    sample("PostgreSQL", "indexing", "index_efficiency", 10, "x", 0.2),
    sample("PostgreSQL", "security", "security_score", 80, "%", 0.05),

    sample("InfluxDB", "ingestion", "insert_rate", 15000, "points/sec", 0.25),
    sample("InfluxDB", "query", "query_latency", 10, "ms", 0.15),
    sample("InfluxDB", "storage", "table_size", 350, "MB", 0.1),
    sample("InfluxDB", "indexing", "index_efficiency", 8.5, "x", 0.2),
    sample("InfluxDB", "security", "security_score", 92, "%", 0.05),

    sample("MongoDB", "ingestion", "insert_rate", 8000, "docs/sec", 0.25),
    sample("MongoDB", "query", "query_latency", 30, "ms", 0.15),
    sample("MongoDB", "storage", "table_size", 450, "MB", 0.1),
    sample("MongoDB", "indexing", "index_efficiency", 12.5, "x", 0.2),
    sample("MongoDB", "security", "security_score", 88, "%", 0.05),
  ];
}
