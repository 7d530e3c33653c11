import * as fs from "fs";
import * as path from "path";
import { COMPARISON_CONFIG } from "./config.js";
import { formatScore } from "./format.js";
import { buildReport } from "./report.js";
import type { ComparisonReport } from "./report.js";
import type { ComparisonResult } from "./types.js";

export type ExportTable = "ranking" | "categories" | "detail";

export const EXPORT_TABLES: readonly ExportTable[] = ["ranking", "categories", "detail"];

export function isExportTable(value: string): value is ExportTable {
  return (EXPORT_TABLES as readonly string[]).includes(value);
}

// ============================================================================
// Delimited text
// ============================================================================

/**
 * Quote a field when it contains the delimiter, a quote or a line break.
 */
export function escapeField(value: string, delimiter: string = COMPARISON_CONFIG.delimiter): string {
  if (value.includes(delimiter) || value.includes('"') || /[\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function toLines(header: string[], rows: (string | number)[][], delimiter: string): string {
  const lines = [header, ...rows].map((fields) =>
    fields.map((f) => escapeField(String(f), delimiter)).join(delimiter)
  );
  return lines.join("\n") + "\n";
}

/**
 * Render one report table as delimited text: a header line, then one record
 * per line in fixed field order.
 */
export function exportDelimited(
  report: ComparisonReport,
  table: ExportTable,
  delimiter: string = COMPARISON_CONFIG.delimiter
): string {
  switch (table) {
    case "ranking":
      return toLines(
        ["rank", "database_name", "total_score", "performance_category", "award", "recommendation", "security_grade"],
        report.ranking.map((r) => [
          r.rank,
          r.databaseName,
          formatScore(r.totalScore),
          r.performanceCategory,
          r.award ?? "",
          r.recommendation,
          r.securityGrade ?? "",
        ]),
        delimiter
      );
    case "categories":
      return toLines(
        ["test_category", "database_name", "average_score", "category_rank"],
        report.categoryPerformance.map((r) => [
          r.testCategory,
          r.databaseName,
          formatScore(r.averageScore),
          r.categoryRank,
        ]),
        delimiter
      );
    case "detail":
      return toLines(
        [
          "database_name",
          "test_category",
          "metric_name",
          "metric_value",
          "unit",
          "normalized_score",
          "weighted_score",
          "notes",
        ],
        report.detail.map((r) => [
          r.databaseName,
          r.testCategory,
          r.metricName,
          r.metricValue,
          r.unit,
          formatScore(r.normalizedScore, 4),
          formatScore(r.weightedScore),
          r.notes ?? "",
        ]),
        delimiter
      );
  }
}

// ============================================================================
// Markdown
// ============================================================================

/**
 * Generate Markdown report
 */
export function generateMarkdown(report: ComparisonReport, comparison: ComparisonResult): string {
  const lines: string[] = [];

  lines.push("# Database Benchmark Comparison Report");
  lines.push("");
  lines.push(`**Run:** ${report.runId}`);
  lines.push("");

  if (!report.winner) {
    lines.push("No metric samples were recorded for this run.");
    lines.push("");
    return lines.join("\n");
  }

  lines.push(`**Overall winner:** ${report.winner.databaseName}`);
  lines.push(`**Total score:** ${formatScore(report.winner.totalScore)}/100 (${report.winner.performanceCategory})`);
  lines.push("");

  lines.push("## Final Rankings");
  lines.push("");
  lines.push("| Rank | Database | Total Score | Tier | Award | Recommendation | Security Grade |");
  lines.push("|------|----------|-------------|------|-------|----------------|----------------|");
  for (const r of report.ranking) {
    const total = r.complete ? formatScore(r.totalScore) : `${formatScore(r.totalScore)}*`;
    lines.push(
      `| ${r.rank} | ${r.databaseName} | ${total} | ${r.performanceCategory} | ${r.award ?? ""} | ${r.recommendation} | ${r.securityGrade ?? "N/A"} |`
    );
  }
  if (report.ranking.some((r) => !r.complete)) {
    lines.push("");
    lines.push("\\* Some categories have no samples; the total re-weights the categories present.");
  }
  lines.push("");

  lines.push("## Category Winners");
  lines.push("");
  for (const w of report.categoryWinners) {
    lines.push(`- **${w.testCategory}**: ${w.databaseName} (${formatScore(w.averageScore)})`);
  }
  lines.push("");

  lines.push("## Category Scores");
  lines.push("");
  lines.push("| Database | Ingestion | Query | Storage | Indexing | Security | Total |");
  lines.push("|----------|-----------|-------|---------|----------|----------|-------|");
  for (const s of comparison.finalScores) {
    const cells = [s.ingestionScore, s.queryScore, s.storageScore, s.indexingScore, s.securityScore]
      .map((v) => formatScore(v))
      .join(" | ");
    lines.push(`| ${s.databaseName} | ${cells} | ${formatScore(s.totalScore)} |`);
  }
  lines.push("");

  lines.push("## Metric Detail");
  lines.push("");
  lines.push("| Database | Category | Metric | Value | Unit | Normalized | Weighted |");
  lines.push("|----------|----------|--------|-------|------|------------|----------|");
  for (const d of report.detail) {
    lines.push(
      `| ${d.databaseName} | ${d.testCategory} | ${d.metricName} | ${d.metricValue} | ${d.unit} | ${formatScore(d.normalizedScore)} | ${formatScore(d.weightedScore)} |`
    );
  }
  lines.push("");

  return lines.join("\n");
}

/**
 * Plain-text summary: winner, rankings and category winners
 */
export function formatSummaryText(report: ComparisonReport): string {
  const lines: string[] = [];

  lines.push("DATABASE BENCHMARK COMPARISON REPORT");
  lines.push("=====================================");
  lines.push(`Run: ${report.runId}`);
  lines.push("");

  if (!report.winner) {
    lines.push("No results.");
    return lines.join("\n");
  }

  lines.push(`OVERALL WINNER: ${report.winner.databaseName}`);
  lines.push(`   Total Score: ${formatScore(report.winner.totalScore)}/100`);
  lines.push(`   Category: ${report.winner.performanceCategory}`);
  lines.push(`   Recommendation: ${report.winner.recommendation}`);
  lines.push("");

  lines.push("FINAL RANKINGS:");
  lines.push("---------------");
  for (const r of report.ranking) {
    const award = r.award ? ` ${r.award}` : "";
    lines.push(`${r.rank}. ${r.databaseName} - ${formatScore(r.totalScore)}/100${award}`);
  }
  lines.push("");

  lines.push("CATEGORY WINNERS:");
  lines.push("-----------------");
  for (const w of report.categoryWinners) {
    lines.push(`• ${w.testCategory}: ${w.databaseName} (${formatScore(w.averageScore)})`);
  }

  return lines.join("\n");
}

function heading(title: string): string[] {
  return [title, "-".repeat(title.length)];
}

/**
 * One-page executive summary: overall recommendation, top three, best per
 * category and security grades.
 */
export function formatExecutiveSummary(report: ComparisonReport): string {
  const lines: string[] = [];

  lines.push("EXECUTIVE SUMMARY");
  lines.push("=================");
  lines.push(`Run: ${report.runId}`);
  lines.push("");

  if (!report.winner) {
    lines.push("No results.");
    return lines.join("\n");
  }

  lines.push(...heading("OVERALL RECOMMENDATION"));
  lines.push(`Database: ${report.winner.databaseName}`);
  lines.push(`Overall Score: ${formatScore(report.winner.totalScore)}/100`);
  lines.push(`Rank: #${report.winner.rank}`);
  lines.push(`Recommendation: ${report.winner.recommendation}`);
  lines.push("");

  lines.push(...heading("TOP 3 DATABASES"));
  for (const r of report.ranking.slice(0, 3)) {
    lines.push(`${r.rank}. ${r.databaseName}: ${formatScore(r.totalScore)}/100`);
  }
  lines.push("");

  lines.push(...heading("BEST IN CATEGORY"));
  for (const w of report.categoryWinners) {
    lines.push(`${w.testCategory}: ${w.databaseName} (${formatScore(w.averageScore)})`);
  }
  lines.push("");

  lines.push(...heading("SECURITY GRADES"));
  for (const r of report.ranking) {
    lines.push(`${r.databaseName}: ${r.securityGrade ?? "N/A"}`);
  }

  return lines.join("\n");
}

// ============================================================================
// Files
// ============================================================================

export interface WriteReportOptions {
  json?: boolean;
  markdown?: boolean;
  csv?: boolean;
  summary?: boolean;
  delimiter?: string;
}

/**
 * Write all reports to disk, returning the written paths
 */
export function writeReports(
  comparison: ComparisonResult,
  outputPrefix: string,
  options: WriteReportOptions = {}
): string[] {
  const { json = true, markdown = true, csv = true, summary = true, delimiter = COMPARISON_CONFIG.delimiter } = options;
  const report = buildReport(comparison);
  const written: string[] = [];

  const dir = path.dirname(outputPrefix);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  if (json) {
    const jsonPath = `${outputPrefix}.json`;
    fs.writeFileSync(jsonPath, JSON.stringify({ report, comparison }, null, 2));
    written.push(jsonPath);
  }

  if (markdown) {
    const mdPath = `${outputPrefix}.md`;
    fs.writeFileSync(mdPath, generateMarkdown(report, comparison));
    written.push(mdPath);
  }

  if (csv) {
    for (const table of EXPORT_TABLES) {
      const csvPath = `${outputPrefix}-${table}.csv`;
      fs.writeFileSync(csvPath, exportDelimited(report, table, delimiter));
      written.push(csvPath);
    }
  }

  if (summary) {
    const summaryPath = `${outputPrefix}-summary.txt`;
    fs.writeFileSync(summaryPath, formatExecutiveSummary(report) + "\n");
    written.push(summaryPath);
  }

  return written;
}
