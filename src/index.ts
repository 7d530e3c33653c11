// dbcompare - cross-database benchmark scoring

export { CATEGORIES, isCategory, isPerformanceCategory } from "./types.js";
export type {
  Award,
  Category,
  CategoryScore,
  ComparisonResult,
  FinalScore,
  MetricSample,
  MetricStats,
  NormalizedScore,
  PerformanceCategory,
  Recommendation,
  SecurityGrade,
} from "./types.js";

export {
  AWARDS,
  CATEGORY_WEIGHTS,
  COMPARISON_CONFIG,
  DATABASE_DISPLAY_NAMES,
  RECOMMENDATION_THRESHOLDS,
  SECURITY_GRADES,
  TIER_THRESHOLDS,
  generateRunId,
  isValidRunId,
  loadEnv,
} from "./config.js";
export type { Env } from "./config.js";

export { VARIANT_SEPARATOR, baseMetricName, isHigherBetter } from "./direction.js";
export { computeMetricStats, normalizeSamples, normalizeValue } from "./normalizer.js";
export { aggregateCategories } from "./aggregator.js";
export {
  classifyTier,
  categoryScoreOf,
  gradeSecurity,
  rankByScore,
  recommendFor,
  scoreDatabases,
  weightedTotal,
} from "./scorer.js";
export type { Ranked } from "./scorer.js";
export { compareRun } from "./comparison.js";

export { formatRejection, ingestSamples, validateSample } from "./ingest.js";
export type { FieldIssue, IngestResult, RejectedRow, SampleValidation } from "./ingest.js";

export {
  buildCategoryPerformance,
  buildCategoryWinners,
  buildDetail,
  buildRanking,
  buildReport,
} from "./report.js";
export type {
  CategoryPerformanceRow,
  CategoryWinner,
  ComparisonReport,
  DetailRow,
  RankingEntry,
} from "./report.js";

export {
  EXPORT_TABLES,
  escapeField,
  exportDelimited,
  formatExecutiveSummary,
  formatSummaryText,
  generateMarkdown,
  isExportTable,
  writeReports,
} from "./export.js";
export type { ExportTable, WriteReportOptions } from "./export.js";

export { ResultsStore } from "./db.js";
export type { ReportHistoryEntry, RunInfo, TrendRow } from "./db.js";

export { collectFiles, collectOutputs, displayNameFor, loadSampleFile } from "./collector.js";
export type { CollectResult, FileRejection } from "./collector.js";

export { runVariants, variantSamples } from "./variants.js";
export type { Measurement, Variant, VariantRejection, VariantResult, VariantSamples } from "./variants.js";

export { createApp, createServer } from "./routes.js";
export type { SamplesRequest, ServerOptions } from "./routes.js";

export const VERSION = "0.1.0";
