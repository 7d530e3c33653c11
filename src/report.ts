// Report Emitter - ranking, category performance and detail tables

import { AWARDS, COMPARISON_CONFIG } from "./config.js";
import { roundTo } from "./format.js";
import { computeMetricStats, normalizeValue } from "./normalizer.js";
import { gradeSecurity, rankByScore, recommendFor } from "./scorer.js";
import { CATEGORIES } from "./types.js";
import type {
  Award,
  Category,
  ComparisonResult,
  PerformanceCategory,
  Recommendation,
  SecurityGrade,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface RankingEntry {
  rank: number;
  databaseName: string;
  totalScore: number;
  performanceCategory: PerformanceCategory;
  award: Award | null;
  recommendation: Recommendation;
  securityGrade: SecurityGrade | null; // null without security samples
  complete: boolean;
}

export interface CategoryPerformanceRow {
  testCategory: Category;
  databaseName: string;
  averageScore: number;
  categoryRank: number;
}

export interface CategoryWinner {
  testCategory: Category;
  databaseName: string;
  averageScore: number;
}

export interface DetailRow {
  databaseName: string;
  testCategory: Category;
  metricName: string;
  metricValue: number;
  unit: string;
  normalizedScore: number;
  weightedScore: number;
  notes: string | null;
}

export interface ComparisonReport {
  runId: string;
  winner: RankingEntry | null;
  ranking: RankingEntry[];
  categoryPerformance: CategoryPerformanceRow[];
  categoryWinners: CategoryWinner[];
  detail: DetailRow[];
}

// ============================================================================
// Builders
// ============================================================================

const { precision, scorePrecision } = COMPARISON_CONFIG;

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function buildRanking(comparison: ComparisonResult): RankingEntry[] {
  return comparison.finalScores.map((score) => ({
    rank: score.ranking,
    databaseName: score.databaseName,
    totalScore: roundTo(score.totalScore, precision),
    performanceCategory: score.performanceCategory,
    award: AWARDS[score.ranking] ?? null,
    recommendation: recommendFor(score.totalScore),
    securityGrade: score.securityScore === null ? null : gradeSecurity(score.securityScore),
    complete: score.missingCategories.length === 0,
  }));
}

/**
 * Every database's average per category, ranked within the category.
 * Categories follow the fixed category order; rows within one follow rank.
 */
export function buildCategoryPerformance(comparison: ComparisonResult): CategoryPerformanceRow[] {
  const rows: CategoryPerformanceRow[] = [];

  for (const category of CATEGORIES) {
    const scores = comparison.categoryScores.filter((s) => s.testCategory === category);
    const ranked = rankByScore(
      scores,
      (s) => roundTo(s.categoryScore, scorePrecision),
      (s) => s.databaseName
    );
    for (const { item, rank } of ranked) {
      rows.push({
        testCategory: category,
        databaseName: item.databaseName,
        averageScore: roundTo(item.categoryScore, precision),
        categoryRank: rank,
      });
    }
  }

  return rows;
}

/**
 * The top database of each category that has any scores. Shared first places
 * go to the first name in sort order.
 */
export function buildCategoryWinners(performance: CategoryPerformanceRow[]): CategoryWinner[] {
  const winners: CategoryWinner[] = [];
  for (const category of CATEGORIES) {
    const top = performance.find((row) => row.testCategory === category);
    if (!top) continue;
    winners.push({
      testCategory: category,
      databaseName: top.databaseName,
      averageScore: top.averageScore,
    });
  }
  return winners;
}

/**
 * Raw value, normalized score and weighted contribution of every sample,
 * re-derived from the run's metric stats.
 */
export function buildDetail(comparison: ComparisonResult): DetailRow[] {
  const stats = comparison.stats.length > 0 ? comparison.stats : computeMetricStats(comparison.samples);
  const byMetric = new Map(stats.map((s) => [s.metricName, s]));
  const rows: DetailRow[] = [];

  for (const sample of comparison.samples) {
    const metricStats = byMetric.get(sample.metricName);
    if (!metricStats) continue;

    const normalizedScore = normalizeValue(sample.metricValue, metricStats);
    rows.push({
      databaseName: sample.databaseName,
      testCategory: sample.testCategory,
      metricName: sample.metricName,
      metricValue: sample.metricValue,
      unit: sample.unit,
      normalizedScore: roundTo(normalizedScore, scorePrecision),
      weightedScore: roundTo(normalizedScore * sample.weight, precision),
      notes: sample.notes ?? null,
    });
  }

  return rows.sort(
    (a, b) =>
      compareText(a.databaseName, b.databaseName) ||
      compareText(a.testCategory, b.testCategory) ||
      compareText(a.metricName, b.metricName)
  );
}

export function buildReport(comparison: ComparisonResult): ComparisonReport {
  const ranking = buildRanking(comparison);
  const categoryPerformance = buildCategoryPerformance(comparison);

  return {
    runId: comparison.runId,
    winner: ranking.find((r) => r.rank === 1) ?? null,
    ranking,
    categoryPerformance,
    categoryWinners: buildCategoryWinners(categoryPerformance),
    detail: buildDetail(comparison),
  };
}
