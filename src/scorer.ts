// Weighted Scorer & Ranker

import {
  CATEGORY_WEIGHTS,
  COMPARISON_CONFIG,
  RECOMMENDATION_THRESHOLDS,
  SECURITY_GRADES,
  TIER_THRESHOLDS,
} from "./config.js";
import { roundTo } from "./format.js";
import { CATEGORIES } from "./types.js";
import type {
  Category,
  CategoryScore,
  FinalScore,
  PerformanceCategory,
  Recommendation,
  SecurityGrade,
} from "./types.js";

export interface Ranked<T> {
  item: T;
  rank: number;
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Standard competition ranking (1, 2, 2, 4): equal scores share a rank and the
 * next rank skips. Output is ordered by score descending, ties by name.
 */
export function rankByScore<T>(
  items: T[],
  getScore: (item: T) => number,
  getName: (item: T) => string
): Ranked<T>[] {
  const sorted = [...items].sort(
    (a, b) => getScore(b) - getScore(a) || compareNames(getName(a), getName(b))
  );

  const ranked: Ranked<T>[] = [];
  for (let i = 0; i < sorted.length; i++) {
    const item = sorted[i];
    const prev = ranked[i - 1];
    const rank = prev && getScore(prev.item) === getScore(item) ? prev.rank : i + 1;
    ranked.push({ item, rank });
  }
  return ranked;
}

export function classifyTier(totalScore: number): PerformanceCategory {
  for (const { min, tier } of TIER_THRESHOLDS) {
    if (totalScore >= min) return tier;
  }
  return "Poor";
}

export function recommendFor(totalScore: number): Recommendation {
  for (const { min, recommendation } of RECOMMENDATION_THRESHOLDS) {
    if (totalScore >= min) return recommendation;
  }
  return "Not Recommended for Production";
}

export function gradeSecurity(securityScore: number): SecurityGrade {
  for (const { min, grade } of SECURITY_GRADES) {
    if (securityScore >= min) return grade;
  }
  return "D";
}

/**
 * Weighted total over the categories a database has scores for. Absent
 * categories drop out of both the sum and the weight denominator.
 */
export function weightedTotal(scores: Partial<Record<Category, number>>): number | null {
  let sum = 0;
  let weight = 0;
  for (const category of CATEGORIES) {
    const score = scores[category];
    if (score === undefined) continue;
    sum += score * CATEGORY_WEIGHTS[category];
    weight += CATEGORY_WEIGHTS[category];
  }
  return weight > 0 ? sum / weight : null;
}

type UnrankedScore = Omit<FinalScore, "ranking">;

/**
 * Build one ranked FinalScore per database present in the category scores.
 */
export function scoreDatabases(categoryScores: CategoryScore[]): FinalScore[] {
  const byDatabase = new Map<string, Partial<Record<Category, number>>>();
  for (const row of categoryScores) {
    const scores = byDatabase.get(row.databaseName) ?? {};
    scores[row.testCategory] = row.categoryScore;
    byDatabase.set(row.databaseName, scores);
  }

  const unranked: UnrankedScore[] = [];
  for (const [databaseName, scores] of byDatabase) {
    const total = weightedTotal(scores);
    if (total === null) continue;

    const totalScore = roundTo(total, COMPARISON_CONFIG.scorePrecision);
    unranked.push({
      databaseName,
      ingestionScore: scores.ingestion ?? null,
      queryScore: scores.query ?? null,
      storageScore: scores.storage ?? null,
      indexingScore: scores.indexing ?? null,
      securityScore: scores.security ?? null,
      totalScore,
      performanceCategory: classifyTier(totalScore),
      missingCategories: CATEGORIES.filter((c) => scores[c] === undefined),
    });
  }

  return rankByScore(unranked, (s) => s.totalScore, (s) => s.databaseName).map(
    ({ item, rank }) => ({ ...item, ranking: rank })
  );
}

/**
 * Category score of a final score row, by category.
 */
export function categoryScoreOf(score: FinalScore, category: Category): number | null {
  switch (category) {
    case "ingestion":
      return score.ingestionScore;
    case "query":
      return score.queryScore;
    case "storage":
      return score.storageScore;
    case "indexing":
      return score.indexingScore;
    case "security":
      return score.securityScore;
  }
}
