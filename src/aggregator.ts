// Category Aggregator - mean normalized score per (database, category)

import type { CategoryScore, NormalizedScore } from "./types.js";

export function aggregateCategories(normalized: NormalizedScore[]): CategoryScore[] {
  const groups = new Map<string, { score: CategoryScore; sum: number }>();

  for (const row of normalized) {
    const key = `${row.databaseName}\u0000${row.testCategory}`;
    const group = groups.get(key);
    if (group) {
      group.sum += row.normalizedScore;
      group.score.sampleCount++;
    } else {
      groups.set(key, {
        score: {
          databaseName: row.databaseName,
          testCategory: row.testCategory,
          categoryScore: 0,
          sampleCount: 1,
        },
        sum: row.normalizedScore,
      });
    }
  }

  return Array.from(groups.values()).map(({ score, sum }) => ({
    ...score,
    categoryScore: sum / score.sampleCount,
  }));
}
