// Normalizer - min/max rescaling of raw metrics onto 0..100

import { isHigherBetter } from "./direction.js";
import type { MetricSample, MetricStats, NormalizedScore } from "./types.js";

/**
 * Per-metric min/max across every database in the sample set.
 * Stats are returned in first-seen metric order.
 */
export function computeMetricStats(samples: MetricSample[]): MetricStats[] {
  const stats = new Map<string, MetricStats>();

  for (const sample of samples) {
    const existing = stats.get(sample.metricName);
    if (!existing) {
      stats.set(sample.metricName, {
        metricName: sample.metricName,
        minValue: sample.metricValue,
        maxValue: sample.metricValue,
        higherIsBetter: isHigherBetter(sample.metricName),
      });
      continue;
    }
    existing.minValue = Math.min(existing.minValue, sample.metricValue);
    existing.maxValue = Math.max(existing.maxValue, sample.metricValue);
  }

  return Array.from(stats.values());
}

/**
 * Rescale one raw value against its metric's stats.
 * A zero range scores 100 for everyone.
 */
export function normalizeValue(value: number, stats: MetricStats): number {
  // Halved operands keep max - min finite near Number.MAX_VALUE
  const min = stats.minValue / 2;
  const max = stats.maxValue / 2;
  const half = value / 2;
  const range = max - min;
  if (range <= 0) return 100;

  const score = stats.higherIsBetter ? ((half - min) / range) * 100 : ((max - half) / range) * 100;

  // Values outside the stats' range (replaying old stats) stay on the scale
  return Math.min(100, Math.max(0, score));
}

/**
 * Normalize every sample of a run. Output order follows input order.
 */
export function normalizeSamples(
  samples: MetricSample[],
  stats: MetricStats[] = computeMetricStats(samples)
): NormalizedScore[] {
  const byMetric = new Map(stats.map((s) => [s.metricName, s]));
  const normalized: NormalizedScore[] = [];

  for (const sample of samples) {
    const metricStats = byMetric.get(sample.metricName);
    if (!metricStats) continue;

    normalized.push({
      databaseName: sample.databaseName,
      testCategory: sample.testCategory,
      metricName: sample.metricName,
      metricValue: sample.metricValue,
      normalizedScore: normalizeValue(sample.metricValue, metricStats),
    });
  }

  return normalized;
}
