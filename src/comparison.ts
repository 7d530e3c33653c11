// Comparison pipeline: samples → stats → normalized → categories → final scores

import { aggregateCategories } from "./aggregator.js";
import { computeMetricStats, normalizeSamples } from "./normalizer.js";
import { scoreDatabases } from "./scorer.js";
import type { ComparisonResult, MetricSample } from "./types.js";

/**
 * Compare the databases of one run. The result depends only on the samples,
 * so a stored run can be re-derived at any time.
 */
export function compareRun(runId: string, samples: MetricSample[]): ComparisonResult {
  const stats = computeMetricStats(samples);
  const normalized = normalizeSamples(samples, stats);
  const categoryScores = aggregateCategories(normalized);
  const finalScores = scoreDatabases(categoryScores);

  return {
    runId,
    samples,
    stats,
    normalized,
    categoryScores,
    finalScores,
  };
}
