// Direction Classifier - decides whether a larger raw value is better

// First match wins. Names matching several rules (e.g. "latency_rate") are
// resolved purely by this order.
const DIRECTION_RULES: { patterns: string[]; higherIsBetter: boolean }[] = [
  { patterns: ["latency", "time"], higherIsBetter: false },
  { patterns: ["rate", "throughput"], higherIsBetter: true },
  { patterns: ["efficiency"], higherIsBetter: true },
  { patterns: ["score"], higherIsBetter: true },
  { patterns: ["size"], higherIsBetter: false },
];

// Separates a metric name from the configuration variant it was measured under
export const VARIANT_SEPARATOR = "@";

/**
 * The metric name without its variant suffix: "write_rate@realtime" → "write_rate".
 */
export function baseMetricName(metricName: string): string {
  const at = metricName.indexOf(VARIANT_SEPARATOR);
  return at === -1 ? metricName : metricName.slice(0, at);
}

/**
 * Case-sensitive substring match of the base metric name against the rule
 * table. Variant suffixes never take part. Unmatched names default to
 * higher-is-better.
 */
export function isHigherBetter(metricName: string): boolean {
  const base = baseMetricName(metricName);
  for (const rule of DIRECTION_RULES) {
    if (rule.patterns.some((p) => base.includes(p))) {
      return rule.higherIsBetter;
    }
  }
  return true;
}
