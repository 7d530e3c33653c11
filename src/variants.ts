// Configuration variants - one measurement procedure, several explicit settings

import { VARIANT_SEPARATOR } from "./direction.js";
import { validateSample } from "./ingest.js";
import type { FieldIssue } from "./ingest.js";
import type { Category, MetricSample } from "./types.js";

export interface Variant<P> {
  name: string;
  params: P;
}

export interface Measurement {
  metricName: string;
  metricValue: number;
  unit: string;
}

export type VariantResult<P> =
  | { success: true; variant: Variant<P>; measurements: Measurement[]; durationMs: number }
  | { success: false; variant: Variant<P>; error: { message: string } };

export interface VariantRejection {
  variant: string;
  metricName: string;
  issues: FieldIssue[];
}

export interface VariantSamples {
  samples: MetricSample[];
  rejected: VariantRejection[];
}

export interface RunVariantsOptions {
  onProgress?: (msg: string) => void;
}

/**
 * Run `measure` once per variant, in list order. A failing variant is
 * recorded and the remaining variants still run.
 */
export async function runVariants<P>(
  variants: Variant<P>[],
  measure: (params: P) => Promise<Measurement[]> | Measurement[],
  options: RunVariantsOptions = {}
): Promise<VariantResult<P>[]> {
  const results: VariantResult<P>[] = [];

  for (const variant of variants) {
    options.onProgress?.(`Measuring variant ${variant.name}...`);
    const start = performance.now();
    try {
      const measurements = await measure(variant.params);
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      results.push({ success: true, variant, measurements, durationMs });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      options.onProgress?.(`  [failed] ${variant.name}: ${message}`);
      results.push({ success: false, variant, error: { message } });
    }
  }

  return results;
}

/**
 * Turn successful variant measurements into metric samples, validated the
 * same way as ingested rows. Each sample is named `<metric>@<variant>` so
 * every variant normalizes on its own while its direction still comes from
 * the base metric name.
 */
export function variantSamples<P>(
  results: VariantResult<P>[],
  databaseName: string,
  testCategory: Category,
  weight: number = 1.0
): VariantSamples {
  const samples: MetricSample[] = [];
  const rejected: VariantRejection[] = [];

  for (const result of results) {
    if (!result.success) continue;
    for (const m of result.measurements) {
      const metricName = `${m.metricName}${VARIANT_SEPARATOR}${result.variant.name}`;
      const validation = validateSample({
        database_name: databaseName,
        test_category: testCategory,
        metric_name: metricName,
        metric_value: m.metricValue,
        unit: m.unit,
        weight,
      });
      if (validation.success) {
        samples.push(validation.sample);
      } else {
        rejected.push({ variant: result.variant.name, metricName, issues: validation.issues });
      }
    }
  }

  return { samples, rejected };
}
