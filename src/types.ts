export const CATEGORIES = ["ingestion", "query", "storage", "indexing", "security"] as const;

export type Category = (typeof CATEGORIES)[number];

export type PerformanceCategory = "Excellent" | "Good" | "Fair" | "Poor";

export type Award = "Winner" | "Runner-up" | "Third Place";

export type Recommendation =
  | "Strongly Recommended"
  | "Recommended"
  | "Consider with Modifications"
  | "Not Recommended for Production";

export type SecurityGrade = "A+" | "A" | "A-" | "B+" | "B" | "B-" | "C+" | "C" | "C-" | "D";

export interface MetricSample {
  databaseName: string;
  testCategory: Category;
  metricName: string;
  metricValue: number;
  unit: string;
  weight: number; // 0..1, scales the detail table's weighted score only
  notes?: string;
}

export interface MetricStats {
  metricName: string;
  minValue: number;
  maxValue: number;
  higherIsBetter: boolean;
}

export interface NormalizedScore {
  databaseName: string;
  testCategory: Category;
  metricName: string;
  metricValue: number;
  normalizedScore: number;
}

export interface CategoryScore {
  databaseName: string;
  testCategory: Category;
  categoryScore: number;
  sampleCount: number;
}

export interface FinalScore {
  databaseName: string;
  ingestionScore: number | null;
  queryScore: number | null;
  storageScore: number | null;
  indexingScore: number | null;
  securityScore: number | null;
  totalScore: number;
  ranking: number;
  performanceCategory: PerformanceCategory;
  missingCategories: Category[]; // non-empty means totalScore uses re-normalized weights
}

export interface ComparisonResult {
  runId: string;
  samples: MetricSample[];
  stats: MetricStats[];
  normalized: NormalizedScore[];
  categoryScores: CategoryScore[];
  finalScores: FinalScore[];
}

export function isCategory(value: string): value is Category {
  return (CATEGORIES as readonly string[]).includes(value);
}

export function isPerformanceCategory(value: string): value is PerformanceCategory {
  return value === "Excellent" || value === "Good" || value === "Fair" || value === "Poor";
}
