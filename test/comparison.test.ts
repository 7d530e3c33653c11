import { describe, it, expect } from "vitest";
import { CATEGORY_WEIGHTS } from "../src/config.js";
import { compareRun } from "../src/comparison.js";
import { CATEGORIES } from "../src/types.js";
import type { FinalScore } from "../src/types.js";
import { sample, threeDatabaseRun } from "./fixtures.js";

function finalFor(scores: FinalScore[], db: string): FinalScore {
  const score = scores.find((s) => s.databaseName === db);
  if (!score) throw new Error(`no final score for ${db}`);
  return score;
}

describe("compareRun", () => {
  it("carries the run id and samples through", () => {
    const samples = threeDatabaseRun();
    const result = compareRun("run_20260101_120000", samples);

    expect(result.runId).toBe("run_20260101_120000");
    expect(result.samples).toBe(samples);
    expect(result.normalized).toHaveLength(15);
    expect(result.categoryScores).toHaveLength(15);
  });

  it("ranks three databases by weighted total", () => {
    const { finalScores } = compareRun("r1", threeDatabaseRun());

    expect(finalScores.map((s) => [s.databaseName, s.totalScore, s.ranking, s.performanceCategory])).toEqual([
      ["InfluxDB", 59.1667, 1, "Fair"],
      ["PostgreSQL", 45, 2, "Fair"],
      ["MongoDB", 33.3333, 3, "Poor"],
    ]);
  });

  it("computes the total as the weighted sum of the five category scores", () => {
    const { finalScores } = compareRun("r1", threeDatabaseRun());

    for (const score of finalScores) {
      const sum =
        (score.ingestionScore ?? 0) * CATEGORY_WEIGHTS.ingestion +
        (score.queryScore ?? 0) * CATEGORY_WEIGHTS.query +
        (score.storageScore ?? 0) * CATEGORY_WEIGHTS.storage +
        (score.indexingScore ?? 0) * CATEGORY_WEIGHTS.indexing +
        (score.securityScore ?? 0) * CATEGORY_WEIGHTS.security;
      expect(Math.abs(score.totalScore - sum)).toBeLessThan(0.01);
      expect(score.missingCategories).toEqual([]);
    }
  });

  it("keeps rank order consistent with total order", () => {
    const { finalScores } = compareRun("r1", threeDatabaseRun());

    for (const a of finalScores) {
      for (const b of finalScores) {
        if (a.totalScore > b.totalScore) {
          expect(a.ranking).toBeLessThan(b.ranking);
        }
      }
    }
  });

  it("scores the ingestion scenario 100 / 16.67 / 0", () => {
    const samples = [
      sample("PostgreSQL", "ingestion", "insert_rate", 50000, "rows/sec"),
      sample("InfluxDB", "ingestion", "insert_rate", 15000, "rows/sec"),
      sample("MongoDB", "ingestion", "insert_rate", 8000, "rows/sec"),
    ];
    for (const category of CATEGORIES.filter((c) => c !== "ingestion")) {
      for (const db of ["PostgreSQL", "InfluxDB", "MongoDB"]) {
        samples.push(sample(db, category, `${category}_metric`, 5));
      }
    }

    const { finalScores } = compareRun("r1", samples);

    expect(finalFor(finalScores, "PostgreSQL").ingestionScore).toBe(100);
    expect(finalFor(finalScores, "MongoDB").ingestionScore).toBe(0);
    expect(finalFor(finalScores, "InfluxDB").ingestionScore).toBeCloseTo(16.67, 2);
    // Every other category is a tie at 100
    expect(finalFor(finalScores, "MongoDB").totalScore).toBe(75);
  });

  it("scores identical values 100 for everyone", () => {
    const { finalScores } = compareRun("r1", [
      sample("a", "storage", "table_size", 300, "MB"),
      sample("b", "storage", "table_size", 300, "MB"),
      sample("c", "storage", "table_size", 300, "MB"),
    ]);

    expect(finalScores.map((s) => s.storageScore)).toEqual([100, 100, 100]);
    expect(finalScores.map((s) => s.ranking)).toEqual([1, 1, 1]);
  });

  it("classifies a total of exactly 80 as Excellent", () => {
    const { finalScores } = compareRun("r1", [
      sample("low", "ingestion", "write_rate", 0, "rows/sec"),
      sample("mid", "ingestion", "write_rate", 80, "rows/sec"),
      sample("high", "ingestion", "write_rate", 100, "rows/sec"),
    ]);

    const mid = finalFor(finalScores, "mid");
    expect(mid.totalScore).toBe(80);
    expect(mid.performanceCategory).toBe("Excellent");
  });

  it("re-weights the total of a database with no security samples", () => {
    const samples = threeDatabaseRun().filter(
      (s) => !(s.databaseName === "MongoDB" && s.testCategory === "security")
    );

    const { finalScores } = compareRun("r1", samples);
    const mongo = finalFor(finalScores, "MongoDB");

    expect(mongo.securityScore).toBeNull();
    expect(mongo.missingCategories).toEqual(["security"]);
    // (0 * 0.25 + 0 * 0.25 + 33.33 * 0.2 + 100 * 0.2) / 0.9
    expect(mongo.totalScore).toBe(29.6296);
    expect(mongo.performanceCategory).toBe("Poor");
    expect(mongo.ranking).toBe(3);

    // Security is now normalized over PostgreSQL and InfluxDB only
    expect(finalFor(finalScores, "PostgreSQL").securityScore).toBe(0);
    expect(finalFor(finalScores, "InfluxDB").securityScore).toBe(100);
  });

  it("ranks extreme but finite values", () => {
    const { finalScores } = compareRun("r1", [
      sample("high", "ingestion", "write_rate", 1.7e308, "rows/sec"),
      sample("low", "ingestion", "write_rate", -1.7e308, "rows/sec"),
    ]);

    expect(finalScores.map((s) => [s.databaseName, s.totalScore, s.ranking, s.performanceCategory])).toEqual([
      ["high", 100, 1, "Excellent"],
      ["low", 0, 2, "Poor"],
    ]);
  });

  it("produces no final scores for an empty run", () => {
    const result = compareRun("empty", []);

    expect(result.finalScores).toEqual([]);
    expect(result.stats).toEqual([]);
  });

  it("is a pure function of the samples", () => {
    const first = compareRun("r1", threeDatabaseRun());
    const second = compareRun("r1", threeDatabaseRun());

    expect(second).toEqual(first);
  });
});
