import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { collectFiles, collectOutputs, displayNameFor, loadSampleFile } from "../src/collector.js";

function writeJson(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(value));
}

const row = (metricName: string, metricValue: unknown, extra: Record<string, unknown> = {}) => ({
  test_category: "ingestion",
  metric_name: metricName,
  metric_value: metricValue,
  unit: "rows/sec",
  ...extra,
});

describe("collector", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "dbcompare-collect-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("loadSampleFile", () => {
    it("reads a plain array", () => {
      const file = path.join(dir, "a.json");
      writeJson(file, [row("insert_rate", 1)]);

      expect(loadSampleFile(file)).toEqual({ success: true, rows: [row("insert_rate", 1)] });
    });

    it("reads an object with a samples array", () => {
      const file = path.join(dir, "b.json");
      writeJson(file, { samples: [row("insert_rate", 2)] });

      expect(loadSampleFile(file)).toEqual({ success: true, rows: [row("insert_rate", 2)] });
    });

    it("fails on other shapes", () => {
      const file = path.join(dir, "c.json");
      writeJson(file, { metrics: [] });

      expect(loadSampleFile(file)).toEqual({
        success: false,
        error: { message: `${file}: expected an array of samples or an object with a "samples" array` },
      });
    });

    it("fails on unreadable files", () => {
      const result = loadSampleFile(path.join(dir, "missing.json"));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toMatch(/^Cannot read /);
      }
    });
  });

  describe("displayNameFor", () => {
    it("maps known suite directories", () => {
      expect(displayNameFor("postgresql")).toBe("PostgreSQL");
      expect(displayNameFor("InfluxDB")).toBe("InfluxDB");
      expect(displayNameFor("cassandra")).toBe("cassandra");
    });
  });

  describe("collectFiles", () => {
    it("fills in the database name and keeps good rows", () => {
      const file = path.join(dir, "pg.json");
      writeJson(file, [row("insert_rate", 50000), row("update_rate", "fast")]);
      const messages: string[] = [];

      const result = collectFiles([{ path: file, databaseName: "PostgreSQL" }], {
        onProgress: (msg) => messages.push(msg),
      });

      expect(result).toEqual({
        success: true,
        samples: [
          {
            databaseName: "PostgreSQL",
            testCategory: "ingestion",
            metricName: "insert_rate",
            metricValue: 50000,
            unit: "rows/sec",
            weight: 1,
          },
        ],
        rejected: [{ file, index: 1, issues: [{ field: "metric_value", message: "must be a number" }] }],
        files: [file],
      });
      expect(messages).toEqual([
        "  [rejected] pg.json row 1: metric_value must be a number",
        "  Loaded: pg.json (1 sample(s))",
      ]);
    });

    it("keeps a database name the row already carries", () => {
      const file = path.join(dir, "mixed.json");
      writeJson(file, [row("insert_rate", 1, { database_name: "MongoDB" })]);

      const result = collectFiles([{ path: file, databaseName: "PostgreSQL" }]);

      expect(result.success && result.samples[0].databaseName).toBe("MongoDB");
    });

    it("fails when any file cannot be loaded", () => {
      const good = path.join(dir, "good.json");
      writeJson(good, [row("insert_rate", 1, { database_name: "a" })]);

      const result = collectFiles([{ path: good }, { path: path.join(dir, "nope.json") }]);

      expect(result.success).toBe(false);
    });
  });

  describe("collectOutputs", () => {
    it("collects every suite directory in name order", () => {
      writeJson(path.join(dir, "postgresql", "ingestion.json"), [row("insert_rate", 50000)]);
      writeJson(path.join(dir, "influxdb", "ingestion.json"), { samples: [row("insert_rate", 15000)] });
      writeJson(path.join(dir, "influxdb", "query.json"), [
        { test_category: "query", metric_name: "query_latency", metric_value: 10, unit: "ms" },
      ]);
      fs.writeFileSync(path.join(dir, "influxdb", "README.txt"), "ignored");
      const messages: string[] = [];

      const result = collectOutputs(dir, { onProgress: (msg) => messages.push(msg) });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.samples.map((s) => [s.databaseName, s.metricName])).toEqual([
        ["InfluxDB", "insert_rate"],
        ["InfluxDB", "query_latency"],
        ["PostgreSQL", "insert_rate"],
      ]);
      expect(result.files).toEqual([
        path.join(dir, "influxdb", "ingestion.json"),
        path.join(dir, "influxdb", "query.json"),
        path.join(dir, "postgresql", "ingestion.json"),
      ]);
      expect(messages[0]).toBe("Collecting InfluxDB results...");
      expect(messages[1]).toBe("Collecting PostgreSQL results...");
    });

    it("fails for a missing directory", () => {
      const missing = path.join(dir, "missing");

      expect(collectOutputs(missing)).toEqual({
        success: false,
        error: { message: `Outputs directory not found: ${missing}` },
      });
    });

    it("fails when no metric files exist", () => {
      fs.mkdirSync(path.join(dir, "mongodb"));

      expect(collectOutputs(dir)).toEqual({
        success: false,
        error: { message: `No metric files found under ${dir}` },
      });
    });
  });
});
