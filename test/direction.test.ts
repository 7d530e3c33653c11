import { describe, it, expect } from "vitest";
import { baseMetricName, isHigherBetter } from "../src/direction.js";

describe("isHigherBetter", () => {
  it("treats latency and time metrics as lower-is-better", () => {
    expect(isHigherBetter("simple_query_latency")).toBe(false);
    expect(isHigherBetter("time_series_query")).toBe(false);
    expect(isHigherBetter("execution_time_ms")).toBe(false);
  });

  it("treats rate and throughput metrics as higher-is-better", () => {
    expect(isHigherBetter("insert_rate")).toBe(true);
    expect(isHigherBetter("write_throughput")).toBe(true);
  });

  it("treats efficiency and score metrics as higher-is-better", () => {
    expect(isHigherBetter("compression_efficiency")).toBe(true);
    expect(isHigherBetter("security_score")).toBe(true);
  });

  it("treats size metrics as lower-is-better", () => {
    expect(isHigherBetter("table_size")).toBe(false);
    expect(isHigherBetter("bson_size")).toBe(false);
  });

  it("defaults to higher-is-better", () => {
    expect(isHigherBetter("query_improvement")).toBe(true);
    expect(isHigherBetter("role_based_access")).toBe(true);
  });

  it("matches case-sensitively", () => {
    expect(isHigherBetter("Latency")).toBe(true);
    expect(isHigherBetter("Table_Size")).toBe(true);
  });

  describe("known heuristic limitations (first match wins)", () => {
    it("resolves latency_rate as lower-is-better", () => {
      expect(isHigherBetter("latency_rate")).toBe(false);
    });

    it("resolves time_index_efficiency by the time rule", () => {
      expect(isHigherBetter("time_index_efficiency")).toBe(false);
    });

    it("matches 'time' inside unrelated words", () => {
      expect(isHigherBetter("uptime_score")).toBe(false);
    });

    it("scores overhead percentages as higher-is-better", () => {
      expect(isHigherBetter("rls_overhead")).toBe(true);
    });
  });
});

describe("baseMetricName", () => {
  it("strips the variant suffix", () => {
    expect(baseMetricName("write_rate@realtime")).toBe("write_rate");
    expect(baseMetricName("write_rate")).toBe("write_rate");
    expect(baseMetricName("read_latency@batch@2")).toBe("read_latency");
  });

  it("keeps variant names out of direction classification", () => {
    expect(isHigherBetter("write_rate@realtime")).toBe(true);
    expect(isHigherBetter("read_latency@throughput_mode")).toBe(false);
    expect(isHigherBetter("insert_rate@large_size")).toBe(true);
  });
});
