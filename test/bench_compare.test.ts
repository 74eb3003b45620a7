import { describe, expect, it } from "vitest";
import { BENCH_THRESHOLDS, compareBenchmarks, computeDrift, selectBaseline } from "../src/bench/compare.js";
import { entry } from "./helpers/bench-fixtures.js";

describe("selectBaseline", () => {
  it("returns null for empty history", () => {
    expect(selectBaseline([], "1.0.0")).toBeNull();
  });

  it("uses the latest entry when it belongs to another version", () => {
    const history = [entry("1.0.0", { a: 1 }), entry("1.1.0", { a: 2 })];
    expect(selectBaseline(history, "1.2.0")?.version).toBe("1.1.0");
  });

  it("steps back one entry when the latest was recorded for the current version", () => {
    const history = [entry("1.0.0", { a: 1 }), entry("1.1.0", { a: 2 })];
    expect(selectBaseline(history, "1.1.0")?.version).toBe("1.0.0");
  });

  it("keeps a sole entry even when it matches the current version", () => {
    expect(selectBaseline([entry("1.0.0", { a: 1 })], "1.0.0")?.version).toBe("1.0.0");
  });
});

describe("computeDrift", () => {
  it("computes exact percentages at the warn boundary", () => {
    expect(computeDrift(115, 100)).toBe(15);
  });

  it("treats a zero base as no drift", () => {
    expect(computeDrift(50, 0)).toBe(0);
  });
});

describe("compareBenchmarks", () => {
  const base = entry("1.0.0", { exact: 100, over: 100, half: 100, fail: 100, faster: 100 });

  it("classifies drift against the fixed thresholds", () => {
    const report = compareBenchmarks(
      [
        { name: "exact", meanNs: 115 },
        { name: "over", meanNs: 115.1 },
        { name: "half", meanNs: 150 },
        { name: "fail", meanNs: 151 },
        { name: "faster", meanNs: 80 },
      ],
      base,
      BENCH_THRESHOLDS,
    );

    expect(report.comparisons.map((c) => [c.name, c.status, c.pctChange])).toEqual([
      ["exact", "pass", 15],
      ["over", "warn", 15.1],
      ["half", "warn", 50],
      ["fail", "fail", 51],
      ["faster", "pass", -20],
    ]);
    expect(report.baselineVersion).toBe("1.0.0");
    expect(report.hasWarn).toBe(true);
    expect(report.hasFail).toBe(true);
  });

  it("marks benchmarks missing from the baseline as new", () => {
    const report = compareBenchmarks([{ name: "added", meanNs: 10 }], base, BENCH_THRESHOLDS);
    expect(report.comparisons).toEqual([{ name: "added", meanNs: 10, status: "new" }]);
    expect(report.hasWarn).toBe(false);
    expect(report.hasFail).toBe(false);
  });

  it("treats a baseline with no benchmarks as no baseline", () => {
    const report = compareBenchmarks([{ name: "a", meanNs: 10 }], entry("1.0.0", {}), BENCH_THRESHOLDS);
    expect(report.baselineVersion).toBeNull();
    expect(report.comparisons[0]?.status).toBe("new");
  });

  it("reports nothing when there is no baseline", () => {
    const report = compareBenchmarks([{ name: "a", meanNs: 10 }], null, BENCH_THRESHOLDS);
    expect(report).toEqual({
      comparisons: [{ name: "a", meanNs: 10, status: "new" }],
      baselineVersion: null,
      hasWarn: false,
      hasFail: false,
    });
  });
});
