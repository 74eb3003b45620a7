import type { BenchComparison, BenchReport, BenchResult, BenchThresholds, HistoryEntry } from "../types/bench.js";

/** Fixed regression policy: drift above warnPct warns, above failPct fails the lane. */
export const BENCH_THRESHOLDS: Readonly<BenchThresholds> = Object.freeze({ warnPct: 15, failPct: 50 });

export function roundTo1(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * Pick the history entry to compare against: the latest, unless it was
 * recorded for the current version and an older one exists.
 */
export function selectBaseline(history: readonly HistoryEntry[], currentVersion: string): HistoryEntry | null {
  const latest = history.at(-1);
  if (!latest) return null;
  if (latest.version === currentVersion && history.length > 1) {
    return history[history.length - 2] ?? null;
  }
  return latest;
}

/** Signed percentage drift; a zero base counts as no drift. */
export function computeDrift(currentNs: number, baseNs: number): number {
  // Multiply before dividing: (115 - 100) / 100 * 100 is 15.000000000000002.
  return baseNs > 0 ? ((currentNs - baseNs) * 100) / baseNs : 0;
}

export function classifyDrift(pct: number, thresholds: Readonly<BenchThresholds>): "pass" | "warn" | "fail" {
  if (pct > thresholds.failPct) return "fail";
  if (pct > thresholds.warnPct) return "warn";
  return "pass";
}

export function compareBenchmarks(
  current: readonly BenchResult[],
  baseline: HistoryEntry | null,
  thresholds: Readonly<BenchThresholds>,
): BenchReport {
  const base = baseline && Object.keys(baseline.benchmarks).length > 0 ? baseline : null;

  const comparisons: BenchComparison[] = current.map((result) => {
    if (!base || !Object.hasOwn(base.benchmarks, result.name)) {
      return { name: result.name, meanNs: result.meanNs, status: "new" };
    }
    const value = base.benchmarks[result.name];
    const baseNs = Number.isFinite(value) ? value : 0;
    const pct = computeDrift(result.meanNs, baseNs);
    return {
      name: result.name,
      meanNs: result.meanNs,
      baseNs,
      pctChange: roundTo1(pct),
      status: classifyDrift(pct, thresholds),
    };
  });

  return {
    comparisons,
    baselineVersion: base ? base.version : null,
    hasWarn: comparisons.some((c) => c.status === "warn"),
    hasFail: comparisons.some((c) => c.status === "fail"),
  };
}
