import type { Lane } from "../types/lane.js";

/** Failure output beyond this many trailing characters is not shown. */
export const MAX_FAILURE_OUTPUT = 2000;

export type BenchSummary =
  | { kind: "regressions"; count: number }
  | { kind: "warnings"; count: number }
  | { kind: "ok" }
  | { kind: "no-baseline" }
  | { kind: "not-run" };

export type FailureDetail = {
  lane: string;
  check: string;
  output: string;
};

export type RunSummary = {
  passed: number;
  failed: number;
  warned: number;
  /** null when the run had no benchmark lane. */
  bench: BenchSummary | null;
  ready: boolean;
  firstFailure: FailureDetail | null;
};

function summarizeBench(lane: Lane): BenchSummary {
  if (!lane.bench) return { kind: "not-run" };
  const { report } = lane.bench;
  if (report.baselineVersion === null) return { kind: "no-baseline" };

  const fails = report.comparisons.filter((c) => c.status === "fail").length;
  if (fails > 0) return { kind: "regressions", count: fails };
  const warns = report.comparisons.filter((c) => c.status === "warn").length;
  if (warns > 0) return { kind: "warnings", count: warns };
  return { kind: "ok" };
}

/**
 * First failed check with output, in lane order then check order. Only one
 * failure is shown in full; the rest are counted.
 */
export function findFirstFailure(lanes: readonly Lane[]): FailureDetail | null {
  for (const lane of lanes) {
    for (const check of lane.checks) {
      if (check.status === "failed" && check.output.trim().length > 0) {
        return { lane: lane.name, check: check.name, output: check.output.slice(-MAX_FAILURE_OUTPUT) };
      }
    }
  }
  return null;
}

/** Aggregate all lane, check and benchmark outcomes into one verdict. */
export function summarize(lanes: readonly Lane[]): RunSummary {
  const statuses = lanes.flatMap((lane) => lane.checks.map((c) => c.status));
  const passed = statuses.filter((s) => s === "passed").length;
  const failed = statuses.filter((s) => s === "failed").length;
  const warned = statuses.filter((s) => s === "warned").length;

  const benchLane = lanes.find((l) => l.kind === "bench");
  const bench = benchLane ? summarizeBench(benchLane) : null;
  const benchOk = !benchLane || (!benchLane.failed && !benchLane.bench?.report.hasFail);

  const ready = failed === 0 && benchOk;

  return {
    passed,
    failed,
    warned,
    bench,
    ready,
    firstFailure: ready ? null : findFirstFailure(lanes),
  };
}
