import type { Lane } from "../types/lane.js";
import { runStandardLane, type LaneContext } from "../core/lane.js";
import { processBenchmarks, type BenchEngineDeps } from "./engine.js";

/**
 * Run the benchmark commands like any lane, then compare their results.
 * A `fail` comparison fails the lane exactly like a broken test.
 */
export async function runBenchLane(lane: Lane, ctx: LaneContext, deps: BenchEngineDeps): Promise<void> {
  await runStandardLane(lane, ctx);
  if (lane.failed) return;

  lane.bench = await processBenchmarks(deps);
  if (lane.bench.report.hasFail) lane.failed = true;
}
