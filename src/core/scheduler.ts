import type { Lane, LaneKind } from "../types/lane.js";
import type { ProgressSink } from "./progress.js";

export type LaneExecutor = (lane: Lane) => Promise<void>;

export type LaneHandlers = Record<LaneKind, LaneExecutor>;

/**
 * Run every lane concurrently, one worker per lane, and wait for all of them.
 * A lane failing never cancels its siblings. An unexpected error from a worker
 * is re-thrown only after every other lane has finished.
 */
export async function runLanes(lanes: readonly Lane[], handlers: LaneHandlers, progress: ProgressSink): Promise<void> {
  const workers = lanes.map(async (lane) => {
    progress.send({ type: "lane-start", lane: lane.name, kind: lane.kind, color: lane.color, total: lane.checks.length });
    const start = Date.now();
    try {
      await handlers[lane.kind](lane);
    } finally {
      lane.elapsedMs = Date.now() - start;
      progress.send({ type: "lane-end", lane: lane.name, failed: lane.failed, elapsedMs: lane.elapsedMs });
    }
  });

  const settled = await Promise.allSettled(workers);
  const rejected = settled.find((r): r is PromiseRejectedResult => r.status === "rejected");
  if (rejected) {
    throw rejected.reason instanceof Error ? rejected.reason : new Error(String(rejected.reason));
  }
}
