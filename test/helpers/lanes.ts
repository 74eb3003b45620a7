import { createCheck, createLane, settleCheck, startCheck } from "../../src/core/lane.js";
import type { Check, Lane, LaneKind, TerminalCheckStatus } from "../../src/types/lane.js";
import type { LaneColor } from "../../src/types/config.js";

export function settled(name: string, status: TerminalCheckStatus, elapsedMs = 1000, output = ""): Check {
  const check = createCheck(name, [name]);
  if (status !== "skipped") startCheck(check);
  settleCheck(check, status, { elapsedMs: status === "skipped" ? 0 : elapsedMs, output });
  return check;
}

export function laneOf(
  name: string,
  checks: Check[],
  opts: { kind?: LaneKind; color?: LaneColor; elapsedMs?: number } = {},
): Lane {
  const lane = createLane(name, opts.color ?? "cyan", opts.kind ?? "standard", checks);
  lane.failed = checks.some((c) => c.status === "failed");
  lane.elapsedMs = opts.elapsedMs ?? checks.reduce((sum, c) => sum + c.elapsedMs, 0);
  return lane;
}
