import type { Check, CheckStatus, Lane, LaneKind, TerminalCheckStatus } from "../types/lane.js";
import type { LaneColor } from "../types/config.js";
import type { ProcessRunner } from "../process/runner.js";
import type { Settings } from "../config/settings.js";
import type { ProgressSink } from "./progress.js";

/** What a lane worker needs; everything else stays on its own Lane. */
export type LaneContext = {
  runner: ProcessRunner;
  progress: ProgressSink;
  settings: Settings;
};

const TERMINAL_STATUSES: ReadonlySet<CheckStatus> = new Set<CheckStatus>(["passed", "failed", "warned", "skipped"]);

export function isTerminal(status: CheckStatus): status is TerminalCheckStatus {
  return TERMINAL_STATUSES.has(status);
}

export function createCheck(name: string, command: readonly string[] = []): Check {
  return { name, command: [...command], status: "pending", elapsedMs: 0, output: "" };
}

export function createLane(name: string, color: LaneColor, kind: LaneKind, checks: Check[]): Lane {
  return { name, color, kind, checks, elapsedMs: 0, failed: false };
}

export function startCheck(check: Check): void {
  if (check.status !== "pending") {
    throw new Error(`Check "${check.name}" cannot start from status ${check.status}`);
  }
  check.status = "running";
}

/** Set a check's terminal status. A terminal status is never overwritten. */
export function settleCheck(
  check: Check,
  status: TerminalCheckStatus,
  result: { elapsedMs?: number; output?: string } = {},
): void {
  if (isTerminal(check.status)) {
    throw new Error(`Check "${check.name}" already settled as ${check.status}`);
  }
  check.status = status;
  if (result.elapsedMs !== undefined) check.elapsedMs = result.elapsedMs;
  if (result.output !== undefined) check.output = result.output;
}

/** Flag the lane failed and skip every check that has not run. */
export function failLane(lane: Lane): void {
  lane.failed = true;
  for (const check of lane.checks) {
    if (check.status === "pending") settleCheck(check, "skipped");
  }
}

export function reportCheckStart(lane: Lane, check: Check, progress: ProgressSink): void {
  progress.send({ type: "check-start", lane: lane.name, check: check.name });
}

export function reportCheckEnd(lane: Lane, check: Check, progress: ProgressSink): void {
  progress.send({
    type: "check-end",
    lane: lane.name,
    check: check.name,
    status: check.status,
    elapsedMs: check.elapsedMs,
  });
}

/** Run one subprocess check. Returns true if it passed. */
export async function runCheck(lane: Lane, check: Check, ctx: LaneContext): Promise<boolean> {
  startCheck(check);
  reportCheckStart(lane, check, ctx.progress);

  const outcome = await ctx.runner.run(check.command, { timeoutMs: ctx.settings.timeoutMs });
  settleCheck(check, outcome.kind === "success" ? "passed" : "failed", {
    elapsedMs: outcome.elapsedMs,
    output: outcome.output,
  });

  reportCheckEnd(lane, check, ctx.progress);
  return check.status === "passed";
}

/**
 * Run checks in order; the first failure fails the lane and skips the rest,
 * since later checks depend on earlier ones (tests need a build).
 */
export async function runStandardLane(lane: Lane, ctx: LaneContext): Promise<void> {
  for (const check of lane.checks) {
    if (check.status !== "pending") continue;
    const ok = await runCheck(lane, check, ctx);
    if (!ok) {
      failLane(lane);
      return;
    }
  }
}
