import type { FormatConfig } from "../types/config.js";
import type { ProcessRunner } from "../process/runner.js";

export type GateStep = "check" | "fix" | "recheck";

/** Non-fatal terminal statuses; both let the run proceed. */
export type GateStatus = "ok" | "auto-fixed";

export type GateFailure = "failed_fix" | "failed_recheck";

export type GateState = GateStep | GateStatus | GateFailure;

export type GateResult = {
  status: GateStatus;
  elapsedMs: number;
};

/** Aborts the whole run before any lane is constructed. */
export class GateError extends Error {
  constructor(
    message: string,
    readonly state: GateFailure,
  ) {
    super(message);
    this.name = "GateError";
  }
}

export function isGateStep(state: GateState): state is GateStep {
  return state === "check" || state === "fix" || state === "recheck";
}

/**
 * Pure function: given the current step and whether its command exited 0,
 * return the next state.
 *
 *   check   --clean-->  ok
 *   check   --dirty-->  fix  --ok-->  recheck  --clean-->  auto-fixed
 *                        \--err-->  failed_fix     \--dirty-->  failed_recheck
 */
export function nextGateState(step: GateStep, passed: boolean): GateState {
  switch (step) {
    case "check":
      return passed ? "ok" : "fix";
    case "fix":
      return passed ? "recheck" : "failed_fix";
    case "recheck":
      return passed ? "auto-fixed" : "failed_recheck";
  }
}

/**
 * Check formatting; auto-fix once and re-verify if needed.
 * A formatter whose fix does not converge on the first attempt is fatal.
 */
export async function runFormatGate(
  format: Readonly<FormatConfig>,
  runner: ProcessRunner,
  timeoutMs?: number,
): Promise<GateResult> {
  const start = Date.now();
  let state: GateState = "check";
  let lastOutput = "";

  while (isGateStep(state)) {
    const command = state === "fix" ? format.fix : format.check;
    const outcome = await runner.run(command, { timeoutMs });
    lastOutput = outcome.output;
    state = nextGateState(state, outcome.kind === "success");
  }

  if (state === "failed_fix") {
    throw new GateError(`${format.fix.join(" ")} failed:\n${lastOutput}`, state);
  }
  if (state === "failed_recheck") {
    throw new GateError(`${format.check.join(" ")} still fails after auto-fix`, state);
  }

  return { status: state, elapsedMs: Date.now() - start };
}
