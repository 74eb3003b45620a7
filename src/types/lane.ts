import type { LaneColor } from "./config.js";
import type { BenchOutcome } from "./bench.js";

export type CheckStatus = "pending" | "running" | "passed" | "failed" | "warned" | "skipped";

export type TerminalCheckStatus = Exclude<CheckStatus, "pending" | "running">;

export type Check = {
  name: string;
  /** Empty for pseudo-checks that the owning lane evaluates itself. */
  command: string[];
  status: CheckStatus;
  elapsedMs: number;
  output: string;
};

export type LaneKind = "standard" | "consistency" | "bench";

export type Lane = {
  name: string;
  color: LaneColor;
  kind: LaneKind;
  checks: Check[];
  elapsedMs: number;
  failed: boolean;
  /** Set by benchmark post-processing; absent until it has run. */
  bench?: BenchOutcome;
};
