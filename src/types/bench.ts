/** One benchmark's measured mean, in nanoseconds. */
export type BenchResult = {
  name: string;
  meanNs: number;
};

export type BenchStatus = "pass" | "warn" | "fail" | "new";

export type BenchComparison = {
  name: string;
  meanNs: number;
  baseNs?: number;
  /** Signed drift relative to the baseline, rounded to one decimal. */
  pctChange?: number;
  status: BenchStatus;
};

export type BenchThresholds = {
  warnPct: number;
  failPct: number;
};

/** Persisted baseline history entry. */
export type HistoryEntry = {
  version: string;
  /** UTC, `YYYY-MM-DDTHH:MM:SSZ`. */
  timestamp: string;
  commit: string;
  benchmarks: Record<string, number>;
};

export type BenchReport = {
  comparisons: BenchComparison[];
  /** Version of the history entry compared against; null when there was no baseline. */
  baselineVersion: string | null;
  hasWarn: boolean;
  hasFail: boolean;
};

export type RecordedBaseline = {
  version: string;
  count: number;
  /** False when writing the history file failed; `message` then carries the error. */
  saved: boolean;
  message: string;
};

export type BenchOutcome = {
  results: BenchResult[];
  report: BenchReport;
  recorded: RecordedBaseline | null;
};
