/** Configuration types — layered config system. */
export const LANE_COLORS = ["cyan", "magenta", "yellow", "blue", "green", "red", "white", "gray"] as const;

export type LaneColor = (typeof LANE_COLORS)[number];

/** Argument vector, executed without a shell. */
export type CommandLine = string[];

export type CheckCondition = {
  /** Executable that must be on PATH. */
  tool?: string;
  /** File, relative to the project root, that must exist. */
  file?: string;
};

export type CheckConfig = {
  name: string;
  command: CommandLine;
  when?: CheckCondition;
};

export type LaneConfig = {
  name: string;
  color: LaneColor;
  checks: CheckConfig[];
};

export type VersionSource = {
  file: string;
  /** Matched line by line; the first capture group is the version label. */
  pattern: string;
};

export type ParityConfig = {
  source: string;
  artifact: string;
  /** `{source}` and `{artifact}` are replaced with absolute paths. */
  compile: CommandLine;
};

export type ConsistencyConfig = {
  name: string;
  color: LaneColor;
  parity: ParityConfig;
};

export type BenchConfig = LaneConfig & {
  results_dir: string;
  results_glob: string;
  history_file: string;
};

export type FormatConfig = {
  check: CommandLine;
  fix: CommandLine;
};

export type LanegateConfig = {
  schema_version: string;
  title: string;
  root?: string;
  timeout_seconds: number;
  format: FormatConfig;
  versions: {
    primary: VersionSource;
    secondary: VersionSource;
  };
  lanes: LaneConfig[];
  consistency?: ConsistencyConfig;
  bench?: BenchConfig;
};
