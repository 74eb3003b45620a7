import fs from "node:fs";
import path from "node:path";
import type { Lane } from "../types/lane.js";
import type { CheckConfig, LaneConfig } from "../types/config.js";
import type { Settings } from "../config/settings.js";
import { findExecutable } from "../process/which.js";
import { createCheck, createLane } from "./lane.js";

export type LaneSelection = {
  skipBench?: boolean;
  benchOnly?: boolean;
};

/** What conditional checks are evaluated against. */
export type EnvironmentProbe = {
  hasTool(name: string): boolean;
  hasFile(relPath: string): boolean;
};

export function createProbe(root: string): EnvironmentProbe {
  return {
    hasTool: (name) => findExecutable(name) !== null,
    hasFile: (relPath) => fs.existsSync(path.join(root, relPath)),
  };
}

function isIncluded(check: Readonly<CheckConfig>, probe: EnvironmentProbe): boolean {
  if (check.when?.tool && !probe.hasTool(check.when.tool)) return false;
  if (check.when?.file && !probe.hasFile(check.when.file)) return false;
  return true;
}

function buildLane(lane: Readonly<LaneConfig>, kind: "standard" | "bench", probe: EnvironmentProbe): Lane {
  const checks = lane.checks.filter((c) => isIncluded(c, probe)).map((c) => createCheck(c.name, c.command));
  return createLane(lane.name, lane.color, kind, checks);
}

/**
 * Construct every lane, all checks pending, in execution order:
 * configured lanes, the consistency lane, then the benchmark lane.
 */
export function buildLanes(
  settings: Settings,
  selection: LaneSelection = {},
  probe: EnvironmentProbe = createProbe(settings.root),
): Lane[] {
  const { config } = settings;
  const lanes: Lane[] = [];

  if (!selection.benchOnly) {
    for (const lane of config.lanes) lanes.push(buildLane(lane, "standard", probe));

    if (config.consistency) {
      lanes.push(
        createLane(config.consistency.name, config.consistency.color, "consistency", [
          createCheck("version consistency"),
          createCheck("API parity"),
        ]),
      );
    }
  }

  if (!selection.skipBench && config.bench) {
    lanes.push(buildLane(config.bench, "bench", probe));
  }

  return lanes;
}
