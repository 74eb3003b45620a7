import fs from "node:fs";
import path from "node:path";
import { minimatch } from "minimatch";
import type { BenchResult } from "../types/bench.js";
import { roundTo1 } from "./compare.js";

export const DEFAULT_RESULTS_GLOB = "**/new/estimates.json";

/** Aggregation nodes written next to the per-benchmark results. */
const REPORT_SEGMENT = "report";

/**
 * Benchmark name from a results-relative path: the segments before the first
 * `new`, joined with "/". Null for report nodes and paths with no name.
 */
export function benchNameFromPath(relPath: string): string | null {
  const segments = relPath.split("/");
  const newIdx = segments.indexOf("new");
  if (newIdx <= 0) return null;
  const parts = segments.slice(0, newIdx);
  if (parts.includes(REPORT_SEGMENT)) return null;
  return parts.join("/");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** `mean.point_estimate` from an estimates file, or null if unreadable. */
export function readMeanEstimate(filePath: string): number | null {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch {
    // Partially written or corrupt results contribute nothing
    return null;
  }
  if (!isRecord(data) || !isRecord(data.mean)) return null;
  const estimate = data.mean.point_estimate;
  return typeof estimate === "number" && Number.isFinite(estimate) ? estimate : null;
}

/** Walk the results tree and collect one mean per benchmark, sorted by name. */
export function extractBenchResults(resultsDir: string, pattern: string = DEFAULT_RESULTS_GLOB): BenchResult[] {
  if (!fs.existsSync(resultsDir) || !fs.statSync(resultsDir).isDirectory()) return [];

  const results: BenchResult[] = [];
  for (const rel of fs.readdirSync(resultsDir, { recursive: true, encoding: "utf8" })) {
    const posixPath = rel.split(path.sep).join("/");
    if (!minimatch(posixPath, pattern)) continue;

    const name = benchNameFromPath(posixPath);
    if (name === null) continue;

    const mean = readMeanEstimate(path.join(resultsDir, rel));
    if (mean === null) continue;

    results.push({ name, meanNs: roundTo1(mean) });
  }

  return results.sort((x, y) => (x.name < y.name ? -1 : x.name > y.name ? 1 : 0));
}
