import type { BenchOutcome, BenchThresholds, HistoryEntry, RecordedBaseline } from "../types/bench.js";
import { extractBenchResults } from "./extract.js";
import { compareBenchmarks, selectBaseline } from "./compare.js";
import { formatTimestamp, upsertEntry, type HistoryLoad, type HistoryStore } from "./history.js";

export type BenchEngineDeps = {
  resultsDir: string;
  resultsGlob: string;
  store: HistoryStore;
  currentVersion: string;
  thresholds: Readonly<BenchThresholds>;
  /** Short HEAD revision; implementations resolve to "unknown" rather than throw. */
  revision: () => Promise<string>;
  forceUpdate: boolean;
  now?: () => Date;
};

/**
 * Record when there is no history yet, when the latest valid entry belongs to
 * another version (first run at a new version), or when forced.
 */
export function shouldRecordBaseline(history: HistoryLoad, currentVersion: string, force: boolean): boolean {
  if (force || !history.exists) return true;
  return history.entries.at(-1)?.version !== currentVersion;
}

function saveEntry(store: HistoryStore, history: HistoryLoad, entry: HistoryEntry): RecordedBaseline {
  const count = Object.keys(entry.benchmarks).length;
  try {
    store.write(upsertEntry(history.raw, entry));
  } catch (e: unknown) {
    const reason = e instanceof Error ? e.message : String(e);
    return { version: entry.version, count, saved: false, message: `Baseline not saved for v${entry.version}: ${reason}` };
  }
  return { version: entry.version, count, saved: true, message: `Baseline updated for v${entry.version} (${count} benchmarks)` };
}

/**
 * Benchmark post-processing: extract → load baseline → compare → maybe record.
 * History is read once and written at most once.
 */
export async function processBenchmarks(deps: BenchEngineDeps): Promise<BenchOutcome> {
  const results = extractBenchResults(deps.resultsDir, deps.resultsGlob);
  const history = await deps.store.load();
  const baseline = selectBaseline(history.entries, deps.currentVersion);
  const report = compareBenchmarks(results, baseline, deps.thresholds);

  let recorded: RecordedBaseline | null = null;
  if (shouldRecordBaseline(history, deps.currentVersion, deps.forceUpdate)) {
    const entry: HistoryEntry = {
      version: deps.currentVersion,
      timestamp: formatTimestamp((deps.now ?? (() => new Date()))()),
      commit: await deps.revision(),
      benchmarks: Object.fromEntries(results.map((r) => [r.name, r.meanNs])),
    };
    recorded = saveEntry(deps.store, history, entry);
  }

  return { results, report, recorded };
}
