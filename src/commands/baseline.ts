import path from "node:path";
import type { OutputFormat, Writer } from "../types/output.js";
import type { HistoryEntry } from "../types/bench.js";
import { ConfigError, loadSettings, type Settings } from "../config/settings.js";
import { HistoryStore } from "../bench/history.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";

export type BaselineOptions = {
  configDir?: string;
  env?: string;
  root?: string;
  format?: OutputFormat;
};

export type BaselineDeps = {
  registry?: SchemaRegistry;
  out?: Writer;
  processEnv?: NodeJS.ProcessEnv;
};

export type BaselineResult =
  | { ok: true; entries: HistoryEntry[] }
  | { ok: false; error: string };

/**
 * Read the recorded benchmark history for the configured project.
 */
export async function readHistory(opts: BaselineOptions = {}, deps: BaselineDeps = {}): Promise<BaselineResult> {
  let settings: Settings;
  try {
    settings = await loadSettings({ configDir: opts.configDir, env: opts.env, root: opts.root, processEnv: deps.processEnv });
  } catch (e: unknown) {
    if (e instanceof ConfigError) return { ok: false, error: e.message };
    throw e;
  }

  const { bench } = settings.config;
  if (!bench) {
    return { ok: false, error: "No bench lane configured." };
  }

  const historyPath = path.resolve(settings.root, bench.history_file);
  const store = new HistoryStore(historyPath, deps.registry ?? (await createRegistry()));
  const history = await store.load();
  if (history.entries.length === 0) {
    return { ok: false, error: `No baseline history found at ${historyPath}. Run the bench lane first.` };
  }
  return { ok: true, entries: history.entries };
}

export function formatHistory(entries: readonly HistoryEntry[]): string {
  const width = Math.max(...entries.map((e) => e.version.length)) + 1;
  return (
    entries
      .map((e) => {
        const count = Object.keys(e.benchmarks).length;
        return `  v${e.version.padEnd(width)} ${e.timestamp}  ${e.commit.padEnd(9)} ${count} benchmarks`;
      })
      .join("\n") + "\n"
  );
}

/** Print the history as a table, or one JSON line per entry. */
export async function showBaseline(opts: BaselineOptions = {}, deps: BaselineDeps = {}): Promise<BaselineResult> {
  const res = await readHistory(opts, deps);
  if (!res.ok) return res;

  const out = deps.out ?? process.stdout;
  if (opts.format === "jsonl") {
    for (const entry of res.entries) out.write(JSON.stringify(entry) + "\n");
  } else {
    out.write(formatHistory(res.entries));
  }
  return res;
}
