import fs from "node:fs";
import path from "node:path";
import type { HistoryEntry } from "../types/bench.js";
import type { SchemaRegistry } from "../schema/registry.js";

export type HistoryLoad = {
  /** Whether the history file exists at all, readable or not. */
  exists: boolean;
  /** Entries that pass the entry schema, in file order. */
  entries: HistoryEntry[];
  /** Every parsed item, valid or not; what a rewrite starts from. Empty when the file is absent or not a JSON array. */
  raw: unknown[];
};

/** `YYYY-MM-DDTHH:MM:SSZ`, always UTC. */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

function hasVersion(item: unknown, version: string): boolean {
  return typeof item === "object" && item !== null && "version" in item && item.version === version;
}

/**
 * Replace the item carrying the same version in place, or append. Items the
 * entry schema rejects are kept where they are.
 */
export function upsertEntry<T>(history: readonly T[], entry: HistoryEntry): (T | HistoryEntry)[] {
  const idx = history.findIndex((e) => hasVersion(e, entry.version));
  if (idx === -1) return [...history, entry];
  return history.map((e, i) => (i === idx ? entry : e));
}

/**
 * History Store — reads and rewrites the benchmark baseline history, the
 * only durable artifact of a run.
 */
export class HistoryStore {
  constructor(
    readonly historyPath: string,
    private readonly registry: SchemaRegistry,
  ) {}

  async load(): Promise<HistoryLoad> {
    if (!fs.existsSync(this.historyPath)) return { exists: false, entries: [], raw: [] };

    let data: unknown;
    try {
      data = JSON.parse(fs.readFileSync(this.historyPath, "utf8"));
    } catch {
      // Unreadable history means no baseline, never a failed run
      return { exists: true, entries: [], raw: [] };
    }
    if (!Array.isArray(data)) return { exists: true, entries: [], raw: [] };

    const raw: unknown[] = data;
    const isEntry = await this.registry.getValidator<HistoryEntry>("history-entry");
    return { exists: true, entries: raw.filter(isEntry), raw };
  }

  write(history: readonly unknown[]): void {
    fs.mkdirSync(path.dirname(this.historyPath), { recursive: true });
    fs.writeFileSync(this.historyPath, JSON.stringify(history, null, 2) + "\n", "utf8");
  }
}
