import { beforeAll, describe, expect, it } from "vitest";
import path from "node:path";
import { SchemaRegistry, createRegistry } from "../src/schema/registry.js";
import type { HistoryEntry } from "../src/types/bench.js";

const SCHEMA_DIR = path.resolve(import.meta.dirname, "../schemas");

describe("schema registry", () => {
  let registry: SchemaRegistry;

  beforeAll(async () => {
    registry = await createRegistry(SCHEMA_DIR);
  });

  it("accepts a well-formed history entry", async () => {
    const isEntry = await registry.getValidator<HistoryEntry>("history-entry");
    expect(
      isEntry({ version: "1.0.0", timestamp: "2024-05-01T12:00:00Z", commit: "abc1234", benchmarks: { alpha: 120.5 } }),
    ).toBe(true);
  });

  it("rejects a malformed timestamp", async () => {
    const isEntry = await registry.getValidator<HistoryEntry>("history-entry");
    expect(isEntry({ version: "1.0.0", timestamp: "yesterday", commit: "abc1234", benchmarks: {} })).toBe(false);
  });

  it("rejects an empty commit and non-numeric benchmark means", async () => {
    const isEntry = await registry.getValidator<HistoryEntry>("history-entry");
    expect(isEntry({ version: "1.0.0", timestamp: "2024-05-01T12:00:00Z", commit: "", benchmarks: {} })).toBe(false);
    expect(
      isEntry({ version: "1.0.0", timestamp: "2024-05-01T12:00:00Z", commit: "abc1234", benchmarks: { alpha: "fast" } }),
    ).toBe(false);
  });

  it("throws for an unknown schema", async () => {
    await expect(registry.getValidator("nope")).rejects.toThrow("Schema not found: nope");
  });

  it("fails to load from a missing directory", async () => {
    await expect(createRegistry(path.join(SCHEMA_DIR, "missing"))).rejects.toThrow("Schema directory not found");
  });

  it("keeps registries independent", async () => {
    const other = await createRegistry(SCHEMA_DIR);
    const isEntry = await other.getValidator<HistoryEntry>("history-entry");
    expect(isEntry({ version: "2.0.0", timestamp: "2024-05-01T12:00:00Z", commit: "def5678", benchmarks: {} })).toBe(true);
  });
});
