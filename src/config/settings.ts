import path from "node:path";
import { loadConfig } from "./loader.js";
import { validateConfig } from "./validator.js";
import { BENCH_THRESHOLDS } from "../bench/compare.js";
import type { LanegateConfig } from "../types/config.js";
import type { BenchThresholds } from "../types/bench.js";

/** Immutable run settings, built once at startup and handed to every component. */
export type Settings = Readonly<{
  root: string;
  timeoutMs: number;
  thresholds: Readonly<BenchThresholds>;
  config: Readonly<LanegateConfig>;
}>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export type SettingsOptions = {
  configDir?: string;
  env?: string;
  /** Overrides `root` from the config; defaults to the current directory. */
  root?: string;
  processEnv?: NodeJS.ProcessEnv;
};

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    const children: unknown[] = Object.values(value);
    for (const child of children) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export async function loadSettings(opts: SettingsOptions = {}): Promise<Settings> {
  let raw: Record<string, unknown>;
  try {
    raw = loadConfig(opts.env, opts.configDir, opts.processEnv);
  } catch (e: unknown) {
    throw new ConfigError(e instanceof Error ? e.message : String(e));
  }

  const result = await validateConfig(raw);
  if (!result.valid) {
    throw new ConfigError(`Invalid configuration: ${result.errors}`);
  }

  const config = result.config;
  return deepFreeze({
    root: path.resolve(opts.root ?? config.root ?? process.cwd()),
    timeoutMs: config.timeout_seconds * 1000,
    thresholds: { ...BENCH_THRESHOLDS },
    config,
  });
}
