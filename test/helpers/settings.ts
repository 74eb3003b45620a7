import type { LanegateConfig } from "../../src/types/config.js";
import type { Settings } from "../../src/config/settings.js";
import { BENCH_THRESHOLDS } from "../../src/bench/compare.js";

export const TEST_VERSION_PATTERN = '^version\\s*=\\s*"([^"]+)"';

/** A small, valid configuration; callers override what they exercise. */
export function makeConfig(overrides: Partial<LanegateConfig> = {}): LanegateConfig {
  return {
    schema_version: "1.0.0",
    title: "Test Verification",
    timeout_seconds: 30,
    format: { check: ["fmt", "--check"], fix: ["fmt"] },
    versions: {
      primary: { file: "Cargo.toml", pattern: TEST_VERSION_PATTERN },
      secondary: { file: "pyproject.toml", pattern: TEST_VERSION_PATTERN },
    },
    lanes: [],
    ...overrides,
  };
}

export function makeSettings(root: string, config: LanegateConfig = makeConfig()): Settings {
  return {
    root,
    timeoutMs: config.timeout_seconds * 1000,
    thresholds: BENCH_THRESHOLDS,
    config,
  };
}
