import path from "node:path";
import type { ChalkInstance } from "chalk";
import type { Lane } from "../types/lane.js";
import type { OutputFormat, Writer } from "../types/output.js";
import { ConfigError, loadSettings, type Settings } from "../config/settings.js";
import { ChildProcessRunner, type ProcessRunner } from "../process/runner.js";
import { GateError, runFormatGate, type GateResult } from "../gate/format-gate.js";
import { buildLanes, createProbe, type EnvironmentProbe } from "../core/lane-builder.js";
import { runStandardLane, type LaneContext } from "../core/lane.js";
import { runConsistencyLane, readVersion } from "../core/consistency-lane.js";
import { ProgressChannel, renderProgress, type ProgressEvent } from "../core/progress.js";
import { runLanes, type LaneHandlers } from "../core/scheduler.js";
import { runBenchLane } from "../bench/bench-lane.js";
import { HistoryStore } from "../bench/history.js";
import type { BenchEngineDeps } from "../bench/engine.js";
import { createRegistry, type SchemaRegistry } from "../schema/registry.js";
import { GitOperations } from "../git/operations.js";
import { summarize, type RunSummary } from "../report/summary.js";
import { createPalette, formatGateFailure, formatHeader, formatReport } from "../report/format.js";
import { EXIT } from "./exit-codes.js";

export type VerifyOptions = {
  configDir?: string;
  env?: string;
  root?: string;
  skipBench?: boolean;
  benchOnly?: boolean;
  updateBaseline?: boolean;
  format?: OutputFormat;
  color?: boolean;
};

/** Everything that reaches outside the process; tests substitute each. */
export type VerifyDeps = {
  runner?: ProcessRunner;
  revision?: () => Promise<string>;
  probe?: EnvironmentProbe;
  registry?: SchemaRegistry;
  out?: Writer;
  err?: Writer;
  processEnv?: NodeJS.ProcessEnv;
};

export type VerifyResult = {
  exitCode: number;
  ready: boolean;
  gate: GateResult | null;
  lanes: Lane[];
  summary: RunSummary | null;
  error?: string;
};

function writeError(format: OutputFormat, out: Writer, err: Writer, code: string, message: string): void {
  if (format === "jsonl") {
    out.write(JSON.stringify({ level: "error", code, message }) + "\n");
  } else {
    err.write(message + "\n");
  }
}

async function createBenchDeps(
  settings: Settings,
  opts: VerifyOptions,
  deps: VerifyDeps,
): Promise<BenchEngineDeps | null> {
  const { config, root } = settings;
  if (!config.bench) return null;

  const registry = deps.registry ?? (await createRegistry());
  const git = new GitOperations(root);

  return {
    resultsDir: path.resolve(root, config.bench.results_dir),
    resultsGlob: config.bench.results_glob,
    store: new HistoryStore(path.resolve(root, config.bench.history_file), registry),
    currentVersion: readVersion(root, config.versions.primary),
    thresholds: settings.thresholds,
    revision: deps.revision ?? (() => git.shortRevisionOrUnknown()),
    forceUpdate: opts.updateBaseline ?? false,
  };
}

/**
 * Format Gate, then every selected lane concurrently, then the summary.
 * Exit 0 only when the branch is ready to push.
 */
export async function verify(opts: VerifyOptions = {}, deps: VerifyDeps = {}): Promise<VerifyResult> {
  const format = opts.format ?? "human";
  const out = deps.out ?? process.stdout;
  const err = deps.err ?? process.stderr;
  const c: ChalkInstance = createPalette(opts.color ?? true);
  const start = Date.now();

  let settings: Settings;
  try {
    settings = await loadSettings({
      configDir: opts.configDir,
      env: opts.env,
      root: opts.root,
      processEnv: deps.processEnv,
    });
  } catch (e: unknown) {
    if (!(e instanceof ConfigError)) throw e;
    writeError(format, out, err, "CONFIG_INVALID", e.message);
    return { exitCode: EXIT.CONFIG_INVALID, ready: false, gate: null, lanes: [], summary: null, error: e.message };
  }

  const runner = deps.runner ?? new ChildProcessRunner(settings.root, settings.timeoutMs);

  // ── Format Gate ──
  let gate: GateResult | null = null;
  if (!opts.benchOnly) {
    try {
      gate = await runFormatGate(settings.config.format, runner, settings.timeoutMs);
    } catch (e: unknown) {
      if (!(e instanceof GateError)) throw e;
      if (format === "jsonl") {
        out.write(JSON.stringify({ type: "gate", status: e.state, message: e.message }) + "\n");
      } else {
        out.write(formatGateFailure(e.message, c));
      }
      return { exitCode: EXIT.GATE_FAILED, ready: false, gate: null, lanes: [], summary: null, error: e.message };
    }
  }

  if (format === "jsonl") {
    if (gate) out.write(JSON.stringify({ type: "gate", status: gate.status, elapsedMs: gate.elapsedMs }) + "\n");
  } else {
    out.write(formatHeader(settings.config.title, gate, c));
  }

  const lanes = buildLanes(
    settings,
    { skipBench: opts.skipBench, benchOnly: opts.benchOnly },
    deps.probe ?? createProbe(settings.root),
  );

  if (lanes.length === 0) {
    if (format === "jsonl") {
      out.write(JSON.stringify({ type: "summary", ready: true, lanes: 0 }) + "\n");
    } else {
      out.write("Nothing to run.\n");
    }
    return { exitCode: EXIT.READY, ready: true, gate, lanes, summary: null };
  }

  const benchDeps = lanes.some((l) => l.kind === "bench") ? await createBenchDeps(settings, opts, deps) : null;

  // ── Lanes ──
  const channel = new ProgressChannel<ProgressEvent>();
  const ctx: LaneContext = { runner, progress: channel, settings };
  const handlers: LaneHandlers = {
    standard: (lane) => runStandardLane(lane, ctx),
    consistency: (lane) => runConsistencyLane(lane, ctx),
    bench: (lane) => {
      if (!benchDeps) throw new Error(`Lane ${lane.name} has no bench configuration`);
      return runBenchLane(lane, ctx, benchDeps);
    },
  };

  const rendering = renderProgress(channel, out, format, c);
  try {
    await runLanes(lanes, handlers, channel);
  } finally {
    channel.close();
    await rendering;
  }

  // ── Summary ──
  const summary = summarize(lanes);
  const elapsedMs = Date.now() - start;

  if (format === "jsonl") {
    out.write(
      JSON.stringify({
        type: "summary",
        ready: summary.ready,
        passed: summary.passed,
        failed: summary.failed,
        warned: summary.warned,
        bench: summary.bench,
        benchmarks: lanes.find((l) => l.kind === "bench")?.bench?.report.comparisons ?? [],
        firstFailure: summary.firstFailure,
        elapsedMs,
      }) + "\n",
    );
  } else {
    out.write(formatReport(lanes, summary, elapsedMs, c));
  }

  return {
    exitCode: summary.ready ? EXIT.READY : EXIT.NOT_READY,
    ready: summary.ready,
    gate,
    lanes,
    summary,
  };
}
