import chalk, { Chalk, type ChalkInstance } from "chalk";
import type { CheckStatus, Lane } from "../types/lane.js";
import type { BenchComparison } from "../types/bench.js";
import type { GateResult } from "../gate/format-gate.js";
import type { BenchSummary, RunSummary } from "./summary.js";

export const PANEL_WIDTH = 60;
const CHECK_NAME_WIDTH = 46;
const BENCH_NAME_WIDTH = 30;

const SYM = {
  pass: "✓",
  fail: "✗",
  warn: "⚠",
  skip: "─",
  new: "○",
} as const;

type Style = (text: string) => string;

/** Colors follow the terminal; `false` renders plain text. */
export function createPalette(color = true): ChalkInstance {
  return color ? chalk : new Chalk({ level: 0 });
}

export function formatNs(ns: number): string {
  if (ns < 1_000) return `${ns.toFixed(0)}ns`;
  if (ns < 1_000_000) return `${(ns / 1_000).toFixed(1)}µs`;
  if (ns < 1_000_000_000) return `${(ns / 1_000_000).toFixed(1)}ms`;
  return `${(ns / 1_000_000_000).toFixed(2)}s`;
}

export function formatSecs(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function formatPct(pct: number): string {
  return `${pct >= 0 ? "+" : ""}${pct.toFixed(1)}%`;
}

export function statusSymbol(status: CheckStatus, c: ChalkInstance): string {
  switch (status) {
    case "passed":
      return c.green(SYM.pass);
    case "failed":
      return c.red(SYM.fail);
    case "warned":
      return c.yellow(SYM.warn);
    case "skipped":
      return c.dim(SYM.skip);
    default:
      return c.dim("?");
  }
}

/** `── Title ─────── subtitle`, PANEL_WIDTH columns wide when rendered plain. */
function heading(title: string, subtitle: string, style: { title: Style; border: Style; subtitle: Style }): string {
  const fill = Math.max(PANEL_WIDTH - title.length - subtitle.length - 5, 3);
  const tail = subtitle ? ` ${style.subtitle(subtitle)}` : "";
  return `${style.border("──")} ${style.title(title)} ${style.border("─".repeat(fill))}${tail}`;
}

export function formatLanePanel(lane: Lane, c: ChalkInstance): string {
  const lines = [
    heading(lane.name, formatSecs(lane.elapsedMs), {
      title: c.bold[lane.color],
      border: lane.failed ? c.red : c.green,
      subtitle: c.dim,
    }),
  ];

  for (const check of lane.checks) {
    const ran = check.status !== "pending" && check.status !== "skipped";
    const time = ran ? formatSecs(check.elapsedMs) : "";
    lines.push(`  ${statusSymbol(check.status, c)} ${check.name.padEnd(CHECK_NAME_WIDTH)} ${c.dim(time.padStart(8))}`.trimEnd());
  }

  return lines.join("\n");
}

function formatComparison(bc: BenchComparison, c: ChalkInstance): string {
  const name = bc.name.padEnd(BENCH_NAME_WIDTH);
  const mean = formatNs(bc.meanNs).padStart(10);

  if (bc.baseNs === undefined || bc.pctChange === undefined) {
    return `  ${c.dim(SYM.new)} ${name} ${mean}  ${c.dim("(new)")}`;
  }

  const pct = formatPct(bc.pctChange);
  const [sym, pctText] =
    bc.status === "fail"
      ? [c.red(SYM.fail), c.red(pct)]
      : bc.status === "warn"
        ? [c.yellow(SYM.warn), c.yellow(pct)]
        : [c.green(SYM.pass), c.dim(pct)];

  return `  ${sym} ${name} ${mean}  ${c.dim(`(base ${formatNs(bc.baseNs).padEnd(8)}`)} ${pctText}${c.dim(")")}`;
}

/** Per-benchmark panel; null when benchmark post-processing never ran. */
export function formatBenchPanel(lane: Lane, c: ChalkInstance): string | null {
  if (!lane.bench) return null;
  const { report, recorded } = lane.bench;

  const border = lane.failed ? c.red : report.hasWarn ? c.yellow : c.green;
  const subtitle = report.baselineVersion === null ? "No baseline" : `vs v${report.baselineVersion}`;
  const lines = [heading("Benchmarks", subtitle, { title: c.bold.blue, border, subtitle: c.dim })];

  const sorted = [...report.comparisons].sort((x, y) => (x.name < y.name ? -1 : x.name > y.name ? 1 : 0));
  for (const bc of sorted) lines.push(formatComparison(bc, c));

  if (recorded) lines.push(`  ${recorded.saved ? c.dim(recorded.message) : c.yellow(recorded.message)}`);

  return lines.join("\n");
}

function formatBenchSummary(bench: BenchSummary, c: ChalkInstance): string {
  switch (bench.kind) {
    case "regressions":
      return c.red(`${bench.count} regressions`);
    case "warnings":
      return c.yellow(`${bench.count} warnings`);
    case "ok":
      return c.green("ok");
    case "no-baseline":
      return c.dim("no baseline");
    case "not-run":
      return c.dim("not run");
  }
}

export function formatStatusLine(summary: RunSummary, totalElapsedMs: number, c: ChalkInstance): string {
  const parts = [`Total: ${formatSecs(totalElapsedMs)}`];

  let checks = `Checks: ${c.green(`${summary.passed} passed`)}`;
  if (summary.failed > 0) {
    checks = `Checks: ${c.red(`${summary.failed} failed`)}  ${c.green(`${summary.passed} passed`)}`;
  }
  if (summary.warned > 0) {
    checks += `  ${c.yellow(`${summary.warned} warnings`)}`;
  }
  parts.push(checks);

  if (summary.bench) parts.push(`Bench: ${formatBenchSummary(summary.bench, c)}`);

  return `  ${parts.join("   ")}`;
}

/** Lane panels, benchmark panel, totals, verdict and the first failure's output. */
export function formatReport(lanes: readonly Lane[], summary: RunSummary, totalElapsedMs: number, c: ChalkInstance): string {
  const blocks: string[] = lanes.map((lane) => formatLanePanel(lane, c));

  for (const lane of lanes) {
    if (lane.kind !== "bench") continue;
    const panel = formatBenchPanel(lane, c);
    if (panel) blocks.push(panel);
  }

  const verdict = summary.ready
    ? `  ${c.bold.green(`${SYM.pass} Ready to push`)}`
    : `  ${c.bold.red(`${SYM.fail} Fix issues before pushing`)}`;
  blocks.push(`${formatStatusLine(summary, totalElapsedMs, c)}\n${verdict}`);

  if (summary.firstFailure) {
    const { lane, check, output } = summary.firstFailure;
    const body = output
      .trimEnd()
      .split("\n")
      .map((line) => `  ${line}`.trimEnd());
    blocks.push([heading(`Failed: ${check}`, lane, { title: c.red, border: c.red, subtitle: c.dim }), ...body].join("\n"));
  }

  return `\n${blocks.join("\n\n")}\n\n`;
}

export function formatHeader(title: string, gate: GateResult | null, c: ChalkInstance): string {
  const lines = ["", `  ${c.bold(title)}`, ""];
  if (gate) {
    const fixed = gate.status === "auto-fixed" ? ` ${c.yellow("(auto-fixed)")}` : "";
    lines.push(`  ${c.green(SYM.pass)} Format check${fixed} ${c.dim(formatSecs(gate.elapsedMs))}`, "");
  }
  return lines.join("\n") + "\n";
}

export function formatGateFailure(message: string, c: ChalkInstance): string {
  const body = message.split("\n").map((line) => `  ${line}`.trimEnd());
  return ["", heading("Format Gate Failed", "", { title: c.bold.red, border: c.red, subtitle: c.dim }), ...body, ""].join("\n") + "\n";
}
