import fs from "node:fs";
import path from "node:path";
import type { Lane } from "../types/lane.js";
import type { ParityConfig, VersionSource } from "../types/config.js";
import { failLane, reportCheckEnd, reportCheckStart, settleCheck, startCheck, type LaneContext } from "./lane.js";

export const UNKNOWN_VERSION = "unknown";

/** First capture group of the first matching line, or "unknown". */
export function readVersion(root: string, source: Readonly<VersionSource>): string {
  const filePath = path.join(root, source.file);
  if (!fs.existsSync(filePath)) return UNKNOWN_VERSION;

  const pattern = new RegExp(source.pattern);
  for (const line of fs.readFileSync(filePath, "utf8").split(/\r?\n/)) {
    const m = pattern.exec(line);
    if (m?.[1] !== undefined) return m[1];
  }
  return UNKNOWN_VERSION;
}

/** The artifact is stale when it is missing or older than its source. */
export function needsCompile(sourcePath: string, artifactPath: string): boolean {
  if (!fs.existsSync(artifactPath)) return true;
  return fs.statSync(sourcePath).mtimeMs > fs.statSync(artifactPath).mtimeMs;
}

export function expandCommand(template: readonly string[], values: Record<string, string>): string[] {
  return template.map((arg) => arg.replace(/\{(\w+)\}/g, (whole, key: string) => values[key] ?? whole));
}

/**
 * Version consistency, then API parity. Neither is a plain subprocess check:
 * the first reads two config files, the second compiles its checker only
 * when stale and degrades to a warning when no compiler produced it.
 */
export async function runConsistencyLane(lane: Lane, ctx: LaneContext): Promise<void> {
  const { config, root } = ctx.settings;
  const [versionCheck, parityCheck] = lane.checks;
  if (!versionCheck || !parityCheck || !config.consistency) {
    throw new Error(`Lane ${lane.name} is not a configured consistency lane`);
  }

  // ── Version consistency ──
  startCheck(versionCheck);
  reportCheckStart(lane, versionCheck, ctx.progress);
  const versionStart = Date.now();

  const { primary, secondary } = config.versions;
  const a = readVersion(root, primary);
  const b = readVersion(root, secondary);

  if (a === b) {
    versionCheck.name = `version consistency (${a})`;
    settleCheck(versionCheck, "passed", { elapsedMs: Date.now() - versionStart });
  } else {
    versionCheck.name = `version mismatch (${a} vs ${b})`;
    settleCheck(versionCheck, "failed", {
      elapsedMs: Date.now() - versionStart,
      output: `${primary.file}=${a}  ${secondary.file}=${b}`,
    });
  }
  reportCheckEnd(lane, versionCheck, ctx.progress);

  if (versionCheck.status === "failed") {
    failLane(lane);
    return;
  }

  // ── API parity ──
  startCheck(parityCheck);
  reportCheckStart(lane, parityCheck, ctx.progress);
  const parityStart = Date.now();

  const artifact = await ensureParityArtifact(root, config.consistency.parity, ctx);

  if (artifact) {
    const outcome = await ctx.runner.run([artifact], { timeoutMs: ctx.settings.timeoutMs });
    settleCheck(parityCheck, outcome.kind === "success" ? "passed" : "failed", {
      elapsedMs: Date.now() - parityStart,
      output: outcome.output,
    });
  } else {
    parityCheck.name = "API parity (compiler unavailable)";
    settleCheck(parityCheck, "warned", { elapsedMs: Date.now() - parityStart });
  }
  reportCheckEnd(lane, parityCheck, ctx.progress);

  if (parityCheck.status === "failed") failLane(lane);
}

/**
 * Compile the parity checker if its source is newer than the artifact.
 * Returns the artifact path if one exists afterwards. A failed compile is
 * not a check failure: a previously built artifact still runs.
 */
async function ensureParityArtifact(
  root: string,
  parity: Readonly<ParityConfig>,
  ctx: LaneContext,
): Promise<string | null> {
  const source = path.resolve(root, parity.source);
  const artifact = path.resolve(root, parity.artifact);

  if (fs.existsSync(source) && needsCompile(source, artifact)) {
    fs.mkdirSync(path.dirname(artifact), { recursive: true });
    await ctx.runner.run(expandCommand(parity.compile, { source, artifact }), {
      timeoutMs: ctx.settings.timeoutMs,
    });
  }

  return fs.existsSync(artifact) ? artifact : null;
}
