import { describe, expect, it } from "vitest";
import {
  createCheck,
  createLane,
  failLane,
  runStandardLane,
  settleCheck,
  startCheck,
  type LaneContext,
} from "../src/core/lane.js";
import { FakeRunner, RecordingSink, outcome } from "./helpers/fake-runner.js";
import { makeSettings } from "./helpers/settings.js";

function context(runner: FakeRunner, progress = new RecordingSink()): LaneContext {
  return { runner, progress, settings: makeSettings("/project") };
}

describe("check lifecycle", () => {
  it("moves pending → running → terminal", () => {
    const check = createCheck("build", ["make"]);
    expect(check.status).toBe("pending");
    startCheck(check);
    expect(check.status).toBe("running");
    settleCheck(check, "passed", { elapsedMs: 42, output: "ok" });
    expect(check).toMatchObject({ status: "passed", elapsedMs: 42, output: "ok" });
  });

  it("never overwrites a terminal status", () => {
    const check = createCheck("build", ["make"]);
    startCheck(check);
    settleCheck(check, "failed");
    expect(() => settleCheck(check, "passed")).toThrow('Check "build" already settled as failed');
    expect(check.status).toBe("failed");
  });

  it("refuses to start a check twice", () => {
    const check = createCheck("build", ["make"]);
    startCheck(check);
    expect(() => startCheck(check)).toThrow("cannot start from status running");
  });

  it("failLane skips only pending checks", () => {
    const done = createCheck("a", ["a"]);
    startCheck(done);
    settleCheck(done, "passed");
    const lane = createLane("L", "cyan", "standard", [done, createCheck("b", ["b"]), createCheck("c", ["c"])]);

    failLane(lane);

    expect(lane.failed).toBe(true);
    expect(lane.checks.map((c) => c.status)).toEqual(["passed", "skipped", "skipped"]);
  });
});

describe("runStandardLane", () => {
  it("runs every check in order when all pass", async () => {
    const runner = new FakeRunner();
    const lane = createLane("Native", "cyan", "standard", [
      createCheck("check", ["cargo", "check"]),
      createCheck("test", ["cargo", "test"]),
    ]);

    await runStandardLane(lane, context(runner));

    expect(runner.commands()).toEqual(["cargo check", "cargo test"]);
    expect(lane.failed).toBe(false);
    expect(lane.checks.map((c) => c.status)).toEqual(["passed", "passed"]);
  });

  it("short-circuits after the first failure", async () => {
    const runner = new FakeRunner({ "cargo check": outcome("failure", "error[E0425]", 250) });
    const lane = createLane("Native", "cyan", "standard", [
      createCheck("check", ["cargo", "check"]),
      createCheck("test", ["cargo", "test"]),
      createCheck("doc", ["cargo", "doc"]),
    ]);

    await runStandardLane(lane, context(runner));

    expect(runner.commands()).toEqual(["cargo check"]);
    expect(lane.failed).toBe(true);
    expect(lane.checks.map((c) => c.status)).toEqual(["failed", "skipped", "skipped"]);
    expect(lane.checks[0]).toMatchObject({ output: "error[E0425]", elapsedMs: 250 });
  });

  it("treats a timeout as a failure", async () => {
    const runner = new FakeRunner({ slow: outcome("timeout", "TIMEOUT") });
    const lane = createLane("L", "cyan", "standard", [createCheck("slow", ["slow"]), createCheck("next", ["next"])]);

    await runStandardLane(lane, context(runner));

    expect(lane.checks.map((c) => c.status)).toEqual(["failed", "skipped"]);
    expect(lane.checks[0]?.output).toBe("TIMEOUT");
  });

  it("passes the configured timeout to the runner", async () => {
    const runner = new FakeRunner();
    const lane = createLane("L", "cyan", "standard", [createCheck("a", ["a"])]);
    await runStandardLane(lane, context(runner));
    expect(runner.calls[0]?.opts.timeoutMs).toBe(30_000);
  });

  it("reports start and end of each executed check", async () => {
    const sink = new RecordingSink();
    const runner = new FakeRunner({ b: outcome("failure", "", 7) });
    const lane = createLane("L", "cyan", "standard", [createCheck("a", ["a"]), createCheck("b", ["b"]), createCheck("c", ["c"])]);

    await runStandardLane(lane, context(runner, sink));

    expect(sink.events).toEqual([
      { type: "check-start", lane: "L", check: "a" },
      { type: "check-end", lane: "L", check: "a", status: "passed", elapsedMs: 100 },
      { type: "check-start", lane: "L", check: "b" },
      { type: "check-end", lane: "L", check: "b", status: "failed", elapsedMs: 7 },
    ]);
  });
});
