import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import { ChildProcessRunner, TIMEOUT_MARKER, TRUNCATED_MARKER } from "../src/process/runner.js";

const node = process.execPath;

describe("ChildProcessRunner", () => {
  const runner = new ChildProcessRunner(os.tmpdir(), 10_000);

  it("captures stdout followed by stderr on success", async () => {
    const res = await runner.run([node, "-e", "process.stdout.write('out'); process.stderr.write('err')"]);
    expect(res.kind).toBe("success");
    expect(res.exitCode).toBe(0);
    expect(res.output).toBe("outerr");
    expect(res.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it("records the exit code and partial output of a failing command", async () => {
    const res = await runner.run([node, "-e", "process.stdout.write('partial'); process.exit(3)"]);
    expect(res.kind).toBe("failure");
    expect(res.exitCode).toBe(3);
    expect(res.output).toBe("partial");
  });

  it("kills a command that outlives its timeout", async () => {
    const res = await runner.run([node, "-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 200 });
    expect(res.kind).toBe("timeout");
    expect(res.exitCode).toBeNull();
    expect(res.output).toBe(TIMEOUT_MARKER);
  });

  it("times out a command that ignores SIGTERM", async () => {
    const script = "process.on('SIGTERM', () => {}); setTimeout(() => process.exit(0), 4000)";
    const res = await runner.run([node, "-e", script], { timeoutMs: 300 });
    expect(res.kind).toBe("timeout");
    expect(res.output).toBe(TIMEOUT_MARKER);
    expect(res.elapsedMs).toBeLessThan(3000);
  });

  it("keeps only the tail of oversized output and still succeeds", async () => {
    const small = new ChildProcessRunner(os.tmpdir(), 10_000, 1024);
    const res = await small.run([node, "-e", "process.stdout.write('a'.repeat(5000) + 'END')"]);
    expect(res.kind).toBe("success");
    expect(res.output).toBe(TRUNCATED_MARKER + "a".repeat(1021) + "END");
  });

  it("reports a missing executable as a failure without an exit code", async () => {
    const res = await runner.run(["lanegate-no-such-binary-xyz"]);
    expect(res.kind).toBe("failure");
    expect(res.exitCode).toBeNull();
    expect(res.output).toContain("ENOENT");
  });

  it("rejects an empty command", async () => {
    await expect(runner.run([])).rejects.toThrow("empty command");
  });

  it("runs in the configured working directory", async () => {
    const res = await runner.run([node, "-e", "process.stdout.write(process.cwd())"]);
    expect(fs.realpathSync(res.output)).toBe(fs.realpathSync(os.tmpdir()));
  });
});
