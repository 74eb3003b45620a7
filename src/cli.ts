#!/usr/bin/env node

import { Command, Option } from "commander";
import { verify } from "./commands/verify.js";
import { showBaseline } from "./commands/baseline.js";
import { EXIT } from "./commands/exit-codes.js";
import type { OutputFormat } from "./types/output.js";

const program = new Command();

const formatOption = () =>
  new Option("--format <format>", "Output format: human|jsonl").choices(["human", "jsonl"]).default("human");

program
  .name("lanegate")
  .description("Pre-push verification: format gate, parallel check lanes and benchmark regressions")
  .version("0.1.0");

program
  .command("verify", { isDefault: true })
  .description("Run the format gate and every verification lane")
  .option("--skip-bench", "Skip the benchmark lane")
  .option("--bench-only", "Run only the benchmark lane")
  .option("--update-baseline", "Record a benchmark baseline for the current version")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to merge over base.yaml")
  .option("--root <path>", "Project root (default: current directory)")
  .option("--no-color", "Disable colored output")
  .addOption(formatOption())
  .action(
    async (opts: {
      skipBench?: boolean;
      benchOnly?: boolean;
      updateBaseline?: boolean;
      config?: string;
      env?: string;
      root?: string;
      color: boolean;
      format: OutputFormat;
    }) => {
      const res = await verify({
        configDir: opts.config,
        env: opts.env,
        root: opts.root,
        skipBench: opts.skipBench,
        benchOnly: opts.benchOnly,
        updateBaseline: opts.updateBaseline,
        format: opts.format,
        color: opts.color,
      });
      process.exit(res.exitCode);
    }
  );

program
  .command("baseline")
  .description("Show recorded benchmark baselines")
  .option("--config <path>", "Path to config directory")
  .option("--env <name>", "Config overlay to merge over base.yaml")
  .option("--root <path>", "Project root (default: current directory)")
  .addOption(formatOption())
  .action(async (opts: { config?: string; env?: string; root?: string; format: OutputFormat }) => {
    const res = await showBaseline({ configDir: opts.config, env: opts.env, root: opts.root, format: opts.format });
    if (!res.ok) {
      if (opts.format === "jsonl") {
        process.stdout.write(JSON.stringify({ level: "error", error: res.error }) + "\n");
      } else {
        console.error(res.error);
      }
      process.exit(EXIT.NOT_READY);
    }
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(1);
});
