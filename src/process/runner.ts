import { spawn } from "node:child_process";

export const DEFAULT_TIMEOUT_MS = 600_000;

/** Output recorded for a process killed by its timeout. */
export const TIMEOUT_MARKER = "TIMEOUT";

/** Per-stream cap on captured output; only the tail is kept beyond it. */
export const MAX_CAPTURED_BYTES = 8 * 1024 * 1024;

/** Prefixed to a stream whose head was dropped. */
export const TRUNCATED_MARKER = "[output truncated]\n";

export type ProcessOutcome = {
  kind: "success" | "failure" | "timeout";
  /** null when the process never started or was killed. */
  exitCode: number | null;
  /** stdout followed by stderr. */
  output: string;
  elapsedMs: number;
};

export type RunOptions = {
  timeoutMs?: number;
};

/**
 * The only component that touches the OS process layer. Every check's
 * terminal status is derived from the outcome it returns.
 */
export interface ProcessRunner {
  run(command: readonly string[], opts?: RunOptions): Promise<ProcessOutcome>;
}

/** Keeps the last `limit` bytes written to one stream. */
class TailBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private dropped = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    if (this.size > 2 * this.limit) this.compact();
  }

  text(): string {
    this.compact();
    const body = Buffer.concat(this.chunks).toString("utf8");
    return this.dropped ? TRUNCATED_MARKER + body : body;
  }

  private compact(): void {
    if (this.size <= this.limit) return;
    const all = Buffer.concat(this.chunks);
    this.chunks = [all.subarray(all.length - this.limit)];
    this.size = this.limit;
    this.dropped = true;
  }
}

/**
 * Runs commands without a shell in a fixed working directory. A command that
 * outlives its timeout is killed with SIGKILL.
 */
export class ChildProcessRunner implements ProcessRunner {
  constructor(
    private readonly cwd: string,
    private readonly defaultTimeoutMs: number = DEFAULT_TIMEOUT_MS,
    private readonly maxCapturedBytes: number = MAX_CAPTURED_BYTES,
  ) {}

  async run(command: readonly string[], opts: RunOptions = {}): Promise<ProcessOutcome> {
    const [file, ...args] = command;
    if (file === undefined) {
      throw new Error("Cannot run an empty command; pseudo-checks are evaluated by their lane");
    }

    const timeoutMs = opts.timeoutMs ?? this.defaultTimeoutMs;
    const start = Date.now();
    const stdout = new TailBuffer(this.maxCapturedBytes);
    const stderr = new TailBuffer(this.maxCapturedBytes);

    return new Promise<ProcessOutcome>((resolve) => {
      const child = spawn(file, args, { cwd: this.cwd, shell: false, stdio: ["ignore", "pipe", "pipe"] });
      let settled = false;

      const finish = (kind: ProcessOutcome["kind"], exitCode: number | null, output: string): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ kind, exitCode, output, elapsedMs: Date.now() - start });
      };

      // Resolve at the deadline; grandchildren may keep the pipes open after the kill.
      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish("timeout", null, TIMEOUT_MARKER);
      }, timeoutMs);

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      // Launch errors (ENOENT, EACCES, ...) never produced output of their own.
      child.on("error", (e: Error) => {
        const captured = stdout.text() + stderr.text();
        finish("failure", null, captured.length > 0 ? captured : e.message);
      });

      child.on("close", (code: number | null) => {
        const output = stdout.text() + stderr.text();
        finish(code === 0 ? "success" : "failure", code, output);
      });
    });
  }
}
