import type { ChalkInstance } from "chalk";
import type { CheckStatus, LaneKind } from "../types/lane.js";
import type { LaneColor } from "../types/config.js";
import type { OutputFormat, Writer } from "../types/output.js";
import { formatSecs, statusSymbol } from "../report/format.js";

export type ProgressEvent =
  | { type: "lane-start"; lane: string; kind: LaneKind; color: LaneColor; total: number }
  | { type: "check-start"; lane: string; check: string }
  | { type: "check-end"; lane: string; check: string; status: CheckStatus; elapsedMs: number }
  | { type: "lane-end"; lane: string; failed: boolean; elapsedMs: number };

/** Write side of the progress channel, shared by every lane worker. */
export interface ProgressSink {
  send(event: ProgressEvent): void;
}

/**
 * Unbounded single-consumer message channel. Lane workers send; one consumer
 * iterates and owns all display state, so no rendering state is shared.
 */
export class ProgressChannel<T> implements AsyncIterable<T> {
  private queue: T[] = [];
  private closed = false;
  private wake: (() => void) | null = null;

  send(message: T): void {
    if (this.closed) {
      throw new Error("Progress channel is closed");
    }
    this.queue.push(message);
    this.notify();
  }

  /** No further sends; the consumer drains what is queued and stops. */
  close(): void {
    this.closed = true;
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for (;;) {
      if (this.queue.length > 0) {
        for (const message of this.queue.splice(0)) yield message;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }
}

type LaneProgress = { color: LaneColor; total: number; done: number };

const LABEL_WIDTH = 7;

/**
 * Consume progress events until the channel closes. Human output is one line
 * per finished check and per finished lane; jsonl output is the raw events.
 */
export async function renderProgress(
  events: AsyncIterable<ProgressEvent>,
  out: Writer,
  format: OutputFormat,
  c: ChalkInstance,
): Promise<void> {
  const lanes = new Map<string, LaneProgress>();

  for await (const event of events) {
    if (format === "jsonl") {
      out.write(JSON.stringify(event) + "\n");
      continue;
    }

    switch (event.type) {
      case "lane-start":
        lanes.set(event.lane, { color: event.color, total: event.total, done: 0 });
        break;
      case "check-start":
        break;
      case "check-end": {
        const state = lanes.get(event.lane);
        if (state) state.done += 1;
        const counter = state ? `[${state.done}/${state.total}]` : "";
        const label = laneLabel(event.lane, state, c);
        out.write(
          `  ${label} ${c.dim(counter)} ${statusSymbol(event.status, c)} ${event.check} ${c.dim(formatSecs(event.elapsedMs))}\n`,
        );
        break;
      }
      case "lane-end": {
        const label = laneLabel(event.lane, lanes.get(event.lane), c);
        const verdict = event.failed ? c.red("✗ Failed") : c.green("✓ Done");
        out.write(`  ${label} ${verdict} ${c.dim(formatSecs(event.elapsedMs))}\n`);
        break;
      }
    }
  }
}

function laneLabel(lane: string, state: LaneProgress | undefined, c: ChalkInstance): string {
  const padded = lane.padEnd(LABEL_WIDTH);
  return state ? c.bold[state.color](padded) : c.bold(padded);
}
