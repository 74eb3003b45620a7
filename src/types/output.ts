export type OutputFormat = "human" | "jsonl";

/** Anything text can be written to; process.stdout in production. */
export type Writer = {
  write(chunk: string): unknown;
};
